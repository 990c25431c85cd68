/**
 * Common (action, rollback command) pairs for provisioning modules.
 *
 * Every interpolated name or path is single-quoted for the shell.
 */

import { TransactionRecorder } from '../domain/transaction';

export interface TransactionTemplate {
  action: string;
  rollbackCommand: string;
}

/** Quote a value for POSIX sh. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function packageInstall(pkg: string): TransactionTemplate {
  return { action: `Installed package: ${pkg}`, rollbackCommand: `apt-get remove -y ${shellQuote(pkg)}` };
}

export function fileCreate(file: string): TransactionTemplate {
  return { action: `Created file: ${file}`, rollbackCommand: `rm -f ${shellQuote(file)}` };
}

export function directoryCreate(dir: string): TransactionTemplate {
  return { action: `Created directory: ${dir}`, rollbackCommand: `rm -rf ${shellQuote(dir)}` };
}

export function fileModify(file: string, backup: string): TransactionTemplate {
  return { action: `Modified file: ${file}`, rollbackCommand: `cp ${shellQuote(backup)} ${shellQuote(file)}` };
}

export function userCreate(username: string): TransactionTemplate {
  return { action: `Created user: ${username}`, rollbackCommand: `userdel -r ${shellQuote(username)}` };
}

export function serviceEnable(service: string): TransactionTemplate {
  const quoted = shellQuote(service);
  return { action: `Enabled service: ${service}`, rollbackCommand: `systemctl disable ${quoted} && systemctl stop ${quoted}` };
}

export function configChange(description: string, restoreCommand: string): TransactionTemplate {
  return { action: `Configuration: ${description}`, rollbackCommand: restoreCommand };
}

/** Record a template through a run-scoped recorder. */
export function recordTemplate(recorder: TransactionRecorder, template: TransactionTemplate): Promise<void> {
  return recorder.record(template.action, template.rollbackCommand);
}
