/**
 * Rollback command execution.
 */

import { spawn } from 'child_process';
import { EngineError, describeThrown, rollbackCommandError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';

/** Executes one rollback command; rejects with an EngineError on failure. */
export interface CommandRunner {
  run(command: string): Promise<void>;
}

export interface ShellCommandRunnerOptions {
  shell?: string;
  timeoutMs?: number;
  logger?: Logger;
}

/** Keep the tail of stderr in error details. */
const MAX_STDERR_CHARS = 4096;

/** How long to wait for stderr to drain once the shell has exited. */
const STDERR_GRACE_MS = 200;

/** Runs commands through `<shell> -c`. */
export class ShellCommandRunner implements CommandRunner {
  private readonly shell: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(options: ShellCommandRunnerOptions = {}) {
    this.shell = options.shell ?? '/bin/sh';
    this.timeoutMs = options.timeoutMs ?? 300_000;
    this.log = (options.logger ?? rootLogger).child({ component: 'command-runner' });
  }

  run(command: string): Promise<void> {
    this.log.debug('Running command', { command, shell: this.shell });

    return new Promise<void>((resolve, reject) => {
      // Own process group, so a timeout can kill everything the command started.
      const proc = spawn(this.shell, ['-c', command], { stdio: ['ignore', 'ignore', 'pipe'], detached: true });
      let stderr = '';
      let settled = false;
      let exitGrace: NodeJS.Timeout | undefined;

      const settle = (error?: EngineError) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        clearTimeout(exitGrace);
        if (error) reject(error);
        else resolve();
      };

      const finish = (exitCode: number | null, signal: NodeJS.Signals | null) => {
        if (exitCode === 0) {
          settle();
          return;
        }
        const reason = exitCode === null ? `killed by ${signal ?? 'signal'}` : `exited with code ${exitCode}`;
        const tail = stderr.trim();
        const message = tail ? `Command ${reason}: ${tail}` : `Command ${reason}`;
        settle(new EngineError(rollbackCommandError(command, message, exitCode ?? undefined)));
      };

      const timer = setTimeout(() => {
        this.killGroup(proc.pid);
        settle(new EngineError(rollbackCommandError(command, `Command timed out after ${this.timeoutMs}ms`)));
      }, this.timeoutMs);

      proc.stderr.on('data', (data: Buffer) => {
        stderr = (stderr + data.toString()).slice(-MAX_STDERR_CHARS);
      });

      proc.on('error', (err) => {
        settle(new EngineError(rollbackCommandError(command, `Cannot start ${this.shell}: ${err.message}`)));
      });

      // A background process may keep stderr open after the shell exits.
      proc.on('exit', (exitCode, signal) => {
        exitGrace = setTimeout(() => finish(exitCode, signal), STDERR_GRACE_MS);
      });

      proc.on('close', (exitCode, signal) => finish(exitCode, signal));
    });
  }

  private killGroup(pid: number | undefined): void {
    if (pid === undefined) return;
    try {
      process.kill(-pid, 'SIGKILL');
    } catch (err) {
      this.log.debug('Process group already gone', { pid, error: describeThrown(err) });
    }
  }
}
