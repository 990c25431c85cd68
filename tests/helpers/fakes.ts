/**
 * Fake modules and collaborators shared by engine tests.
 */

import { EngineError, rollbackCommandError } from '../../src/domain/errors';
import { ModuleContext, ModuleDescriptor, ModuleResult, ok } from '../../src/domain/module';
import { CommandRunner } from '../../src/engine/command-runner';

export const FIXED_NOW = new Date('2026-03-01T10:00:00.000Z');
export const fixedClock = (): Date => FIXED_NOW;

/** Records every command; fails the ones listed. */
export class CapturingRunner implements CommandRunner {
  readonly commands: string[] = [];

  constructor(private readonly failing: ReadonlySet<string> = new Set()) {}

  async run(command: string): Promise<void> {
    this.commands.push(command);
    if (this.failing.has(command)) {
      throw new EngineError(rollbackCommandError(command, `Command exited with code 1`, 1));
    }
  }
}

export interface FakeModuleOptions {
  dependsOn?: string[];
  parallelGroup?: string;
  expectedDurationMs?: number;
  /** Transactions recorded by execute, in order. */
  records?: Array<[string, string]>;
  check?: (context: ModuleContext) => Promise<ModuleResult>;
  /** Runs after the records are written. */
  execute?: (context: ModuleContext) => Promise<ModuleResult>;
}

/** Call counters per module id. */
export class CallLog {
  readonly checks: string[] = [];
  readonly executes: string[] = [];

  count(list: 'checks' | 'executes', moduleId: string): number {
    return this[list].filter((id) => id === moduleId).length;
  }
}

export function fakeModule(id: string, calls: CallLog, options: FakeModuleOptions = {}): ModuleDescriptor {
  return {
    id,
    dependsOn: options.dependsOn ?? [],
    parallelGroup: options.parallelGroup,
    expectedDurationMs: options.expectedDurationMs,
    capability: {
      async checkPrerequisites(context) {
        calls.checks.push(id);
        return options.check ? options.check(context) : ok();
      },
      async execute(context) {
        calls.executes.push(id);
        for (const [action, command] of options.records ?? []) {
          await context.transactions.record(action, command);
        }
        return options.execute ? options.execute(context) : ok();
      },
    },
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
