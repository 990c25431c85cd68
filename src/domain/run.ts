/**
 * Provisioning run domain model.
 *
 * A run walks the execution plan once. Each module moves through its own
 * state machine; the run's outcome and the optional rollback report are
 * collected in a RunReport.
 */

import { TypedError } from './errors';
import { ExecutionPlan } from './module';
import { RollbackReport } from './transaction';

/** Run lifecycle states. */
export enum RunStatus {
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Canceled = 'canceled',
}

/** Per-module states. */
export enum ModuleRunStatus {
  Pending = 'pending',
  Skipped = 'skipped',
  Checking = 'checking',
  Blocked = 'blocked',
  /** Dry-run only: prerequisites passed, execute would have been called. */
  Ready = 'ready',
  Running = 'running',
  Completed = 'completed',
  Failed = 'failed',
}

/** Valid state transitions for modules. */
export const VALID_MODULE_TRANSITIONS: Record<ModuleRunStatus, ModuleRunStatus[]> = {
  [ModuleRunStatus.Pending]: [ModuleRunStatus.Skipped, ModuleRunStatus.Checking, ModuleRunStatus.Failed],
  [ModuleRunStatus.Checking]: [ModuleRunStatus.Blocked, ModuleRunStatus.Ready, ModuleRunStatus.Running],
  [ModuleRunStatus.Running]: [ModuleRunStatus.Completed, ModuleRunStatus.Failed],
  [ModuleRunStatus.Skipped]: [],
  [ModuleRunStatus.Blocked]: [],
  [ModuleRunStatus.Ready]: [],
  [ModuleRunStatus.Completed]: [],
  [ModuleRunStatus.Failed]: [],
};

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Failed, RunStatus.Canceled],
  [RunStatus.Succeeded]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Canceled]: [],
};

/** Process exit codes reported by a run. */
export enum ExitCode {
  Success = 0,
  ModuleFailure = 1,
  ConfigurationError = 2,
  RollbackDegraded = 3,
  StorageError = 4,
  LockHeld = 5,
  Declined = 6,
}

/** Outcome of one module within a run. */
export interface ModuleRunResult {
  moduleId: string;
  status: ModuleRunStatus;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  /** Transactions this module recorded during the run. */
  transactionsRecorded: number;
  /** Whether an existing checkpoint was removed because the module was forced. */
  forced?: boolean;
  error?: TypedError;
}

/** Options honored by a single orchestrator invocation. */
export interface RunOptions {
  /** Plan and check prerequisites only; never execute, checkpoint or record. */
  dryRun?: boolean;
  /** Re-run every module (true) or the named modules despite their checkpoints. */
  force?: boolean | string[];
  /** Skip the confirmation collaborator. */
  assumeYes?: boolean;
}

/** The first fatal cause of a failed run. */
export interface RunFailure {
  moduleId?: string;
  error: TypedError;
}

/** Final report of one orchestrator invocation. */
export interface RunReport {
  runId: string;
  status: RunStatus;
  dryRun: boolean;
  startedAt: string;
  completedAt: string;
  plan: ExecutionPlan;
  modules: Record<string, ModuleRunResult>;
  failure?: RunFailure;
  rollback?: RollbackReport;
  /** Storage failure that interrupted the rollback itself. */
  rollbackError?: TypedError;
  /** Checkpoints removed after the rollback of this run. */
  checkpointsReverted: string[];
  exitCode: ExitCode;
}
