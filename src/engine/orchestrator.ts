/**
 * Orchestrator: the core provisioning engine.
 *
 * Walks the registry's plan batch by batch. Members of a batch run
 * concurrently (at most `maxParallel` at a time) behind a barrier; the
 * first BLOCKED or FAILED member stops further batches, and the run's own
 * log segment is rolled back once the barrier is reached.
 */

import { v4 as uuid } from 'uuid';
import { CheckpointStore } from '../domain/checkpoint';
import {
  EngineError,
  TypedError,
  errorKind,
  isEngineError,
  runDeclinedError,
  unknownModuleError,
} from '../domain/errors';
import { ExecutionPlan, ModuleDescriptor } from '../domain/module';
import {
  ExitCode,
  ModuleRunResult,
  ModuleRunStatus,
  RunFailure,
  RunOptions,
  RunReport,
  RunStatus,
} from '../domain/run';
import { RollbackReport, TransactionLog } from '../domain/transaction';
import { ModuleRegistry } from '../graph/registry';
import { Logger, logger as rootLogger } from '../logger';
import { PhaseEventPublisher } from '../monitoring/publisher';
import { CommandRunner, ShellCommandRunner } from './command-runner';
import { runModule } from './module-runner';
import { RollbackExecutor } from './rollback-executor';
import { RunTransactionRecorder } from './run-recorder';
import { isHaltingModuleStatus, transitionRunStatus } from './state-machine';

/** What the operator is asked to approve before anything executes. */
export interface ConfirmationRequest {
  runId: string;
  plan: ExecutionPlan;
  /** Modules without a checkpoint, plus forced ones, in plan order. */
  pending: string[];
  forced: string[];
}

export type ConfirmFn = (request: ConfirmationRequest) => Promise<boolean>;

export interface OrchestratorDependencies {
  registry: ModuleRegistry;
  checkpoints: CheckpointStore;
  transactions: TransactionLog;
  /** Runs rollback commands; defaults to the shell runner. */
  commandRunner?: CommandRunner;
  publisher?: PhaseEventPublisher;
  confirm?: ConfirmFn;
  settings?: Readonly<Record<string, string>>;
  maxParallel?: number;
  logger?: Logger;
  now?: () => Date;
}

export const DEFAULT_MAX_PARALLEL = 4;

export class Orchestrator {
  private readonly registry: ModuleRegistry;
  private readonly checkpoints: CheckpointStore;
  private readonly transactions: TransactionLog;
  private readonly rollback: RollbackExecutor;
  private readonly publisher?: PhaseEventPublisher;
  private readonly confirm?: ConfirmFn;
  private readonly settings: Readonly<Record<string, string>>;
  private readonly maxParallel: number;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(deps: OrchestratorDependencies) {
    this.registry = deps.registry;
    this.checkpoints = deps.checkpoints;
    this.transactions = deps.transactions;
    this.publisher = deps.publisher;
    this.confirm = deps.confirm;
    this.settings = Object.freeze({ ...deps.settings });
    this.maxParallel = Math.max(1, deps.maxParallel ?? DEFAULT_MAX_PARALLEL);
    this.log = (deps.logger ?? rootLogger).child({ component: 'orchestrator' });
    this.now = deps.now ?? (() => new Date());
    this.rollback = new RollbackExecutor({
      log: deps.transactions,
      runner: deps.commandRunner ?? new ShellCommandRunner({ logger: deps.logger }),
      publisher: deps.publisher,
      logger: deps.logger,
      now: this.now,
    });
  }

  /**
   * Execute one run. Throws an EngineError (CONFIGURATION.UNKNOWN_MODULE)
   * before anything runs when `force` names an unregistered module.
   */
  async run(options: RunOptions = {}): Promise<RunReport> {
    const dryRun = options.dryRun ?? false;
    const forcedIds = this.resolveForced(options.force);
    const runId = `run_${uuid()}`;
    const startedAt = this.now().toISOString();
    const plan = this.registry.plan;
    const log = this.log.child({ runId });

    const modules: Record<string, ModuleRunResult> = {};
    for (const moduleId of plan.order) {
      modules[moduleId] = { moduleId, status: ModuleRunStatus.Pending, transactionsRecorded: 0 };
    }

    let status = RunStatus.Running;
    const report = (finalStatus: RunStatus, extras: Partial<RunReport> = {}): RunReport => {
      const result = transitionRunStatus(status, finalStatus);
      if (result.error) throw new EngineError({ ...result.error, runId });
      status = finalStatus;
      const partial: RunReport = {
        runId,
        status,
        dryRun,
        startedAt,
        completedAt: this.now().toISOString(),
        plan,
        modules,
        checkpointsReverted: [],
        exitCode: ExitCode.Success,
        ...extras,
      };
      partial.exitCode = exitCodeFor(partial);
      log.info('Run finished', { status, exitCode: partial.exitCode, failingModule: partial.failure?.moduleId });
      this.publisher?.publish({
        type: 'run.completed',
        runId,
        payload: { status, exitCode: partial.exitCode, failingModule: partial.failure?.moduleId },
      });
      return partial;
    };

    log.info('Run started', { dryRun, modules: plan.order.length, batches: plan.batches.length, forced: forcedIds.size });
    this.publisher?.publish({ type: 'run.started', runId, payload: { dryRun, modules: plan.order.length, batches: plan.batches.length } });

    if (!dryRun && !options.assumeYes && this.confirm) {
      const request = await this.confirmationRequest(runId, plan, forcedIds);
      if (!(await this.confirm(request))) {
        log.warn('Run declined at confirmation');
        return report(RunStatus.Canceled, { failure: { error: runDeclinedError(runId) } });
      }
    }

    const recorder = new RunTransactionRecorder(this.transactions, runId, dryRun, this.log);
    let failure: RunFailure | undefined;

    for (const batch of plan.batches) {
      if (failure && !dryRun) break;
      log.debug('Batch started', { batch: batch.index, modules: batch.modules, parallelGroup: batch.parallelGroup });

      const results = await mapWithLimit(batch.modules, this.maxParallel, (moduleId) =>
        runModule(this.descriptor(moduleId), {
          runId,
          checkpoints: this.checkpoints,
          recorder,
          settings: this.settings,
          dryRun,
          forced: forcedIds.has(moduleId),
          logger: log,
          publisher: this.publisher,
          now: this.now,
        }),
      );

      for (const result of results) {
        modules[result.moduleId] = result;
        if (!failure && isHaltingModuleStatus(result.status) && result.error) {
          failure = { moduleId: result.moduleId, error: result.error };
        }
      }
    }

    if (!failure) {
      return report(RunStatus.Succeeded);
    }
    if (dryRun) {
      return report(RunStatus.Failed, { failure });
    }

    log.warn('Run halted; rolling back', { failingModule: failure.moduleId, code: failure.error.code });
    let rollback: RollbackReport | undefined;
    let rollbackError: TypedError | undefined;
    const checkpointsReverted: string[] = [];
    try {
      rollback = recorder.hasBegun ? await this.rollback.execute({ runId }) : this.emptyRollback(runId);
      for (const result of Object.values(modules)) {
        if (result.status !== ModuleRunStatus.Completed) continue;
        if (await this.checkpoints.remove(result.moduleId)) {
          checkpointsReverted.push(result.moduleId);
        }
      }
    } catch (err) {
      if (!isEngineError(err)) throw err;
      rollbackError = err.typedError;
      log.error('Rollback could not complete', { code: err.code, error: err.message });
    }

    return report(RunStatus.Failed, { failure, rollback, rollbackError, checkpointsReverted });
  }

  /** Nothing was recorded in this run, so there is nothing to undo and no marker to write. */
  private emptyRollback(runId: string): RollbackReport {
    const now = this.now().toISOString();
    return { label: runId, attempted: 0, succeeded: 0, failed: [], alreadyCompensated: 0, startedAt: now, completedAt: now };
  }

  private descriptor(moduleId: string): ModuleDescriptor {
    const descriptor = this.registry.get(moduleId);
    if (!descriptor) throw new EngineError(unknownModuleError(moduleId));
    return descriptor;
  }

  private resolveForced(force: RunOptions['force']): Set<string> {
    if (force === true) return new Set(this.registry.ids());
    if (!force) return new Set();
    for (const moduleId of force) {
      if (!this.registry.has(moduleId)) throw new EngineError(unknownModuleError(moduleId));
    }
    return new Set(force);
  }

  private async confirmationRequest(runId: string, plan: ExecutionPlan, forcedIds: Set<string>): Promise<ConfirmationRequest> {
    const existing = await this.checkpoints.list();
    return {
      runId,
      plan,
      pending: plan.order.filter((id) => forcedIds.has(id) || !existing.has(id)),
      forced: plan.order.filter((id) => forcedIds.has(id)),
    };
  }
}

/** Map a finished report to its process exit code. */
export function exitCodeFor(report: Pick<RunReport, 'status' | 'failure' | 'rollback' | 'rollbackError'>): ExitCode {
  if (report.status === RunStatus.Canceled) return ExitCode.Declined;
  if (!report.failure) return ExitCode.Success;

  switch (errorKind(report.failure.error)) {
    case 'ConfigurationError':
    case 'ArgumentError':
      if (!report.failure.moduleId) return ExitCode.ConfigurationError;
      break;
    case 'StorageError':
      return ExitCode.StorageError;
    case 'LockError':
      return ExitCode.LockHeld;
    default:
      break;
  }
  if (report.rollbackError) return ExitCode.StorageError;
  if (report.rollback && report.rollback.failed.length > 0) return ExitCode.RollbackDegraded;
  return ExitCode.ModuleFailure;
}

/** Run `task` over `items` with at most `limit` in flight; results keep input order. */
async function mapWithLimit<T, R>(items: readonly T[], limit: number, task: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index]);
    }
  };
  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, worker));
  return results;
}
