/**
 * Module runner: drives one module through its state machine.
 *
 * Modules report failure as results; anything a module throws is caught
 * here and turned into the same typed outcome. The runner never rejects
 * for module behavior, so a batch barrier always sees every member reach
 * a terminal state.
 */

import { CheckpointStore, readOnlyCheckpoints } from '../domain/checkpoint';
import {
  EngineError,
  TypedError,
  createTypedError,
  describeThrown,
  executionError,
  isEngineError,
  prerequisiteError,
  storageError,
} from '../domain/errors';
import { ModuleContext, ModuleDescriptor, ModuleFailureReason } from '../domain/module';
import { ModuleRunResult, ModuleRunStatus } from '../domain/run';
import { Logger } from '../logger';
import { PhaseEventPublisher } from '../monitoring/publisher';
import { RunTransactionRecorder } from './run-recorder';
import { transitionModuleStatus } from './state-machine';

export interface ModuleRunDependencies {
  runId: string;
  checkpoints: CheckpointStore;
  recorder: RunTransactionRecorder;
  settings: Readonly<Record<string, string>>;
  dryRun: boolean;
  /** Re-run despite an existing checkpoint. */
  forced: boolean;
  logger: Logger;
  publisher?: PhaseEventPublisher;
  now: () => Date;
}

/** Run a single module to a terminal state. */
export async function runModule(descriptor: ModuleDescriptor, deps: ModuleRunDependencies): Promise<ModuleRunResult> {
  const moduleId = descriptor.id;
  const log = deps.logger.child({ moduleId });
  const started = deps.now();
  const transactions = deps.recorder.forModule();
  let status = ModuleRunStatus.Pending;
  let forced: boolean | undefined;

  const advance = (target: ModuleRunStatus): void => {
    const result = transitionModuleStatus(status, target);
    if (result.error) throw new EngineError({ ...result.error, moduleId, runId: deps.runId });
    status = target;
  };

  const finish = (target: ModuleRunStatus, error?: TypedError): ModuleRunResult => {
    advance(target);
    const completed = deps.now();
    const result: ModuleRunResult = {
      moduleId,
      status,
      startedAt: started.toISOString(),
      completedAt: completed.toISOString(),
      durationMs: completed.getTime() - started.getTime(),
      transactionsRecorded: transactions.recorded,
      forced,
      error: error ? { ...error, moduleId, runId: deps.runId } : undefined,
    };
    if (error) {
      log.warn(`Module ${status}`, { code: error.code, error: error.message });
    } else {
      log.info(`Module ${status}`, { durationMs: result.durationMs, transactions: result.transactionsRecorded });
    }
    deps.publisher?.publish({
      type: 'module.completed',
      runId: deps.runId,
      moduleId,
      payload: { status, durationMs: result.durationMs, code: error?.code },
    });
    return result;
  };

  // Checkpoint gate
  try {
    if (!deps.forced && (await deps.checkpoints.exists(moduleId))) {
      return finish(ModuleRunStatus.Skipped);
    }
  } catch (err) {
    return finish(ModuleRunStatus.Failed, asStorageError(err, 'CHECKPOINT_READ', `Cannot read checkpoint of ${moduleId}`));
  }

  deps.publisher?.publish({
    type: 'module.started',
    runId: deps.runId,
    moduleId,
    payload: { expectedDurationMs: descriptor.expectedDurationMs },
  });

  const context: ModuleContext = {
    runId: deps.runId,
    moduleId,
    settings: deps.settings,
    dryRun: deps.dryRun,
    logger: log,
    checkpoints: readOnlyCheckpoints(deps.checkpoints),
    transactions,
  };

  advance(ModuleRunStatus.Checking);
  try {
    const check = await descriptor.capability.checkPrerequisites(context);
    if (!check.success) {
      return finish(ModuleRunStatus.Blocked, prerequisiteError(moduleId, check.reason.message, reasonDetails(check.reason)));
    }
  } catch (err) {
    return finish(ModuleRunStatus.Blocked, thrownError(err, 'PREREQUISITE.THREW', moduleId));
  }

  if (deps.dryRun) {
    return finish(ModuleRunStatus.Ready);
  }

  advance(ModuleRunStatus.Running);
  // A forced module keeps its checkpoint until its prerequisites have passed.
  if (deps.forced) {
    try {
      forced = await deps.checkpoints.remove(moduleId);
      if (forced) log.info('Checkpoint removed for forced re-run');
    } catch (err) {
      return finish(ModuleRunStatus.Failed, asStorageError(err, 'CHECKPOINT_WRITE', `Cannot remove checkpoint of ${moduleId}`));
    }
  }
  try {
    const outcome = await descriptor.capability.execute(context);
    if (!outcome.success) {
      return finish(ModuleRunStatus.Failed, executionError(moduleId, outcome.reason.message, reasonDetails(outcome.reason)));
    }
  } catch (err) {
    return finish(ModuleRunStatus.Failed, thrownError(err, 'EXECUTION.THREW', moduleId));
  }

  // The work happened; failing to remember it is fatal.
  try {
    await deps.checkpoints.create(moduleId);
  } catch (err) {
    return finish(ModuleRunStatus.Failed, asStorageError(err, 'CHECKPOINT_WRITE', `Cannot write checkpoint of ${moduleId}`));
  }
  return finish(ModuleRunStatus.Completed);
}

function reasonDetails(reason: ModuleFailureReason): Record<string, unknown> | undefined {
  const details: Record<string, unknown> = { ...reason.details };
  if (reason.code) details.reasonCode = reason.code;
  if (reason.fieldErrors?.length) details.fieldErrors = reason.fieldErrors;
  return Object.keys(details).length > 0 ? details : undefined;
}

/** Storage failures keep their kind; any other throw becomes `code`. */
function thrownError(err: unknown, code: string, moduleId: string): TypedError {
  if (isEngineError(err) && err.kind === 'StorageError') return err.typedError;
  return createTypedError({
    code,
    message: describeThrown(err),
    moduleId,
    details: isEngineError(err) ? { cause: err.code } : undefined,
  });
}

function asStorageError(err: unknown, code: string, message: string): TypedError {
  if (isEngineError(err)) return err.typedError;
  return storageError(code, `${message}: ${describeThrown(err)}`);
}
