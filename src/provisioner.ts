/**
 * Scoped provisioning entry point.
 *
 * Owns everything around a single orchestrator run: log level, store
 * initialization, the run lock and the duration watch. Configuration
 * errors and lock contention come back as reports, not exceptions.
 */

import { v4 as uuid } from 'uuid';
import { CheckpointStore } from './domain/checkpoint';
import { TypedError, errorKind, isEngineError } from './domain/errors';
import { ModuleDescriptor } from './domain/module';
import { ExitCode, RunOptions, RunReport, RunStatus } from './domain/run';
import { TransactionLog } from './domain/transaction';
import { EngineConfig } from './config';
import { CommandRunner, ShellCommandRunner } from './engine/command-runner';
import { ConfirmFn, Orchestrator } from './engine/orchestrator';
import { ModuleRegistry } from './graph/registry';
import { Logger, logger as rootLogger, setLogLevel } from './logger';
import { DurationWatch } from './monitoring/duration-watch';
import { PhaseEventPublisher } from './monitoring/publisher';
import { FileCheckpointStore } from './storage/checkpoint-store';
import { RunLock, withRunLock } from './storage/run-lock';
import { FileTransactionLog } from './storage/transaction-log';

export interface ProvisionParams {
  /** A built registry, or descriptors to build one from. */
  modules: ModuleRegistry | ReadonlyArray<ModuleDescriptor>;
  config: EngineConfig;
  options?: RunOptions;
  confirm?: ConfirmFn;
  /** Defaults derive from `config`. */
  checkpoints?: CheckpointStore;
  transactions?: TransactionLog;
  commandRunner?: CommandRunner;
  lock?: RunLock;
  publisher?: PhaseEventPublisher;
  logger?: Logger;
}

export async function provision(params: ProvisionParams): Promise<RunReport> {
  const { config } = params;
  setLogLevel(config.logLevel);
  const log = (params.logger ?? rootLogger).child({ component: 'provisioner' });

  let registry: ModuleRegistry;
  try {
    registry = params.modules instanceof ModuleRegistry ? params.modules : ModuleRegistry.build(params.modules);
  } catch (err) {
    if (!isEngineError(err)) throw err;
    log.error('Module configuration rejected', { code: err.code, error: err.message });
    return failedReport(err.typedError, params.options);
  }

  const checkpoints = params.checkpoints ?? new FileCheckpointStore({ directory: config.checkpointDir, logger: params.logger });
  const transactions = params.transactions ?? new FileTransactionLog({ file: config.transactionLog, logger: params.logger });
  const publisher = params.publisher ?? new PhaseEventPublisher({ logger: params.logger });
  const lock = params.lock ?? new RunLock({ file: config.lockFile, logger: params.logger });

  const orchestrator = new Orchestrator({
    registry,
    checkpoints,
    transactions,
    commandRunner:
      params.commandRunner ??
      new ShellCommandRunner({ shell: config.shell, timeoutMs: config.rollbackCommandTimeoutMs, logger: params.logger }),
    publisher,
    confirm: params.confirm,
    settings: config.settings,
    maxParallel: config.maxParallel,
    logger: params.logger,
  });

  try {
    return await withRunLock(
      lock,
      async () => {
        await checkpoints.init();
        await transactions.init();

        const watch = new DurationWatch({ publisher, intervalMs: config.monitorIntervalMs, logger: params.logger });
        watch.start();
        try {
          return await orchestrator.run(params.options);
        } finally {
          watch.stop();
        }
      },
      log,
    );
  } catch (err) {
    if (!isEngineError(err)) throw err;
    log.error('Provisioning aborted', { code: err.code, error: err.message });
    return failedReport(err.typedError, params.options, registry);
  }
}

/** Report for a run that ended before any module was considered. */
function failedReport(error: TypedError, options: RunOptions = {}, registry?: ModuleRegistry): RunReport {
  const now = new Date().toISOString();
  return {
    runId: `run_${uuid()}`,
    status: RunStatus.Failed,
    dryRun: options.dryRun ?? false,
    startedAt: now,
    completedAt: now,
    plan: registry?.plan ?? { batches: [], order: [] },
    modules: {},
    failure: { error },
    checkpointsReverted: [],
    exitCode: earlyExitCode(error),
  };
}

function earlyExitCode(error: TypedError): ExitCode {
  switch (errorKind(error)) {
    case 'LockError':
      return ExitCode.LockHeld;
    case 'StorageError':
      return ExitCode.StorageError;
    case 'RunError':
      return ExitCode.ModuleFailure;
    default:
      return ExitCode.ConfigurationError;
  }
}
