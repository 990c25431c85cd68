/**
 * Host provisioner: checkpointed, rollback-capable provisioning engine
 * for a single machine.
 *
 * Modules are registered as descriptors, planned into dependency-ordered
 * batches and executed by the orchestrator. Checkpoints make reruns skip
 * finished work; the transaction log lets a failed run be compensated.
 */

export * from './domain';
export * from './config';
export * from './graph/planner';
export * from './graph/registry';
export * from './storage';
export * from './engine/command-runner';
export * from './engine/module-runner';
export * from './engine/orchestrator';
export * from './engine/rollback-executor';
export * from './engine/run-recorder';
export * from './engine/run-summary';
export * from './engine/state-machine';
export * from './monitoring/duration-watch';
export * from './monitoring/publisher';
export * from './provisioner';
export {
  LogLevel,
  LogEntry,
  LogHandler,
  Logger,
  createLogger,
  getLogLevel,
  logger,
  resetLogHandler,
  setLogHandler,
  setLogLevel,
} from './logger';
