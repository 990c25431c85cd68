/**
 * Provisioning module model.
 *
 * A module is a unit of provisioning work registered once per run under a
 * stable identifier. The engine only ever talks to it through the
 * {checkPrerequisites, execute} capability pair.
 */

import { Logger } from '../logger';
import { FieldError } from './errors';
import { CheckpointReader } from './checkpoint';
import { TransactionRecorder } from './transaction';

/** Structured reason a module reports for a failed check or execution. */
export interface ModuleFailureReason {
  message: string;
  /** Module-local code, e.g. "DISK_SPACE". */
  code?: string;
  /** Field errors mapped from the validation collaborator. */
  fieldErrors?: FieldError[];
  details?: Record<string, unknown>;
}

export type ModuleResult =
  | { success: true }
  | { success: false; reason: ModuleFailureReason };

/** Everything a module may use while checking or executing. */
export interface ModuleContext {
  runId: string;
  moduleId: string;
  /** Resolved configuration. */
  settings: Readonly<Record<string, string>>;
  dryRun: boolean;
  logger: Logger;
  /** Read-only view of completed modules, for cross-module conditions. */
  checkpoints: CheckpointReader;
  /** Run-scoped transaction log handle. */
  transactions: TransactionRecorder;
}

/** The capability every module implements. */
export interface ModuleCapability {
  /** Side-effect-free gate. */
  checkPrerequisites(context: ModuleContext): Promise<ModuleResult>;
  /**
   * Mutating work. Record every undoable side effect through
   * context.transactions before (or atomically with) performing it.
   */
  execute(context: ModuleContext): Promise<ModuleResult>;
}

/** Registration-time description of a module. */
export interface ModuleDescriptor {
  id: string;
  dependsOn: readonly string[];
  /** Modules sharing a tag and ready at the same time run in one batch. */
  parallelGroup?: string;
  /** Advisory duration for the monitoring collaborator. */
  expectedDurationMs?: number;
  capability: ModuleCapability;
}

/** A set of modules eligible to run concurrently. */
export interface ExecutionBatch {
  index: number;
  modules: string[];
  parallelGroup?: string;
}

/** Derived, never persisted. */
export interface ExecutionPlan {
  batches: ExecutionBatch[];
  /** Flattened order, batch by batch. */
  order: string[];
}

export const MODULE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function isValidModuleId(id: string): boolean {
  return MODULE_ID_PATTERN.test(id);
}

/** Success result helper for module authors. */
export function ok(): ModuleResult {
  return { success: true };
}

/** Failure result helper for module authors. */
export function fail(message: string, extras: Omit<ModuleFailureReason, 'message'> = {}): ModuleResult {
  return { success: false, reason: { message, ...extras } };
}

/** Map validation collaborator output into a module result. */
export function fromFieldErrors(errors: FieldError[], message = 'Invalid configuration'): ModuleResult {
  if (errors.length === 0) return ok();
  return fail(message, { code: 'INVALID_CONFIGURATION', fieldErrors: errors });
}
