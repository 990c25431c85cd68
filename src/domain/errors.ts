/**
 * Typed error model.
 *
 * Failures travel through the engine as data (TypedError) so that the
 * run report can carry the exact cause, the failing module and a rollback
 * summary. Operations that cannot return a result throw EngineError,
 * which wraps the same structure.
 */

/** Top-level error namespaces. */
export type ErrorDomain =
  | 'CONFIGURATION'
  | 'PREREQUISITE'
  | 'EXECUTION'
  | 'ROLLBACK'
  | 'STORAGE'
  | 'ARGUMENT'
  | 'LOCK'
  | 'RUN'
  | 'MODULE';

/** Error kinds surfaced to operators. */
export type ErrorKind =
  | 'ConfigurationError'
  | 'PrerequisiteError'
  | 'ExecutionError'
  | 'RollbackError'
  | 'StorageError'
  | 'ArgumentError'
  | 'LockError'
  | 'RunError';

/** Typed suggested fix an operator (or tool) can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** A single field-level validation failure reported by a module. */
export interface FieldError {
  field: string;
  reason: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g. "STORAGE.CHECKPOINT_WRITE"). */
  code: string;
  message: string;
  moduleId?: string;
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  moduleId?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    moduleId: params.moduleId,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

const KIND_BY_DOMAIN: Record<ErrorDomain, ErrorKind> = {
  CONFIGURATION: 'ConfigurationError',
  PREREQUISITE: 'PrerequisiteError',
  EXECUTION: 'ExecutionError',
  ROLLBACK: 'RollbackError',
  STORAGE: 'StorageError',
  ARGUMENT: 'ArgumentError',
  LOCK: 'LockError',
  RUN: 'RunError',
  MODULE: 'RunError',
};

function isErrorDomain(value: string): value is ErrorDomain {
  return Object.prototype.hasOwnProperty.call(KIND_BY_DOMAIN, value);
}

/** Map an error code to its kind. Unknown namespaces are run errors. */
export function errorKind(error: TypedError): ErrorKind {
  const domain = error.code.split('.')[0];
  return isErrorDomain(domain) ? KIND_BY_DOMAIN[domain] : 'RunError';
}

/** Thrown wrapper around a TypedError. */
export class EngineError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = errorKind(typedError);
  }

  get code(): string {
    return this.typedError.code;
  }

  get kind(): ErrorKind {
    return errorKind(this.typedError);
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

/** Best-effort message extraction for unknown thrown values. */
export function describeThrown(err: unknown): string {
  if (typeof err === 'string') return err;
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return 'Unknown error';
}

// --- CONFIGURATION ---

export function dependencyCycleError(cycle: string[]): TypedError {
  return createTypedError({
    code: 'CONFIGURATION.CYCLE',
    message: `Dependency cycle detected: ${cycle.join(' -> ')}`,
    details: { cycle, modules: [...new Set(cycle)] },
    suggestedFixes: [
      { type: 'BREAK_CYCLE', params: { modules: [...new Set(cycle)] }, description: 'Remove one of the dependency edges in the cycle' },
    ],
  });
}

export function unresolvedDependencyError(moduleId: string, dependency: string): TypedError {
  return createTypedError({
    code: 'CONFIGURATION.UNRESOLVED_DEPENDENCY',
    message: `Module "${moduleId}" depends on unregistered module "${dependency}"`,
    moduleId,
    details: { dependency },
    suggestedFixes: [
      { type: 'REGISTER_MODULE', params: { moduleId: dependency }, description: `Register a module with id "${dependency}"` },
    ],
  });
}

export function duplicateModuleError(moduleId: string): TypedError {
  return createTypedError({
    code: 'CONFIGURATION.DUPLICATE_MODULE',
    message: `Module "${moduleId}" is registered more than once`,
    moduleId,
  });
}

export function unknownModuleError(moduleId: string): TypedError {
  return createTypedError({
    code: 'CONFIGURATION.UNKNOWN_MODULE',
    message: `Unknown module: ${moduleId}`,
    moduleId,
  });
}

export function invalidConfigError(issues: Array<{ path: string; message: string }>): TypedError {
  return createTypedError({
    code: 'CONFIGURATION.INVALID_CONFIG',
    message: `Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
    details: { issues },
  });
}

// --- MODULE OUTCOMES ---

export function prerequisiteError(moduleId: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'PREREQUISITE.FAILED',
    message,
    moduleId,
    details,
  });
}

export function executionError(moduleId: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'EXECUTION.FAILED',
    message,
    moduleId,
    details,
  });
}

export function rollbackCommandError(command: string, message: string, exitCode?: number): TypedError {
  return createTypedError({
    code: 'ROLLBACK.COMMAND_FAILED',
    message,
    retryable: true,
    details: { command, exitCode },
  });
}

// --- STORAGE ---

export function storageError(code: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: `STORAGE.${code}`,
    message,
    details,
  });
}

// --- ARGUMENT ---

export function emptyFieldError(field: string): TypedError {
  return createTypedError({
    code: 'ARGUMENT.EMPTY_FIELD',
    message: `Field "${field}" must not be empty`,
    details: { field },
  });
}

export function invalidFieldError(field: string, reason: string): TypedError {
  return createTypedError({
    code: 'ARGUMENT.INVALID_FIELD',
    message: `Field "${field}" is invalid: ${reason}`,
    details: { field, reason },
  });
}

export function invalidModuleIdError(moduleId: string): TypedError {
  return createTypedError({
    code: 'ARGUMENT.INVALID_MODULE_ID',
    message: `Invalid module id: "${moduleId}"`,
    details: { moduleId },
    suggestedFixes: [
      { type: 'RENAME_MODULE', params: { pattern: '^[A-Za-z0-9][A-Za-z0-9._-]*$' }, description: 'Use letters, digits, dot, underscore and dash only' },
    ],
  });
}

// --- LOCK / RUN ---

export function lockHeldError(lockFile: string, ownerPid: number): TypedError {
  return createTypedError({
    code: 'LOCK.HELD',
    message: `Another provisioning run holds the lock (PID ${ownerPid})`,
    retryable: true,
    details: { lockFile, ownerPid },
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: { ownerPid }, description: 'Wait for the other run to finish' },
    ],
  });
}

export function runDeclinedError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.DECLINED',
    message: 'Provisioning was not confirmed',
    runId,
  });
}
