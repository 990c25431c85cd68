/**
 * Run and module state machines.
 *
 * Enforces valid state transitions, producing typed errors on invalid
 * transitions.
 */

import {
  ModuleRunStatus,
  RunStatus,
  VALID_MODULE_TRANSITIONS,
  VALID_RUN_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a run state transition. */
export function transitionRunStatus(
  current: RunStatus,
  target: RunStatus,
): TransitionResult<RunStatus> {
  const validTargets = VALID_RUN_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'RUN.INVALID_TRANSITION',
        message: `Invalid run state transition: ${current} -> ${target}`,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a module state transition. */
export function transitionModuleStatus(
  current: ModuleRunStatus,
  target: ModuleRunStatus,
): TransitionResult<ModuleRunStatus> {
  const validTargets = VALID_MODULE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'MODULE.INVALID_TRANSITION',
        message: `Invalid module state transition: ${current} -> ${target}`,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

export function isTerminalRunStatus(status: RunStatus): boolean {
  return VALID_RUN_TRANSITIONS[status].length === 0;
}

export function isTerminalModuleStatus(status: ModuleRunStatus): boolean {
  return VALID_MODULE_TRANSITIONS[status].length === 0;
}

/** Terminal states that halt the run. */
export function isHaltingModuleStatus(status: ModuleRunStatus): boolean {
  return status === ModuleRunStatus.Blocked || status === ModuleRunStatus.Failed;
}

/** Terminal states that count as success. */
export function isSuccessfulModuleStatus(status: ModuleRunStatus): boolean {
  return status === ModuleRunStatus.Completed || status === ModuleRunStatus.Skipped || status === ModuleRunStatus.Ready;
}
