/**
 * Phase events.
 *
 * The orchestrator announces run, module and rollback phases; the
 * monitoring collaborator consumes them. Nothing flows back.
 */

export type PhaseEventType =
  | 'run.started'
  | 'run.completed'
  | 'module.started'
  | 'module.completed'
  | 'module.overdue'
  | 'rollback.started'
  | 'rollback.completed';

export interface PhaseEvent {
  id: string;
  type: PhaseEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  runId: string;
  moduleId?: string;
  payload: Record<string, unknown>;
}

export interface PhaseEventSubscription {
  id: string;
  /** Deliver only these types; all types when omitted. */
  eventTypes?: PhaseEventType[];
  callback: (event: PhaseEvent) => void;
}
