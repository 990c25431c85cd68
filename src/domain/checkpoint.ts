/**
 * Checkpoint domain model.
 *
 * Presence of a checkpoint means the module's mutating work is complete
 * for the current configuration. Only the orchestrator creates them.
 */

export interface Checkpoint {
  moduleId: string;
  createdAt: string;
  hostname?: string;
  user?: string;
}

/** Read-only checkpoint access handed to modules. */
export interface CheckpointReader {
  exists(moduleId: string): Promise<boolean>;
  get(moduleId: string): Promise<Checkpoint | null>;
  list(): Promise<Set<string>>;
}

/** Durable presence/absence marker per module. */
export interface CheckpointStore extends CheckpointReader {
  init(): Promise<void>;
  /** Idempotent: creating an existing checkpoint succeeds without change. */
  create(moduleId: string): Promise<Checkpoint>;
  /** Returns whether a checkpoint was removed. */
  remove(moduleId: string): Promise<boolean>;
  /** Returns the number of checkpoints removed. */
  clearAll(): Promise<number>;
}

/** Restrict a store to its read side. */
export function readOnlyCheckpoints(store: CheckpointReader): CheckpointReader {
  return {
    exists: (moduleId) => store.exists(moduleId),
    get: (moduleId) => store.get(moduleId),
    list: () => store.list(),
  };
}
