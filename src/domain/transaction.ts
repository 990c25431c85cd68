/**
 * Transaction domain model.
 *
 * The transaction log is an append-only sequence of
 * `timestamp|action|rollback_command` lines. Log order is the chronological
 * order of forward actions; rollback consumes it in reverse.
 */

import { TypedError, emptyFieldError, invalidFieldError } from './errors';

export const FIELD_DELIMITER = '|';

/** Rollback command written for marker entries; never executed. */
export const MARKER_COMMAND = ':';

const RUN_BEGIN_PREFIX = '@run-begin ';
const ROLLBACK_PREFIX = '@rollback ';

export interface TransactionEntry {
  timestamp: string;
  action: string;
  rollbackCommand: string;
  /** 1-based line number in the log. */
  line: number;
}

/** Result of scanning the log for malformed lines. */
export interface LogValidationResult {
  valid: boolean;
  entries: number;
  /** First malformed line (1-based). */
  firstMalformedLine?: number;
  malformedLines: number;
}

/** The append-only log. */
export interface TransactionLog {
  init(): Promise<void>;
  record(action: string, rollbackCommand: string): Promise<TransactionEntry>;
  /**
   * Append several lines as one atomic unit; used to write a run marker
   * together with the first entry of the run.
   */
  recordBatch(items: Array<{ action: string; rollbackCommand: string }>): Promise<TransactionEntry[]>;
  /** Finite, recomputed on each call, most recent first. */
  entriesReverse(): AsyncIterable<TransactionEntry>;
  count(): Promise<number>;
  tail(n: number): Promise<TransactionEntry[]>;
  validate(): Promise<LogValidationResult>;
  archive(destination: string): Promise<void>;
  clear(): Promise<void>;
}

/** What modules see: a run-scoped recording handle. */
export interface TransactionRecorder {
  record(action: string, rollbackCommand: string): Promise<void>;
  /** Number of entries recorded through this handle. */
  readonly recorded: number;
}

/** What to roll back. */
export type RollbackTarget = { runId: string } | 'latest' | 'all';

export interface RollbackFailure {
  entry: TransactionEntry;
  error: TypedError;
}

export interface RollbackReport {
  /** Segment label: a run id, or "all". */
  label: string;
  attempted: number;
  succeeded: number;
  failed: RollbackFailure[];
  /** Entries skipped because an earlier rollback already compensated them. */
  alreadyCompensated: number;
  startedAt: string;
  completedAt: string;
}

// --- Line codec ---

/** Serialize an entry to its log line (without newline). */
export function formatEntryLine(timestamp: string, action: string, rollbackCommand: string): string {
  return `${timestamp}${FIELD_DELIMITER}${action}${FIELD_DELIMITER}${rollbackCommand}`;
}

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?Z$/;

/**
 * Parse one log line. The command is everything after the second
 * delimiter, so commands may contain "|". Returns null when malformed.
 */
export function parseEntryLine(text: string, line: number): TransactionEntry | null {
  const first = text.indexOf(FIELD_DELIMITER);
  if (first < 0) return null;
  const second = text.indexOf(FIELD_DELIMITER, first + 1);
  if (second < 0) return null;

  const timestamp = text.slice(0, first);
  const action = text.slice(first + 1, second);
  const rollbackCommand = text.slice(second + 1);
  if (!ISO_TIMESTAMP.test(timestamp) || action.length === 0 || rollbackCommand.length === 0) {
    return null;
  }
  return { timestamp, action, rollbackCommand, line };
}

/**
 * Check the fields of a record call. The action may not contain the
 * delimiter; neither field may span lines.
 */
export function validateRecordFields(action: string, rollbackCommand: string): TypedError | null {
  if (action.trim().length === 0) return emptyFieldError('action');
  if (rollbackCommand.trim().length === 0) return emptyFieldError('rollbackCommand');
  if (action.includes(FIELD_DELIMITER)) return invalidFieldError('action', `must not contain "${FIELD_DELIMITER}"`);
  if (/[\r\n]/.test(action)) return invalidFieldError('action', 'must be a single line');
  if (/[\r\n]/.test(rollbackCommand)) return invalidFieldError('rollbackCommand', 'must be a single line');
  return null;
}

// --- Markers ---

export type MarkerInfo =
  | { kind: 'run-begin'; runId: string }
  | { kind: 'rollback'; label: string; succeeded: number; attempted: number };

export function runBeginAction(runId: string): string {
  return `${RUN_BEGIN_PREFIX}${runId}`;
}

export function rollbackMarkerAction(label: string, succeeded: number, attempted: number): string {
  return `${ROLLBACK_PREFIX}${label} ${succeeded}/${attempted}`;
}

/** Recognize an engine marker entry. Returns null for forward entries. */
export function parseMarker(entry: Pick<TransactionEntry, 'action'>): MarkerInfo | null {
  if (entry.action.startsWith(RUN_BEGIN_PREFIX)) {
    const runId = entry.action.slice(RUN_BEGIN_PREFIX.length).trim();
    return runId ? { kind: 'run-begin', runId } : null;
  }
  if (entry.action.startsWith(ROLLBACK_PREFIX)) {
    const match = /^(\S+) (\d+)\/(\d+)$/.exec(entry.action.slice(ROLLBACK_PREFIX.length));
    if (!match) return null;
    return {
      kind: 'rollback',
      label: match[1],
      succeeded: Number(match[2]),
      attempted: Number(match[3]),
    };
  }
  return null;
}
