/**
 * Rollback executor.
 *
 * Replays rollback commands in reverse log order. The log is divided into
 * run segments by `@run-begin` markers; a pass over a segment ends with an
 * `@rollback <label> <succeeded>/<attempted>` marker, and entries that an
 * earlier marker already covers are not replayed again.
 */

import {
  TypedError,
  describeThrown,
  isEngineError,
  rollbackCommandError,
} from '../domain/errors';
import {
  MARKER_COMMAND,
  RollbackFailure,
  RollbackReport,
  RollbackTarget,
  TransactionEntry,
  TransactionLog,
  parseMarker,
  rollbackMarkerAction,
} from '../domain/transaction';
import { Logger, logger as rootLogger } from '../logger';
import { PhaseEventPublisher } from '../monitoring/publisher';
import { CommandRunner } from './command-runner';

/** Label of passes that cover the whole log. */
export const ALL_SEGMENTS = 'all';

export interface RollbackPlan {
  label: string;
  /** Entries to replay, most recent first. */
  entries: TransactionEntry[];
  alreadyCompensated: number;
}

/**
 * Decide which entries a rollback pass replays.
 *
 * `reversed` is the log, most recent entry first. Forward entries recorded
 * before the first run marker belong to no segment and are reached only
 * by `all` (or by `latest` on a log without run markers).
 */
export function planRollback(reversed: TransactionEntry[], target: RollbackTarget): RollbackPlan {
  const forward = [...reversed].reverse();

  let label: string;
  if (target === 'all') {
    label = ALL_SEGMENTS;
  } else if (target === 'latest') {
    label = ALL_SEGMENTS;
    for (const entry of reversed) {
      const marker = parseMarker(entry);
      if (marker?.kind === 'run-begin') {
        label = marker.runId;
        break;
      }
    }
  } else {
    label = target.runId;
  }

  const segmentOf = new Map<number, string | null>();
  let segment: string | null = null;
  for (const entry of forward) {
    const marker = parseMarker(entry);
    if (marker?.kind === 'run-begin') segment = marker.runId;
    else if (!marker) segmentOf.set(entry.line, segment);
  }

  // Walking backwards, a rollback marker covers every earlier entry of its segment.
  const covered = new Set<string>();
  const entries: TransactionEntry[] = [];
  let alreadyCompensated = 0;
  for (const entry of reversed) {
    const marker = parseMarker(entry);
    if (marker?.kind === 'rollback') {
      covered.add(marker.label);
      continue;
    }
    if (marker) continue;

    const entrySegment = segmentOf.get(entry.line) ?? null;
    const selected = label === ALL_SEGMENTS || entrySegment === label;
    if (!selected) continue;

    const compensated = covered.has(ALL_SEGMENTS) || (entrySegment !== null && covered.has(entrySegment));
    if (compensated) {
      alreadyCompensated += 1;
    } else {
      entries.push(entry);
    }
  }

  return { label, entries, alreadyCompensated };
}

export interface RollbackExecutorOptions {
  log: TransactionLog;
  runner: CommandRunner;
  publisher?: PhaseEventPublisher;
  logger?: Logger;
  now?: () => Date;
}

export class RollbackExecutor {
  private readonly log: TransactionLog;
  private readonly runner: CommandRunner;
  private readonly publisher?: PhaseEventPublisher;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: RollbackExecutorOptions) {
    this.log = options.log;
    this.runner = options.runner;
    this.publisher = options.publisher;
    this.logger = (options.logger ?? rootLogger).child({ component: 'rollback' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Replay the target's entries, most recent first. Command failures are
   * collected and never stop the pass; storage failures propagate.
   */
  async execute(target: RollbackTarget = 'latest'): Promise<RollbackReport> {
    const startedAt = this.now().toISOString();
    const reversed: TransactionEntry[] = [];
    for await (const entry of this.log.entriesReverse()) {
      reversed.push(entry);
    }

    const plan = planRollback(reversed, target);
    this.logger.info('Rollback started', { label: plan.label, entries: plan.entries.length, alreadyCompensated: plan.alreadyCompensated });
    this.publisher?.publish({
      type: 'rollback.started',
      runId: plan.label,
      payload: { entries: plan.entries.length, alreadyCompensated: plan.alreadyCompensated },
    });

    let succeeded = 0;
    const failed: RollbackFailure[] = [];
    for (const entry of plan.entries) {
      try {
        await this.runner.run(entry.rollbackCommand);
        succeeded += 1;
        this.logger.info('Rolled back', { action: entry.action, line: entry.line });
      } catch (err) {
        const error = toRollbackError(entry.rollbackCommand, err);
        failed.push({ entry, error });
        this.logger.error('Rollback command failed', { action: entry.action, line: entry.line, code: error.code, error: error.message });
      }
    }

    const attempted = plan.entries.length;
    await this.log.record(rollbackMarkerAction(plan.label, succeeded, attempted), MARKER_COMMAND);

    const report: RollbackReport = {
      label: plan.label,
      attempted,
      succeeded,
      failed,
      alreadyCompensated: plan.alreadyCompensated,
      startedAt,
      completedAt: this.now().toISOString(),
    };

    if (failed.length > 0) {
      this.logger.warn('Rollback completed with failures', { label: plan.label, attempted, succeeded, failed: failed.length });
    } else {
      this.logger.info('Rollback completed', { label: plan.label, attempted, succeeded });
    }
    this.publisher?.publish({
      type: 'rollback.completed',
      runId: plan.label,
      payload: { attempted, succeeded, failed: failed.length },
    });
    return report;
  }
}

function toRollbackError(command: string, err: unknown): TypedError {
  if (isEngineError(err)) return err.typedError;
  return rollbackCommandError(command, describeThrown(err));
}
