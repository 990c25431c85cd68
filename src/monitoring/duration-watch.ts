/**
 * Advisory duration watch.
 *
 * Tracks running modules from phase events and announces `module.overdue`
 * once per module that runs past its expected duration. It never touches a
 * module's outcome.
 */

import { v4 as uuid } from 'uuid';
import { PhaseEvent } from '../domain/events';
import { Logger, logger as rootLogger } from '../logger';
import { PhaseEventPublisher } from './publisher';

interface Tracked {
  runId: string;
  moduleId: string;
  startedAt: number;
  expectedDurationMs: number;
}

export interface DurationWatchOptions {
  publisher: PhaseEventPublisher;
  intervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

export class DurationWatch {
  private readonly publisher: PhaseEventPublisher;
  private readonly intervalMs: number;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly tracked = new Map<string, Tracked>();
  private timer: NodeJS.Timeout | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(options: DurationWatchOptions) {
    this.publisher = options.publisher;
    this.intervalMs = options.intervalMs ?? 5000;
    this.log = (options.logger ?? rootLogger).child({ component: 'duration-watch' });
    this.now = options.now ?? (() => Date.now());
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      this.log.warn('Already started');
      return;
    }
    this.unsubscribe = this.publisher.subscribe({
      id: `sub_${uuid()}`,
      eventTypes: ['module.started', 'module.completed'],
      callback: (event) => this.observe(event),
    });
    this.timer = setInterval(() => this.check(), this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.tracked.clear();
  }

  /** Publish `module.overdue` for tracked modules past their expected duration. */
  check(): void {
    const now = this.now();
    for (const [key, entry] of this.tracked) {
      const elapsedMs = now - entry.startedAt;
      if (elapsedMs <= entry.expectedDurationMs) continue;
      this.tracked.delete(key);
      this.log.warn('Module overdue', { runId: entry.runId, moduleId: entry.moduleId, elapsedMs, expectedDurationMs: entry.expectedDurationMs });
      this.publisher.publish({
        type: 'module.overdue',
        runId: entry.runId,
        moduleId: entry.moduleId,
        payload: { elapsedMs, expectedDurationMs: entry.expectedDurationMs },
      });
    }
  }

  private observe(event: PhaseEvent): void {
    if (!event.moduleId) return;
    const key = `${event.runId}/${event.moduleId}`;
    if (event.type === 'module.completed') {
      this.tracked.delete(key);
      return;
    }
    const expected = event.payload.expectedDurationMs;
    if (typeof expected !== 'number' || expected <= 0) return;
    this.tracked.set(key, { runId: event.runId, moduleId: event.moduleId, startedAt: this.now(), expectedDurationMs: expected });
  }
}
