/**
 * Phase event publisher.
 *
 * Emits versioned run, module and rollback events and keeps the history
 * of each run in memory for inspection. Subscribers only observe; nothing
 * they do reaches the orchestrator.
 */

import { v4 as uuid } from 'uuid';
import { describeThrown } from '../domain/errors';
import { PhaseEvent, PhaseEventSubscription, PhaseEventType } from '../domain/events';
import { Logger, logger as rootLogger } from '../logger';

export const PHASE_EVENT_SCHEMA_VERSION = '1.0.0';

export interface PublishInput {
  type: PhaseEventType;
  runId: string;
  moduleId?: string;
  payload?: Record<string, unknown>;
}

export class PhaseEventPublisher {
  private subscriptions: PhaseEventSubscription[] = [];
  private readonly history = new Map<string, PhaseEvent[]>();
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: { logger?: Logger; now?: () => Date } = {}) {
    this.log = (options.logger ?? rootLogger).child({ component: 'phase-events' });
    this.now = options.now ?? (() => new Date());
  }

  publish(input: PublishInput): PhaseEvent {
    const event: PhaseEvent = {
      id: `evt_${uuid()}`,
      type: input.type,
      schemaVersion: PHASE_EVENT_SCHEMA_VERSION,
      timestamp: this.now().toISOString(),
      runId: input.runId,
      moduleId: input.moduleId,
      payload: input.payload ?? {},
    };

    const events = this.history.get(event.runId) ?? [];
    events.push(event);
    this.history.set(event.runId, events);

    for (const sub of this.subscriptions) {
      if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) continue;
      try {
        sub.callback(event);
      } catch (err) {
        this.log.warn('Event subscriber threw', { subscriptionId: sub.id, eventType: event.type, error: describeThrown(err) });
      }
    }

    return event;
  }

  /** Subscribe to events. Returns the unsubscribe function. */
  subscribe(subscription: PhaseEventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  getEventsByRun(runId: string, eventTypes?: PhaseEventType[]): PhaseEvent[] {
    const events = this.history.get(runId) ?? [];
    return eventTypes?.length ? events.filter((e) => eventTypes.includes(e.type)) : [...events];
  }
}
