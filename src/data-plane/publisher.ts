/**
 * Process lifecycle event publisher.
 *
 * Emits versioned events on every status transition and fans them out to
 * subscribers. Publication is observational: callbacks are started but
 * never awaited, so a slow subscriber cannot hold up the caller. A failing
 * subscriber is logged and never affects the process or other subscribers.
 */

import { v4 as uuid } from 'uuid';
import { EventSubscription, ProcessEvent, ProcessEventType, eventTypeForStatus } from '../domain/events';
import { ValidationProcess } from '../domain/process';
import { Logger, logger as rootLogger } from '../logger';

export const EVENT_SCHEMA_VERSION = '1.0.0';

export class ProcessEventPublisher {
  private subscriptions: EventSubscription[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private readonly log: Logger;

  constructor(log: Logger = rootLogger) {
    this.log = log.child({ component: 'publisher' });
  }

  /** Publish the event announcing the process's current status. */
  async publishTransition(process: ValidationProcess): Promise<ProcessEvent> {
    const event: ProcessEvent = {
      id: `evt_${uuid()}`,
      type: eventTypeForStatus(process.status),
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      processId: process.processId,
      subjectId: process.subjectId,
      payload: {
        status: process.status,
        message: process.message,
        ...(process.errorDetail ? { errorDetail: process.errorDetail } : {}),
      },
    };

    await this.publishEvent(event);
    return event;
  }

  /** Deliver an event to every matching subscriber without waiting for them. */
  async publishEvent(event: ProcessEvent): Promise<void> {
    for (const sub of this.subscriptions) {
      if (!matchesSubscription(event.type, sub)) continue;
      try {
        const result = sub.callback(event);
        if (result instanceof Promise) this.track(result, sub, event);
      } catch (err) {
        this.reportFailure(sub, event, err);
      }
    }
  }

  /** Resolves once every asynchronous delivery started so far has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  /** Number of asynchronous deliveries still running. */
  pendingDeliveries(): number {
    return this.inFlight.size;
  }

  private track(delivery: Promise<void>, sub: EventSubscription, event: ProcessEvent): void {
    const settled = delivery
      .catch((err: unknown) => this.reportFailure(sub, event, err))
      .finally(() => {
        this.inFlight.delete(settled);
      });
    this.inFlight.add(settled);
  }

  private reportFailure(sub: EventSubscription, event: ProcessEvent, err: unknown): void {
    this.log.warn('Event subscriber failed', {
      subscriptionId: sub.id,
      eventType: event.type,
      processId: event.processId,
      error: err instanceof Error ? err.message : String(err),
    });
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  subscriberCount(): number {
    return this.subscriptions.length;
  }
}

function matchesSubscription(type: ProcessEventType, sub: EventSubscription): boolean {
  if (!sub.eventTypes?.length) return true;
  return sub.eventTypes.includes(type);
}
