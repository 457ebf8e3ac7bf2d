import type { Logger } from 'pino';
import type { Event, EventPayload } from '../domain/index.js';
import { createEvent } from '../domain/index.js';
import type { WorkflowEngine } from './workflow-engine.js';

/** Subscribe to every event type. */
export const ANY_EVENT = '*';

export type EventHandler = (event: Event) => void | Promise<unknown>;

export interface EventBusOptions {
  log: Logger;
  /** Events kept per type for `poll()`. */
  historySize?: number | undefined;
  /** Event types with history kept; the least recently published type is dropped first. */
  historyTypes?: number | undefined;
}

/**
 * In-process event bus.
 *
 * `publish()` returns immediately: delivery is scheduled on the next
 * turn of the event loop, so publishers never wait on subscribers.
 * Subscriber failures are logged and never reach the publisher.
 */
export class EventBus {
  private readonly subscribers: Map<string, Set<EventHandler>> = new Map();
  private readonly history: Map<string, Event[]> = new Map();
  private readonly pending: Set<Promise<void>> = new Set();
  private readonly handoffs: Set<Promise<void>> = new Set();
  private readonly log: Logger;
  private readonly historySize: number;
  private readonly historyTypes: number;

  constructor(options: EventBusOptions) {
    this.log = options.log;
    this.historySize = options.historySize ?? 100;
    this.historyTypes = options.historyTypes ?? 1000;
  }

  /** Fire-and-forget publish of a new event stamped with the current time. */
  publish(type: string, payload: EventPayload = {}): void {
    this.publishEvent(createEvent(type, payload));
  }

  /** Publishes an already-built event (e.g. one read from the stream). */
  publishEvent(event: Event): void {
    this.remember(event);

    const handlers = [
      ...(this.subscribers.get(event.type) ?? []),
      ...(this.subscribers.get(ANY_EVENT) ?? []),
    ];
    if (handlers.length === 0) {
      this.log.debug({ event_type: event.type }, 'Event published with no subscribers');
      return;
    }

    for (const handler of handlers) {
      const scheduled = new Promise<void>((resolve) => {
        setImmediate(resolve);
      });
      const delivery = scheduled
        .then(() => handler(event))
        .then(
          () => undefined,
          (err: unknown) => {
            this.log.error({ err, event_type: event.type }, 'Event subscriber failed');
          },
        );
      // Reactions run in registration order, so this settles right after
      // the handler was called and before it finishes.
      const handoff = scheduled.then(() => undefined);

      this.pending.add(delivery);
      this.handoffs.add(handoff);
      void delivery.finally(() => this.pending.delete(delivery));
      void handoff.finally(() => this.handoffs.delete(handoff));
    }
  }

  /** Returns an unsubscribe function. */
  subscribe(type: string, handler: EventHandler): () => void {
    let handlers = this.subscribers.get(type);
    if (handlers === undefined) {
      handlers = new Set();
      this.subscribers.set(type, handlers);
    }
    handlers.add(handler);

    return () => {
      this.subscribers.get(type)?.delete(handler);
    };
  }

  /** Recent events of `type`, optionally only those after `since` (ISO-8601). */
  poll(type: string, since?: string): Event[] {
    const events = this.history.get(type) ?? [];
    if (since === undefined) return [...events];
    const cutoff = Date.parse(since);
    return events.filter((e) => Date.parse(e.timestamp) > cutoff);
  }

  clearHistory(type?: string): void {
    if (type === undefined) {
      this.history.clear();
      return;
    }
    this.history.delete(type);
  }

  /** Resolves once every delivery scheduled so far, and any it caused, has settled. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  /** Resolves once every handler scheduled so far has been called; does not wait for them to finish. */
  async dispatched(): Promise<void> {
    await Promise.all([...this.handoffs]);
  }

  get pendingDeliveries(): number {
    return this.pending.size;
  }

  /** Number of event types that currently have history. */
  get historyTypeCount(): number {
    return this.history.size;
  }

  private remember(event: Event): void {
    const events = this.history.get(event.type) ?? [];
    events.push(event);
    if (events.length > this.historySize) {
      events.splice(0, events.length - this.historySize);
    }
    // Re-insert so Map order tracks recency.
    this.history.delete(event.type);
    this.history.set(event.type, events);

    for (const type of this.history.keys()) {
      if (this.history.size <= this.historyTypes) break;
      this.history.delete(type);
    }
  }
}

/**
 * Wires the engine to the bus: every published event goes to the
 * engine, and the engine's completion/failure events come back as
 * bus events. Returns a function that undoes both.
 */
export function connectEngine(bus: EventBus, engine: WorkflowEngine): () => void {
  const unsubscribe = bus.subscribe(ANY_EVENT, (event) => engine.handleEvent(event));
  engine.setEmitter((type, payload) => bus.publish(type, payload));

  return () => {
    unsubscribe();
    engine.setEmitter(undefined);
  };
}
