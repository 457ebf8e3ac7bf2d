/**
 * Core domain types for the event model.
 *
 * These types define the canonical shape of an event as it flows
 * through the bus and the engine. They carry no framework dependencies.
 */

/** Free-form key/value payload attached to every event. */
export type EventPayload = Record<string, unknown>;

/**
 * Canonical Event entity.
 *
 * Identified by `type` only. Producers that need correlation put
 * their own id into the payload.
 */
export interface Event {
  readonly type: string;
  readonly payload: EventPayload;
  readonly timestamp: string; // ISO-8601
}

/** Freezes `value` and everything reachable from it, in place. */
export function freezeDeep<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) freezeDeep(item);
  }
  return value;
}

/**
 * Builds an event stamped with the given (or current) time.
 *
 * The payload is copied and frozen all the way down, so neither the
 * producer nor any handler can change what other invocations read.
 */
export function createEvent(
  type: string,
  payload: EventPayload = {},
  timestamp: string = new Date().toISOString(),
): Event {
  return Object.freeze({
    type,
    payload: freezeDeep(structuredClone(payload)),
    timestamp,
  });
}
