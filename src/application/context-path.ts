import type { ExecutionContext } from '../domain/index.js';

/** A dotted path segment: letters, digits, underscore, dash. */
const SEGMENT_RE = /^[A-Za-z0-9_-]+$/;

/**
 * View of an ExecutionContext that templates and conditions read from.
 *
 * `event.type` and `event.timestamp` always refer to the event itself;
 * payload keys with the same names stay reachable as `event.payload.<key>`.
 */
export function projectContext(context: ExecutionContext): Record<string, unknown> {
  const { event } = context;
  return {
    event: {
      ...event.payload,
      type: event.type,
      timestamp: event.timestamp,
      payload: event.payload,
    },
    error: context.error,
    results: Object.fromEntries(context.results),
  };
}

/** Splits a dotted path, or returns null if any segment is malformed. */
export function parsePath(path: string): string[] | null {
  if (path.length === 0) return null;
  const segments = path.split('.');
  for (const segment of segments) {
    if (!SEGMENT_RE.test(segment)) return null;
  }
  return segments;
}

/**
 * Walks `segments` from `root`. Missing keys, scalars along the way and
 * out-of-range indexes all yield `undefined`.
 */
export function readPath(root: unknown, segments: readonly string[]): unknown {
  let current: unknown = root;

  for (const segment of segments) {
    if (current === null || current === undefined) return undefined;

    if (Array.isArray(current)) {
      const index = Number(segment);
      if (!Number.isInteger(index)) return undefined;
      current = current[index];
      continue;
    }

    if (current instanceof Map) {
      current = current.get(segment);
      continue;
    }

    if (!isRecord(current)) return undefined;
    if (!Object.prototype.hasOwnProperty.call(current, segment)) return undefined;
    current = current[segment];
  }

  return current;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
