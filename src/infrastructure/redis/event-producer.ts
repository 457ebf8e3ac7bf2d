import type Redis from 'ioredis';
import type { Event } from '../../domain/index.js';

export const STREAM_KEY = 'workflow_events';

/**
 * Appends an event to the ingress stream with `XADD *`.
 *
 * Stream values are strings, so the payload is JSON-serialized. A
 * `workflow_id` field marks a manual run of that one workflow.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueEvent(redis: Redis, event: Event, workflowId?: string): Promise<string> {
  const fields = [
    'type', event.type,
    'timestamp', event.timestamp,
    'payload', JSON.stringify(event.payload),
  ];
  if (workflowId !== undefined) {
    fields.push('workflow_id', workflowId);
  }

  const entryId = await redis.xadd(STREAM_KEY, '*', ...fields);
  if (entryId === null) {
    throw new Error(`XADD to ${STREAM_KEY} returned no entry id`);
  }
  return entryId;
}
