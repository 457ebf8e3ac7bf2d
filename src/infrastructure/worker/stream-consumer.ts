import type Redis from 'ioredis';
import type { Logger } from 'pino';
import type { Event } from '../../domain/index.js';
import { WorkflowDisabledError, WorkflowNotFoundError, createEvent } from '../../domain/index.js';
import type { EventBus } from '../../application/event-bus.js';
import type { WorkflowEngine } from '../../application/workflow-engine.js';
import { isRecord } from '../../application/context-path.js';
import { STREAM_KEY } from '../redis/event-producer.js';

export const GROUP_NAME = 'workflow_engine';

const BLOCK_MS = 5000;
const BATCH_SIZE = 100;

export interface StreamConsumerDeps {
  redis: Redis;
  log: Logger;
  bus: EventBus;
  engine: WorkflowEngine;
  consumerName: string;
  signal: AbortSignal;
}

export interface StreamEntry {
  event: Event;
  /** Set for a manual run of one workflow. */
  workflowId?: string | undefined;
}

/**
 * Ensures the consumer group exists, starting at `$` (new entries only).
 * MKSTREAM creates the stream; BUSYGROUP means it already exists.
 */
async function ensureConsumerGroup(redis: Redis, log: Logger): Promise<void> {
  try {
    await redis.xgroup('CREATE', STREAM_KEY, GROUP_NAME, '$', 'MKSTREAM');
    log.info({ group: GROUP_NAME, stream: STREAM_KEY }, 'Consumer group created (from $)');
  } catch (err: unknown) {
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      log.debug({ group: GROUP_NAME }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

/**
 * Parses a flat `[field, value, ...]` stream entry.
 * Returns null when the entry has no type or its payload is not a JSON object.
 */
export function parseStreamEntry(fields: readonly string[]): StreamEntry | null {
  const map = new Map<string, string>();
  for (let i = 0; i < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }

  const type = map.get('type');
  if (type === undefined || type === '') return null;

  let payload: unknown;
  try {
    payload = JSON.parse(map.get('payload') ?? '{}');
  } catch {
    return null;
  }
  if (!isRecord(payload)) return null;

  const rawTimestamp = map.get('timestamp');
  const timestamp = rawTimestamp !== undefined && Number.isFinite(Date.parse(rawTimestamp))
    ? rawTimestamp
    : new Date().toISOString();

  return {
    event: createEvent(type, payload, timestamp),
    workflowId: map.get('workflow_id'),
  };
}

/**
 * Flattens an XREADGROUP reply (`[[stream, [[id, fields], ...]], ...]`)
 * into `[id, fields]` pairs, dropping anything of another shape.
 */
export function readEntries(response: unknown): Array<[string, string[]]> {
  const entries: Array<[string, string[]]> = [];
  if (!Array.isArray(response)) return entries;

  for (const stream of response) {
    if (!Array.isArray(stream) || !Array.isArray(stream[1])) continue;
    for (const item of stream[1]) {
      if (!Array.isArray(item) || typeof item[0] !== 'string') continue;
      const fields: unknown = item[1];
      entries.push([
        item[0],
        Array.isArray(fields) ? fields.filter((f): f is string => typeof f === 'string') : [],
      ]);
    }
  }
  return entries;
}

/**
 * Hands one entry to the engine, then ACKs it.
 *
 * Trigger events go through the bus; manual runs go straight to
 * `engine.execute`. Neither is awaited to completion: the entry is
 * ACKed once the engine has admitted it. Malformed entries are ACKed
 * and dropped.
 */
export async function processEntry(
  deps: StreamConsumerDeps,
  streamId: string,
  fields: readonly string[],
): Promise<void> {
  const entry = parseStreamEntry(fields);

  if (entry === null) {
    deps.log.warn({ streamId }, 'Malformed stream entry, acknowledging without processing');
    await deps.redis.xack(STREAM_KEY, GROUP_NAME, streamId);
    return;
  }

  const { event, workflowId } = entry;

  if (workflowId !== undefined) {
    void deps.engine.execute(workflowId, event.payload, event.type).catch((err: unknown) => {
      if (err instanceof WorkflowNotFoundError || err instanceof WorkflowDisabledError) {
        deps.log.warn({ err, workflow_id: workflowId, streamId }, 'Manual run rejected');
        return;
      }
      deps.log.error({ err, workflow_id: workflowId, streamId }, 'Manual run failed');
    });
  } else {
    deps.bus.publishEvent(event);
    await deps.bus.dispatched();
  }

  await deps.redis.xack(STREAM_KEY, GROUP_NAME, streamId);
  deps.log.debug({ streamId, event_type: event.type, workflow_id: workflowId }, 'Stream entry dispatched');
}

/**
 * Processes entries in order, waiting for a free engine slot before
 * each one. Entries not yet taken stay unacknowledged in the stream.
 * An entry without fields (deleted from the stream) is ACKed as malformed.
 */
export async function processBatch(
  deps: StreamConsumerDeps,
  entries: ReadonlyArray<[string, string[]]>,
): Promise<number> {
  for (const [streamId, fields] of entries) {
    await deps.engine.whenAvailable();
    await processEntry(deps, streamId, fields);
  }
  return entries.length;
}

/** Re-reads this consumer's own pending entries (delivered, never ACKed). */
async function processPending(deps: StreamConsumerDeps): Promise<void> {
  const response = await deps.redis.xreadgroup(
    'GROUP', GROUP_NAME, deps.consumerName,
    'COUNT', BATCH_SIZE,
    'STREAMS', STREAM_KEY,
    '0',
  );

  const count = await processBatch(deps, readEntries(response));

  if (count > 0) {
    deps.log.info({ count }, 'Recovered pending entries');
  }
}

/**
 * Consumer loop: XREADGROUP with BLOCK, hand each entry to the engine,
 * XACK. Reads no further while the engine is saturated. Runs until
 * `signal` aborts.
 */
export async function startStreamConsumer(deps: StreamConsumerDeps): Promise<void> {
  const { redis, log, signal } = deps;

  await ensureConsumerGroup(redis, log);

  log.info({ consumer: deps.consumerName, group: GROUP_NAME, stream: STREAM_KEY }, 'Consumer started');

  await processPending(deps);

  while (!signal.aborted) {
    try {
      const response = await redis.xreadgroup(
        'GROUP', GROUP_NAME, deps.consumerName,
        'COUNT', BATCH_SIZE,
        'BLOCK', BLOCK_MS,
        'STREAMS', STREAM_KEY,
        '>',
      );

      await processBatch(deps, readEntries(response));
    } catch (err: unknown) {
      if (signal.aborted) break;
      log.error({ err }, 'Consumer loop error, retrying in 1s');
      await sleep(1000);
    }
  }

  log.info('Consumer stopped');
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
