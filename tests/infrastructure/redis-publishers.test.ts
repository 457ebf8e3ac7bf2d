import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type Redis from 'ioredis';
import { enqueueEvent, STREAM_KEY } from '../../src/infrastructure/redis/event-producer.js';
import { publishWorkflowChange, WORKFLOWS_CHANGED_CHANNEL } from '../../src/infrastructure/redis/workflow-notifier.js';
import { createRedisOutcomeReporter, OUTCOMES_CHANNEL } from '../../src/infrastructure/redis/outcome-publisher.js';
import { RedisMetricsSink } from '../../src/infrastructure/redis/metrics-sink.js';
import type { InvocationOutcome } from '../../src/domain/index.js';
import { fakeLogger, makeEvent } from '../helpers.js';

describe('enqueueEvent', () => {
  it('appends the event fields to the stream', async () => {
    const xadd = vi.fn().mockResolvedValue('1-0');
    const redis = { xadd } as unknown as Redis;

    const id = await enqueueEvent(redis, makeEvent('order.created', { id: 1 }));

    expect(id).toBe('1-0');
    expect(xadd).toHaveBeenCalledWith(
      STREAM_KEY, '*',
      'type', 'order.created',
      'timestamp', '2026-02-18T12:00:00.000Z',
      'payload', '{"id":1}',
    );
  });

  it('adds the workflow id for a manual run', async () => {
    const xadd = vi.fn().mockResolvedValue('2-0');

    await enqueueEvent({ xadd } as unknown as Redis, makeEvent('x'), 'orders.notify');

    expect(xadd.mock.calls[0]?.slice(-2)).toEqual(['workflow_id', 'orders.notify']);
  });

  it('throws when Redis returns no id', async () => {
    const redis = { xadd: vi.fn().mockResolvedValue(null) } as unknown as Redis;
    await expect(enqueueEvent(redis, makeEvent())).rejects.toThrow('XADD to workflow_events returned no entry id');
  });
});

describe('publishWorkflowChange', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-02-18T12:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('publishes the change notification', async () => {
    const publish = vi.fn().mockResolvedValue(1);

    await publishWorkflowChange({ publish } as unknown as Redis, fakeLogger(), 'update', 'orders.notify');

    expect(publish).toHaveBeenCalledWith(
      WORKFLOWS_CHANGED_CHANNEL,
      JSON.stringify({ ts: '2026-02-18T12:00:00.000Z', reason: 'update', workflow_id: 'orders.notify' }),
    );
  });

  it('logs and swallows publish failures', async () => {
    const err = new Error('redis down');
    const log = fakeLogger();

    await publishWorkflowChange({ publish: vi.fn().mockRejectedValue(err) } as unknown as Redis, log, 'delete', 'x');

    expect(log.error).toHaveBeenCalledWith(
      { err, reason: 'delete', workflow_id: 'x' },
      'Failed to publish workflow change notification',
    );
  });
});

describe('createRedisOutcomeReporter', () => {
  const outcome: InvocationOutcome = {
    run_id: 'run-1',
    workflow_id: 'wf',
    workflow_version: '1.0.0',
    event_type: 'test.event',
    state: 'completed',
    manual: false,
    actions: [],
    error_actions: [],
    skipped_actions: [],
    skipped_error_actions: [],
    started_at: '2026-02-18T12:00:00.000Z',
    finished_at: '2026-02-18T12:00:00.000Z',
    duration_ms: 0,
  };

  it('publishes the outcome as JSON', async () => {
    const publish = vi.fn().mockResolvedValue(1);

    await createRedisOutcomeReporter({ publish } as unknown as Redis, fakeLogger()).report(outcome);

    expect(publish).toHaveBeenCalledWith(OUTCOMES_CHANNEL, JSON.stringify(outcome));
  });

  it('only warns when publishing fails', async () => {
    const log = fakeLogger();
    const redis = { publish: vi.fn().mockRejectedValue(new Error('down')) } as unknown as Redis;

    await expect(createRedisOutcomeReporter(redis, log).report(outcome)).resolves.toBeUndefined();
    expect(log.warn).toHaveBeenCalledWith(
      { err: expect.any(Error), run_id: 'run-1' },
      'Failed to publish workflow outcome',
    );
  });
});

describe('RedisMetricsSink', () => {
  it('increments the total and one field per tag in a transaction', async () => {
    const pipeline = { hincrbyfloat: vi.fn(), exec: vi.fn().mockResolvedValue([]) };
    pipeline.hincrbyfloat.mockReturnValue(pipeline);
    const redis = { multi: vi.fn().mockReturnValue(pipeline) } as unknown as Redis;

    await new RedisMetricsSink(redis).increment('transfers.volume', 250, { currency: 'USD' });

    expect(pipeline.hincrbyfloat.mock.calls).toEqual([
      ['metrics:transfers.volume', 'total', 250],
      ['metrics:transfers.volume', 'currency=USD', 250],
    ]);
    expect(pipeline.exec).toHaveBeenCalledTimes(1);
  });

  it('fails when Redis rejects a command inside the transaction', async () => {
    const wrongType = new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
    const pipeline = {
      hincrbyfloat: vi.fn(),
      exec: vi.fn().mockResolvedValue([[wrongType, null]]),
    };
    pipeline.hincrbyfloat.mockReturnValue(pipeline);
    const redis = { multi: vi.fn().mockReturnValue(pipeline) } as unknown as Redis;

    await expect(new RedisMetricsSink(redis).increment('transfers.count', 1, {})).rejects.toBe(wrongType);
  });

  it('fails when the transaction is aborted', async () => {
    const pipeline = { hincrbyfloat: vi.fn(), exec: vi.fn().mockResolvedValue(null) };
    pipeline.hincrbyfloat.mockReturnValue(pipeline);
    const redis = { multi: vi.fn().mockReturnValue(pipeline) } as unknown as Redis;

    await expect(new RedisMetricsSink(redis).increment('transfers.count', 1, {}))
      .rejects.toThrow('Metrics transaction for "transfers.count" was aborted');
  });
});
