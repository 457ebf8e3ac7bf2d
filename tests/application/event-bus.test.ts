import { describe, it, expect, vi } from 'vitest';
import { EventBus, connectEngine } from '../../src/application/event-bus.js';
import { ActionRegistry } from '../../src/application/action-registry.js';
import { WorkflowEngine } from '../../src/application/workflow-engine.js';
import { WorkflowRegistry } from '../../src/application/workflow-registry.js';
import { createEvent } from '../../src/domain/index.js';
import { fakeLogger, makeWorkflow, recordingHandler } from '../helpers.js';

describe('EventBus', () => {
  it('should deliver asynchronously after publish returns', async () => {
    const bus = new EventBus({ log: fakeLogger() });
    const handler = vi.fn();
    bus.subscribe('order.created', handler);

    bus.publish('order.created', { id: 1 });
    expect(handler).not.toHaveBeenCalled();
    expect(bus.pendingDeliveries).toBe(1);

    await bus.flush();
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[0]).toMatchObject({ type: 'order.created', payload: { id: 1 } });
    expect(bus.pendingDeliveries).toBe(0);
  });

  it('should deliver every event to wildcard subscribers', async () => {
    const bus = new EventBus({ log: fakeLogger() });
    const handler = vi.fn();
    bus.subscribe('*', handler);

    bus.publish('a');
    bus.publish('b');
    await bus.flush();

    expect(handler.mock.calls.map((c) => c[0].type)).toEqual(['a', 'b']);
  });

  it('should stop delivering after unsubscribe', async () => {
    const bus = new EventBus({ log: fakeLogger() });
    const handler = vi.fn();
    const unsubscribe = bus.subscribe('a', handler);

    unsubscribe();
    bus.publish('a');
    await bus.flush();

    expect(handler).not.toHaveBeenCalled();
  });

  it('should log a failing subscriber and keep delivering to others', async () => {
    const log = fakeLogger();
    const bus = new EventBus({ log });
    const failure = new Error('subscriber broke');
    const other = vi.fn();
    bus.subscribe('a', () => { throw failure; });
    bus.subscribe('a', other);

    bus.publish('a');
    await bus.flush();

    expect(other).toHaveBeenCalledTimes(1);
    expect(log.error).toHaveBeenCalledWith({ err: failure, event_type: 'a' }, 'Event subscriber failed');
  });

  it('should note events nobody subscribes to', () => {
    const log = fakeLogger();
    const bus = new EventBus({ log });

    bus.publish('lonely');

    expect(log.debug).toHaveBeenCalledWith({ event_type: 'lonely' }, 'Event published with no subscribers');
  });

  it('should keep a bounded history for polling', () => {
    const bus = new EventBus({ log: fakeLogger(), historySize: 2 });
    bus.publishEvent(createEvent('a', { n: 1 }, '2026-01-01T00:00:00.000Z'));
    bus.publishEvent(createEvent('a', { n: 2 }, '2026-01-01T01:00:00.000Z'));
    bus.publishEvent(createEvent('a', { n: 3 }, '2026-01-01T02:00:00.000Z'));

    expect(bus.poll('a').map((e) => e.payload['n'])).toEqual([2, 3]);
    expect(bus.poll('a', '2026-01-01T01:00:00.000Z').map((e) => e.payload['n'])).toEqual([3]);
    expect(bus.poll('b')).toEqual([]);

    bus.clearHistory('a');
    expect(bus.poll('a')).toEqual([]);
  });

  it('should drop the least recently published types beyond the type limit', () => {
    const bus = new EventBus({ log: fakeLogger(), historySize: 100, historyTypes: 50 });

    for (let i = 0; i < 10_000; i++) {
      bus.publish(`type.${i}`);
    }
    bus.publish('type.9950');

    expect(bus.historyTypeCount).toBe(50);
    expect(bus.poll('type.0')).toEqual([]);
    expect(bus.poll('type.9950')).toHaveLength(2);
    expect(bus.poll('type.9999')).toHaveLength(1);

    bus.publish('type.new');
    expect(bus.poll('type.9951')).toEqual([]);
    expect(bus.poll('type.9950')).toHaveLength(2);
    expect(bus.historyTypeCount).toBe(50);
  });
});

describe('connectEngine', () => {
  it('should run workflows for bus events and publish their outcomes', async () => {
    const { handler, calls } = recordingHandler();
    const engine = new WorkflowEngine({
      registry: new WorkflowRegistry([makeWorkflow()]),
      actions: new ActionRegistry().register('record', handler),
      log: fakeLogger(),
    });
    const bus = new EventBus({ log: fakeLogger() });
    const disconnect = connectEngine(bus, engine);

    bus.publish('test.event', { n: 1 });
    await bus.flush();

    expect(calls).toHaveLength(1);
    const [completed] = bus.poll('workflow.completed');
    expect(completed?.payload).toMatchObject({ workflow_id: 'test.workflow', state: 'completed' });

    disconnect();
    bus.publish('test.event');
    await bus.flush();
    expect(calls).toHaveLength(1);
  });
});
