import { vi } from 'vitest';
import type { Logger } from 'pino';
import type {
  Event,
  EventPayload,
  ExecutionContext,
  WorkflowDefinition,
} from '../src/domain/index.js';
import { createEvent, createExecutionContext } from '../src/domain/index.js';
import { parseWorkflowDefinition } from '../src/application/workflow-schema.js';
import type { ActionHandler, HandlerResult } from '../src/application/action-registry.js';

/** Fixed timestamp for events whose time does not matter. */
export const FIXED_TIMESTAMP = '2026-02-18T12:00:00.000Z';

/**
 * Minimal fake logger. `child()` returns the same object so calls made
 * through a child logger are visible on the parent's mocks.
 */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

export function makeEvent(type = 'test.event', payload: EventPayload = {}): Event {
  return createEvent(type, payload, FIXED_TIMESTAMP);
}

export function makeContext(type = 'test.event', payload: EventPayload = {}): ExecutionContext {
  return createExecutionContext(makeEvent(type, payload));
}

/** Builds a validated definition; any document field can be overridden. */
export function makeWorkflow(overrides: Record<string, unknown> = {}): WorkflowDefinition {
  return parseWorkflowDefinition({
    id: 'test.workflow',
    trigger: { type: 'event', event: 'test.event' },
    actions: [{ id: 'first', type: 'record' }],
    ...overrides,
  });
}

/** Handler that records each call and returns `result`. */
export function recordingHandler(result: HandlerResult = { status: 'success' }) {
  const calls: Array<{ id: string; data: Record<string, unknown> }> = [];
  const handler: ActionHandler = {
    async handle(spec, data) {
      calls.push({ id: spec.id, data });
      return result;
    },
  };
  return { handler, calls };
}
