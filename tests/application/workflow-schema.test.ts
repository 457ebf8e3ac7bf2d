import { describe, it, expect } from 'vitest';
import { parseWorkflowDefinition, toWorkflowDocument } from '../../src/application/workflow-schema.js';
import { WorkflowValidationError } from '../../src/domain/index.js';

const minimal = {
  id: 'orders.notify',
  trigger: { type: 'event', event: 'order.created' },
  actions: [{ id: 'log', type: 'system', target: 'log' }],
};

function issuesOf(raw: unknown): readonly { path: string; message: string }[] {
  try {
    parseWorkflowDefinition(raw);
  } catch (err: unknown) {
    if (err instanceof WorkflowValidationError) return err.issues;
    throw err;
  }
  throw new Error('expected the document to be rejected');
}

describe('parseWorkflowDefinition', () => {
  it('should fill defaults for optional fields', () => {
    const def = parseWorkflowDefinition(minimal);

    expect(def.name).toBe('orders.notify');
    expect(def.description).toBe('');
    expect(def.version).toBe('1.0.0');
    expect(def.enabled).toBe(true);
    expect(def.actions[0]?.data).toEqual({});
    expect(def.error_handler).toBeUndefined();
  });

  it('should return a deeply frozen definition', () => {
    const def = parseWorkflowDefinition({
      ...minimal,
      actions: [{ id: 'log', type: 'system', data: { tags: { a: '1' } } }],
    });

    expect(Object.isFrozen(def)).toBe(true);
    expect(Object.isFrozen(def.actions)).toBe(true);
    expect(Object.isFrozen(def.actions[0]?.data['tags'])).toBe(true);
  });

  it('should report a missing trigger', () => {
    expect(() => parseWorkflowDefinition({ id: 'x', actions: [] }))
      .toThrow('Workflow "x" is invalid: trigger: Required');
  });

  it('should reject a non-event trigger type', () => {
    const issues = issuesOf({ ...minimal, trigger: { type: 'cron', event: 'x' } });
    expect(issues.map((i) => i.path)).toEqual(['trigger.type']);
  });

  it('should reject duplicate action ids within a chain', () => {
    const issues = issuesOf({
      ...minimal,
      actions: [{ id: 'a', type: 't' }, { id: 'a', type: 't' }],
    });
    expect(issues).toEqual([{ path: 'actions.1.id', message: 'Duplicate action id "a"' }]);
  });

  it('should reject an error chain action id that the main chain already uses', () => {
    const issues = issuesOf({
      ...minimal,
      error_handler: { actions: [{ id: 'report', type: 'system' }, { id: 'log', type: 'system' }] },
    });
    expect(issues).toEqual([{
      path: 'error_handler.actions.1.id',
      message: 'Action id "log" is already used in actions',
    }]);
  });

  it('should accept distinct ids across the main and error chains', () => {
    const def = parseWorkflowDefinition({
      ...minimal,
      error_handler: { actions: [{ id: 'log_error', type: 'system' }] },
    });
    expect(def.error_handler?.actions.map((a) => a.id)).toEqual(['log_error']);
  });

  it('should describe a document that is not an object', () => {
    expect(() => parseWorkflowDefinition('nope'))
      .toThrow('Workflow document is invalid: <root>: Expected object, received string');
  });

  it('should reject a non-positive timeout', () => {
    const issues = issuesOf({ ...minimal, timeout_ms: 0 });
    expect(issues.map((i) => i.path)).toEqual(['timeout_ms']);
  });
});

describe('toWorkflowDocument', () => {
  it('should produce plain JSON without unknown or absent fields', () => {
    const def = parseWorkflowDefinition({ ...minimal, extra: 'dropped' });

    expect(toWorkflowDocument(def)).toEqual({
      id: 'orders.notify',
      name: 'orders.notify',
      description: '',
      version: '1.0.0',
      enabled: true,
      trigger: { type: 'event', event: 'order.created' },
      actions: [{ id: 'log', type: 'system', target: 'log', data: {} }],
    });
  });

  it('should be accepted again by the parser', () => {
    const def = parseWorkflowDefinition({ ...minimal, timeout_ms: 500 });
    expect(parseWorkflowDefinition(toWorkflowDocument(def)).timeout_ms).toBe(500);
  });
});
