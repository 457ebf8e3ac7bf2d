import { describe, it, expect } from 'vitest';
import {
  findPlaceholders,
  parseTemplate,
  resolve,
  resolveData,
  resolveText,
} from '../../src/application/template-resolver.js';
import { TemplateError } from '../../src/domain/index.js';
import { makeContext } from '../helpers.js';

describe('parseTemplate', () => {
  it('should split text and placeholders', () => {
    expect(parseTemplate('Hi {{ event.name }}!')).toEqual([
      { kind: 'text', text: 'Hi ' },
      { kind: 'placeholder', path: ['event', 'name'], raw: 'event.name' },
      { kind: 'text', text: '!' },
    ]);
  });

  it('should reject an unterminated placeholder', () => {
    expect(() => parseTemplate('Hi {{event.name')).toThrow('Unterminated placeholder at position 3');
  });

  it('should reject an empty placeholder', () => {
    expect(() => parseTemplate('{{  }}')).toThrow('Empty placeholder at position 0');
  });

  it('should reject a placeholder that is not a dotted path', () => {
    expect(() => parseTemplate('{{event name}}')).toThrow(TemplateError);
    expect(() => parseTemplate('{{event..name}}')).toThrow('Invalid placeholder path "event..name" at position 0');
  });
});

describe('resolve', () => {
  it('should substitute embedded placeholders as text', () => {
    const ctx = makeContext('transfer.done', { amount: 250, currency: 'USD' });
    expect(resolve('Sent {{event.amount}} {{event.currency}}', ctx)).toBe('Sent 250 USD');
  });

  it('should keep the raw type for a lone placeholder', () => {
    const ctx = makeContext('transfer.done', { amount: 250, tags: ['a', 'b'] });
    expect(resolve('{{event.amount}}', ctx)).toBe(250);
    expect(resolve('{{ event.tags }}', ctx)).toEqual(['a', 'b']);
  });

  it('should resolve missing paths to an empty string', () => {
    const ctx = makeContext('x', {});
    expect(resolve('{{event.missing}}', ctx)).toBe('');
    expect(resolve('a{{event.missing.deeper}}b', ctx)).toBe('ab');
  });

  it('should read nested objects and array indexes', () => {
    const ctx = makeContext('x', { user: { name: 'Ada' }, items: ['zero', 'one'] });
    expect(resolve('{{event.user.name}} / {{event.items.1}}', ctx)).toBe('Ada / one');
    expect(resolve('{{event.items.5}}', ctx)).toBe('');
  });

  it('should serialize objects embedded in text as JSON', () => {
    const ctx = makeContext('x', { obj: { a: 1 } });
    expect(resolve('v={{event.obj}}', ctx)).toBe('v={"a":1}');
  });

  it('should let event type and timestamp win over payload keys', () => {
    const ctx = makeContext('order.created', { type: 'shadow' });
    expect(resolve('{{event.type}}', ctx)).toBe('order.created');
    expect(resolve('{{event.timestamp}}', ctx)).toBe('2026-02-18T12:00:00.000Z');
    expect(resolve('{{event.payload.type}}', ctx)).toBe('shadow');
  });

  it('should read prior results and the error record', () => {
    const ctx = makeContext('x', {});
    ctx.results.set('lookup', {
      action_id: 'lookup',
      status: 'success',
      output: { id: 7 },
      duration_ms: 1,
    });
    ctx.error = { message: 'boom', type: 'handler_failure', action_id: 'lookup' };

    expect(resolve('{{results.lookup.output.id}}', ctx)).toBe(7);
    expect(resolve('{{error.action_id}} failed: {{error.message}}', ctx)).toBe('lookup failed: boom');
  });

  it('should resolve the error record to empty text when there is none', () => {
    expect(resolve('[{{error.message}}]', makeContext())).toBe('[]');
  });

  it('should pass values without placeholders through unchanged', () => {
    const ctx = makeContext();
    expect(resolve('plain }} text', ctx)).toBe('plain }} text');
    expect(resolve(5, ctx)).toBe(5);
    expect(resolve(null, ctx)).toBeNull();
    expect(resolve(false, ctx)).toBe(false);
  });

  it('should throw TemplateError on malformed syntax', () => {
    expect(() => resolve('{{event.a', makeContext())).toThrow(TemplateError);
  });
});

describe('resolveData', () => {
  it('should resolve nested containers field by field', () => {
    const ctx = makeContext('x', { id: 'abc', n: 3 });
    expect(resolveData({
      id: '{{event.id}}',
      count: '{{event.n}}',
      list: ['{{event.id}}-1', 2],
      nested: { label: 'n={{event.n}}', flag: true },
    }, ctx)).toEqual({
      id: 'abc',
      count: 3,
      list: ['abc-1', 2],
      nested: { label: 'n=3', flag: true },
    });
  });
});

describe('resolveText', () => {
  it('should render the resolved value as a string', () => {
    const ctx = makeContext('x', { amount: 250 });
    expect(resolveText('{{event.amount}}', ctx)).toBe('250');
    expect(resolveText(undefined, ctx)).toBeUndefined();
  });
});

describe('findPlaceholders', () => {
  it('should list every referenced path', () => {
    expect(findPlaceholders({
      a: '{{event.x}}',
      b: ['{{ error.message }} and {{results.a.status}}', 3],
    })).toEqual(['event.x', 'error.message', 'results.a.status']);
  });

  it('should throw on the first malformed placeholder', () => {
    expect(() => findPlaceholders({ a: 'ok', b: '{{broken' })).toThrow(TemplateError);
  });
});
