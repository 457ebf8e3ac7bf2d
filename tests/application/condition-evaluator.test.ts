import { describe, it, expect } from 'vitest';
import {
  SUPPORTED_OPERATORS,
  evaluate,
  looseEquals,
  parseCondition,
} from '../../src/application/condition-evaluator.js';
import { ConditionError } from '../../src/domain/index.js';
import { makeContext } from '../helpers.js';

describe('parseCondition', () => {
  it('should parse a comparison', () => {
    expect(parseCondition("event.kind == 'transfer'")).toEqual({
      kind: 'compare',
      operator: '==',
      left: { kind: 'path', segments: ['event', 'kind'] },
      right: { kind: 'literal', value: 'transfer' },
    });
  });

  it('should parse numbers, booleans and null', () => {
    expect(parseCondition('event.n != -1.5')).toMatchObject({ right: { kind: 'literal', value: -1.5 } });
    expect(parseCondition('event.ok == true')).toMatchObject({ right: { kind: 'literal', value: true } });
    expect(parseCondition('event.v == null')).toMatchObject({ right: { kind: 'literal', value: null } });
  });

  it('should parse a lone operand as a truthiness test', () => {
    expect(parseCondition('event.active')).toEqual({
      kind: 'truthy',
      operand: { kind: 'path', segments: ['event', 'active'] },
    });
  });

  it('should reject boolean combinators', () => {
    expect(() => parseCondition("event.a == 'x' and event.b == 'y'"))
      .toThrow(`Unsupported operator "and" at position 15 in "event.a == 'x' and event.b == 'y'"`);
  });

  it('should reject operators outside the table', () => {
    expect(() => parseCondition('event.a > 1')).toThrow('Unexpected character ">" at position 8');
  });

  it('should reject incomplete or overlong expressions', () => {
    expect(() => parseCondition('event.a ==')).toThrow('Expected a value');
    expect(() => parseCondition("event.a 'x'")).toThrow('Expected an operator at position 8');
    expect(() => parseCondition("event.a == 'x' 'y'")).toThrow('Unexpected trailing input at position 15');
    expect(() => parseCondition("event.a == 'open")).toThrow('Unterminated string literal at position 11');
    expect(() => parseCondition('   ')).toThrow(ConditionError);
  });

  it('should unescape quotes inside string literals', () => {
    expect(parseCondition("event.s == 'it\\'s'")).toMatchObject({ right: { value: "it's" } });
  });
});

describe('evaluate', () => {
  it('should be true for a missing or blank condition', () => {
    expect(evaluate(undefined, makeContext())).toBe(true);
    expect(evaluate('  ', makeContext())).toBe(true);
  });

  it('should compare event fields with string literals', () => {
    const transfer = makeContext('tx', { transaction_type: 'transfer' });
    const deposit = makeContext('tx', { transaction_type: 'deposit' });
    const expr = "event.transaction_type == 'transfer'";

    expect(evaluate(expr, transfer)).toBe(true);
    expect(evaluate(expr, deposit)).toBe(false);
    expect(evaluate("event.transaction_type != 'transfer'", deposit)).toBe(true);
  });

  it('should match numbers against numeric strings', () => {
    expect(evaluate('event.amount == 250', makeContext('x', { amount: '250' }))).toBe(true);
    expect(evaluate("event.amount == '250'", makeContext('x', { amount: 250 }))).toBe(true);
    expect(evaluate('event.amount == 25', makeContext('x', { amount: 250 }))).toBe(false);
  });

  it('should treat a missing path as null or empty', () => {
    const ctx = makeContext('x', {});
    expect(evaluate('event.missing == null', ctx)).toBe(true);
    expect(evaluate("event.missing == ''", ctx)).toBe(true);
    expect(evaluate('event.missing != null', ctx)).toBe(false);
  });

  it('should read the event type', () => {
    expect(evaluate("event.type == 'order.created'", makeContext('order.created'))).toBe(true);
  });

  it('should test truthiness of a lone path', () => {
    expect(evaluate('event.active', makeContext('x', { active: true }))).toBe(true);
    expect(evaluate('event.active', makeContext('x', {}))).toBe(false);
  });

  it('should throw ConditionError for a malformed expression', () => {
    expect(() => evaluate('event.a or event.b', makeContext())).toThrow(ConditionError);
  });
});

describe('looseEquals', () => {
  it('should compare with the documented coercions', () => {
    expect(looseEquals(1, '1')).toBe(true);
    expect(looseEquals(0, '')).toBe(false);
    expect(looseEquals(true, 'true')).toBe(true);
    expect(looseEquals('false', true)).toBe(false);
    expect(looseEquals(undefined, null)).toBe(true);
    expect(looseEquals(undefined, 0)).toBe(false);
    expect(looseEquals({}, {})).toBe(false);
  });
});

describe('SUPPORTED_OPERATORS', () => {
  it('should expose equality operators', () => {
    expect([...SUPPORTED_OPERATORS].sort()).toEqual(['!=', '==']);
  });
});
