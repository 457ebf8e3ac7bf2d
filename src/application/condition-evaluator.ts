import type { ExecutionContext } from '../domain/index.js';
import { ConditionError } from '../domain/index.js';
import { parsePath, projectContext, readPath } from './context-path.js';

type Comparator = (left: unknown, right: unknown) => boolean;

const isBlank = (value: unknown): boolean =>
  value === undefined || value === null || value === '';

/**
 * Equality used by `==` / `!=`.
 *
 * Strict, except: a number matches its numeric string, a boolean matches
 * 'true'/'false', and an unresolved path (undefined) matches null or ''.
 */
export function looseEquals(left: unknown, right: unknown): boolean {
  if (left === right) return true;

  if (left === undefined || right === undefined) {
    return isBlank(left) && isBlank(right);
  }

  if (typeof left === 'number' && typeof right === 'string') {
    return right.trim() !== '' && Number(right) === left;
  }
  if (typeof left === 'string' && typeof right === 'number') {
    return left.trim() !== '' && Number(left) === right;
  }

  if (typeof left === 'boolean' && typeof right === 'string') return String(left) === right;
  if (typeof left === 'string' && typeof right === 'boolean') return left === String(right);

  return false;
}

/**
 * Supported comparison operators.
 *
 * Adding one (`>`, `<`, `in`, …) is a new entry here; the tokenizer
 * picks its symbol up from this table.
 */
const COMPARATORS = {
  '==': (left, right) => looseEquals(left, right),
  '!=': (left, right) => !looseEquals(left, right),
} satisfies Record<string, Comparator>;

export type ComparatorSymbol = keyof typeof COMPARATORS;

function isComparatorSymbol(key: string): key is ComparatorSymbol {
  return Object.prototype.hasOwnProperty.call(COMPARATORS, key);
}

// Longest first so a future `>=` wins over `>`.
const SYMBOLS: readonly ComparatorSymbol[] = Object.keys(COMPARATORS)
  .filter(isComparatorSymbol)
  .sort((a, b) => b.length - a.length);

/** Words reserved for combinators that this grammar does not accept yet. */
const RESERVED_WORDS = new Set(['and', 'or', 'not', 'in']);

type Literal = string | number | boolean | null;

type Token =
  | { readonly kind: 'path'; readonly segments: readonly string[]; readonly pos: number }
  | { readonly kind: 'literal'; readonly value: Literal; readonly pos: number }
  | { readonly kind: 'operator'; readonly symbol: ComparatorSymbol; readonly pos: number };

export type Operand =
  | { readonly kind: 'path'; readonly segments: readonly string[] }
  | { readonly kind: 'literal'; readonly value: Literal };

export type ConditionNode =
  | { readonly kind: 'compare'; readonly operator: ComparatorSymbol; readonly left: Operand; readonly right: Operand }
  | { readonly kind: 'truthy'; readonly operand: Operand };

const WORD_RE = /[A-Za-z0-9_.-]/;
const NUMBER_RE = /^-?\d+(\.\d+)?/;

function readString(expr: string, start: number): { value: string; end: number } {
  const quote = expr.charAt(start);
  let value = '';
  let i = start + 1;

  while (i < expr.length) {
    const ch = expr.charAt(i);
    if (ch === '\\' && i + 1 < expr.length) {
      value += expr.charAt(i + 1);
      i += 2;
      continue;
    }
    if (ch === quote) return { value, end: i + 1 };
    value += ch;
    i++;
  }

  throw new ConditionError('Unterminated string literal', expr, start);
}

function tokenize(expr: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  outer: while (i < expr.length) {
    const ch = expr.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const { value, end } = readString(expr, i);
      tokens.push({ kind: 'literal', value, pos: i });
      i = end;
      continue;
    }

    for (const symbol of SYMBOLS) {
      if (expr.startsWith(symbol, i)) {
        tokens.push({ kind: 'operator', symbol, pos: i });
        i += symbol.length;
        continue outer;
      }
    }

    const numberMatch = NUMBER_RE.exec(expr.slice(i));
    if (numberMatch !== null && !WORD_RE.test(expr.charAt(i + numberMatch[0].length))) {
      tokens.push({ kind: 'literal', value: Number(numberMatch[0]), pos: i });
      i += numberMatch[0].length;
      continue;
    }

    if (WORD_RE.test(ch)) {
      const start = i;
      while (i < expr.length && WORD_RE.test(expr.charAt(i))) i++;
      const word = expr.slice(start, i);

      if (word === 'true' || word === 'false') {
        tokens.push({ kind: 'literal', value: word === 'true', pos: start });
        continue;
      }
      if (word === 'null') {
        tokens.push({ kind: 'literal', value: null, pos: start });
        continue;
      }
      if (RESERVED_WORDS.has(word.toLowerCase())) {
        throw new ConditionError(`Unsupported operator "${word}"`, expr, start);
      }

      const segments = parsePath(word);
      if (segments === null) {
        throw new ConditionError(`Invalid path "${word}"`, expr, start);
      }
      tokens.push({ kind: 'path', segments, pos: start });
      continue;
    }

    throw new ConditionError(`Unexpected character "${ch}"`, expr, i);
  }

  return tokens;
}

function toOperand(token: Token | undefined, expr: string): Operand {
  if (token === undefined) {
    throw new ConditionError('Expected a value', expr, expr.length);
  }
  if (token.kind === 'operator') {
    throw new ConditionError(`Unexpected operator "${token.symbol}"`, expr, token.pos);
  }
  return token.kind === 'path'
    ? { kind: 'path', segments: token.segments }
    : { kind: 'literal', value: token.value };
}

/**
 * Parses `operand` or `operand <op> operand`.
 * Throws ConditionError on anything else.
 */
export function parseCondition(expr: string): ConditionNode {
  const tokens = tokenize(expr);
  if (tokens.length === 0) {
    throw new ConditionError('Empty expression', expr, 0);
  }

  const left = toOperand(tokens[0], expr);
  const next = tokens[1];

  if (next === undefined) {
    return { kind: 'truthy', operand: left };
  }
  if (next.kind !== 'operator') {
    throw new ConditionError('Expected an operator', expr, next.pos);
  }

  const right = toOperand(tokens[2], expr);
  const extra = tokens[3];
  if (extra !== undefined) {
    throw new ConditionError('Unexpected trailing input', expr, extra.pos);
  }

  return { kind: 'compare', operator: next.symbol, left, right };
}

function operandValue(operand: Operand, root: Record<string, unknown>): unknown {
  return operand.kind === 'path' ? readPath(root, operand.segments) : operand.value;
}

export function evaluateNode(node: ConditionNode, context: ExecutionContext): boolean {
  const root = projectContext(context);

  if (node.kind === 'truthy') {
    return Boolean(operandValue(node.operand, root));
  }

  const compare: Comparator = COMPARATORS[node.operator];
  return compare(operandValue(node.left, root), operandValue(node.right, root));
}

/**
 * Evaluates a trigger condition. A missing or blank expression is true.
 * Throws ConditionError when the expression does not parse.
 */
export function evaluate(expr: string | undefined, context: ExecutionContext): boolean {
  if (expr === undefined || expr.trim() === '') return true;
  return evaluateNode(parseCondition(expr), context);
}

export const SUPPORTED_OPERATORS: readonly ComparatorSymbol[] = SYMBOLS;
