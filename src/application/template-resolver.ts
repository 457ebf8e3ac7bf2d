import type { ExecutionContext, ResolvedData, TemplateValue } from '../domain/index.js';
import { TemplateError } from '../domain/index.js';
import { parsePath, projectContext, readPath } from './context-path.js';

const OPEN = '{{';
const CLOSE = '}}';

/** A template string split into literal text and placeholder references. */
export type TemplatePart =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'placeholder'; readonly path: readonly string[]; readonly raw: string };

/**
 * Splits a string into text and `{{path}}` parts.
 *
 * Throws TemplateError for an unterminated `{{`, an empty placeholder
 * or a placeholder whose body is not a dotted path. Stray `}}` outside
 * a placeholder is plain text.
 */
export function parseTemplate(template: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let cursor = 0;

  while (cursor < template.length) {
    const open = template.indexOf(OPEN, cursor);
    if (open === -1) {
      parts.push({ kind: 'text', text: template.slice(cursor) });
      break;
    }

    if (open > cursor) {
      parts.push({ kind: 'text', text: template.slice(cursor, open) });
    }

    const close = template.indexOf(CLOSE, open + OPEN.length);
    if (close === -1) {
      throw new TemplateError(`Unterminated placeholder at position ${open}`, template);
    }

    const raw = template.slice(open + OPEN.length, close).trim();
    if (raw === '') {
      throw new TemplateError(`Empty placeholder at position ${open}`, template);
    }

    const path = parsePath(raw);
    if (path === null) {
      throw new TemplateError(`Invalid placeholder path "${raw}" at position ${open}`, template);
    }

    parts.push({ kind: 'placeholder', path, raw });
    cursor = close + CLOSE.length;
  }

  return parts;
}

/** Renders a resolved placeholder value for embedding in a longer string. */
function stringify(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value) ?? '';
}

function resolveString(template: string, root: Record<string, unknown>): unknown {
  if (!template.includes(OPEN)) return template;

  const parts = parseTemplate(template);

  // A lone placeholder keeps the type of what it points at.
  const [only] = parts;
  if (parts.length === 1 && only?.kind === 'placeholder') {
    return readPath(root, only.path) ?? '';
  }

  let out = '';
  for (const part of parts) {
    out += part.kind === 'text' ? part.text : stringify(readPath(root, part.path));
  }
  return out;
}

function resolveWith(value: unknown, root: Record<string, unknown>): unknown {
  if (typeof value === 'string') return resolveString(value, root);

  if (Array.isArray(value)) {
    return value.map((item: unknown) => resolveWith(item, root));
  }

  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = resolveWith(item, root);
    }
    return out;
  }

  return value;
}

/**
 * Substitutes every `{{path}}` in `value` from the execution context.
 *
 * Paths that lead nowhere resolve to `''`. A string that is a single
 * placeholder yields the raw value (a number stays a number); embedded
 * placeholders are stringified. Values without `{{` come back unchanged.
 */
export function resolve(value: TemplateValue, context: ExecutionContext): unknown {
  return resolveWith(value, projectContext(context));
}

/** Resolves a whole `data` mapping against one projection of the context. */
export function resolveData(
  data: { readonly [key: string]: TemplateValue },
  context: ExecutionContext,
): ResolvedData {
  const root = projectContext(context);
  const out: ResolvedData = {};
  for (const [key, item] of Object.entries(data)) {
    out[key] = resolveWith(item, root);
  }
  return out;
}

/** Resolves an optional string field and renders it back to a string. */
export function resolveText(
  value: string | undefined,
  context: ExecutionContext,
): string | undefined {
  if (value === undefined) return undefined;
  return stringify(resolveString(value, projectContext(context)));
}

/**
 * Lists the dotted paths referenced anywhere in `value`.
 * Throws TemplateError on the first malformed placeholder.
 */
export function findPlaceholders(value: TemplateValue): string[] {
  const found: string[] = [];

  const visit = (item: unknown): void => {
    if (typeof item === 'string') {
      if (!item.includes(OPEN)) return;
      for (const part of parseTemplate(item)) {
        if (part.kind === 'placeholder') found.push(part.raw);
      }
      return;
    }
    if (Array.isArray(item)) {
      item.forEach(visit);
      return;
    }
    if (item !== null && typeof item === 'object') {
      Object.values(item).forEach(visit);
    }
  };

  visit(value);
  return found;
}
