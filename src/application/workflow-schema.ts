import { z } from 'zod';
import type { ActionSpec, TemplateValue, WorkflowDefinition } from '../domain/index.js';
import { WorkflowValidationError, freezeDeep } from '../domain/index.js';

const templateValueSchema: z.ZodType<TemplateValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(templateValueSchema),
    z.record(z.string(), templateValueSchema),
  ]),
);

const identifierSchema = z.string().trim().min(1).max(255);

export const actionSpecSchema = z.object({
  id: identifierSchema,
  type: identifierSchema,
  target: z.string().optional(),
  template: z.string().optional(),
  channel: z.string().optional(),
  data: z.record(z.string(), templateValueSchema).optional().default({}),
});

/** Rejects a chain that reuses an action id, so `results.<id>` stays unambiguous. */
const actionChainSchema = z.array(actionSpecSchema).superRefine((actions, ctx) => {
  const seen = new Set<string>();
  actions.forEach((action, index) => {
    if (seen.has(action.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `Duplicate action id "${action.id}"`,
      });
    }
    seen.add(action.id);
  });
});

export const triggerSchema = z.object({
  type: z.literal('event'),
  event: z.string().trim().min(1).max(255),
  condition: z.string().optional(),
});

/**
 * Zod schema for a workflow document.
 *
 * `id`, `trigger` and `actions` are required. Unknown top-level fields
 * are stripped so newer documents still load. Action ids are unique
 * across both chains.
 */
export const workflowDocumentSchema = z.object({
  id: identifierSchema,
  name: z.string().max(255).optional(),
  description: z.string().max(2000).optional().default(''),
  version: z.string().min(1).max(50).optional().default('1.0.0'),
  enabled: z.boolean().optional().default(true),
  timeout_ms: z.number().int().positive().optional(),
  trigger: triggerSchema,
  actions: actionChainSchema,
  error_handler: z.object({ actions: actionChainSchema }).optional(),
}).superRefine((doc, ctx) => {
  // Both chains write into the same `results` map.
  const mainIds = new Set(doc.actions.map((action) => action.id));
  doc.error_handler?.actions.forEach((action, index) => {
    if (mainIds.has(action.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['error_handler', 'actions', index, 'id'],
        message: `Action id "${action.id}" is already used in actions`,
      });
    }
  });
});

export type WorkflowDocument = z.input<typeof workflowDocumentSchema>;

function toActionSpec(action: z.infer<typeof actionSpecSchema>): ActionSpec {
  return {
    id: action.id,
    type: action.type,
    target: action.target,
    template: action.template,
    channel: action.channel,
    data: action.data,
  };
}

/**
 * Validates a raw document and returns a frozen WorkflowDefinition.
 *
 * Throws WorkflowValidationError with every issue found; a document
 * that throws here must never reach the registry.
 */
export function parseWorkflowDefinition(raw: unknown): WorkflowDefinition {
  const parsed = workflowDocumentSchema.safeParse(raw);

  if (!parsed.success) {
    const rawId = typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string'
      ? raw.id
      : undefined;
    throw new WorkflowValidationError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
      rawId,
    );
  }

  const doc = parsed.data;
  const definition: WorkflowDefinition = {
    id: doc.id,
    name: doc.name ?? doc.id,
    description: doc.description,
    version: doc.version,
    enabled: doc.enabled,
    timeout_ms: doc.timeout_ms,
    trigger: {
      type: doc.trigger.type,
      event: doc.trigger.event,
      condition: doc.trigger.condition,
    },
    actions: doc.actions.map(toActionSpec),
    error_handler: doc.error_handler !== undefined
      ? { actions: doc.error_handler.actions.map(toActionSpec) }
      : undefined,
  };

  return freezeDeep(definition);
}

/** Plain JSON view of a definition, as stored and served by the API. */
export function toWorkflowDocument(definition: WorkflowDefinition): Record<string, unknown> {
  const doc: Record<string, unknown> = JSON.parse(JSON.stringify(definition));
  return doc;
}
