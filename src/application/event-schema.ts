import { z } from 'zod';

/**
 * Zod schema for one inbound event.
 *
 * `timestamp` is optional; the ingress stamps the current time when it
 * is absent. `payload` is open-ended: workflows address it by path.
 */
export const eventSchema = z.object({
  type: z.string().trim().min(1).max(255),
  payload: z.record(z.string(), z.unknown()).default({}),
  timestamp: z.string().datetime({ message: 'Must be a valid ISO-8601 datetime' }).optional(),
});

export type EventInput = z.infer<typeof eventSchema>;

export const eventBatchSchema = z.array(eventSchema).min(1, 'Batch must contain at least one event');

/** Body of a manual execution request. */
export const executeRequestSchema = z.object({
  payload: z.record(z.string(), z.unknown()).default({}),
});

/** Body of `PATCH /workflows/:id`. */
export const patchWorkflowSchema = z.object({
  enabled: z.boolean(),
});
