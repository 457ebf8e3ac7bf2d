import type Redis from 'ioredis';
import type { Logger } from 'pino';

export const WORKFLOWS_CHANGED_CHANNEL = 'workflows_changed';

export type WorkflowChangeReason = 'create' | 'update' | 'enable' | 'disable' | 'delete';

export interface WorkflowChangePayload {
  ts: string;
  reason: WorkflowChangeReason;
  workflow_id: string;
}

/**
 * Publishes a lightweight notification on `workflows_changed`.
 *
 * Best-effort: failures are logged and never reach the caller, so CRUD
 * responses do not depend on Pub/Sub.
 */
export async function publishWorkflowChange(
  redis: Redis,
  log: Logger,
  reason: WorkflowChangeReason,
  workflowId: string,
): Promise<void> {
  try {
    const payload: WorkflowChangePayload = {
      ts: new Date().toISOString(),
      reason,
      workflow_id: workflowId,
    };
    await redis.publish(WORKFLOWS_CHANGED_CHANNEL, JSON.stringify(payload));
    log.debug({ channel: WORKFLOWS_CHANGED_CHANNEL, reason, workflow_id: workflowId }, 'Published workflow change notification');
  } catch (err: unknown) {
    log.error({ err, reason, workflow_id: workflowId }, 'Failed to publish workflow change notification');
  }
}
