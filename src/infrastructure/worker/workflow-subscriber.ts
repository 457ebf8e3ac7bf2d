import Redis from 'ioredis';
import type { Logger } from 'pino';
import type { WorkflowDefinition } from '../../domain/index.js';
import type { WorkflowRegistry } from '../../application/workflow-registry.js';
import { rowToDefinition } from '../../application/workflow-crud.js';
import { isRecord } from '../../application/context-path.js';
import type { Database } from '../db/index.js';
import { findAllWorkflows } from '../db/index.js';
import { WORKFLOWS_CHANGED_CHANNEL } from '../redis/workflow-notifier.js';

export interface ReloadDeps {
  db: Database;
  log: Logger;
  registry: WorkflowRegistry;
}

/** Coalesces notifications that arrive while a reload runs into one more reload. */
export interface ReloadGuard {
  running: boolean;
  pending: boolean;
}

function describeMessage(rawMessage: string): { reason?: unknown; workflow_id?: unknown } {
  try {
    const parsed: unknown = JSON.parse(rawMessage);
    return isRecord(parsed) ? { reason: parsed['reason'], workflow_id: parsed['workflow_id'] } : {};
  } catch {
    return {};
  }
}

/**
 * Rebuilds the registry from every stored document and swaps it in
 * with one `replaceAll`. Stored documents that no longer validate are
 * logged and left out.
 */
export async function reloadWorkflows(deps: ReloadDeps, rawMessage: string, guard: ReloadGuard): Promise<void> {
  if (guard.running) {
    guard.pending = true;
    deps.log.debug('Reload already in progress, queued another');
    return;
  }

  guard.running = true;
  try {
    do {
      guard.pending = false;
      const { reason, workflow_id } = describeMessage(rawMessage);
      deps.log.info({ reason, workflow_id }, 'Workflow change detected, reloading workflows from database');

      const rows = await findAllWorkflows(deps.db);
      const definitions: WorkflowDefinition[] = [];

      for (const row of rows) {
        try {
          definitions.push(rowToDefinition(row));
        } catch (err: unknown) {
          deps.log.warn({ err, workflow_id: row.workflow_id }, 'Stored workflow document is invalid, skipping');
        }
      }

      deps.registry.replaceAll(definitions);
      deps.log.info(
        { workflowCount: definitions.length, workflowIds: definitions.map((d) => d.id) },
        'Workflows reloaded successfully',
      );
    } while (guard.pending);
  } catch (err: unknown) {
    deps.log.error({ err }, 'Failed to reload workflows from database');
  } finally {
    guard.running = false;
  }
}

/**
 * Subscribes to `workflows_changed` on a dedicated connection (a
 * subscribed ioredis client cannot issue other commands) and reloads on
 * every notification. Returns a cleanup function.
 */
export async function startWorkflowSubscriber(
  redisUrl: string,
  deps: ReloadDeps,
  signal: AbortSignal,
): Promise<() => Promise<void>> {
  const sub = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await sub.connect();
  deps.log.info('Workflow subscriber Redis connection established');

  const guard: ReloadGuard = { running: false, pending: false };

  sub.on('message', (channel: string, message: string) => {
    if (channel !== WORKFLOWS_CHANGED_CHANNEL) return;
    if (signal.aborted) return;
    void reloadWorkflows(deps, message, guard);
  });

  await sub.subscribe(WORKFLOWS_CHANGED_CHANNEL);
  deps.log.info({ channel: WORKFLOWS_CHANGED_CHANNEL }, 'Subscribed to workflow change notifications');

  return async () => {
    try {
      await sub.unsubscribe(WORKFLOWS_CHANGED_CHANNEL);
      await sub.quit();
    } catch (err: unknown) {
      deps.log.warn({ err }, 'Workflow subscriber did not close cleanly');
    }
    deps.log.info('Workflow subscriber disconnected');
  };
}
