import { eq, and, desc, type SQL } from 'drizzle-orm';
import type { InvocationOutcome } from '../../domain/index.js';
import type { Database } from './client.js';
import { workflowRuns } from './schema.js';

export type RunRow = typeof workflowRuns.$inferSelect;

export interface RunQueryFilters {
  workflow_id?: string;
  state?: string;
}

export interface PaginationParams {
  limit: number;
  offset: number;
}

/**
 * Persists an outcome record. ON CONFLICT DO NOTHING on run_id, so a
 * repeated report is harmless. Returns true if a row was inserted.
 */
export async function insertRun(db: Database, outcome: InvocationOutcome): Promise<boolean> {
  const rows = await db
    .insert(workflowRuns)
    .values({
      run_id: outcome.run_id,
      workflow_id: outcome.workflow_id,
      workflow_version: outcome.workflow_version,
      event_type: outcome.event_type,
      state: outcome.state,
      manual: outcome.manual,
      actions: [...outcome.actions],
      error_actions: [...outcome.error_actions],
      skipped_actions: [...outcome.skipped_actions],
      error: outcome.error ?? null,
      started_at: new Date(outcome.started_at),
      finished_at: new Date(outcome.finished_at),
      duration_ms: Math.round(outcome.duration_ms),
    })
    .onConflictDoNothing({ target: workflowRuns.run_id })
    .returning({ run_id: workflowRuns.run_id });

  return rows.length > 0;
}

/** Newest first (started_at DESC). */
export async function queryRuns(
  db: Database,
  filters: RunQueryFilters,
  pagination: PaginationParams,
): Promise<RunRow[]> {
  const conditions: SQL[] = [];

  if (filters.workflow_id !== undefined) {
    conditions.push(eq(workflowRuns.workflow_id, filters.workflow_id));
  }
  if (filters.state !== undefined) {
    conditions.push(eq(workflowRuns.state, filters.state));
  }

  const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

  return db
    .select()
    .from(workflowRuns)
    .where(whereClause)
    .orderBy(desc(workflowRuns.started_at))
    .limit(pagination.limit)
    .offset(pagination.offset);
}

export async function findRunById(db: Database, runId: string): Promise<RunRow | undefined> {
  const rows = await db
    .select()
    .from(workflowRuns)
    .where(eq(workflowRuns.run_id, runId))
    .limit(1);

  return rows[0];
}
