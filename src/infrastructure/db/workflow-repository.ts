import { eq, asc, sql } from 'drizzle-orm';
import type { Database } from './client.js';
import { workflows } from './schema.js';

/** Row shape returned by workflow queries. */
export type WorkflowRow = typeof workflows.$inferSelect;

export interface UpsertWorkflowInput {
  workflow_id: string;
  name: string;
  description: string;
  version: string;
  enabled: boolean;
  document: Record<string, unknown>;
}

/** Inserts the document, or replaces the stored one with the same id. */
export async function upsertWorkflow(db: Database, input: UpsertWorkflowInput): Promise<WorkflowRow> {
  const now = new Date();
  const [row] = await db.insert(workflows).values({
    workflow_id: input.workflow_id,
    name: input.name,
    description: input.description,
    version: input.version,
    enabled: input.enabled,
    document: input.document,
    created_at: now,
    updated_at: now,
  }).onConflictDoUpdate({
    target: workflows.workflow_id,
    set: {
      name: input.name,
      description: input.description,
      version: input.version,
      enabled: input.enabled,
      document: input.document,
      updated_at: now,
    },
  }).returning();

  if (row === undefined) {
    throw new Error(`Upsert of workflow "${input.workflow_id}" returned no row`);
  }
  return row;
}

/** Inserts the document unless the id is taken. Returns true if it was inserted. */
export async function insertWorkflowIfAbsent(db: Database, input: UpsertWorkflowInput): Promise<boolean> {
  const now = new Date();
  const rows = await db.insert(workflows).values({
    ...input,
    created_at: now,
    updated_at: now,
  }).onConflictDoNothing({ target: workflows.workflow_id })
    .returning({ workflow_id: workflows.workflow_id });

  return rows.length > 0;
}

export async function findAllWorkflows(db: Database): Promise<WorkflowRow[]> {
  return db.select().from(workflows).orderBy(asc(workflows.workflow_id));
}

export async function findWorkflowById(db: Database, workflowId: string): Promise<WorkflowRow | undefined> {
  const rows = await db.select().from(workflows).where(eq(workflows.workflow_id, workflowId)).limit(1);
  return rows[0];
}

/** Flips `enabled` on both the column and the stored document. */
export async function setWorkflowEnabled(
  db: Database,
  workflowId: string,
  enabled: boolean,
): Promise<WorkflowRow | undefined> {
  const rows = await db.update(workflows).set({
    enabled,
    document: sql`jsonb_set(${workflows.document}, '{enabled}', to_jsonb(${enabled}::boolean))`,
    updated_at: new Date(),
  }).where(eq(workflows.workflow_id, workflowId)).returning();

  return rows[0];
}

export async function deleteWorkflow(db: Database, workflowId: string): Promise<boolean> {
  const rows = await db.delete(workflows)
    .where(eq(workflows.workflow_id, workflowId))
    .returning({ workflow_id: workflows.workflow_id });
  return rows.length > 0;
}
