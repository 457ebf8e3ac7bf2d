import type { Database } from '../infrastructure/db/index.js';
import {
  upsertWorkflow,
  insertWorkflowIfAbsent,
  findAllWorkflows,
  findWorkflowById,
  setWorkflowEnabled,
  deleteWorkflow,
} from '../infrastructure/db/index.js';
import type { WorkflowRow } from '../infrastructure/db/index.js';
import type { Event, EventPayload, WorkflowDefinition } from '../domain/index.js';
import {
  WorkflowDisabledError,
  WorkflowNotFoundError,
  WorkflowValidationError,
  createEvent,
} from '../domain/index.js';
import { parseWorkflowDefinition, toWorkflowDocument } from './workflow-schema.js';

export type { WorkflowRow };

function toUpsertInput(definition: WorkflowDefinition) {
  return {
    workflow_id: definition.id,
    name: definition.name,
    description: definition.description,
    version: definition.version,
    enabled: definition.enabled,
    document: toWorkflowDocument(definition),
  };
}

/** Rebuilds the definition stored in a row. Throws WorkflowValidationError. */
export function rowToDefinition(row: WorkflowRow): WorkflowDefinition {
  return parseWorkflowDefinition(row.document);
}

/**
 * Validates and stores a new document.
 * Returns null if a workflow with that id already exists.
 */
export async function createWorkflow(db: Database, raw: unknown): Promise<WorkflowRow | null> {
  const definition = parseWorkflowDefinition(raw);
  const existing = await findWorkflowById(db, definition.id);
  if (existing !== undefined) return null;
  return upsertWorkflow(db, toUpsertInput(definition));
}

/**
 * Stores each definition whose id is not in the table yet, so documents
 * shipped on disk are visible to the API and the worker alike. Stored
 * documents are never overwritten. Returns the ids that were inserted.
 */
export async function seedWorkflows(
  db: Database,
  definitions: readonly WorkflowDefinition[],
): Promise<string[]> {
  const seeded: string[] = [];
  for (const definition of definitions) {
    if (await insertWorkflowIfAbsent(db, toUpsertInput(definition))) {
      seeded.push(definition.id);
    }
  }
  return seeded;
}

/** List all workflows (enabled and disabled). */
export async function listWorkflows(db: Database): Promise<WorkflowRow[]> {
  return findAllWorkflows(db);
}

/** Returns null if not found. */
export async function getWorkflow(db: Database, workflowId: string): Promise<WorkflowRow | null> {
  const row = await findWorkflowById(db, workflowId);
  return row ?? null;
}

/**
 * Full replace. The document's id must equal `workflowId`.
 * Returns null if nothing is stored under that id.
 */
export async function replaceWorkflow(
  db: Database,
  workflowId: string,
  raw: unknown,
): Promise<WorkflowRow | null> {
  const definition = parseWorkflowDefinition(raw);
  if (definition.id !== workflowId) {
    throw new WorkflowValidationError(
      [{ path: 'id', message: `Must match "${workflowId}"` }],
      definition.id,
    );
  }

  const existing = await findWorkflowById(db, workflowId);
  if (existing === undefined) return null;
  return upsertWorkflow(db, toUpsertInput(definition));
}

/** Returns the updated row or null if not found. */
export async function setEnabled(
  db: Database,
  workflowId: string,
  enabled: boolean,
): Promise<WorkflowRow | null> {
  const row = await setWorkflowEnabled(db, workflowId, enabled);
  return row ?? null;
}

/** Returns true if deleted, false if not found. */
export async function removeWorkflow(db: Database, workflowId: string): Promise<boolean> {
  return deleteWorkflow(db, workflowId);
}

/**
 * Builds the event for a manual run of a stored workflow, typed after
 * its trigger. Throws WorkflowNotFoundError or WorkflowDisabledError.
 */
export async function prepareExecution(
  db: Database,
  workflowId: string,
  payload: EventPayload,
): Promise<Event> {
  const row = await findWorkflowById(db, workflowId);
  if (row === undefined) throw new WorkflowNotFoundError(workflowId);
  if (!row.enabled) throw new WorkflowDisabledError(workflowId);

  const definition = rowToDefinition(row);
  return createEvent(definition.trigger.event, payload);
}
