import { pgTable, uuid, varchar, timestamp, jsonb, boolean, integer, index } from 'drizzle-orm/pg-core';
import type { ActionResult, ErrorInfo } from '../../domain/index.js';

/**
 * Stored workflow documents.
 *
 * `document` holds the validated document as JSON; the scalar columns
 * duplicate what listing and filtering need.
 */
export const workflows = pgTable('workflows', {
  workflow_id: varchar('workflow_id', { length: 255 }).primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  description: varchar('description', { length: 2000 }).notNull().default(''),
  version: varchar('version', { length: 50 }).notNull(),
  enabled: boolean('enabled').notNull().default(true),
  document: jsonb('document').$type<Record<string, unknown>>().notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_workflows_enabled').on(table.enabled),
]);

/**
 * One row per finished invocation.
 *
 * `workflow_id` is not a foreign key: runs outlive deleted workflows.
 */
export const workflowRuns = pgTable('workflow_runs', {
  run_id: uuid('run_id').primaryKey(),
  workflow_id: varchar('workflow_id', { length: 255 }).notNull(),
  workflow_version: varchar('workflow_version', { length: 50 }).notNull(),
  event_type: varchar('event_type', { length: 255 }).notNull(),
  state: varchar('state', { length: 20 }).notNull(),
  manual: boolean('manual').notNull().default(false),
  actions: jsonb('actions').$type<ActionResult[]>().notNull().default([]),
  error_actions: jsonb('error_actions').$type<ActionResult[]>().notNull().default([]),
  skipped_actions: jsonb('skipped_actions').$type<string[]>().notNull().default([]),
  error: jsonb('error').$type<ErrorInfo>(),
  started_at: timestamp('started_at', { withTimezone: true }).notNull(),
  finished_at: timestamp('finished_at', { withTimezone: true }).notNull(),
  duration_ms: integer('duration_ms').notNull(),
}, (table) => [
  index('idx_workflow_runs_workflow_id').on(table.workflow_id),
  index('idx_workflow_runs_state').on(table.state),
  index('idx_workflow_runs_started_at').on(table.started_at),
]);
