export { workflows, workflowRuns } from './schema.js';
export { createDbClient, ensureTables, DEFAULT_DATABASE_URL } from './client.js';
export type { Database, SqlClient } from './client.js';
export {
  upsertWorkflow,
  insertWorkflowIfAbsent,
  findAllWorkflows,
  findWorkflowById,
  setWorkflowEnabled,
  deleteWorkflow,
} from './workflow-repository.js';
export type { WorkflowRow, UpsertWorkflowInput } from './workflow-repository.js';
export { insertRun, queryRuns, findRunById } from './run-repository.js';
export type { RunRow, RunQueryFilters, PaginationParams } from './run-repository.js';
export { queryRunMetrics } from './metrics-repository.js';
export type { RunMetricsFilters, RunMetricsBucket } from './metrics-repository.js';
export { createPostgresOutcomeReporter } from './run-reporter.js';
export { default as dbPlugin } from './db-plugin.js';
