import type { Database } from '../infrastructure/db/index.js';
import { queryRuns, findRunById } from '../infrastructure/db/index.js';
import type { PaginationParams, RunQueryFilters, RunRow } from '../infrastructure/db/index.js';

const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 500;

export interface ListRunsParams {
  limit?: number;
  offset?: number;
  workflow_id?: string;
  state?: string;
}

export interface RunPage {
  data: RunRow[];
  /** `count` is the number of rows on this page, not a total. */
  pagination: PaginationParams & { count: number };
}

function toPage(params: ListRunsParams): PaginationParams {
  return {
    limit: Math.min(Math.max(params.limit ?? DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE),
    offset: Math.max(params.offset ?? 0, 0),
  };
}

/**
 * One page of invocation runs, newest first, optionally narrowed to a
 * workflow and a terminal state.
 */
export async function listRuns(db: Database, params: ListRunsParams): Promise<RunPage> {
  const page = toPage(params);
  const filters: RunQueryFilters = {};
  if (params.workflow_id !== undefined) filters.workflow_id = params.workflow_id;
  if (params.state !== undefined) filters.state = params.state;

  const data = await queryRuns(db, filters, page);
  return { data, pagination: { ...page, count: data.length } };
}

export async function getRun(db: Database, runId: string): Promise<RunRow | null> {
  return (await findRunById(db, runId)) ?? null;
}
