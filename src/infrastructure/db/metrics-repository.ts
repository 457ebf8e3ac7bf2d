import { and, gte, lte, count, avg } from 'drizzle-orm';
import type { Database } from './client.js';
import { workflowRuns } from './schema.js';

export interface RunMetricsFilters {
  from: Date;
  to: Date;
  group_by: 'workflow_id' | 'state';
}

export interface RunMetricsBucket {
  key: string;
  count: number;
  avg_duration_ms: number;
}

/**
 * Grouped run counts and mean duration within a time window, on the
 * indexed `started_at` column. Rates are derived in the application layer.
 */
export async function queryRunMetrics(
  db: Database,
  filters: RunMetricsFilters,
): Promise<RunMetricsBucket[]> {
  const groupCol = filters.group_by === 'state' ? workflowRuns.state : workflowRuns.workflow_id;

  const rows = await db
    .select({
      key: groupCol,
      count: count(),
      avg_duration_ms: avg(workflowRuns.duration_ms),
    })
    .from(workflowRuns)
    .where(and(
      gte(workflowRuns.started_at, filters.from),
      lte(workflowRuns.started_at, filters.to),
    ))
    .groupBy(groupCol);

  return rows.map((r) => ({
    key: r.key,
    count: Number(r.count),
    avg_duration_ms: r.avg_duration_ms === null ? 0 : Number(r.avg_duration_ms),
  }));
}
