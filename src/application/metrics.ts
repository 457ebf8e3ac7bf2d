import type { Database } from '../infrastructure/db/index.js';
import { queryRunMetrics } from '../infrastructure/db/index.js';

const DEFAULT_WINDOW = 3600;
const MIN_WINDOW = 10;
const MAX_WINDOW = 86_400;

const VALID_GROUP_BY = ['workflow_id', 'state'] as const;
type GroupBy = (typeof VALID_GROUP_BY)[number];

export interface GetRunMetricsParams {
  window_seconds?: number;
  group_by?: string;
}

export interface RunMetricsResult {
  window_seconds: number;
  group_by: GroupBy;
  from: string;
  to: string;
  metrics: Array<{
    key: string;
    count: number;
    rate_per_sec: number;
    avg_duration_ms: number;
  }>;
}

function isGroupBy(raw: string): raw is GroupBy {
  return VALID_GROUP_BY.some((g) => g === raw);
}

/**
 * Clamps `window_seconds` to [10, 86400].
 * Returns null if the input is not a finite integer.
 */
export function resolveWindow(raw: number | undefined): number | null {
  if (raw === undefined) return DEFAULT_WINDOW;
  if (!Number.isFinite(raw) || raw !== Math.floor(raw)) return null;
  return Math.min(Math.max(raw, MIN_WINDOW), MAX_WINDOW);
}

/** Returns the validated value or null if invalid. */
export function resolveGroupBy(raw: string | undefined): GroupBy | null {
  if (raw === undefined) return 'workflow_id';
  return isGroupBy(raw) ? raw : null;
}

/**
 * Use case: run counts per workflow or per terminal state within a
 * sliding window. Rate is count / window_seconds.
 */
export async function getRunMetrics(
  db: Database,
  params: GetRunMetricsParams,
  now: Date = new Date(),
): Promise<RunMetricsResult> {
  const window_seconds = resolveWindow(params.window_seconds) ?? DEFAULT_WINDOW;
  const group_by = resolveGroupBy(params.group_by) ?? 'workflow_id';

  const to = now;
  const from = new Date(to.getTime() - window_seconds * 1000);

  const buckets = await queryRunMetrics(db, { from, to, group_by });

  return {
    window_seconds,
    group_by,
    from: from.toISOString(),
    to: to.toISOString(),
    metrics: buckets.map((b) => ({
      key: b.key,
      count: b.count,
      rate_per_sec: parseFloat((b.count / window_seconds).toFixed(4)),
      avg_duration_ms: Math.round(b.avg_duration_ms),
    })),
  };
}
