import type { ResolvedActionSpec, ResolvedData } from '../../domain/index.js';
import type { ActionHandler, HandlerContext, HandlerResult } from '../../application/action-registry.js';
import { isRecord } from '../../application/context-path.js';

/** Destination of the `system` action's `metrics` target. */
export interface MetricsSink {
  increment(metric: string, value: number, tags: Record<string, string>): Promise<void>;
}

type SystemOperation = (data: ResolvedData, ctx: HandlerContext) => Promise<HandlerResult>;

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function toLogLevel(raw: unknown): LogLevel | undefined {
  if (raw === undefined || raw === null || raw === '') return 'info';
  return LOG_LEVELS.find((level) => level === raw);
}

function toNumber(raw: unknown): number | undefined {
  if (raw === undefined || raw === null || raw === '') return 1;
  const value = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number(raw) : NaN;
  return Number.isFinite(value) ? value : undefined;
}

function toTags(raw: unknown): Record<string, string> {
  if (!isRecord(raw)) return {};
  const tags: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined && value !== null) tags[key] = String(value);
  }
  return tags;
}

/**
 * `system` action type: a dispatch table keyed by `spec.target`.
 *
 * - `log`: writes `data.message` at `data.level` (default `info`)
 * - `metrics`: adds `data.value` (default 1) to `data.metric`, tagged by `data.tags`
 */
export class SystemHandler implements ActionHandler {
  private readonly operations: Map<string, SystemOperation>;

  constructor(metrics: MetricsSink) {
    this.operations = new Map<string, SystemOperation>([
      ['log', async (data, ctx) => {
        const level = toLogLevel(data['level']);
        if (level === undefined) {
          return { status: 'failure', error: `Unsupported log level "${String(data['level'])}"` };
        }
        const message = data['message'];
        const text = typeof message === 'string' ? message : JSON.stringify(message ?? '');
        const fields = Object.fromEntries(
          Object.entries(data).filter(([key]) => key !== 'message' && key !== 'level'),
        );
        ctx.log[level]({ ...fields, workflow_id: ctx.workflow_id }, text);
        return { status: 'success', output: { logged: true, level } };
      }],
      ['metrics', async (data) => {
        const metric = data['metric'];
        if (typeof metric !== 'string' || metric === '') {
          return { status: 'failure', error: 'Metrics action requires data.metric' };
        }
        const value = toNumber(data['value']);
        if (value === undefined) {
          return { status: 'failure', error: `Metric value for "${metric}" is not a number` };
        }
        const tags = toTags(data['tags']);
        await metrics.increment(metric, value, tags);
        return { status: 'success', output: { metric, value, tags } };
      }],
    ]);
  }

  async handle(spec: ResolvedActionSpec, data: ResolvedData, ctx: HandlerContext): Promise<HandlerResult> {
    const target = spec.target ?? '';
    const operation = this.operations.get(target);
    if (operation === undefined) {
      return { status: 'failure', error: `Unknown system action "${target}"` };
    }
    return operation(data, ctx);
  }
}
