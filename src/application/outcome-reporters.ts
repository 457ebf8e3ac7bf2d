import type { Logger } from 'pino';
import type { InvocationOutcome } from '../domain/index.js';
import type { OutcomeReporter } from './workflow-engine.js';

/** One structured line per invocation: `info` when completed, `warn` otherwise. */
export function createLoggingReporter(log: Logger): OutcomeReporter {
  return {
    report(outcome: InvocationOutcome): void {
      const fields = {
        run_id: outcome.run_id,
        workflow_id: outcome.workflow_id,
        workflow_version: outcome.workflow_version,
        event_type: outcome.event_type,
        state: outcome.state,
        manual: outcome.manual,
        actions: outcome.actions.map((a) => ({ action_id: a.action_id, status: a.status })),
        error_actions: outcome.error_actions.map((a) => ({ action_id: a.action_id, status: a.status })),
        skipped_actions: outcome.skipped_actions,
        duration_ms: outcome.duration_ms,
      };

      if (outcome.state === 'completed') {
        log.info(fields, 'Workflow invocation completed');
      } else {
        log.warn({ ...fields, error: outcome.error }, 'Workflow invocation failed');
      }
    },
  };
}

export interface RunHistoryFilters {
  workflow_id?: string | undefined;
  limit?: number | undefined;
}

/** Bounded in-memory record of recent outcomes, newest first. */
export class RunHistory implements OutcomeReporter {
  private readonly entries: InvocationOutcome[] = [];
  private readonly capacity: number;

  constructor(capacity = 500) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  report(outcome: InvocationOutcome): void {
    this.entries.unshift(outcome);
    if (this.entries.length > this.capacity) {
      this.entries.length = this.capacity;
    }
  }

  list(filters: RunHistoryFilters = {}): InvocationOutcome[] {
    const matching = filters.workflow_id === undefined
      ? this.entries
      : this.entries.filter((o) => o.workflow_id === filters.workflow_id);
    return matching.slice(0, filters.limit ?? matching.length);
  }

  get(runId: string): InvocationOutcome | undefined {
    return this.entries.find((o) => o.run_id === runId);
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries.length = 0;
  }
}
