import type { Logger } from 'pino';
import type { OutcomeReporter } from '../../application/workflow-engine.js';
import type { Database } from './client.js';
import { insertRun } from './run-repository.js';

/** Persists every outcome to `workflow_runs`. */
export function createPostgresOutcomeReporter(db: Database, log: Logger): OutcomeReporter {
  return {
    async report(outcome) {
      const inserted = await insertRun(db, outcome);
      if (!inserted) {
        log.debug({ run_id: outcome.run_id }, 'Duplicate run record skipped');
      }
    },
  };
}
