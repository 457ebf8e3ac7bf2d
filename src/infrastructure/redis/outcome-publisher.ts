import type Redis from 'ioredis';
import type { Logger } from 'pino';
import type { InvocationOutcome } from '../../domain/index.js';
import type { OutcomeReporter } from '../../application/workflow-engine.js';

export const OUTCOMES_CHANNEL = 'workflow_outcomes';

/**
 * Publishes an outcome record on `workflow_outcomes` for external
 * observers. Best-effort: failures are logged only.
 */
export async function publishOutcome(redis: Redis, log: Logger, outcome: InvocationOutcome): Promise<void> {
  try {
    await redis.publish(OUTCOMES_CHANNEL, JSON.stringify(outcome));
    log.debug({ channel: OUTCOMES_CHANNEL, run_id: outcome.run_id }, 'Published workflow outcome');
  } catch (err: unknown) {
    log.warn({ err, run_id: outcome.run_id }, 'Failed to publish workflow outcome');
  }
}

export function createRedisOutcomeReporter(redis: Redis, log: Logger): OutcomeReporter {
  return {
    report: (outcome) => publishOutcome(redis, log, outcome),
  };
}
