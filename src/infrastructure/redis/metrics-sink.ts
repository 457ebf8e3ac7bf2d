import type Redis from 'ioredis';
import type { MetricsSink } from '../actions/system-handler.js';

const KEY_PREFIX = 'metrics:';

/**
 * Counters in one Redis hash per metric (`metrics:<name>`): field
 * `total` plus one `<tag>=<value>` field per tag.
 */
export class RedisMetricsSink implements MetricsSink {
  private readonly redis: Redis;

  constructor(redis: Redis) {
    this.redis = redis;
  }

  async increment(metric: string, value: number, tags: Record<string, string>): Promise<void> {
    const key = `${KEY_PREFIX}${metric}`;
    const pipeline = this.redis.multi().hincrbyfloat(key, 'total', value);
    for (const [tag, tagValue] of Object.entries(tags)) {
      pipeline.hincrbyfloat(key, `${tag}=${tagValue}`, value);
    }
    const replies = await pipeline.exec();
    if (replies === null) {
      throw new Error(`Metrics transaction for "${metric}" was aborted`);
    }
    // MULTI reports per-command errors (e.g. WRONGTYPE) in the reply, not as a rejection.
    for (const [err] of replies) {
      if (err !== null) throw err;
    }
  }
}
