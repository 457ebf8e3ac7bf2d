export { default as redisPlugin } from './redis-plugin.js';
export { enqueueEvent, STREAM_KEY } from './event-producer.js';
export { publishWorkflowChange, WORKFLOWS_CHANGED_CHANNEL } from './workflow-notifier.js';
export type { WorkflowChangeReason, WorkflowChangePayload } from './workflow-notifier.js';
export { publishOutcome, createRedisOutcomeReporter, OUTCOMES_CHANNEL } from './outcome-publisher.js';
export { RedisMetricsSink } from './metrics-sink.js';
