export { startStreamConsumer, processEntry, parseStreamEntry, readEntries, GROUP_NAME } from './stream-consumer.js';
export type { StreamConsumerDeps, StreamEntry } from './stream-consumer.js';
export { startWorkflowSubscriber, reloadWorkflows } from './workflow-subscriber.js';
export type { ReloadDeps, ReloadGuard } from './workflow-subscriber.js';
