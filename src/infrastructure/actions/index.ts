export { loadActionsConfig, parseSimpleYaml, DEFAULT_CONFIG } from './config.js';
export type { ActionsConfig } from './config.js';
export { sendSlackNotification } from './slack.js';
export { sendEmailNotification } from './email.js';
export type { NotificationMessage } from './email.js';
export { NotificationHandler } from './notification-handler.js';
export { SystemHandler } from './system-handler.js';
export type { MetricsSink } from './system-handler.js';
export { ServiceHandler, ServiceDirectory, createHttpService } from './service-handler.js';
export type { ServiceCall } from './service-handler.js';
export { registerDefaultHandlers } from './register.js';
