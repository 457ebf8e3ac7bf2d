export { eventSchema, eventBatchSchema, executeRequestSchema, patchWorkflowSchema } from './event-schema.js';
export type { EventInput } from './event-schema.js';
export { resolve, resolveData, resolveText, parseTemplate, findPlaceholders } from './template-resolver.js';
export { evaluate, parseCondition, SUPPORTED_OPERATORS } from './condition-evaluator.js';
export { ActionRegistry } from './action-registry.js';
export type { ActionHandler, HandlerContext, HandlerResult, DispatchOptions } from './action-registry.js';
export { workflowDocumentSchema, parseWorkflowDefinition, toWorkflowDocument } from './workflow-schema.js';
export type { WorkflowDocument } from './workflow-schema.js';
export { loadWorkflowDirectory, lintWorkflow } from './workflow-loader.js';
export type { LoadResult, LoadFailure } from './workflow-loader.js';
export { WorkflowRegistry } from './workflow-registry.js';
export { InvocationLimiter } from './invocation-limiter.js';
export {
  WorkflowEngine,
  WORKFLOW_COMPLETED_EVENT,
  WORKFLOW_FAILED_EVENT,
} from './workflow-engine.js';
export type { OutcomeReporter, EngineEmitter, WorkflowEngineOptions } from './workflow-engine.js';
export { EventBus, ANY_EVENT, connectEngine } from './event-bus.js';
export type { EventHandler, EventBusOptions } from './event-bus.js';
export { createLoggingReporter, RunHistory } from './outcome-reporters.js';
export type { RunHistoryFilters } from './outcome-reporters.js';
