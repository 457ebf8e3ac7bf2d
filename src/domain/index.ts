export type { Event, EventPayload } from './event.js';
export { createEvent, freezeDeep } from './event.js';
export type {
  TemplateValue,
  ResolvedData,
  Trigger,
  ActionSpec,
  ResolvedActionSpec,
  ErrorHandler,
  WorkflowDefinition,
  ActionStatus,
  ActionResult,
  ErrorInfo,
  ExecutionContext,
  InvocationState,
  TerminalState,
  InvocationOutcome,
} from './workflow.js';
export { createExecutionContext } from './workflow.js';
export type { ErrorCode, ValidationIssue } from './errors.js';
export {
  WorkflowRuntimeError,
  TemplateError,
  ConditionError,
  UnknownActionTypeError,
  HandlerFailureError,
  ActionTimeoutError,
  WorkflowValidationError,
  WorkflowNotFoundError,
  WorkflowDisabledError,
  EnvConfigError,
  errorMessage,
} from './errors.js';
