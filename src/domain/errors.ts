/**
 * Error taxonomy.
 *
 * Inside an action chain these never propagate: the dispatcher turns
 * them into a failed ActionResult carrying `code`. Only
 * WorkflowValidationError escapes, at registration time.
 */

export type ErrorCode =
  | 'template_error'
  | 'condition_error'
  | 'unknown_action_type'
  | 'handler_failure'
  | 'timeout';

export abstract class WorkflowRuntimeError extends Error {
  abstract readonly code: ErrorCode;
}

/** Malformed placeholder syntax, e.g. an unterminated `{{`. */
export class TemplateError extends WorkflowRuntimeError {
  readonly code = 'template_error' as const;
  readonly template: string;

  constructor(message: string, template: string) {
    super(message);
    this.name = 'TemplateError';
    this.template = template;
  }
}

export class ConditionError extends WorkflowRuntimeError {
  readonly code = 'condition_error' as const;
  readonly expression: string;
  readonly position: number;

  constructor(message: string, expression: string, position: number) {
    super(`${message} at position ${position} in "${expression}"`);
    this.name = 'ConditionError';
    this.expression = expression;
    this.position = position;
  }
}

export class UnknownActionTypeError extends WorkflowRuntimeError {
  readonly code = 'unknown_action_type' as const;
  readonly actionType: string;

  constructor(actionType: string) {
    super(`No handler registered for action type "${actionType}"`);
    this.name = 'UnknownActionTypeError';
    this.actionType = actionType;
  }
}

export class HandlerFailureError extends WorkflowRuntimeError {
  readonly code = 'handler_failure' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HandlerFailureError';
  }
}

export class ActionTimeoutError extends WorkflowRuntimeError {
  readonly code = 'timeout' as const;
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Workflow invocation exceeded ${timeoutMs}ms`);
    this.name = 'ActionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/** Rejected workflow document. A definition that throws this is never registered. */
export class WorkflowValidationError extends Error {
  readonly code = 'invalid_workflow' as const;
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[], workflowId?: string) {
    const subject = workflowId !== undefined ? `Workflow "${workflowId}"` : 'Workflow document';
    const details = issues.map((i) => `${i.path || '<root>'}: ${i.message}`).join('; ');
    super(`${subject} is invalid: ${details}`);
    this.name = 'WorkflowValidationError';
    this.issues = issues;
  }
}

/** Maps anything thrown to a message without losing non-Error values. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

export class WorkflowNotFoundError extends Error {
  readonly workflowId: string;

  constructor(workflowId: string) {
    super(`Workflow "${workflowId}" is not registered`);
    this.name = 'WorkflowNotFoundError';
    this.workflowId = workflowId;
  }
}

export class WorkflowDisabledError extends Error {
  readonly workflowId: string;

  constructor(workflowId: string) {
    super(`Workflow "${workflowId}" is disabled`);
    this.name = 'WorkflowDisabledError';
    this.workflowId = workflowId;
  }
}

/** Invalid environment at process start. Thrown before anything connects. */
export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}
