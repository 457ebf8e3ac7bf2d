import type { Event } from './event.js';
import type { ErrorCode } from './errors.js';

/**
 * A value inside an action's `data` mapping.
 *
 * Strings may carry `{{path}}` placeholders; containers are resolved
 * field by field; other scalars pass through untouched.
 */
export type TemplateValue =
  | string
  | number
  | boolean
  | null
  | readonly TemplateValue[]
  | { readonly [key: string]: TemplateValue };

export type ResolvedData = Record<string, unknown>;

export interface Trigger {
  readonly type: 'event';
  /** Exact event type to match. */
  readonly event: string;
  /** Boolean expression over the event context; absent means always. */
  readonly condition?: string | undefined;
}

export interface ActionSpec {
  /** Unique within its chain, so `results.<id>` is unambiguous. */
  readonly id: string;
  /** Dispatch key into the ActionRegistry. */
  readonly type: string;
  readonly target?: string | undefined;
  readonly template?: string | undefined;
  readonly channel?: string | undefined;
  readonly data: { readonly [key: string]: TemplateValue };
}

/** ActionSpec after target/template/channel went through the resolver. */
export interface ResolvedActionSpec {
  readonly id: string;
  readonly type: string;
  readonly target?: string | undefined;
  readonly template?: string | undefined;
  readonly channel?: string | undefined;
}

export interface ErrorHandler {
  readonly actions: readonly ActionSpec[];
}

/**
 * Parsed, validated, frozen workflow document.
 *
 * Never edited in place: a change is a new definition registered
 * under the same id.
 */
export interface WorkflowDefinition {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly version: string;
  readonly enabled: boolean;
  /** Per-invocation budget; the engine default applies when absent. */
  readonly timeout_ms?: number | undefined;
  readonly trigger: Trigger;
  readonly actions: readonly ActionSpec[];
  readonly error_handler?: ErrorHandler | undefined;
}

export type ActionStatus = 'success' | 'failure';

export interface ActionResult {
  readonly action_id: string;
  readonly status: ActionStatus;
  readonly output: Record<string, unknown>;
  readonly error?: string | undefined;
  readonly error_code?: ErrorCode | undefined;
  readonly duration_ms: number;
}

export interface ErrorInfo {
  readonly message: string;
  readonly type: ErrorCode;
  /** null when the failure is not tied to an action (condition, timeout between actions). */
  readonly action_id: string | null;
}

/**
 * Per-invocation scratch space. Owned by exactly one invocation and
 * dropped when it ends.
 */
export interface ExecutionContext {
  readonly event: Event;
  readonly results: Map<string, ActionResult>;
  error?: ErrorInfo | undefined;
}

export type InvocationState =
  | 'matching'
  | 'running'
  | 'error_handling'
  | 'completed'
  | 'error_completed';

export type TerminalState = Extract<InvocationState, 'completed' | 'error_completed'>;

/** Audit record for one workflow invocation. */
export interface InvocationOutcome {
  readonly run_id: string;
  readonly workflow_id: string;
  readonly workflow_version: string;
  readonly event_type: string;
  readonly state: TerminalState;
  readonly manual: boolean;
  /** Main chain results, in execution order. */
  readonly actions: readonly ActionResult[];
  readonly error_actions: readonly ActionResult[];
  /** Main chain action ids that never ran because the chain halted. */
  readonly skipped_actions: readonly string[];
  readonly skipped_error_actions: readonly string[];
  readonly error?: ErrorInfo | undefined;
  readonly started_at: string;
  readonly finished_at: string;
  readonly duration_ms: number;
}

export function createExecutionContext(event: Event): ExecutionContext {
  return { event, results: new Map() };
}
