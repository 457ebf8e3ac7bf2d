import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type {
  ActionResult,
  ActionSpec,
  ErrorInfo,
  Event,
  EventPayload,
  ExecutionContext,
  InvocationOutcome,
  InvocationState,
  WorkflowDefinition,
} from '../domain/index.js';
import {
  ActionTimeoutError,
  ConditionError,
  WorkflowDisabledError,
  WorkflowNotFoundError,
  createEvent,
  createExecutionContext,
  errorMessage,
} from '../domain/index.js';
import type { ActionRegistry } from './action-registry.js';
import type { WorkflowRegistry } from './workflow-registry.js';
import { evaluate } from './condition-evaluator.js';
import { InvocationLimiter } from './invocation-limiter.js';

export const WORKFLOW_COMPLETED_EVENT = 'workflow.completed';
export const WORKFLOW_FAILED_EVENT = 'workflow.failed';

const DEFAULT_MAX_CONCURRENT = 16;
const DEFAULT_TIMEOUT_MS = 30_000;

/** Receives the audit record of every finished invocation. */
export interface OutcomeReporter {
  report(outcome: InvocationOutcome): void | Promise<void>;
}

/** Egress for engine-emitted events (normally `EventBus.publish`). */
export type EngineEmitter = (type: string, payload: EventPayload) => void;

export interface WorkflowEngineOptions {
  registry: WorkflowRegistry;
  actions: ActionRegistry;
  log: Logger;
  maxConcurrent?: number | undefined;
  defaultTimeoutMs?: number | undefined;
  reporters?: readonly OutcomeReporter[] | undefined;
  emit?: EngineEmitter | undefined;
  /** Clock, injectable for tests. */
  now?: (() => number) | undefined;
  newRunId?: (() => string) | undefined;
}

interface ChainRun {
  readonly results: ActionResult[];
  readonly skipped: string[];
  readonly failure?: ErrorInfo | undefined;
}

interface ChainOptions {
  readonly workflowId: string;
  readonly runId: string;
  readonly timeoutMs: number;
  readonly log: Logger;
}

/** True for an egress event that reports on `definition` itself. */
function isOwnOutcome(definition: WorkflowDefinition, event: Event): boolean {
  return (event.type === WORKFLOW_COMPLETED_EVENT || event.type === WORKFLOW_FAILED_EVENT)
    && event.payload['workflow_id'] === definition.id;
}

/**
 * Workflow engine.
 *
 * For each event:
 * 1. Matches registered definitions by trigger event type, then by
 *    condition against a fresh ExecutionContext.
 * 2. Runs one invocation per match, concurrently, bounded by
 *    `maxConcurrent`.
 * 3. Within an invocation, dispatches actions strictly in order; the
 *    first failure halts the chain and runs the error chain once.
 * 4. Reports the outcome to every reporter and emits
 *    `workflow.completed` / `workflow.failed`.
 *
 * Nothing thrown by a handler, a template or a condition escapes an
 * invocation; it ends up in the outcome record instead.
 */
export class WorkflowEngine {
  private readonly registry: WorkflowRegistry;
  private readonly actions: ActionRegistry;
  private readonly log: Logger;
  private readonly limiter: InvocationLimiter;
  private readonly defaultTimeoutMs: number;
  private readonly reporters: OutcomeReporter[];
  private emit: EngineEmitter | undefined;
  private readonly now: () => number;
  private readonly newRunId: () => string;

  constructor(options: WorkflowEngineOptions) {
    this.registry = options.registry;
    this.actions = options.actions;
    this.log = options.log;
    this.limiter = new InvocationLimiter(options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT);
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.reporters = [...(options.reporters ?? [])];
    this.emit = options.emit;
    this.now = options.now ?? Date.now;
    this.newRunId = options.newRunId ?? randomUUID;
  }

  /** Sets where completion/failure events go. */
  setEmitter(emit: EngineEmitter | undefined): void {
    this.emit = emit;
  }

  addReporter(reporter: OutcomeReporter): void {
    this.reporters.push(reporter);
  }

  get stats(): { inFlight: number; queued: number; workflows: number } {
    return {
      inFlight: this.limiter.inFlight,
      queued: this.limiter.queued,
      workflows: this.registry.size,
    };
  }

  /**
   * Resolves when the engine can start an invocation without queueing
   * it. Ingress loops await this before taking the next event.
   */
  whenAvailable(): Promise<void> {
    return this.limiter.whenAvailable();
  }

  /**
   * Runs every workflow the event activates. Resolves once all of
   * them reached a terminal state; never rejects because of a
   * workflow failure.
   */
  async handleEvent(event: Event): Promise<InvocationOutcome[]> {
    // Snapshot at arrival: later registry swaps do not affect this event.
    const candidates = this.registry.match(event.type);
    const runs: Promise<InvocationOutcome>[] = [];

    for (const definition of candidates) {
      if (isOwnOutcome(definition, event)) continue;

      const context = createExecutionContext(event);
      let conditionError: ConditionError | undefined;

      try {
        if (!evaluate(definition.trigger.condition, context)) continue;
      } catch (err: unknown) {
        conditionError = err instanceof ConditionError
          ? err
          : new ConditionError(errorMessage(err), definition.trigger.condition ?? '', 0);
      }

      runs.push(this.limiter.run(() => this.invoke(definition, context, false, conditionError)));
    }

    if (runs.length === 0) {
      this.log.debug({ event_type: event.type }, 'No workflow matched event');
      return [];
    }

    return Promise.all(runs);
  }

  /**
   * Manually runs one workflow against `payload`, skipping its trigger
   * condition. The event type defaults to the trigger's.
   */
  async execute(
    workflowId: string,
    payload: EventPayload = {},
    eventType?: string,
  ): Promise<InvocationOutcome> {
    const definition = this.registry.get(workflowId);
    if (definition === undefined) throw new WorkflowNotFoundError(workflowId);
    if (!definition.enabled) throw new WorkflowDisabledError(workflowId);

    const event = createEvent(eventType ?? definition.trigger.event, payload);
    const context = createExecutionContext(event);
    return this.limiter.run(() => this.invoke(definition, context, true));
  }

  private async invoke(
    definition: WorkflowDefinition,
    context: ExecutionContext,
    manual: boolean,
    conditionError?: ConditionError,
  ): Promise<InvocationOutcome> {
    const runId = this.newRunId();
    const startedMs = this.now();
    const timeoutMs = definition.timeout_ms ?? this.defaultTimeoutMs;
    const log = this.log.child({
      workflow_id: definition.id,
      run_id: runId,
      event_type: context.event.type,
    });

    let state: InvocationState = 'matching';
    const transition = (next: InvocationState): void => {
      log.debug({ from: state, to: next }, 'Invocation state changed');
      state = next;
    };

    const chainOptions: ChainOptions = { workflowId: definition.id, runId, timeoutMs, log };

    let main: ChainRun;
    if (conditionError !== undefined) {
      main = {
        results: [],
        skipped: definition.actions.map((a) => a.id),
        failure: { message: conditionError.message, type: conditionError.code, action_id: null },
      };
    } else {
      transition('running');
      main = await this.runChain(definition.actions, context, chainOptions);
    }

    let errorChain: ChainRun = { results: [], skipped: [] };

    if (main.failure !== undefined) {
      context.error = main.failure;
      log.warn({ error: main.failure }, 'Workflow action chain failed');

      if (definition.error_handler !== undefined) {
        transition('error_handling');
        errorChain = await this.runChain(definition.error_handler.actions, context, chainOptions);

        if (errorChain.failure !== undefined) {
          // Logged only: the error chain never triggers another chain.
          log.warn({ error: errorChain.failure }, 'Error handler chain failed');
        }
      }
      transition('error_completed');
    } else {
      transition('completed');
    }

    const finishedMs = this.now();
    const outcome: InvocationOutcome = {
      run_id: runId,
      workflow_id: definition.id,
      workflow_version: definition.version,
      event_type: context.event.type,
      state: main.failure !== undefined ? 'error_completed' : 'completed',
      manual,
      actions: main.results,
      error_actions: errorChain.results,
      skipped_actions: main.skipped,
      skipped_error_actions: errorChain.skipped,
      error: main.failure,
      started_at: new Date(startedMs).toISOString(),
      finished_at: new Date(finishedMs).toISOString(),
      duration_ms: finishedMs - startedMs,
    };

    await this.report(outcome, log);
    this.emitOutcome(outcome, log);

    return outcome;
  }

  /**
   * Dispatches `chain` in order under a fresh `timeoutMs` budget.
   * Stops at the first failed result or when the budget runs out.
   */
  private async runChain(
    chain: readonly ActionSpec[],
    context: ExecutionContext,
    options: ChainOptions,
  ): Promise<ChainRun> {
    const results: ActionResult[] = [];
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new ActionTimeoutError(options.timeoutMs));
    }, options.timeoutMs);

    try {
      for (let i = 0; i < chain.length; i++) {
        const spec = chain[i];
        if (spec === undefined) continue;

        if (controller.signal.aborted) {
          return {
            results,
            skipped: chain.slice(i).map((a) => a.id),
            failure: {
              message: new ActionTimeoutError(options.timeoutMs).message,
              type: 'timeout',
              action_id: null,
            },
          };
        }

        options.log.debug({ action_id: spec.id, action_type: spec.type }, 'Dispatching action');

        const result = await this.actions.dispatch(spec, context, {
          workflow_id: options.workflowId,
          run_id: options.runId,
          signal: controller.signal,
          log: options.log,
          timeoutMs: options.timeoutMs,
        });

        context.results.set(spec.id, result);
        results.push(result);

        if (result.status === 'failure') {
          return {
            results,
            skipped: chain.slice(i + 1).map((a) => a.id),
            failure: {
              message: result.error ?? 'Action failed',
              type: result.error_code ?? 'handler_failure',
              action_id: spec.id,
            },
          };
        }
      }

      return { results, skipped: [] };
    } finally {
      clearTimeout(timer);
    }
  }

  private async report(outcome: InvocationOutcome, log: Logger): Promise<void> {
    for (const reporter of this.reporters) {
      try {
        await reporter.report(outcome);
      } catch (err: unknown) {
        log.warn({ err }, 'Outcome reporter failed');
      }
    }
  }

  private emitOutcome(outcome: InvocationOutcome, log: Logger): void {
    if (this.emit === undefined) return;

    const type = outcome.state === 'completed' ? WORKFLOW_COMPLETED_EVENT : WORKFLOW_FAILED_EVENT;
    try {
      this.emit(type, {
        run_id: outcome.run_id,
        workflow_id: outcome.workflow_id,
        workflow_version: outcome.workflow_version,
        event_type: outcome.event_type,
        state: outcome.state,
        manual: outcome.manual,
        duration_ms: outcome.duration_ms,
        error: outcome.error,
      });
    } catch (err: unknown) {
      log.warn({ err, type }, 'Failed to emit outcome event');
    }
  }
}
