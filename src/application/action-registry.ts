import type { Logger } from 'pino';
import type {
  ActionResult,
  ActionSpec,
  Event,
  ExecutionContext,
  ResolvedActionSpec,
  ResolvedData,
} from '../domain/index.js';
import {
  ActionTimeoutError,
  HandlerFailureError,
  UnknownActionTypeError,
  WorkflowRuntimeError,
  errorMessage,
} from '../domain/index.js';
import { resolveData, resolveText } from './template-resolver.js';

/** What a handler hands back. Throwing is equivalent to `failure`. */
export type HandlerResult =
  | { readonly status: 'success'; readonly output?: Record<string, unknown> | undefined }
  | { readonly status: 'failure'; readonly error: string; readonly output?: Record<string, unknown> | undefined };

/** Per-call information a handler may use; `signal` aborts on timeout. */
export interface HandlerContext {
  readonly workflow_id: string;
  readonly run_id: string;
  readonly event: Event;
  readonly signal: AbortSignal;
  readonly log: Logger;
}

/**
 * Capability implementing one action type's effect.
 * Supplied by collaborators at startup; the engine ships none.
 */
export interface ActionHandler {
  handle(spec: ResolvedActionSpec, data: ResolvedData, ctx: HandlerContext): Promise<HandlerResult>;
}

export interface DispatchOptions {
  readonly workflow_id: string;
  readonly run_id: string;
  readonly signal: AbortSignal;
  readonly log: Logger;
  /** Used as the timeout reported when `signal` aborts without an ActionTimeoutError reason. */
  readonly timeoutMs?: number | undefined;
}

function abortReason(signal: AbortSignal, timeoutMs: number): unknown {
  return signal.reason instanceof ActionTimeoutError ? signal.reason : new ActionTimeoutError(timeoutMs);
}

/** Rejects once `signal` aborts; never settles otherwise. */
function abortion(signal: AbortSignal, timeoutMs: number): { promise: Promise<never>; dispose: () => void } {
  let onAbort: (() => void) | undefined;
  const promise = new Promise<never>((_resolve, reject) => {
    onAbort = (): void => reject(abortReason(signal, timeoutMs));
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return {
    promise,
    dispose: () => {
      if (onAbort !== undefined) signal.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Dispatch table from action type to handler.
 *
 * Adding an action type is a `register()` call; nothing branches on
 * the type string anywhere else.
 */
export class ActionRegistry {
  private readonly handlers: Map<string, ActionHandler> = new Map();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /** Registers (or replaces) the handler for `actionType`. */
  register(actionType: string, handler: ActionHandler): this {
    this.handlers.set(actionType, handler);
    return this;
  }

  unregister(actionType: string): boolean {
    return this.handlers.delete(actionType);
  }

  has(actionType: string): boolean {
    return this.handlers.has(actionType);
  }

  types(): string[] {
    return [...this.handlers.keys()];
  }

  /**
   * Resolves the action's templates, invokes its handler and reports the
   * outcome as data. Never rejects: unknown types, template errors,
   * handler throws and timeouts all come back as a failed ActionResult.
   */
  async dispatch(
    spec: ActionSpec,
    context: ExecutionContext,
    options: DispatchOptions,
  ): Promise<ActionResult> {
    const started = this.now();

    const fail = (err: unknown, output: Record<string, unknown> = {}): ActionResult => ({
      action_id: spec.id,
      status: 'failure',
      output,
      error: errorMessage(err),
      error_code: err instanceof WorkflowRuntimeError ? err.code : 'handler_failure',
      duration_ms: this.now() - started,
    });

    const handler = this.handlers.get(spec.type);
    if (handler === undefined) {
      return fail(new UnknownActionTypeError(spec.type));
    }

    let resolvedSpec: ResolvedActionSpec;
    let data: ResolvedData;
    try {
      resolvedSpec = {
        id: spec.id,
        type: spec.type,
        target: resolveText(spec.target, context),
        template: resolveText(spec.template, context),
        channel: resolveText(spec.channel, context),
      };
      data = resolveData(spec.data, context);
    } catch (err: unknown) {
      return fail(err);
    }

    if (options.signal.aborted) {
      return fail(abortReason(options.signal, options.timeoutMs ?? 0));
    }

    const aborted = abortion(options.signal, options.timeoutMs ?? 0);
    try {
      const result = await Promise.race([
        Promise.resolve().then(() => handler.handle(resolvedSpec, data, {
          workflow_id: options.workflow_id,
          run_id: options.run_id,
          event: context.event,
          signal: options.signal,
          log: options.log,
        })),
        aborted.promise,
      ]);

      if (result.status === 'failure') {
        return fail(new HandlerFailureError(result.error), result.output ?? {});
      }

      return {
        action_id: spec.id,
        status: 'success',
        output: result.output ?? {},
        duration_ms: this.now() - started,
      };
    } catch (err: unknown) {
      return fail(err);
    } finally {
      aborted.dispose();
    }
  }
}
