import type { ResolvedActionSpec, ResolvedData } from '../../domain/index.js';
import type { ActionHandler, HandlerContext, HandlerResult } from '../../application/action-registry.js';
import { isRecord } from '../../application/context-path.js';

/** Invokes `action` on one service. A throw becomes a handler failure. */
export type ServiceCall = (
  action: string,
  data: ResolvedData,
  signal: AbortSignal,
) => Promise<Record<string, unknown>>;

/**
 * Client for a service reachable over HTTP: `POST <baseUrl>/<action>`
 * with the data as JSON. A JSON object reply becomes the action output.
 */
export function createHttpService(name: string, baseUrl: string): ServiceCall {
  const base = baseUrl.replace(/\/+$/, '');

  return async (action, data, signal) => {
    const response = await fetch(`${base}/${encodeURIComponent(action)}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(data),
      signal,
    });

    if (!response.ok) {
      throw new Error(`Service "${name}" returned ${response.status} for "${action}"`);
    }

    const text = await response.text();
    if (text === '') return { status: response.status };

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err: unknown) {
      return { status: response.status, body: text, parse_error: err instanceof Error ? err.message : String(err) };
    }
    return isRecord(body) ? body : { status: response.status, body };
  };
}

/** Named services the `service` action type can reach. */
export class ServiceDirectory {
  private readonly services: Map<string, ServiceCall> = new Map();

  static fromConfig(services: Record<string, string>): ServiceDirectory {
    const directory = new ServiceDirectory();
    for (const [name, url] of Object.entries(services)) {
      directory.register(name, createHttpService(name, url));
    }
    return directory;
  }

  register(name: string, call: ServiceCall): this {
    this.services.set(name, call);
    return this;
  }

  get(name: string): ServiceCall | undefined {
    return this.services.get(name);
  }

  names(): string[] {
    return [...this.services.keys()];
  }
}

function splitTarget(spec: ResolvedActionSpec, data: ResolvedData): { service?: string; action?: string } {
  const target = spec.target ?? '';
  const dot = target.indexOf('.');
  if (dot > 0) {
    return { service: target.slice(0, dot), action: target.slice(dot + 1) };
  }
  const service = data['service'];
  const action = data['action'];
  return {
    service: typeof service === 'string' && service !== '' ? service : target || undefined,
    action: typeof action === 'string' && action !== '' ? action : undefined,
  };
}

/**
 * `service` action type. The target is `"service.action"`, or the pair
 * comes from `data.service` and `data.action`; the rest of `data` is
 * forwarded.
 */
export class ServiceHandler implements ActionHandler {
  private readonly directory: ServiceDirectory;

  constructor(directory: ServiceDirectory) {
    this.directory = directory;
  }

  async handle(spec: ResolvedActionSpec, data: ResolvedData, ctx: HandlerContext): Promise<HandlerResult> {
    const { service, action } = splitTarget(spec, data);
    if (service === undefined || action === undefined) {
      return { status: 'failure', error: 'Service action requires "service.action" target or data.service and data.action' };
    }

    const call = this.directory.get(service);
    if (call === undefined) {
      return { status: 'failure', error: `Unknown service "${service}"` };
    }

    const forwarded = Object.fromEntries(
      Object.entries(data).filter(([key]) => key !== 'service' && key !== 'action'),
    );

    ctx.log.debug({ service, action }, 'Calling service');
    const output = await call(action, forwarded, ctx.signal);
    return { status: 'success', output: { service, action, result: output } };
  }
}
