import type { ActionRegistry } from '../../application/action-registry.js';
import type { ActionsConfig } from './config.js';
import type { MetricsSink } from './system-handler.js';
import { NotificationHandler } from './notification-handler.js';
import { SystemHandler } from './system-handler.js';
import { ServiceDirectory, ServiceHandler } from './service-handler.js';

/** Registers the built-in `notification`, `system` and `service` handlers. */
export function registerDefaultHandlers(
  registry: ActionRegistry,
  config: ActionsConfig,
  metrics: MetricsSink,
  services: ServiceDirectory = ServiceDirectory.fromConfig(config.services),
): ActionRegistry {
  return registry
    .register('notification', new NotificationHandler(config))
    .register('system', new SystemHandler(metrics))
    .register('service', new ServiceHandler(services));
}
