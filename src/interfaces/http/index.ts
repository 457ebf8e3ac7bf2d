export { default as eventRoutes } from './event-routes.js';
export { default as workflowRoutes } from './workflow-routes.js';
export { default as runRoutes } from './run-routes.js';
export { default as metricsRoutes } from './metrics-routes.js';
