export * from './db/index.js';
export * from './redis/index.js';
export * from './worker/index.js';
export * from './actions/index.js';
export { loadEnvConfig, envSchema } from './config/env.js';
export type { EnvConfig, EnvSource } from './config/env.js';
