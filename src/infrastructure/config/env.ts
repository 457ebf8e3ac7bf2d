import { z } from 'zod';
import { EnvConfigError } from '../../domain/index.js';
import { DEFAULT_DATABASE_URL } from '../db/client.js';

export type EnvSource = Record<string, string | undefined>;

/** Empty strings count as unset, so `PORT=` falls back to the default. */
function withDefault<T extends z.ZodTypeAny>(schema: T, fallback: z.input<T>) {
  return z.preprocess((v) => (v === undefined || v === '' ? fallback : v), schema);
}

export const envSchema = z.object({
  LOG_LEVEL: withDefault(z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']), 'info'),
  HOST: withDefault(z.string().min(1), '0.0.0.0'),
  PORT: withDefault(z.coerce.number().int().min(1).max(65535), 3000),
  REDIS_URL: withDefault(z.string().min(1), 'redis://localhost:6379'),
  DATABASE_URL: withDefault(z.string().min(1), DEFAULT_DATABASE_URL),
  WORKER_ID: withDefault(z.string().min(1), 'worker-1'),
  WORKFLOWS_DIR: withDefault(z.string().min(1), 'workflows'),
  ENGINE_MAX_CONCURRENT: withDefault(z.coerce.number().int().min(1).max(10_000), 16),
  ENGINE_TIMEOUT_MS: withDefault(z.coerce.number().int().min(1), 30_000),
  ACTIONS_CONFIG: withDefault(z.string().min(1), 'config/actions.yaml'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates the process environment. Throws EnvConfigError listing
 * every offending variable.
 */
export function loadEnvConfig(env: EnvSource = process.env, context = 'flowrelay'): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('\n');
    throw new EnvConfigError(`[${context}] Invalid environment configuration\n${details}`);
  }
  return result.data;
}
