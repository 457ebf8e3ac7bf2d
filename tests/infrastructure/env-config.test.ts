import { describe, it, expect } from 'vitest';
import { loadEnvConfig } from '../../src/infrastructure/config/env.js';
import { DEFAULT_DATABASE_URL } from '../../src/infrastructure/db/client.js';
import { EnvConfigError } from '../../src/domain/index.js';

describe('loadEnvConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadEnvConfig({})).toEqual({
      LOG_LEVEL: 'info',
      HOST: '0.0.0.0',
      PORT: 3000,
      REDIS_URL: 'redis://localhost:6379',
      DATABASE_URL: DEFAULT_DATABASE_URL,
      WORKER_ID: 'worker-1',
      WORKFLOWS_DIR: 'workflows',
      ENGINE_MAX_CONCURRENT: 16,
      ENGINE_TIMEOUT_MS: 30_000,
      ACTIONS_CONFIG: 'config/actions.yaml',
    });
  });

  it('coerces numbers and treats empty strings as unset', () => {
    const env = loadEnvConfig({ PORT: '8080', ENGINE_MAX_CONCURRENT: '4', HOST: '' });

    expect(env.PORT).toBe(8080);
    expect(env.ENGINE_MAX_CONCURRENT).toBe(4);
    expect(env.HOST).toBe('0.0.0.0');
  });

  it('lists every invalid variable', () => {
    const load = () => loadEnvConfig({ PORT: '70000', ENGINE_TIMEOUT_MS: '0' }, 'worker');

    expect(load).toThrow(EnvConfigError);
    expect(load).toThrow([
      '[worker] Invalid environment configuration',
      '  - PORT: Number must be less than or equal to 65535',
      '  - ENGINE_TIMEOUT_MS: Number must be greater than or equal to 1',
    ].join('\n'));
  });

  it('rejects an unknown log level', () => {
    expect(() => loadEnvConfig({ LOG_LEVEL: 'loud' })).toThrow('  - LOG_LEVEL: ');
  });
});
