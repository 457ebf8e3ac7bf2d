import Redis from 'ioredis';
import pino from 'pino';
import {
  createDbClient,
  ensureTables,
  createPostgresOutcomeReporter,
  createRedisOutcomeReporter,
  RedisMetricsSink,
  loadActionsConfig,
  registerDefaultHandlers,
  loadEnvConfig,
  startStreamConsumer,
  startWorkflowSubscriber,
  reloadWorkflows,
} from './infrastructure/index.js';
import type { ReloadDeps } from './infrastructure/index.js';
import {
  ActionRegistry,
  EventBus,
  WorkflowEngine,
  WorkflowRegistry,
  connectEngine,
  createLoggingReporter,
  loadWorkflowDirectory,
} from './application/index.js';
import { seedWorkflows } from './application/workflow-crud.js';
import { WORKER_HEALTH_KEY } from './interfaces/http/event-routes.js';

const HEALTH_INTERVAL_MS = 10_000;
const HEALTH_TTL_SECONDS = 30;
const FORCE_EXIT_MS = 15_000;

/**
 * Engine worker.
 *
 * Reads the ingress stream, publishes each event on the in-process bus
 * and runs matching workflows. Documents in WORKFLOWS_DIR are stored in
 * the `workflows` table when their id is new; the registry is built from
 * that table and reloaded on every `workflows_changed` notification.
 */
const env = loadEnvConfig();
const log = pino({ level: env.LOG_LEVEL });

const redisOptions = {
  maxRetriesPerRequest: null,
  enableReadyCheck: true,
  lazyConnect: true,
};

// XREADGROUP BLOCK holds its connection, so other commands get their own.
const streamRedis = new Redis(env.REDIS_URL, redisOptions);
const commandRedis = new Redis(env.REDIS_URL, redisOptions);

const { sql, db } = createDbClient(env.DATABASE_URL);

const ac = new AbortController();

async function main(): Promise<void> {
  await streamRedis.connect();
  await commandRedis.connect();
  log.info('Redis connected');

  await ensureTables(sql);
  log.info('Database ready (workflows + workflow_runs tables)');

  const actionsConfig = loadActionsConfig(env.ACTIONS_CONFIG, log);
  const actions = registerDefaultHandlers(
    new ActionRegistry(),
    actionsConfig,
    new RedisMetricsSink(commandRedis),
  );
  log.info({ actionTypes: actions.types(), services: Object.keys(actionsConfig.services) }, 'Action handlers registered');

  const { definitions } = loadWorkflowDirectory(env.WORKFLOWS_DIR, log);
  const seeded = await seedWorkflows(db, definitions);
  log.info({ dir: env.WORKFLOWS_DIR, seeded }, 'Workflow documents from disk stored');

  const registry = new WorkflowRegistry();
  const reloadDeps: ReloadDeps = { db, log, registry };
  await reloadWorkflows(reloadDeps, JSON.stringify({ reason: 'startup' }), { running: false, pending: false });

  const engine = new WorkflowEngine({
    registry,
    actions,
    log,
    maxConcurrent: env.ENGINE_MAX_CONCURRENT,
    defaultTimeoutMs: env.ENGINE_TIMEOUT_MS,
    reporters: [
      createLoggingReporter(log),
      createPostgresOutcomeReporter(db, log),
      createRedisOutcomeReporter(commandRedis, log),
    ],
  });

  const bus = new EventBus({ log });
  const disconnect = connectEngine(bus, engine);

  const stopSubscriber = await startWorkflowSubscriber(env.REDIS_URL, reloadDeps, ac.signal);

  const beat = (): void => {
    commandRedis.set(WORKER_HEALTH_KEY, 'ok', 'EX', HEALTH_TTL_SECONDS).catch((err: unknown) => {
      log.warn({ err }, 'Failed to write worker heartbeat');
    });
  };
  beat();
  const heartbeat = setInterval(beat, HEALTH_INTERVAL_MS);

  await startStreamConsumer({
    redis: streamRedis,
    log,
    bus,
    engine,
    consumerName: env.WORKER_ID,
    signal: ac.signal,
  });

  // Stream consumer returned: shutdown was requested.
  clearInterval(heartbeat);
  await bus.flush();
  disconnect();
  log.info(engine.stats, 'Engine drained');

  await stopSubscriber();
  await streamRedis.quit();
  await commandRedis.quit();
  await sql.end();
}

function shutdown(): void {
  if (ac.signal.aborted) return;
  log.info('Shutting down worker...');
  ac.abort();

  setTimeout(() => {
    log.warn('Worker did not drain in time, forcing exit');
    process.exit(1);
  }, FORCE_EXIT_MS).unref();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().then(
  () => process.exit(0),
  (err: unknown) => {
    log.fatal({ err }, 'Worker crashed');
    process.exit(1);
  },
);
