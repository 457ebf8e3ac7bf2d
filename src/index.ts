import Fastify from 'fastify';
import { redisPlugin, dbPlugin, loadEnvConfig } from './infrastructure/index.js';
import {
  eventRoutes,
  workflowRoutes,
  runRoutes,
  metricsRoutes,
} from './interfaces/http/index.js';

/**
 * API server bootstrap.
 *
 * Order:
 * 1) Environment
 * 2) Infrastructure plugins
 * 3) HTTP routes
 * 4) listen()
 */
async function main(): Promise<void> {
  const env = loadEnvConfig();

  const fastify = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { redisUrl: env.REDIS_URL });
  await fastify.register(dbPlugin, { databaseUrl: env.DATABASE_URL });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(eventRoutes);
  await fastify.register(workflowRoutes);
  await fastify.register(runRoutes);
  await fastify.register(metricsRoutes);

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down API server');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({
    host: env.HOST,
    port: env.PORT,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
