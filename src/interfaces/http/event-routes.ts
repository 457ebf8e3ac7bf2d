import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { eventSchema, eventBatchSchema } from '../../application/index.js';
import type { EventInput } from '../../application/index.js';
import { enqueueEvent } from '../../infrastructure/index.js';
import { createEvent } from '../../domain/index.js';
import type { Event } from '../../domain/index.js';

export const WORKER_HEALTH_KEY = 'worker:health';

function toEvent(input: EventInput): Event {
  return createEvent(input.type, input.payload, input.timestamp);
}

/**
 * Event ingress routes.
 *
 * POST /api/v1/events        single event
 * POST /api/v1/events/batch  array of events, all-or-nothing validation
 * GET  /api/v1/events/health Redis PING plus worker heartbeat
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/events',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = eventSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = toEvent(parsed.data);

      // Not awaited: the worker picks the event up from the stream.
      enqueueEvent(fastify.redis, event).catch((err: unknown) => {
        fastify.log.error({ err, event_type: event.type }, 'Failed to enqueue event');
      });

      return reply.status(202).send({
        status: 'accepted',
        type: event.type,
        timestamp: event.timestamp,
      });
    },
  );

  fastify.post(
    '/api/v1/events/batch',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = eventBatchSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const events = parsed.data.map(toEvent);

      // Sequential so stream order follows batch order.
      const enqueueAll = async (): Promise<void> => {
        for (const event of events) {
          await enqueueEvent(fastify.redis, event);
        }
      };
      enqueueAll().catch((err: unknown) => {
        fastify.log.error({ err, count: events.length }, 'Failed to enqueue event batch');
      });

      return reply.status(202).send({
        status: 'accepted',
        count: events.length,
        types: events.map((e) => e.type),
      });
    },
  );

  /**
   * The worker refreshes `worker:health` with a TTL; a missing key
   * means no worker has reported recently.
   */
  fastify.get(
    '/api/v1/events/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      let pong: string;
      try {
        pong = await fastify.redis.ping();
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Redis health check failed');
        return reply.status(503).send({ status: 'degraded', redis: 'unreachable', worker: 'unknown' });
      }

      let worker: 'ok' | 'degraded' | 'unknown' = 'unknown';
      try {
        const workerHealth = await fastify.redis.get(WORKER_HEALTH_KEY);
        if (workerHealth === 'ok') worker = 'ok';
        else if (workerHealth === 'degraded') worker = 'degraded';
      } catch (err: unknown) {
        fastify.log.warn({ err }, 'Failed to read worker heartbeat');
      }

      return reply.status(200).send({ status: 'ok', redis: pong, worker });
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['redis'],
  fastify: '5.x',
});
