import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { getRunMetrics, resolveWindow, resolveGroupBy } from '../../application/metrics.js';

/**
 * GET /api/v1/metrics: run counts, rates and mean duration per
 * workflow or per terminal state within a time window.
 */
async function metricsRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/metrics',
    async (
      request: FastifyRequest<{
        Querystring: {
          window_seconds?: string;
          group_by?: string;
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      let windowParam: number | undefined;
      if (q.window_seconds !== undefined) {
        const n = Number(q.window_seconds);
        if (resolveWindow(n) === null) {
          return reply.status(400).send({ error: 'window_seconds must be an integer' });
        }
        if (n < 10 || n > 86_400) {
          return reply.status(400).send({ error: 'window_seconds must be between 10 and 86400' });
        }
        windowParam = n;
      }

      if (q.group_by !== undefined && resolveGroupBy(q.group_by) === null) {
        return reply.status(400).send({ error: 'group_by must be one of: workflow_id, state' });
      }

      fastify.log.debug({ window_seconds: windowParam, group_by: q.group_by }, 'Metrics endpoint hit');

      const result = await getRunMetrics(fastify.db, {
        window_seconds: windowParam,
        group_by: q.group_by,
      });

      return reply.status(200).send(result);
    },
  );
}

export default fp(metricsRoutes, {
  name: 'metrics-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
