import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { listRuns, getRun } from '../../application/query-runs.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const RUN_STATES = ['completed', 'error_completed'];

/** `undefined` when absent, NaN when not an integer. */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/**
 * Run history routes.
 *
 * GET /api/v1/runs          paginated, filter by workflow_id and state
 * GET /api/v1/runs/:run_id  single run
 */
async function runRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/runs',
    async (
      request: FastifyRequest<{
        Querystring: {
          limit?: string;
          offset?: string;
          workflow_id?: string;
          state?: string;
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      const limit = safeInt(q.limit);
      const offset = safeInt(q.offset);

      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (offset !== undefined && Number.isNaN(offset)) {
        return reply.status(400).send({ error: 'offset must be an integer' });
      }
      if (q.state !== undefined && !RUN_STATES.includes(q.state)) {
        return reply.status(400).send({ error: `state must be one of: ${RUN_STATES.join(', ')}` });
      }

      const result = await listRuns(fastify.db, {
        limit,
        offset,
        workflow_id: q.workflow_id,
        state: q.state,
      });

      return reply.status(200).send(result);
    },
  );

  fastify.get(
    '/api/v1/runs/:run_id',
    async (
      request: FastifyRequest<{ Params: { run_id: string } }>,
      reply: FastifyReply,
    ) => {
      const { run_id } = request.params;
      if (!UUID_RE.test(run_id)) {
        return reply.status(400).send({ error: 'run_id must be a valid UUID' });
      }

      const row = await getRun(fastify.db, run_id);
      if (row === null) {
        return reply.status(404).send({ error: 'Run not found' });
      }

      return reply.status(200).send(row);
    },
  );
}

export default fp(runRoutes, {
  name: 'run-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
