import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { executeRequestSchema, patchWorkflowSchema } from '../../application/event-schema.js';
import {
  createWorkflow,
  listWorkflows,
  getWorkflow,
  replaceWorkflow,
  setEnabled,
  removeWorkflow,
  prepareExecution,
} from '../../application/workflow-crud.js';
import {
  WorkflowDisabledError,
  WorkflowNotFoundError,
  WorkflowValidationError,
} from '../../domain/index.js';
import { enqueueEvent, publishWorkflowChange } from '../../infrastructure/redis/index.js';

type IdParams = { Params: { workflow_id: string } };

/** Replies 400 for a rejected document and returns true; false for anything else. */
function replyInvalid(reply: FastifyReply, err: unknown): boolean {
  if (!(err instanceof WorkflowValidationError)) return false;
  void reply.status(400).send({ error: err.message, issues: err.issues });
  return true;
}

/**
 * Workflow document routes.
 *
 * POST   /api/v1/workflows                       create (201, 409 if the id exists)
 * GET    /api/v1/workflows                       list
 * GET    /api/v1/workflows/:workflow_id          get
 * PUT    /api/v1/workflows/:workflow_id          full replace
 * PATCH  /api/v1/workflows/:workflow_id          `{ enabled }`
 * DELETE /api/v1/workflows/:workflow_id          delete
 * POST   /api/v1/workflows/:workflow_id/execute  manual run (202)
 *
 * Every successful write is announced on `workflows_changed` so the
 * worker reloads its registry.
 */
async function workflowRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/workflows',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      try {
        const row = await createWorkflow(fastify.db, request.body);
        if (row === null) {
          return reply.status(409).send({ error: 'Workflow already exists' });
        }
        await publishWorkflowChange(fastify.redis, fastify.log, 'create', row.workflow_id);
        return reply.status(201).send(row);
      } catch (err: unknown) {
        if (replyInvalid(reply, err)) return reply;
        throw err;
      }
    },
  );

  fastify.get(
    '/api/v1/workflows',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const rows = await listWorkflows(fastify.db);
      return reply.status(200).send(rows);
    },
  );

  fastify.get(
    '/api/v1/workflows/:workflow_id',
    async (request: FastifyRequest<IdParams>, reply: FastifyReply) => {
      const row = await getWorkflow(fastify.db, request.params.workflow_id);
      if (row === null) {
        return reply.status(404).send({ error: 'Workflow not found' });
      }
      return reply.status(200).send(row);
    },
  );

  fastify.put(
    '/api/v1/workflows/:workflow_id',
    async (request: FastifyRequest<IdParams & { Body: unknown }>, reply: FastifyReply) => {
      const { workflow_id } = request.params;
      try {
        const row = await replaceWorkflow(fastify.db, workflow_id, request.body);
        if (row === null) {
          return reply.status(404).send({ error: 'Workflow not found' });
        }
        await publishWorkflowChange(fastify.redis, fastify.log, 'update', workflow_id);
        return reply.status(200).send(row);
      } catch (err: unknown) {
        if (replyInvalid(reply, err)) return reply;
        throw err;
      }
    },
  );

  fastify.patch(
    '/api/v1/workflows/:workflow_id',
    async (request: FastifyRequest<IdParams & { Body: unknown }>, reply: FastifyReply) => {
      const { workflow_id } = request.params;
      const parsed = patchWorkflowSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const row = await setEnabled(fastify.db, workflow_id, parsed.data.enabled);
      if (row === null) {
        return reply.status(404).send({ error: 'Workflow not found' });
      }

      await publishWorkflowChange(
        fastify.redis,
        fastify.log,
        parsed.data.enabled ? 'enable' : 'disable',
        workflow_id,
      );
      return reply.status(200).send(row);
    },
  );

  fastify.delete(
    '/api/v1/workflows/:workflow_id',
    async (request: FastifyRequest<IdParams>, reply: FastifyReply) => {
      const { workflow_id } = request.params;
      const deleted = await removeWorkflow(fastify.db, workflow_id);
      if (!deleted) {
        return reply.status(404).send({ error: 'Workflow not found' });
      }

      await publishWorkflowChange(fastify.redis, fastify.log, 'delete', workflow_id);
      return reply.status(204).send();
    },
  );

  fastify.post(
    '/api/v1/workflows/:workflow_id/execute',
    async (request: FastifyRequest<IdParams & { Body: unknown }>, reply: FastifyReply) => {
      const { workflow_id } = request.params;
      const parsed = executeRequestSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      try {
        const event = await prepareExecution(fastify.db, workflow_id, parsed.data.payload);
        const entryId = await enqueueEvent(fastify.redis, event, workflow_id);
        return reply.status(202).send({
          status: 'accepted',
          workflow_id,
          event_type: event.type,
          entry_id: entryId,
        });
      } catch (err: unknown) {
        if (err instanceof WorkflowNotFoundError) {
          return reply.status(404).send({ error: err.message });
        }
        if (err instanceof WorkflowDisabledError) {
          return reply.status(409).send({ error: err.message });
        }
        if (replyInvalid(reply, err)) return reply;
        throw err;
      }
    },
  );
}

export default fp(workflowRoutes, {
  name: 'workflow-routes',
  dependencies: ['db', 'redis'],
  fastify: '5.x',
});
