import type { FastifyInstance } from 'fastify';
import {
  createWorkflowStatusSchema,
  updateWorkflowStatusSchema,
  reorderStatusesSchema,
} from '../schemas/workflow-status.schema.js';
import { projectParamsSchema, projectEntityParamsSchema } from '../schemas/common.schema.js';
import { workflowStatusesService } from '../services/workflow-statuses.service.js';
import { sendResult } from '../lib/error-handler.js';

type ProjectParams = { projectId: string };
type StatusParams = { projectId: string; id: string };

export async function workflowStatusesRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', fastify.authenticate);

  // GET /api/projects/:projectId/statuses - ordered by column order
  fastify.get<{ Params: ProjectParams }>(
    '/api/projects/:projectId/statuses',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      return sendResult(reply, await workflowStatusesService.list(request.actorId, projectId));
    }
  );

  // GET /api/projects/:projectId/statuses/:id
  fastify.get<{ Params: StatusParams }>(
    '/api/projects/:projectId/statuses/:id',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await workflowStatusesService.getById(request.actorId, projectId, id));
    }
  );

  // POST /api/projects/:projectId/statuses
  fastify.post<{ Params: ProjectParams; Body: unknown }>(
    '/api/projects/:projectId/statuses',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      const data = createWorkflowStatusSchema.parse(request.body);
      return sendResult(reply, await workflowStatusesService.create(request.actorId, projectId, data));
    }
  );

  /**
   * PUT /api/projects/:projectId/statuses/reorder
   * Body: { statusIds } in the new order. Omitted statuses keep their order.
   */
  fastify.put<{ Params: ProjectParams; Body: unknown }>(
    '/api/projects/:projectId/statuses/reorder',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      const data = reorderStatusesSchema.parse(request.body);
      return sendResult(reply, await workflowStatusesService.reorder(request.actorId, projectId, data));
    }
  );

  // PUT /api/projects/:projectId/statuses/:id
  fastify.put<{ Params: StatusParams; Body: unknown }>(
    '/api/projects/:projectId/statuses/:id',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      const data = updateWorkflowStatusSchema.parse(request.body);
      return sendResult(
        reply,
        await workflowStatusesService.update(request.actorId, projectId, id, data)
      );
    }
  );

  // DELETE /api/projects/:projectId/statuses/:id
  fastify.delete<{ Params: StatusParams }>(
    '/api/projects/:projectId/statuses/:id',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await workflowStatusesService.delete(request.actorId, projectId, id));
    }
  );
}
