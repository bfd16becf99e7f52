import type { FastifyInstance } from 'fastify';
import {
  createWorkItemSchema,
  updateWorkItemSchema,
  workItemFiltersSchema,
  moveToSprintSchema,
} from '../schemas/work-item.schema.js';
import { projectParamsSchema, projectEntityParamsSchema } from '../schemas/common.schema.js';
import { workItemsService } from '../services/work-items.service.js';
import { listWorkItemActivity } from '../services/audit.service.js';
import { sendResult } from '../lib/error-handler.js';

type ProjectParams = { projectId: string };
type ItemParams = { projectId: string; id: string };

export async function workItemsRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', fastify.authenticate);

  // GET /api/projects/:projectId/work-items - filtered list, limited to what the caller may read
  fastify.get<{ Params: ProjectParams; Querystring: Record<string, unknown> }>(
    '/api/projects/:projectId/work-items',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      const filters = workItemFiltersSchema.parse(request.query);
      return sendResult(reply, await workItemsService.list(request.actorId, projectId, filters));
    }
  );

  // POST /api/projects/:projectId/work-items
  fastify.post<{ Params: ProjectParams; Body: unknown }>(
    '/api/projects/:projectId/work-items',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      const data = createWorkItemSchema.parse(request.body);
      return sendResult(reply, await workItemsService.create(request.actorId, projectId, data));
    }
  );

  // POST /api/projects/:projectId/work-items/move-to-sprint - sprintId null sends items to the backlog
  fastify.post<{ Params: ProjectParams; Body: unknown }>(
    '/api/projects/:projectId/work-items/move-to-sprint',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      const data = moveToSprintSchema.parse(request.body);
      return sendResult(reply, await workItemsService.moveToSprint(request.actorId, projectId, data));
    }
  );

  // GET /api/projects/:projectId/work-items/:id
  fastify.get<{ Params: ItemParams }>(
    '/api/projects/:projectId/work-items/:id',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await workItemsService.getById(request.actorId, projectId, id));
    }
  );

  // GET /api/projects/:projectId/work-items/:id/children
  fastify.get<{ Params: ItemParams }>(
    '/api/projects/:projectId/work-items/:id/children',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await workItemsService.listChildren(request.actorId, projectId, id));
    }
  );

  // GET /api/projects/:projectId/work-items/:id/activity
  fastify.get<{ Params: ItemParams }>(
    '/api/projects/:projectId/work-items/:id/activity',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await listWorkItemActivity(request.actorId, projectId, id));
    }
  );

  // PUT /api/projects/:projectId/work-items/:id
  fastify.put<{ Params: ItemParams; Body: unknown }>(
    '/api/projects/:projectId/work-items/:id',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      const data = updateWorkItemSchema.parse(request.body);
      return sendResult(reply, await workItemsService.update(request.actorId, projectId, id, data));
    }
  );

  // DELETE /api/projects/:projectId/work-items/:id
  fastify.delete<{ Params: ItemParams }>(
    '/api/projects/:projectId/work-items/:id',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await workItemsService.delete(request.actorId, projectId, id));
    }
  );
}
