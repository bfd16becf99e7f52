import type { FastifyInstance } from 'fastify';
import { createSprintSchema, updateSprintSchema } from '../schemas/sprint.schema.js';
import { projectParamsSchema, projectEntityParamsSchema } from '../schemas/common.schema.js';
import { sprintsService } from '../services/sprints.service.js';
import { sendResult } from '../lib/error-handler.js';

type ProjectParams = { projectId: string };
type SprintParams = { projectId: string; id: string };

export async function sprintsRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', fastify.authenticate);

  // GET /api/projects/:projectId/sprints
  fastify.get<{ Params: ProjectParams }>(
    '/api/projects/:projectId/sprints',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      return sendResult(reply, await sprintsService.list(request.actorId, projectId));
    }
  );

  // GET /api/projects/:projectId/sprints/:id
  fastify.get<{ Params: SprintParams }>(
    '/api/projects/:projectId/sprints/:id',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await sprintsService.getById(request.actorId, projectId, id));
    }
  );

  // POST /api/projects/:projectId/sprints
  fastify.post<{ Params: ProjectParams; Body: unknown }>(
    '/api/projects/:projectId/sprints',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      const data = createSprintSchema.parse(request.body);
      return sendResult(reply, await sprintsService.create(request.actorId, projectId, data));
    }
  );

  // PUT /api/projects/:projectId/sprints/:id
  fastify.put<{ Params: SprintParams; Body: unknown }>(
    '/api/projects/:projectId/sprints/:id',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      const data = updateSprintSchema.parse(request.body);
      return sendResult(reply, await sprintsService.update(request.actorId, projectId, id, data));
    }
  );

  // POST /api/projects/:projectId/sprints/:id/start - PLANNING -> ACTIVE
  fastify.post<{ Params: SprintParams }>(
    '/api/projects/:projectId/sprints/:id/start',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await sprintsService.start(request.actorId, projectId, id));
    }
  );

  // POST /api/projects/:projectId/sprints/:id/complete - ACTIVE -> COMPLETED
  fastify.post<{ Params: SprintParams }>(
    '/api/projects/:projectId/sprints/:id/complete',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await sprintsService.complete(request.actorId, projectId, id));
    }
  );

  // DELETE /api/projects/:projectId/sprints/:id - items go back to the backlog
  fastify.delete<{ Params: SprintParams }>(
    '/api/projects/:projectId/sprints/:id',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await sprintsService.delete(request.actorId, projectId, id));
    }
  );
}
