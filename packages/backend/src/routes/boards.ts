import type { FastifyInstance } from 'fastify';
import { createBoardSchema, addColumnSchema, boardColumnParamsSchema } from '../schemas/board.schema.js';
import { projectParamsSchema, projectEntityParamsSchema } from '../schemas/common.schema.js';
import { boardsService } from '../services/boards.service.js';
import { sendResult } from '../lib/error-handler.js';

type ProjectParams = { projectId: string };
type BoardParams = { projectId: string; id: string };

export async function boardsRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', fastify.authenticate);

  // GET /api/projects/:projectId/boards - default board plus the caller's own
  fastify.get<{ Params: ProjectParams }>(
    '/api/projects/:projectId/boards',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      return sendResult(reply, await boardsService.list(request.actorId, projectId));
    }
  );

  // GET /api/projects/:projectId/boards/:id
  fastify.get<{ Params: BoardParams }>(
    '/api/projects/:projectId/boards/:id',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await boardsService.getById(request.actorId, projectId, id));
    }
  );

  // POST /api/projects/:projectId/boards - personal board forked from the default
  fastify.post<{ Params: ProjectParams; Body: unknown }>(
    '/api/projects/:projectId/boards',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      const data = createBoardSchema.parse(request.body);
      return sendResult(reply, await boardsService.createPersonal(request.actorId, projectId, data));
    }
  );

  // POST /api/projects/:projectId/boards/:id/columns
  fastify.post<{ Params: BoardParams; Body: unknown }>(
    '/api/projects/:projectId/boards/:id/columns',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      const data = addColumnSchema.parse(request.body);
      return sendResult(reply, await boardsService.addColumn(request.actorId, projectId, id, data));
    }
  );

  // DELETE /api/projects/:projectId/boards/:id/columns/:columnId
  fastify.delete<{ Params: BoardParams & { columnId: string } }>(
    '/api/projects/:projectId/boards/:id/columns/:columnId',
    async (request, reply) => {
      const { projectId, id, columnId } = boardColumnParamsSchema.parse(request.params);
      return sendResult(
        reply,
        await boardsService.removeColumn(request.actorId, projectId, id, columnId)
      );
    }
  );

  // DELETE /api/projects/:projectId/boards/:id
  fastify.delete<{ Params: BoardParams }>(
    '/api/projects/:projectId/boards/:id',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await boardsService.delete(request.actorId, projectId, id));
    }
  );
}
