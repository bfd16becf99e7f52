import type { FastifyInstance } from 'fastify';
import { projectParamsSchema } from '../schemas/common.schema.js';
import { dashboardService } from '../services/dashboard.service.js';
import { sendResult } from '../lib/error-handler.js';

type ProjectParams = { projectId: string };

export async function dashboardRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', fastify.authenticate);

  // GET /api/projects/:projectId/dashboard
  fastify.get<{ Params: ProjectParams }>(
    '/api/projects/:projectId/dashboard',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      return sendResult(reply, await dashboardService.get(request.actorId, projectId));
    }
  );
}
