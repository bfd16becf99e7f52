import type { FastifyInstance } from 'fastify';
import {
  companyActivityFiltersSchema,
  projectActivityFiltersSchema,
} from '../schemas/activity-log.schema.js';
import { projectParamsSchema } from '../schemas/common.schema.js';
import { listCompanyActivity, listProjectActivity } from '../services/audit.service.js';
import { sendResult } from '../lib/error-handler.js';

export async function activityLogsRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', fastify.authenticate);

  // GET /api/activity - company-wide, admins only
  fastify.get<{ Querystring: Record<string, unknown> }>('/api/activity', async (request, reply) => {
    const filters = companyActivityFiltersSchema.parse(request.query);
    return sendResult(reply, await listCompanyActivity(request.actorId, filters));
  });

  // GET /api/projects/:projectId/activity
  fastify.get<{ Params: { projectId: string }; Querystring: Record<string, unknown> }>(
    '/api/projects/:projectId/activity',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      const filters = projectActivityFiltersSchema.parse(request.query);
      return sendResult(reply, await listProjectActivity(request.actorId, projectId, filters));
    }
  );
}
