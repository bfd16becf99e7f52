import type { FastifyInstance } from 'fastify';
import { createCompanySchema, updateCompanySchema } from '../schemas/company.schema.js';
import { idParamsSchema } from '../schemas/common.schema.js';
import { companiesService } from '../services/companies.service.js';
import { sendResult } from '../lib/error-handler.js';

export async function companiesRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', fastify.authenticate);

  // GET /api/companies - SuperAdmin sees every company, others their own
  fastify.get('/api/companies', async (request, reply) => {
    return sendResult(reply, await companiesService.list(request.actorId));
  });

  // GET /api/companies/:id
  fastify.get<{ Params: { id: string } }>('/api/companies/:id', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    return sendResult(reply, await companiesService.getById(request.actorId, id));
  });

  // POST /api/companies - SuperAdmin only
  fastify.post<{ Body: unknown }>('/api/companies', async (request, reply) => {
    const data = createCompanySchema.parse(request.body);
    return sendResult(reply, await companiesService.create(request.actorId, data));
  });

  // PUT /api/companies/:id
  fastify.put<{ Params: { id: string }; Body: unknown }>(
    '/api/companies/:id',
    async (request, reply) => {
      const { id } = idParamsSchema.parse(request.params);
      const data = updateCompanySchema.parse(request.body);
      return sendResult(reply, await companiesService.update(request.actorId, id, data));
    }
  );

  // DELETE /api/companies/:id - soft delete, rejected while projects remain
  fastify.delete<{ Params: { id: string } }>('/api/companies/:id', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    return sendResult(reply, await companiesService.delete(request.actorId, id));
  });
}
