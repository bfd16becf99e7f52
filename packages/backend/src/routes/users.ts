import type { FastifyInstance } from 'fastify';
import {
  createUserSchema,
  updateUserSchema,
  userFiltersSchema,
  transferSuperAdminSchema,
} from '../schemas/user.schema.js';
import { idParamsSchema } from '../schemas/common.schema.js';
import { usersService } from '../services/users.service.js';
import { sendResult } from '../lib/error-handler.js';

export async function userRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', fastify.authenticate);

  /**
   * GET /api/users
   * Users of the caller's company. `search` matches names and email.
   */
  fastify.get<{ Querystring: Record<string, unknown> }>('/api/users', async (request, reply) => {
    const filters = userFiltersSchema.parse(request.query);
    return sendResult(reply, await usersService.list(request.actorId, filters));
  });

  // GET /api/users/me
  fastify.get('/api/users/me', async (request, reply) => {
    return sendResult(reply, await usersService.getMe(request.actorId));
  });

  // GET /api/users/team - direct reports
  fastify.get('/api/users/team', async (request, reply) => {
    return sendResult(reply, await usersService.listTeam(request.actorId));
  });

  // GET /api/users/managers - candidates for managerId
  fastify.get('/api/users/managers', async (request, reply) => {
    return sendResult(reply, await usersService.listManagers(request.actorId));
  });

  // GET /api/users/:id
  fastify.get<{ Params: { id: string } }>('/api/users/:id', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    return sendResult(reply, await usersService.getById(request.actorId, id));
  });

  // GET /api/users/:id/projects
  fastify.get<{ Params: { id: string } }>('/api/users/:id/projects', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    return sendResult(reply, await usersService.listProjects(request.actorId, id));
  });

  // POST /api/users
  fastify.post<{ Body: unknown }>('/api/users', async (request, reply) => {
    const data = createUserSchema.parse(request.body);
    return sendResult(reply, await usersService.create(request.actorId, data));
  });

  /**
   * POST /api/users/transfer-super-admin
   * Swap roles with a same-company Admin in one transaction.
   */
  fastify.post<{ Body: unknown }>('/api/users/transfer-super-admin', async (request, reply) => {
    const { targetUserId } = transferSuperAdminSchema.parse(request.body);
    return sendResult(reply, await usersService.transferSuperAdmin(request.actorId, targetUserId));
  });

  // PUT /api/users/:id
  fastify.put<{ Params: { id: string }; Body: unknown }>('/api/users/:id', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const data = updateUserSchema.parse(request.body);
    return sendResult(reply, await usersService.update(request.actorId, id, data));
  });

  // DELETE /api/users/:id
  fastify.delete<{ Params: { id: string } }>('/api/users/:id', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    return sendResult(reply, await usersService.delete(request.actorId, id));
  });
}
