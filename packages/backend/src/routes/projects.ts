import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  createProjectSchema,
  updateProjectSchema,
  addMemberSchema,
  updateMemberRoleSchema,
  availableUsersFiltersSchema,
} from '../schemas/project.schema.js';
import { idSchema, projectParamsSchema } from '../schemas/common.schema.js';
import { projectsService } from '../services/projects.service.js';
import { sendResult } from '../lib/error-handler.js';

const memberParamsSchema = z.object({
  projectId: idSchema,
  memberId: idSchema,
});

export async function projectsRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', fastify.authenticate);

  // GET /api/projects - projects visible to the caller
  fastify.get('/api/projects', async (request, reply) => {
    return sendResult(reply, await projectsService.list(request.actorId));
  });

  // GET /api/projects/:projectId
  fastify.get<{ Params: { projectId: string } }>(
    '/api/projects/:projectId',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      return sendResult(reply, await projectsService.getById(request.actorId, projectId));
    }
  );

  /**
   * POST /api/projects
   * Creates the project with its manager, core statuses and default board.
   */
  fastify.post<{ Body: unknown }>('/api/projects', async (request, reply) => {
    const data = createProjectSchema.parse(request.body);
    return sendResult(reply, await projectsService.create(request.actorId, data));
  });

  // PUT /api/projects/:projectId
  fastify.put<{ Params: { projectId: string }; Body: unknown }>(
    '/api/projects/:projectId',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      const data = updateProjectSchema.parse(request.body);
      return sendResult(reply, await projectsService.update(request.actorId, projectId, data));
    }
  );

  // DELETE /api/projects/:projectId
  fastify.delete<{ Params: { projectId: string } }>(
    '/api/projects/:projectId',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      return sendResult(reply, await projectsService.delete(request.actorId, projectId));
    }
  );

  // ==========================================================================
  // Members
  // ==========================================================================

  // GET /api/projects/:projectId/members
  fastify.get<{ Params: { projectId: string } }>(
    '/api/projects/:projectId/members',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      return sendResult(reply, await projectsService.listMembers(request.actorId, projectId));
    }
  );

  // GET /api/projects/:projectId/available-users - company users not yet members
  fastify.get<{ Params: { projectId: string }; Querystring: Record<string, unknown> }>(
    '/api/projects/:projectId/available-users',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      const filters = availableUsersFiltersSchema.parse(request.query);
      return sendResult(
        reply,
        await projectsService.listAvailableUsers(request.actorId, projectId, filters)
      );
    }
  );

  // POST /api/projects/:projectId/members
  fastify.post<{ Params: { projectId: string }; Body: unknown }>(
    '/api/projects/:projectId/members',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      const data = addMemberSchema.parse(request.body);
      return sendResult(reply, await projectsService.addMember(request.actorId, projectId, data));
    }
  );

  // PUT /api/projects/:projectId/members/:memberId
  fastify.put<{ Params: { projectId: string; memberId: string }; Body: unknown }>(
    '/api/projects/:projectId/members/:memberId',
    async (request, reply) => {
      const { projectId, memberId } = memberParamsSchema.parse(request.params);
      const data = updateMemberRoleSchema.parse(request.body);
      return sendResult(
        reply,
        await projectsService.updateMemberRole(request.actorId, projectId, memberId, data)
      );
    }
  );

  // DELETE /api/projects/:projectId/members/:memberId
  fastify.delete<{ Params: { projectId: string; memberId: string } }>(
    '/api/projects/:projectId/members/:memberId',
    async (request, reply) => {
      const { projectId, memberId } = memberParamsSchema.parse(request.params);
      return sendResult(
        reply,
        await projectsService.removeMember(request.actorId, projectId, memberId)
      );
    }
  );
}
