import type { FastifyInstance } from 'fastify';
import { createCommentSchema, commentParamsSchema } from '../schemas/comment.schema.js';
import { projectEntityParamsSchema } from '../schemas/common.schema.js';
import { commentsService } from '../services/comments.service.js';
import { sendResult } from '../lib/error-handler.js';

type WorkItemParams = { projectId: string; id: string };
type CommentParams = { projectId: string; id: string; commentId: string };

export async function commentsRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', fastify.authenticate);

  // GET /api/projects/:projectId/work-items/:id/comments - newest first
  fastify.get<{ Params: WorkItemParams }>(
    '/api/projects/:projectId/work-items/:id/comments',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await commentsService.list(request.actorId, projectId, id));
    }
  );

  // POST /api/projects/:projectId/work-items/:id/comments
  fastify.post<{ Params: WorkItemParams; Body: unknown }>(
    '/api/projects/:projectId/work-items/:id/comments',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      const data = createCommentSchema.parse(request.body);
      return sendResult(reply, await commentsService.create(request.actorId, projectId, id, data));
    }
  );

  // DELETE /api/projects/:projectId/work-items/:id/comments/:commentId
  fastify.delete<{ Params: CommentParams }>(
    '/api/projects/:projectId/work-items/:id/comments/:commentId',
    async (request, reply) => {
      const { projectId, id, commentId } = commentParamsSchema.parse(request.params);
      return sendResult(reply, await commentsService.delete(request.actorId, projectId, id, commentId));
    }
  );
}
