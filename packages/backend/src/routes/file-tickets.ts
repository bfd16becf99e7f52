import type { FastifyInstance } from 'fastify';
import {
  createFileTicketSchema,
  updateFileTicketSchema,
  transferFileTicketSchema,
  fileTicketFiltersSchema,
} from '../schemas/file-ticket.schema.js';
import { projectParamsSchema, projectEntityParamsSchema } from '../schemas/common.schema.js';
import { fileTicketsService } from '../services/file-tickets.service.js';
import { listFileTicketActivity } from '../services/audit.service.js';
import { sendResult } from '../lib/error-handler.js';

type ProjectParams = { projectId: string };
type TicketParams = { projectId: string; id: string };

export async function fileTicketsRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', fastify.authenticate);

  // GET /api/projects/:projectId/file-tickets
  fastify.get<{ Params: ProjectParams; Querystring: Record<string, unknown> }>(
    '/api/projects/:projectId/file-tickets',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      const filters = fileTicketFiltersSchema.parse(request.query);
      return sendResult(reply, await fileTicketsService.list(request.actorId, projectId, filters));
    }
  );

  // GET /api/projects/:projectId/file-tickets/:id - includes the transfer ledger
  fastify.get<{ Params: TicketParams }>(
    '/api/projects/:projectId/file-tickets/:id',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await fileTicketsService.getById(request.actorId, projectId, id));
    }
  );

  // POST /api/projects/:projectId/file-tickets
  fastify.post<{ Params: ProjectParams; Body: unknown }>(
    '/api/projects/:projectId/file-tickets',
    async (request, reply) => {
      const { projectId } = projectParamsSchema.parse(request.params);
      const data = createFileTicketSchema.parse(request.body);
      return sendResult(reply, await fileTicketsService.create(request.actorId, projectId, data));
    }
  );

  // PUT /api/projects/:projectId/file-tickets/:id
  fastify.put<{ Params: TicketParams; Body: unknown }>(
    '/api/projects/:projectId/file-tickets/:id',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      const data = updateFileTicketSchema.parse(request.body);
      return sendResult(reply, await fileTicketsService.update(request.actorId, projectId, id, data));
    }
  );

  // POST /api/projects/:projectId/file-tickets/:id/transfer
  fastify.post<{ Params: TicketParams; Body: unknown }>(
    '/api/projects/:projectId/file-tickets/:id/transfer',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      const data = transferFileTicketSchema.parse(request.body);
      return sendResult(reply, await fileTicketsService.transfer(request.actorId, projectId, id, data));
    }
  );

  // POST /api/projects/:projectId/file-tickets/:id/receive - current holder only
  fastify.post<{ Params: TicketParams }>(
    '/api/projects/:projectId/file-tickets/:id/receive',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await fileTicketsService.receive(request.actorId, projectId, id));
    }
  );

  // GET /api/projects/:projectId/file-tickets/:id/transfers
  fastify.get<{ Params: TicketParams }>(
    '/api/projects/:projectId/file-tickets/:id/transfers',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await fileTicketsService.listTransfers(request.actorId, projectId, id));
    }
  );

  // GET /api/projects/:projectId/file-tickets/:id/activity
  fastify.get<{ Params: TicketParams }>(
    '/api/projects/:projectId/file-tickets/:id/activity',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await listFileTicketActivity(request.actorId, projectId, id));
    }
  );

  // DELETE /api/projects/:projectId/file-tickets/:id
  fastify.delete<{ Params: TicketParams }>(
    '/api/projects/:projectId/file-tickets/:id',
    async (request, reply) => {
      const { projectId, id } = projectEntityParamsSchema.parse(request.params);
      return sendResult(reply, await fileTicketsService.delete(request.actorId, projectId, id));
    }
  );
}
