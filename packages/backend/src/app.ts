import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { registerErrorHandler } from './lib/error-handler.js';
import { getConfig } from './lib/config.js';
import { loggerOptions } from './lib/logger.js';
import authPlugin from './plugins/auth.plugin.js';
import { companiesRoutes } from './routes/companies.js';
import { userRoutes } from './routes/users.js';
import { projectsRoutes } from './routes/projects.js';
import { workflowStatusesRoutes } from './routes/workflow-statuses.js';
import { workItemsRoutes } from './routes/work-items.js';
import { sprintsRoutes } from './routes/sprints.js';
import { boardsRoutes } from './routes/boards.js';
import { fileTicketsRoutes } from './routes/file-tickets.js';
import { activityLogsRoutes } from './routes/activity-logs.js';
import { commentsRoutes } from './routes/comments.js';
import { dashboardRoutes } from './routes/dashboard.js';

export interface BuildAppOptions {
  /** false disables request logging (tests). */
  logger?: boolean;
}

/**
 * Assemble the HTTP adapter. The database must already be open.
 */
export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = getConfig();

  const fastify = Fastify({
    logger: options.logger === false ? false : loggerOptions,
  });

  await fastify.register(cors, {
    origin: config.corsOrigin,
    credentials: true,
  });

  // Bearer token -> request.actorId
  await fastify.register(authPlugin);

  registerErrorHandler(fastify);

  fastify.get('/health', async () => {
    return { status: 'ok' };
  });

  await fastify.register(companiesRoutes);
  await fastify.register(userRoutes);
  await fastify.register(projectsRoutes);
  await fastify.register(workflowStatusesRoutes);
  await fastify.register(workItemsRoutes);
  await fastify.register(sprintsRoutes);
  await fastify.register(boardsRoutes);
  await fastify.register(fileTicketsRoutes);
  await fastify.register(activityLogsRoutes);
  await fastify.register(commentsRoutes);
  await fastify.register(dashboardRoutes);

  return fastify;
}
