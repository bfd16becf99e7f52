import 'dotenv/config';
import { buildApp } from './app.js';
import { getConfig } from './lib/config.js';
import { openDatabase, closeDatabase } from './lib/db.js';
import { logger } from './lib/logger.js';

const start = async () => {
  const config = getConfig();
  openDatabase(config.databasePath);

  const fastify = await buildApp();

  const shutdown = async (signal: string) => {
    fastify.log.info({ signal }, 'Shutting down');
    await fastify.close();
    closeDatabase();
    process.exit(0);
  };
  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  await fastify.listen({ port: config.port, host: config.host });
};

start().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
