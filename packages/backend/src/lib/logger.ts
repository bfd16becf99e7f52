import pino from 'pino';
import type { LoggerOptions } from 'pino';
import { getConfig } from './config.js';

/** Shared by the service logger and Fastify's request logger. */
export const loggerOptions: LoggerOptions = {
  level: getConfig().logLevel,
  base: { service: 'workhub-backend' },
  redact: ['req.headers.authorization'],
};

export const logger = pino(loggerOptions);

export function moduleLogger(module: string) {
  return logger.child({ module });
}
