import type { FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import {
  NotFoundError,
  ValidationError,
  WorkflowError,
  UnauthorizedError,
  ForbiddenError,
} from './errors.js';
import { RESULT_STATUS_CODES } from './service-result.js';
import type { ServiceResult, ServiceResultKind } from './service-result.js';

interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

const ERROR_LABELS: Record<Exclude<ServiceResultKind, 'success' | 'created'>, string> = {
  bad_request: 'Bad Request',
  unauthorized: 'Unauthorized',
  forbidden: 'Forbidden',
  not_found: 'Not Found',
  failure: 'Internal Server Error',
};

/**
 * Write a service result to the reply. Success kinds send the data; every
 * other kind sends an ErrorResponse with the mapped status code.
 */
export function sendResult<T>(reply: FastifyReply, result: ServiceResult<T>): FastifyReply {
  const statusCode = RESULT_STATUS_CODES[result.kind];
  if (result.ok) {
    return reply.code(statusCode).send(result.data);
  }

  const response: ErrorResponse = {
    error: ERROR_LABELS[result.kind],
    message: result.message,
    statusCode,
  };
  if (result.kind !== 'failure' && result.details) {
    response.details = result.details;
  }
  return reply.code(statusCode).send(response);
}

/** Covers errors raised outside services: param/query parsing, tokens, unknown routes. */
export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error, request, reply) => {
    const response: ErrorResponse = {
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      statusCode: 500,
    };

    if (error instanceof ZodError) {
      response.error = 'Validation Error';
      response.message = 'Request validation failed';
      response.statusCode = 400;
      response.details = error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      return reply.status(400).send(response);
    }

    if (error instanceof NotFoundError) {
      response.error = 'Not Found';
      response.message = error.message;
      response.statusCode = 404;
      return reply.status(404).send(response);
    }

    if (error instanceof ValidationError) {
      response.error = 'Validation Error';
      response.message = error.message;
      response.statusCode = 400;
      if (error.details) {
        response.details = error.details;
      }
      return reply.status(400).send(response);
    }

    if (error instanceof WorkflowError) {
      response.error = 'Workflow Error';
      response.message = error.message;
      response.statusCode = 400;
      response.details = {
        currentStatus: error.currentStatus,
        attemptedStatus: error.attemptedStatus,
      };
      return reply.status(400).send(response);
    }

    if (error instanceof UnauthorizedError) {
      response.error = 'Unauthorized';
      response.message = error.message;
      response.statusCode = 401;
      return reply.status(401).send(response);
    }

    if (error instanceof ForbiddenError) {
      response.error = 'Forbidden';
      response.message = error.message;
      response.statusCode = 403;
      return reply.status(403).send(response);
    }

    // Fastify's own errors (malformed JSON, payload too large, ...)
    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      response.statusCode = error.statusCode;
      response.message = error.message;
      if (error.statusCode === 400) {
        response.error = 'Bad Request';
      } else if (error.statusCode === 404) {
        response.error = 'Not Found';
      }
      return reply.status(error.statusCode).send(response);
    }

    request.log.error({ err: error }, 'Unhandled request error');

    return reply.status(500).send(response);
  });
}
