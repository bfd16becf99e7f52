import { ZodError } from 'zod';
import {
  NotFoundError,
  ValidationError,
  WorkflowError,
  UnauthorizedError,
  ForbiddenError,
} from './errors.js';
import { logger } from './logger.js';

export type SuccessKind = 'success' | 'created';
export type RejectionKind = 'bad_request' | 'unauthorized' | 'forbidden' | 'not_found';
export type ServiceResultKind = SuccessKind | RejectionKind | 'failure';

export interface ServiceSuccess<T> {
  ok: true;
  kind: SuccessKind;
  data: T;
}

export interface ServiceRejection {
  ok: false;
  kind: RejectionKind;
  message: string;
  details?: Record<string, unknown>;
}

export interface ServiceFailure {
  ok: false;
  kind: 'failure';
  message: string;
  cause: unknown;
}

/**
 * Outcome of every public service operation. The HTTP layer maps each kind
 * to exactly one status code (see RESULT_STATUS_CODES).
 */
export type ServiceResult<T> = ServiceSuccess<T> | ServiceRejection | ServiceFailure;

export const RESULT_STATUS_CODES: Record<ServiceResultKind, number> = {
  success: 200,
  created: 201,
  bad_request: 400,
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  failure: 500,
};

export const GENERIC_FAILURE_MESSAGE = 'An unexpected error occurred';

export function success<T>(data: T): ServiceSuccess<T> {
  return { ok: true, kind: 'success', data };
}

export function created<T>(data: T): ServiceSuccess<T> {
  return { ok: true, kind: 'created', data };
}

export function rejection(
  kind: RejectionKind,
  message: string,
  details?: Record<string, unknown>
): ServiceRejection {
  return details ? { ok: false, kind, message, details } : { ok: false, kind, message };
}

export function failure(cause: unknown): ServiceFailure {
  return { ok: false, kind: 'failure', message: GENERIC_FAILURE_MESSAGE, cause };
}

/**
 * Classify a thrown error. Returns null for errors that are not part of the
 * domain taxonomy.
 */
export function classifyError(error: unknown): ServiceRejection | null {
  if (error instanceof NotFoundError) {
    return rejection('not_found', error.message);
  }
  if (error instanceof ValidationError) {
    return rejection('bad_request', error.message, error.details);
  }
  if (error instanceof WorkflowError) {
    return rejection('bad_request', error.message, {
      currentStatus: error.currentStatus,
      attemptedStatus: error.attemptedStatus,
    });
  }
  if (error instanceof UnauthorizedError) {
    return rejection('unauthorized', error.message);
  }
  if (error instanceof ForbiddenError) {
    return rejection('forbidden', error.message);
  }
  if (error instanceof ZodError) {
    return rejection('bad_request', 'Request validation failed', {
      issues: error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return null;
}

/**
 * Service boundary. Domain errors thrown by the body become typed rejections;
 * anything else is logged and becomes a failure carrying the cause.
 */
export async function runService<T>(
  operation: string,
  body: () => ServiceResult<T> | Promise<ServiceResult<T>>
): Promise<ServiceResult<T>> {
  try {
    return await body();
  } catch (error) {
    const classified = classifyError(error);
    if (classified) {
      return classified;
    }
    logger.error({ err: error, operation }, 'Unexpected service failure');
    return failure(error);
  }
}
