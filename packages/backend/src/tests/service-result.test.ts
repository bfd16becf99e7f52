import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  runService,
  classifyError,
  success,
  created,
  RESULT_STATUS_CODES,
} from '../lib/service-result.js';
import {
  NotFoundError,
  ValidationError,
  WorkflowError,
  UnauthorizedError,
  ForbiddenError,
} from '../lib/errors.js';

describe('classifyError', () => {
  it('maps each domain error to one kind', () => {
    expect(classifyError(new NotFoundError('Sprint'))).toEqual({
      ok: false,
      kind: 'not_found',
      message: 'Sprint not found',
    });
    expect(classifyError(new ValidationError('bad'))?.kind).toBe('bad_request');
    expect(classifyError(new UnauthorizedError())?.kind).toBe('unauthorized');
    expect(classifyError(new ForbiddenError('no'))?.kind).toBe('forbidden');
  });

  it('reports both states of a workflow error', () => {
    expect(classifyError(new WorkflowError('nope', 'PLANNING', 'COMPLETED'))).toEqual({
      ok: false,
      kind: 'bad_request',
      message: 'nope',
      details: { currentStatus: 'PLANNING', attemptedStatus: 'COMPLETED' },
    });
  });

  it('turns schema errors into a bad request', () => {
    const parsed = z.object({ name: z.string() }).safeParse({ name: 1 });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      const result = classifyError(parsed.error);
      expect(result?.message).toBe('Request validation failed');
      expect(result?.details).toEqual({
        issues: [{ path: 'name', message: 'Expected string, received number' }],
      });
    }
  });

  it('returns null for anything else', () => {
    expect(classifyError(new TypeError('boom'))).toBeNull();
  });
});

describe('runService', () => {
  it('passes results through', async () => {
    await expect(runService('test.ok', () => success(1))).resolves.toEqual({
      ok: true,
      kind: 'success',
      data: 1,
    });
    await expect(runService('test.created', async () => created('x'))).resolves.toEqual({
      ok: true,
      kind: 'created',
      data: 'x',
    });
  });

  it('converts thrown domain errors', async () => {
    const result = await runService('test.forbidden', () => {
      throw new ForbiddenError('Members cannot create work items');
    });
    expect(result).toEqual({ ok: false, kind: 'forbidden', message: 'Members cannot create work items' });
  });

  it('hides unexpected errors behind a generic failure', async () => {
    const cause = new Error('disk on fire');
    const result = await runService('test.failure', () => {
      throw cause;
    });
    expect(result).toEqual({
      ok: false,
      kind: 'failure',
      message: 'An unexpected error occurred',
      cause,
    });
  });
});

describe('RESULT_STATUS_CODES', () => {
  it('maps each kind to one status', () => {
    expect(RESULT_STATUS_CODES).toEqual({
      success: 200,
      created: 201,
      bad_request: 400,
      unauthorized: 401,
      forbidden: 403,
      not_found: 404,
      failure: 500,
    });
  });
});
