import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { SignJWT } from 'jose';
import {
  useTestDatabase,
  buildTestApp,
  signTestToken,
  parseJsonResponse,
  seedOrg,
  seedProject,
} from './setup.js';
import type {
  CommentDto,
  DashboardDto,
  ProjectDto,
  SprintDto,
  UserDto,
  WorkItemDto,
  WorkflowStatusDto,
} from '../types/index.js';

interface ErrorBody {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

describe('API Integration Tests', () => {
  useTestDatabase();

  let app: FastifyInstance;

  beforeEach(async () => {
    app = await buildTestApp();
  });

  afterEach(async () => {
    await app.close();
  });

  async function authHeaders(userId: number | string): Promise<Record<string, string>> {
    return { authorization: `Bearer ${await signTestToken(userId)}` };
  }

  describe('Health Check', () => {
    it('GET /health answers without a token', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(parseJsonResponse(response)).toEqual({ status: 'ok' });
    });
  });

  describe('Authentication', () => {
    it('rejects a request without a bearer token', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/users/me' });

      expect(response.statusCode).toBe(401);
      expect(parseJsonResponse<ErrorBody>(response)).toEqual({
        error: 'Unauthorized',
        message: 'Access token required',
        statusCode: 401,
      });
    });

    it('rejects a token that does not verify', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/users/me',
        headers: { authorization: 'Bearer not-a-token' },
      });

      expect(response.statusCode).toBe(401);
      expect(parseJsonResponse<ErrorBody>(response).message).toBe('Invalid or expired access token');
    });

    it('rejects a token signed with another secret', async () => {
      const token = await new SignJWT({})
        .setProtectedHeader({ alg: 'HS256' })
        .setSubject('1')
        .setExpirationTime('1h')
        .sign(new TextEncoder().encode('some-other-secret-value'));

      const response = await app.inject({
        method: 'GET',
        url: '/api/users/me',
        headers: { authorization: `Bearer ${token}` },
      });

      expect(response.statusCode).toBe(401);
      expect(parseJsonResponse<ErrorBody>(response).message).toBe('Invalid or expired access token');
    });

    it('rejects a subject that is not a user id', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/users/me',
        headers: await authHeaders('abc'),
      });

      expect(response.statusCode).toBe(401);
      expect(parseJsonResponse<ErrorBody>(response).message).toBe(
        'Invalid token: missing or malformed sub claim'
      );
    });

    it('rejects a token whose user no longer exists', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/users/me',
        headers: await authHeaders(999),
      });

      expect(response.statusCode).toBe(401);
      expect(parseJsonResponse<ErrorBody>(response)).toEqual({
        error: 'Unauthorized',
        message: 'User not found',
        statusCode: 401,
      });
    });

    it('returns the caller for a valid token', async () => {
      const org = seedOrg();

      const response = await app.inject({
        method: 'GET',
        url: '/api/users/me',
        headers: await authHeaders(org.memberId),
      });

      expect(response.statusCode).toBe(200);
      const me = parseJsonResponse<UserDto>(response);
      expect(me.id).toBe(org.memberId);
      expect(me.fullName).toBe('Max Member');
    });
  });

  describe('Projects', () => {
    it('creates a project with its core statuses', async () => {
      const org = seedOrg();

      const createResponse = await app.inject({
        method: 'POST',
        url: '/api/projects',
        headers: await authHeaders(org.adminId),
        payload: { name: 'Website', key: 'web', managerId: org.managerId },
      });

      expect(createResponse.statusCode).toBe(201);
      const project = parseJsonResponse<ProjectDto>(createResponse);
      expect(project.key).toBe('WEB');

      const statusesResponse = await app.inject({
        method: 'GET',
        url: `/api/projects/${project.id}/statuses`,
        headers: await authHeaders(org.managerId),
      });

      expect(statusesResponse.statusCode).toBe(200);
      const statuses = parseJsonResponse<WorkflowStatusDto[]>(statusesResponse);
      expect(statuses.map((status) => status.name)).toEqual(['To Do', 'In Progress', 'Review', 'Done']);
    });

    it('maps a duplicate key to 400', async () => {
      const org = seedOrg();
      await seedProject(org.adminId, org.managerId);

      const response = await app.inject({
        method: 'POST',
        url: '/api/projects',
        headers: await authHeaders(org.adminId),
        payload: { name: 'Another', key: 'ACM', managerId: org.managerId },
      });

      expect(response.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(response)).toEqual({
        error: 'Bad Request',
        message: "Project key 'ACM' is already in use",
        statusCode: 400,
      });
    });

    it('answers 404 for a project of another company', async () => {
      const acme = seedOrg();
      const bluebell = seedOrg('Bluebell Ltd');
      const project = await seedProject(acme.adminId, acme.managerId);

      const response = await app.inject({
        method: 'GET',
        url: `/api/projects/${project.id}`,
        headers: await authHeaders(bluebell.superAdminId),
      });

      expect(response.statusCode).toBe(404);
      expect(parseJsonResponse<ErrorBody>(response)).toEqual({
        error: 'Not Found',
        message: 'Project not found',
        statusCode: 404,
      });
    });

    it('rejects a non-numeric project id', async () => {
      const org = seedOrg();

      const response = await app.inject({
        method: 'GET',
        url: '/api/projects/abc',
        headers: await authHeaders(org.adminId),
      });

      expect(response.statusCode).toBe(400);
      const body = parseJsonResponse<ErrorBody>(response);
      expect(body.error).toBe('Validation Error');
      expect(body.details).toEqual([{ path: 'projectId', message: 'Expected number, received nan' }]);
    });
  });

  describe('Work Items', () => {
    it('forbids a member from creating work items', async () => {
      const org = seedOrg();
      const project = await seedProject(org.adminId, org.managerId);

      const response = await app.inject({
        method: 'POST',
        url: `/api/projects/${project.id}/work-items`,
        headers: await authHeaders(org.memberId),
        payload: { title: 'Fix login' },
      });

      expect(response.statusCode).toBe(403);
      expect(parseJsonResponse<ErrorBody>(response)).toEqual({
        error: 'Forbidden',
        message: 'Members cannot create work items',
        statusCode: 403,
      });
    });

    it('reports body validation issues', async () => {
      const org = seedOrg();
      const project = await seedProject(org.adminId, org.managerId);

      const response = await app.inject({
        method: 'POST',
        url: `/api/projects/${project.id}/work-items`,
        headers: await authHeaders(org.managerId),
        payload: {},
      });

      expect(response.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(response)).toEqual({
        error: 'Validation Error',
        message: 'Request validation failed',
        statusCode: 400,
        details: [{ path: 'title', message: 'Required' }],
      });
    });
  });

  describe('Comments', () => {
    it('adds a comment and reads it back', async () => {
      const org = seedOrg();
      const project = await seedProject(org.adminId, org.managerId);
      const headers = await authHeaders(org.managerId);

      const itemResponse = await app.inject({
        method: 'POST',
        url: `/api/projects/${project.id}/work-items`,
        headers,
        payload: { title: 'Fix login' },
      });
      const item = parseJsonResponse<WorkItemDto>(itemResponse);
      const commentsUrl = `/api/projects/${project.id}/work-items/${item.id}/comments`;

      const createResponse = await app.inject({
        method: 'POST',
        url: commentsUrl,
        headers,
        payload: { content: 'Blocked on the auth provider' },
      });
      expect(createResponse.statusCode).toBe(201);
      expect(parseJsonResponse<CommentDto>(createResponse).authorName).toBe('Mia Manager');

      const listResponse = await app.inject({ method: 'GET', url: commentsUrl, headers });
      expect(listResponse.statusCode).toBe(200);
      expect(parseJsonResponse<CommentDto[]>(listResponse).map((c) => c.content)).toEqual([
        'Blocked on the auth provider',
      ]);
    });

    it('rejects a non-numeric comment id', async () => {
      const org = seedOrg();
      const project = await seedProject(org.adminId, org.managerId);

      const response = await app.inject({
        method: 'DELETE',
        url: `/api/projects/${project.id}/work-items/1/comments/latest`,
        headers: await authHeaders(org.adminId),
      });

      expect(response.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(response).details).toEqual([
        { path: 'commentId', message: 'Expected number, received nan' },
      ]);
    });
  });

  describe('Dashboard', () => {
    it('returns the project counts', async () => {
      const org = seedOrg();
      const project = await seedProject(org.adminId, org.managerId);

      const response = await app.inject({
        method: 'GET',
        url: `/api/projects/${project.id}/dashboard`,
        headers: await authHeaders(org.managerId),
      });

      expect(response.statusCode).toBe(200);
      const dashboard = parseJsonResponse<DashboardDto>(response);
      expect(dashboard.totalWorkItems).toBe(0);
      expect(dashboard.byStatus.map((s) => s.count)).toEqual([0, 0, 0, 0]);
    });
  });

  describe('Sprints', () => {
    it('returns both states when a transition is refused', async () => {
      const org = seedOrg();
      const project = await seedProject(org.adminId, org.managerId);
      const headers = await authHeaders(org.managerId);

      const createResponse = await app.inject({
        method: 'POST',
        url: `/api/projects/${project.id}/sprints`,
        headers,
        payload: { name: 'Sprint 1', startDate: '2026-03-16', endDate: '2026-03-29' },
      });
      expect(createResponse.statusCode).toBe(201);
      const sprint = parseJsonResponse<SprintDto>(createResponse);

      const startUrl = `/api/projects/${project.id}/sprints/${sprint.id}/start`;
      const first = await app.inject({ method: 'POST', url: startUrl, headers });
      expect(first.statusCode).toBe(200);

      const second = await app.inject({ method: 'POST', url: startUrl, headers });
      expect(second.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(second)).toEqual({
        error: 'Bad Request',
        message: 'Cannot move sprint from ACTIVE to ACTIVE',
        statusCode: 400,
        details: { currentStatus: 'ACTIVE', attemptedStatus: 'ACTIVE' },
      });
    });
  });
});
