import { describe, it, expect } from 'vitest';
import { randomUUID } from 'node:crypto';
import { buildTestApp, readEnvelope } from '../helpers/build-test-app';
import type { UserResponse } from '../../src/modules/users';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

type TestApp = Awaited<ReturnType<typeof buildTestApp>>['app'];

async function createUser(app: TestApp, email: string, password = 'secret1') {
  return app.inject({
    method: 'POST',
    url: '/api/users',
    payload: { email, password },
  });
}

describe('POST /api/users', () => {
  it('creates, rejects a duplicate, lists and 404s (end-to-end scenario)', async () => {
    const { app, close } = await buildTestApp();

    try {
      const created = await createUser(app, 'a@example.com');
      expect(created.statusCode).toBe(200);

      const body = readEnvelope<UserResponse>(created);
      expect(body.success).toBe(true);
      expect(body.data?.email).toBe('a@example.com');
      expect(body.data?.id).toMatch(UUID_RE);

      const duplicate = await createUser(app, 'a@example.com');
      expect(duplicate.statusCode).toBe(400);
      expect(readEnvelope(duplicate)).toEqual({
        success: false,
        error: { code: 'BAD_REQUEST', message: 'User with this email already exists' },
      });

      const list = await app.inject({ method: 'GET', url: '/api/users?limit=1&page=1' });
      expect(list.statusCode).toBe(200);
      const listBody = readEnvelope<UserResponse[]>(list);
      expect(listBody.meta?.total).toBe(1);
      expect(listBody.data).toHaveLength(1);

      const missing = await app.inject({ method: 'GET', url: `/api/users/${randomUUID()}` });
      expect(missing.statusCode).toBe(404);
      expect(readEnvelope(missing).error?.code).toBe('NOT_FOUND');
    } finally {
      await close();
    }
  });

  it('never returns the password or its digest', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await createUser(app, 'b@example.com');
      const data = readEnvelope<Record<string, unknown>>(res).data ?? {};

      expect(Object.keys(data)).toEqual(['id', 'email', 'created_at', 'updated_at']);
      expect(res.body).not.toContain('secret1');
    } finally {
      await close();
    }
  });

  it('returns VALIDATION_ERROR with per-field details', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await createUser(app, 'invalid-email', '123');

      expect(res.statusCode).toBe(400);
      expect(readEnvelope(res)).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          details: {
            validation_errors: [
              'email: Invalid email format',
              'password: Password must be at least 6 characters',
            ],
          },
        },
      });
    } finally {
      await close();
    }
  });

  it('returns VALIDATION_ERROR when the body is missing', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'POST', url: '/api/users' });

      expect(res.statusCode).toBe(400);
      expect(readEnvelope(res).error?.code).toBe('VALIDATION_ERROR');
    } finally {
      await close();
    }
  });

  it('returns BAD_REQUEST for malformed JSON', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/api/users',
        headers: { 'content-type': 'application/json' },
        payload: '{"email":',
      });

      expect(res.statusCode).toBe(400);
      expect(readEnvelope(res).error?.code).toBe('BAD_REQUEST');
    } finally {
      await close();
    }
  });

  it('lets exactly one of many concurrent same-email requests succeed', async () => {
    const { app, close } = await buildTestApp();

    try {
      const responses = await Promise.all(
        Array.from({ length: 10 }, () => createUser(app, 'race@example.com')),
      );

      expect(responses.filter((r) => r.statusCode === 200)).toHaveLength(1);
      expect(responses.filter((r) => r.statusCode === 400)).toHaveLength(9);

      const list = await app.inject({ method: 'GET', url: '/api/users' });
      expect(readEnvelope(list).meta?.total).toBe(1);
    } finally {
      await close();
    }
  });
});

describe('GET /api/users', () => {
  it('returns an empty first page with default meta', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/api/users' });

      expect(res.statusCode).toBe(200);
      expect(readEnvelope(res)).toEqual({
        success: true,
        data: [],
        meta: { page: 1, limit: 10, total: 0, total_pages: 0 },
      });
    } finally {
      await close();
    }
  });

  it('paginates in creation order', async () => {
    const { app, close } = await buildTestApp();

    try {
      for (const email of ['u1@example.com', 'u2@example.com', 'u3@example.com']) {
        await createUser(app, email);
      }

      const res = await app.inject({ method: 'GET', url: '/api/users?page=2&limit=2' });
      const body = readEnvelope<UserResponse[]>(res);

      expect(body.data?.map((u) => u.email)).toEqual(['u3@example.com']);
      expect(body.meta).toEqual({ page: 2, limit: 2, total: 3, total_pages: 2 });

      const beyond = await app.inject({ method: 'GET', url: '/api/users?page=9&limit=2' });
      expect(readEnvelope(beyond)).toEqual({
        success: true,
        data: [],
        meta: { page: 9, limit: 2, total: 3, total_pages: 2 },
      });
    } finally {
      await close();
    }
  });

  it('clamps limit and page', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/api/users?page=0&limit=500' });

      expect(res.statusCode).toBe(200);
      expect(readEnvelope(res).meta).toEqual({ page: 1, limit: 100, total: 0, total_pages: 0 });
    } finally {
      await close();
    }
  });

  it('rejects non-numeric pagination', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/api/users?page=abc' });

      expect(res.statusCode).toBe(400);
      expect(readEnvelope(res).error?.code).toBe('VALIDATION_ERROR');
    } finally {
      await close();
    }
  });
});

describe('GET /api/users/:id', () => {
  it('returns the created user', async () => {
    const { app, close } = await buildTestApp();

    try {
      const created = readEnvelope<UserResponse>(await createUser(app, 'c@example.com')).data;
      const res = await app.inject({ method: 'GET', url: `/api/users/${created?.id}` });

      expect(res.statusCode).toBe(200);
      expect(readEnvelope(res)).toEqual({ success: true, data: created });
    } finally {
      await close();
    }
  });

  it('rejects an id that is not a UUID', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/api/users/not-a-uuid' });

      expect(res.statusCode).toBe(400);
      expect(readEnvelope(res).error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: { validation_errors: ['id: Invalid user id'] },
      });
    } finally {
      await close();
    }
  });
});

describe('PUT / DELETE /api/users/:id (placeholders)', () => {
  it('refuses update and delete of an existing user without changing it', async () => {
    const { app, close } = await buildTestApp();

    try {
      const created = readEnvelope<UserResponse>(await createUser(app, 'd@example.com')).data;
      const url = `/api/users/${created?.id}`;

      const put = await app.inject({ method: 'PUT', url, payload: { email: 'new@example.com' } });
      expect(put.statusCode).toBe(400);
      expect(readEnvelope(put).error).toEqual({
        code: 'BAD_REQUEST',
        message: 'Update functionality not implemented yet',
      });

      const del = await app.inject({ method: 'DELETE', url });
      expect(del.statusCode).toBe(400);
      expect(readEnvelope(del).error).toEqual({
        code: 'BAD_REQUEST',
        message: 'Delete functionality not implemented yet',
      });

      const after = await app.inject({ method: 'GET', url });
      expect(readEnvelope(after).data).toEqual(created);
    } finally {
      await close();
    }
  });

  it('answers 404 for a missing user', async () => {
    const { app, close } = await buildTestApp();

    try {
      const url = `/api/users/${randomUUID()}`;

      const put = await app.inject({ method: 'PUT', url, payload: {} });
      const del = await app.inject({ method: 'DELETE', url });

      expect(put.statusCode).toBe(404);
      expect(del.statusCode).toBe(404);
      expect(readEnvelope(put).error).toEqual({ code: 'NOT_FOUND', message: 'User not found' });
      expect(readEnvelope(del).error).toEqual({ code: 'NOT_FOUND', message: 'User not found' });
    } finally {
      await close();
    }
  });
});

describe('unknown routes', () => {
  it('answer 404 in the envelope', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/api/nope' });

      expect(res.statusCode).toBe(404);
      expect(readEnvelope(res)).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Route GET /api/nope not found' },
      });
    } finally {
      await close();
    }
  });
});
