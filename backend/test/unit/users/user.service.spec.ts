import { describe, it, expect, vi } from 'vitest';
import { InMemIdentityStore } from '../../../src/modules/users/dal/inmem-identity-store';
import type { IdentityStore } from '../../../src/modules/users/dal/identity-store';
import { UserService } from '../../../src/modules/users/user.service';
import { AppError } from '../../../src/shared/http/errors';
import { PlaceholderPasswordHasher } from '../../../src/shared/security/placeholder-password-hasher';
import { createMemoryLogger } from '../../helpers/memory-logger';

function buildService(store: IdentityStore = new InMemIdentityStore()) {
  const logger = createMemoryLogger();
  const service = new UserService({
    store,
    passwordHasher: new PlaceholderPasswordHasher(),
    logger,
  });
  return { service, store, logger };
}

async function expectAppError(promise: Promise<unknown>, expected: { code: string; status: number; message: string }) {
  const err = await promise.then(
    () => null,
    (e: unknown) => e,
  );

  expect(err).toBeInstanceOf(AppError);
  if (!(err instanceof AppError)) return;
  expect({ code: err.code, status: err.status, message: err.message }).toEqual(expected);
}

function brokenStore(): IdentityStore {
  const fail = () => Promise.reject(new Error('store offline'));
  return {
    create: fail,
    findById: fail,
    findByEmail: fail,
    existsByEmail: fail,
    list: fail,
    ping: fail,
  };
}

describe('UserService', () => {
  describe('createUser', () => {
    it('stores the hashed password and returns a projection without it', async () => {
      const store = new InMemIdentityStore({
        generateId: () => 'usr-1',
        now: () => new Date('2026-03-01T10:00:00.000Z'),
      });
      const { service } = buildService(store);

      const user = await service.createUser({
        email: 'a@example.com',
        password: 'secret1',
        correlationId: 'corr-1',
      });

      expect(user).toEqual({
        id: 'usr-1',
        email: 'a@example.com',
        created_at: '2026-03-01T10:00:00.000Z',
        updated_at: '2026-03-01T10:00:00.000Z',
      });
      expect((await store.findById('usr-1'))?.passwordHash).toBe('hashed_secret1');
    });

    it('maps a taken email to BAD_REQUEST', async () => {
      const { service } = buildService();
      const params = { email: 'a@example.com', password: 'secret1', correlationId: 'corr-1' };

      await service.createUser(params);

      await expectAppError(service.createUser(params), {
        code: 'BAD_REQUEST',
        status: 400,
        message: 'User with this email already exists',
      });
    });

    it('never lets two concurrent creates for one email both succeed', async () => {
      const { service } = buildService();
      const params = { email: 'race@example.com', password: 'secret1', correlationId: 'corr-1' };

      const results = await Promise.allSettled([service.createUser(params), service.createUser(params)]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      expect(results.filter((r) => r.status === 'rejected')).toHaveLength(1);
    });

    it('logs the outcome without the password', async () => {
      const { service, logger } = buildService(new InMemIdentityStore({ generateId: () => 'usr-1' }));

      await service.createUser({ email: 'a@example.com', password: 'secret1', correlationId: 'corr-7' });

      expect(logger.find('users.create.success')).toEqual([
        {
          level: 'info',
          msg: 'users.create.success',
          meta: { flow: 'users.create', correlationId: 'corr-7', userId: 'usr-1' },
        },
      ]);
    });

    it('wraps store faults as INTERNAL_ERROR', async () => {
      const { service } = buildService(brokenStore());

      await expectAppError(
        service.createUser({ email: 'a@example.com', password: 'secret1', correlationId: 'c' }),
        { code: 'INTERNAL_ERROR', status: 500, message: 'Failed to create user' },
      );
    });
  });

  describe('getUserById', () => {
    it('returns undefined for an unknown id', async () => {
      const { service } = buildService();
      expect(await service.getUserById('missing')).toBeUndefined();
    });

    it('wraps store faults', async () => {
      const { service } = buildService(brokenStore());
      await expectAppError(service.getUserById('x'), {
        code: 'INTERNAL_ERROR',
        status: 500,
        message: 'Failed to retrieve user',
      });
    });
  });

  describe('listUsers', () => {
    it('applies default pagination', async () => {
      const store = new InMemIdentityStore();
      const list = vi.spyOn(store, 'list');
      const { service } = buildService(store);

      const result = await service.listUsers({});

      expect(list).toHaveBeenCalledWith(1, 10);
      expect(result).toEqual({ users: [], page: 1, limit: 10, total: 0 });
    });

    it('clamps out-of-range values before reaching the store', async () => {
      const store = new InMemIdentityStore();
      const list = vi.spyOn(store, 'list');
      const { service } = buildService(store);

      const result = await service.listUsers({ page: -2, limit: 1000 });

      expect(list).toHaveBeenCalledWith(1, 100);
      expect(result.page).toBe(1);
      expect(result.limit).toBe(100);
    });
  });

  describe('placeholders', () => {
    it('update on an existing user is refused and leaves the store untouched', async () => {
      const store = new InMemIdentityStore({ generateId: () => 'usr-1' });
      const { service } = buildService(store);
      await service.createUser({ email: 'a@example.com', password: 'secret1', correlationId: 'c' });
      const before = await store.findById('usr-1');

      await expectAppError(service.updateUser('usr-1'), {
        code: 'BAD_REQUEST',
        status: 400,
        message: 'Update functionality not implemented yet',
      });
      expect(await store.findById('usr-1')).toEqual(before);
    });

    it('delete on an existing user is refused', async () => {
      const store = new InMemIdentityStore({ generateId: () => 'usr-1' });
      const { service } = buildService(store);
      await service.createUser({ email: 'a@example.com', password: 'secret1', correlationId: 'c' });

      await expectAppError(service.deleteUser('usr-1'), {
        code: 'BAD_REQUEST',
        status: 400,
        message: 'Delete functionality not implemented yet',
      });
      expect((await store.list(1, 10)).total).toBe(1);
    });

    it('update and delete on a missing user are NOT_FOUND', async () => {
      const { service } = buildService();
      const notFound = { code: 'NOT_FOUND', status: 404, message: 'User not found' };

      await expectAppError(service.updateUser('missing'), notFound);
      await expectAppError(service.deleteUser('missing'), notFound);
    });
  });
});
