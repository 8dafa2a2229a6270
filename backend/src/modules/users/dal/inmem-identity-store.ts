/**
 * backend/src/modules/users/dal/inmem-identity-store.ts
 *
 * WHY:
 * - Process-local IdentityStore. Data lives until the process exits.
 *
 * CONCURRENCY:
 * - A single RwLock guards the map. Reads take it shared, create() takes it
 *   exclusive for the whole scan-then-insert sequence.
 * - Map iteration order is insertion order, which gives list() a stable ordering.
 */

import { randomUUID } from 'node:crypto';

import { RwLock } from '../../../shared/concurrency/rw-lock';
import type { UserId, UserRecord } from '../user.types';
import type { CreateUserRecordResult, IdentityStore, UserRecordPage } from './identity-store';

function copyRecord(record: UserRecord): UserRecord {
  return {
    id: record.id,
    email: record.email,
    passwordHash: record.passwordHash,
    createdAt: new Date(record.createdAt.getTime()),
    updatedAt: new Date(record.updatedAt.getTime()),
  };
}

function assertPositiveInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

export class InMemIdentityStore implements IdentityStore {
  private readonly users = new Map<UserId, UserRecord>();
  private readonly lock = new RwLock();

  constructor(
    private readonly opts: {
      initialRecords?: readonly UserRecord[];
      generateId?: () => UserId;
      now?: () => Date;
    } = {},
  ) {
    for (const record of opts.initialRecords ?? []) {
      if (this.users.has(record.id)) {
        throw new Error(`Duplicate id in initial records: ${record.id}`);
      }
      if (this.scanByEmail(record.email)) {
        throw new Error(`Duplicate email in initial records: ${record.email}`);
      }
      this.users.set(record.id, copyRecord(record));
    }
  }

  async create(email: string, passwordHash: string): Promise<CreateUserRecordResult> {
    return this.lock.withWrite((): CreateUserRecordResult => {
      if (this.scanByEmail(email)) {
        return { status: 'EMAIL_TAKEN' };
      }

      const now = this.opts.now?.() ?? new Date();
      const record: UserRecord = {
        id: this.opts.generateId?.() ?? randomUUID(),
        email,
        passwordHash,
        createdAt: now,
        updatedAt: new Date(now.getTime()),
      };

      this.users.set(record.id, record);
      return { status: 'CREATED', record: copyRecord(record) };
    });
  }

  async findById(id: UserId): Promise<UserRecord | undefined> {
    return this.lock.withRead(() => {
      const record = this.users.get(id);
      return record ? copyRecord(record) : undefined;
    });
  }

  async findByEmail(email: string): Promise<UserRecord | undefined> {
    return this.lock.withRead(() => {
      const record = this.scanByEmail(email);
      return record ? copyRecord(record) : undefined;
    });
  }

  async existsByEmail(email: string): Promise<boolean> {
    return this.lock.withRead(() => this.scanByEmail(email) !== undefined);
  }

  async list(page: number, limit: number): Promise<UserRecordPage> {
    assertPositiveInt('page', page);
    assertPositiveInt('limit', limit);

    return this.lock.withRead(() => {
      const snapshot = Array.from(this.users.values());
      const total = snapshot.length;
      const offset = (page - 1) * limit;

      if (offset >= total) {
        return { records: [], total };
      }

      const end = Math.min(offset + limit, total);
      return { records: snapshot.slice(offset, end).map(copyRecord), total };
    });
  }

  async ping(): Promise<boolean> {
    return this.lock.withRead(() => true);
  }

  // Caller must hold the lock.
  private scanByEmail(email: string): UserRecord | undefined {
    for (const record of this.users.values()) {
      if (record.email === email) return record;
    }
    return undefined;
  }
}
