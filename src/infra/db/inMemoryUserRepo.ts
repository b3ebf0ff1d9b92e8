import type { NewUser, User } from '../../domain/user/user.js';
import type { UserListResult, UserStore } from '../../application/users/userStore.js';
import { ConflictError, NotFoundError } from '../../application/errors.js';
import { withAbort } from './abort.js';

/**
 * In-process UserStore with the same semantics as UserRepo, including soft
 * delete and email uniqueness among live rows. Used by tests.
 */
export class InMemoryUserRepo implements UserStore {
  private readonly rows = new Map<number, User>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  create(user: NewUser, signal?: AbortSignal): Promise<User> {
    return withAbort(async () => {
      if (this.findLiveByEmail(user.email)) {
        throw new ConflictError('email already registered');
      }

      const timestamp = this.now();
      const created: User = {
        ...user,
        id: this.nextId++,
        createdAt: timestamp,
        updatedAt: timestamp,
        deletedAt: null,
      };
      this.rows.set(created.id, created);
      return created;
    }, signal);
  }

  findById(id: number, signal?: AbortSignal): Promise<User | null> {
    return withAbort(async () => {
      const row = this.rows.get(id);
      return row && row.deletedAt === null ? row : null;
    }, signal);
  }

  findByEmail(email: string, signal?: AbortSignal): Promise<User | null> {
    return withAbort(async () => this.findLiveByEmail(email) ?? null, signal);
  }

  list(offset: number, limit: number, signal?: AbortSignal): Promise<UserListResult> {
    return withAbort(async () => {
      const live = this.liveRows();
      return {
        users: live.slice(offset, offset + limit),
        total: live.length,
      };
    }, signal);
  }

  update(user: User, signal?: AbortSignal): Promise<User> {
    return withAbort(async () => {
      const existing = this.rows.get(user.id);
      if (!existing || existing.deletedAt !== null) {
        throw new NotFoundError('user not found');
      }

      const owner = this.findLiveByEmail(user.email);
      if (owner && owner.id !== user.id) {
        throw new ConflictError('email already taken');
      }

      const updated: User = {
        ...user,
        createdAt: existing.createdAt,
        updatedAt: this.now(),
        deletedAt: null,
      };
      this.rows.set(updated.id, updated);
      return updated;
    }, signal);
  }

  delete(id: number, signal?: AbortSignal): Promise<void> {
    return withAbort(async () => {
      const existing = this.rows.get(id);
      if (!existing || existing.deletedAt !== null) {
        throw new NotFoundError('user not found');
      }

      const timestamp = this.now();
      this.rows.set(id, { ...existing, updatedAt: timestamp, deletedAt: timestamp });
    }, signal);
  }

  /**
   * Every stored row, soft-deleted ones included, in insertion order.
   */
  allRows(): User[] {
    return [...this.rows.values()];
  }

  private liveRows(): User[] {
    return this.allRows().filter((row) => row.deletedAt === null);
  }

  private findLiveByEmail(email: string): User | undefined {
    return this.liveRows().find((row) => row.email === email);
  }
}
