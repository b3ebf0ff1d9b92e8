import type { NewUser, User } from '../../domain/user/user.js';

export interface UserListResult {
  users: User[];
  total: number;
}

/**
 * Persistence contract for users. Reads never return soft-deleted rows.
 *
 * - create: ConflictError when the email is taken by a non-deleted row
 * - update: NotFoundError when the row is gone, ConflictError on email collision
 * - delete: NotFoundError when the row is gone or already deleted
 *
 * Every call accepts the request's AbortSignal and rejects once it fires.
 */
export interface UserStore {
  create(user: NewUser, signal?: AbortSignal): Promise<User>;
  findById(id: number, signal?: AbortSignal): Promise<User | null>;
  findByEmail(email: string, signal?: AbortSignal): Promise<User | null>;
  list(offset: number, limit: number, signal?: AbortSignal): Promise<UserListResult>;
  update(user: User, signal?: AbortSignal): Promise<User>;
  delete(id: number, signal?: AbortSignal): Promise<void>;
}
