import type pg from 'pg';
import type { NewUser, User } from '../../domain/user/user.js';
import type { UserListResult, UserStore } from '../../application/users/userStore.js';
import { ConflictError, NotFoundError } from '../../application/errors.js';
import { withAbort } from './abort.js';

interface UserRow {
  id: number;
  name: string;
  email: string;
  password_hash: string;
  role: string;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
}

const USER_COLUMNS =
  'id, name, email, password_hash, role, is_active, created_at, updated_at, deleted_at';

const UNIQUE_VIOLATION = '23505';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    passwordHash: row.password_hash,
    role: row.role,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

/**
 * PostgreSQL user store. Every read filters `deleted_at IS NULL`; email
 * uniqueness among live rows is enforced by a partial unique index.
 */
export class UserRepo implements UserStore {
  constructor(private pool: pg.Pool) {}

  async create(user: NewUser, signal?: AbortSignal): Promise<User> {
    try {
      const result = await withAbort(
        () =>
          this.pool.query<UserRow>(
            `INSERT INTO users (name, email, password_hash, role, is_active)
             VALUES ($1, $2, $3, $4, $5)
             RETURNING ${USER_COLUMNS}`,
            [user.name, user.email, user.passwordHash, user.role, user.isActive]
          ),
        signal
      );
      return toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('email already registered');
      }
      throw error;
    }
  }

  async findById(id: number, signal?: AbortSignal): Promise<User | null> {
    const result = await withAbort(
      () =>
        this.pool.query<UserRow>(
          `SELECT ${USER_COLUMNS} FROM users WHERE id = $1 AND deleted_at IS NULL`,
          [id]
        ),
      signal
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async findByEmail(email: string, signal?: AbortSignal): Promise<User | null> {
    const result = await withAbort(
      () =>
        this.pool.query<UserRow>(
          `SELECT ${USER_COLUMNS} FROM users WHERE email = $1 AND deleted_at IS NULL`,
          [email]
        ),
      signal
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async list(offset: number, limit: number, signal?: AbortSignal): Promise<UserListResult> {
    const countResult = await withAbort(
      () =>
        this.pool.query<{ total: string }>(
          'SELECT COUNT(*) AS total FROM users WHERE deleted_at IS NULL'
        ),
      signal
    );

    const result = await withAbort(
      () =>
        this.pool.query<UserRow>(
          `SELECT ${USER_COLUMNS} FROM users
           WHERE deleted_at IS NULL
           ORDER BY id ASC
           LIMIT $1 OFFSET $2`,
          [limit, offset]
        ),
      signal
    );

    return {
      users: result.rows.map(toUser),
      // COUNT(*) is bigint, which pg hands back as a string
      total: parseInt(countResult.rows[0].total, 10),
    };
  }

  async update(user: User, signal?: AbortSignal): Promise<User> {
    let result: pg.QueryResult<UserRow>;
    try {
      result = await withAbort(
        () =>
          this.pool.query<UserRow>(
            `UPDATE users
             SET name = $2, email = $3, password_hash = $4, role = $5, is_active = $6,
                 updated_at = NOW()
             WHERE id = $1 AND deleted_at IS NULL
             RETURNING ${USER_COLUMNS}`,
            [user.id, user.name, user.email, user.passwordHash, user.role, user.isActive]
          ),
        signal
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('email already taken');
      }
      throw error;
    }

    if (result.rows.length === 0) {
      throw new NotFoundError('user not found');
    }
    return toUser(result.rows[0]);
  }

  async delete(id: number, signal?: AbortSignal): Promise<void> {
    const result = await withAbort(
      () =>
        this.pool.query(
          `UPDATE users SET deleted_at = NOW(), updated_at = NOW()
           WHERE id = $1 AND deleted_at IS NULL`,
          [id]
        ),
      signal
    );

    if (result.rowCount === 0) {
      throw new NotFoundError('user not found');
    }
  }
}
