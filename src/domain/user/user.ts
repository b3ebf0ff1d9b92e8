/**
 * User domain entity.
 * `deletedAt` is set by soft delete; rows with a non-null value are invisible
 * to every read path.
 */
export interface User {
  readonly id: number;
  readonly name: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly role: string;
  readonly isActive: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly deletedAt: Date | null;
}

export const Roles = {
  Admin: 'admin',
  User: 'user',
} as const;

export type Role = (typeof Roles)[keyof typeof Roles];

/**
 * Fields supplied when inserting a user. Identity and timestamps come from the store.
 */
export interface NewUser {
  name: string;
  email: string;
  passwordHash: string;
  role: string;
  isActive: boolean;
}
