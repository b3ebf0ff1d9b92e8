import { hash, verify } from 'argon2';

export interface PasswordHasher {
  hash(plainPassword: string): Promise<string>;
  verify(plainPassword: string, passwordHash: string): Promise<boolean>;
}

/**
 * Password hashing using Argon2 (salted, adaptive cost).
 * The salt and parameters are embedded in the digest.
 */
export class Argon2PasswordHasher implements PasswordHasher {
  /**
   * Hash a plain text password.
   */
  async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword);
  }

  /**
   * Verify a plain password against a hash. A malformed hash verifies as false.
   */
  async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}
