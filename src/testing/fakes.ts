import type { PasswordHasher } from '../domain/user/password.js';
import { createLogger, type Logger } from '../infra/logger.js';

/**
 * Reversible stand-in for Argon2 so use case tests can assert on stored hashes.
 */
export class FakePasswordHasher implements PasswordHasher {
  hashCalls = 0;

  hash(plainPassword: string): Promise<string> {
    this.hashCalls++;
    return Promise.resolve(`hashed:${plainPassword}`);
  }

  verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    return Promise.resolve(passwordHash === `hashed:${plainPassword}`);
  }
}

export function silentLogger(): Logger {
  return createLogger({ level: 'error', service: 'test', env: 'test', silent: true });
}
