import type express from 'express';
import { createApp } from '../infra/http/app.js';
import { InMemoryUserRepo } from '../infra/db/inMemoryUserRepo.js';
import { JwtTokenService } from '../application/auth/tokenService.js';
import type { RateLimitOptions } from '../infra/http/middleware/rateLimit.js';
import type { Cache } from '../infra/cache/cache.js';
import type { Role } from '../domain/user/user.js';
import { FakePasswordHasher, silentLogger } from './fakes.js';

export const TEST_SECRET = 'test-secret';

export interface TestAppOptions {
  cache?: Cache | null;
  pingDatabase?: () => Promise<void>;
  rateLimit?: Partial<RateLimitOptions>;
  corsOrigin?: true | string[];
}

export interface TestApp {
  app: express.Express;
  userStore: InMemoryUserRepo;
  tokenService: JwtTokenService;
  /** Insert a user directly and return a bearer header for it. */
  seedUser(email: string, role?: Role, password?: string): Promise<{ id: number; authHeader: string }>;
}

export function buildTestApp(options: TestAppOptions = {}): TestApp {
  const userStore = new InMemoryUserRepo();
  const passwordHasher = new FakePasswordHasher();
  const tokenService = new JwtTokenService({ secret: TEST_SECRET, expiresInSeconds: 3600 });

  const app = createApp({
    logger: silentLogger(),
    userStore,
    passwordHasher,
    tokenService,
    cache: options.cache ?? null,
    pingDatabase: options.pingDatabase ?? (() => Promise.resolve()),
    rateLimit: { windowMs: 60_000, max: 1000, loginMax: 1000, ...options.rateLimit },
    corsOrigin: options.corsOrigin ?? true,
  });

  const seedUser = async (email: string, role: Role = 'user', password = 'secret1') => {
    const user = await userStore.create({
      name: email.split('@')[0],
      email,
      passwordHash: await passwordHasher.hash(password),
      role,
      isActive: true,
    });
    return { id: user.id, authHeader: `Bearer ${tokenService.issue(user.id, user.email, user.role)}` };
  };

  return { app, userStore, tokenService, seedUser };
}
