import type { PasswordHasher } from '../../domain/user/password.js';
import { Roles } from '../../domain/user/user.js';
import type { UserStore } from '../../application/users/userStore.js';
import type { Logger } from '../logger.js';

export interface SeedUser {
  name: string;
  email: string;
  role: string;
}

export const DEFAULT_SEED_USERS: readonly SeedUser[] = [
  { name: 'Admin User', email: 'admin@example.com', role: Roles.Admin },
  { name: 'Regular User', email: 'user@example.com', role: Roles.User },
];

export interface SeedResult {
  created: string[];
  skipped: string[];
}

/**
 * Inserts development accounts. Emails that already exist are left alone,
 * so running it twice is harmless.
 */
export class Seeder {
  constructor(
    private userStore: UserStore,
    private passwordHasher: PasswordHasher,
    private logger: Logger
  ) {}

  async seed(password: string, users: readonly SeedUser[] = DEFAULT_SEED_USERS): Promise<SeedResult> {
    this.logger.info('Running database seeders...');
    const result: SeedResult = { created: [], skipped: [] };

    for (const user of users) {
      const existing = await this.userStore.findByEmail(user.email);
      if (existing) {
        this.logger.info(`User ${user.email} already exists, skipping...`);
        result.skipped.push(user.email);
        continue;
      }

      await this.userStore.create({
        name: user.name,
        email: user.email,
        passwordHash: await this.passwordHasher.hash(password),
        role: user.role,
        isActive: true,
      });
      this.logger.info(`Created user: ${user.email}`);
      result.created.push(user.email);
    }

    this.logger.info('Database seeding completed!');
    return result;
  }
}
