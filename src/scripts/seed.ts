import dotenv from 'dotenv';
import { loadConfig } from '../infra/config.js';
import { createLogger, errorMeta } from '../infra/logger.js';
import { createPool } from '../infra/db/pool.js';
import { UserRepo } from '../infra/db/userRepo.js';
import { Seeder } from '../infra/db/seeder.js';
import { Argon2PasswordHasher } from '../domain/user/password.js';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({
    level: config.log.level,
    service: `${config.app.name}-seed`,
    env: config.app.env,
  });
  const pool = createPool(config.database, logger);

  try {
    const seeder = new Seeder(new UserRepo(pool), new Argon2PasswordHasher(), logger);
    await seeder.seed(config.seed.password);
  } catch (error) {
    logger.error('Failed to seed database', errorMeta(error));
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error('Seeding failed:', error);
  process.exitCode = 1;
});
