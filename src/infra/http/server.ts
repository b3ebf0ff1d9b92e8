import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { createLogger, errorMeta } from '../logger.js';
import { createPool, pingDatabase } from '../db/pool.js';
import { UserRepo } from '../db/userRepo.js';
import { connectCache } from '../cache/redisCache.js';
import { Argon2PasswordHasher } from '../../domain/user/password.js';
import { JwtTokenService } from '../../application/auth/tokenService.js';
import { createApp } from './app.js';

dotenv.config();

const SHUTDOWN_TIMEOUT_MS = 10_000;

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({
    level: config.log.level,
    service: config.app.name,
    env: config.app.env,
  });
  logger.info('Starting application...');

  const pool = createPool(config.database, logger);
  const cache = await connectCache(config.redis, logger);

  const app = createApp({
    logger,
    userStore: new UserRepo(pool),
    passwordHasher: new Argon2PasswordHasher(),
    tokenService: new JwtTokenService({
      secret: config.jwt.secret,
      expiresInSeconds: Math.round(config.jwt.expireHours * 3600),
    }),
    cache,
    pingDatabase: () => pingDatabase(pool),
    rateLimit: config.rateLimit,
    corsOrigin: config.cors.origin,
  });

  const server = app.listen(config.app.port, () => {
    logger.info(`Server running on http://localhost:${config.app.port}`);
    logger.info(`Swagger documentation: http://localhost:${config.app.port}/docs`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down server...`);

    const forceExit = setTimeout(() => {
      logger.error('Server forced to shutdown');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    server.close((closeError) => {
      if (closeError) {
        logger.error('Error while closing HTTP server', errorMeta(closeError));
      }

      Promise.all([pool.end(), cache?.close()])
        .then(() => {
          logger.info('Server exited properly');
        })
        .catch((error: unknown) => {
          logger.error('Error while closing connections', errorMeta(error));
          process.exitCode = 1;
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  // Config or startup failed before the logger existed
  console.error('Failed to start server:', error);
  process.exit(1);
});
