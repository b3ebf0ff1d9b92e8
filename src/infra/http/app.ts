import express from 'express';
import cors from 'cors';
import type { PasswordHasher } from '../../domain/user/password.js';
import type { TokenService } from '../../application/auth/tokenService.js';
import type { UserStore } from '../../application/users/userStore.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import { LoginUseCase } from '../../application/auth/login.js';
import { GetUserUseCase } from '../../application/users/getUser.js';
import { ListUsersUseCase } from '../../application/users/listUsers.js';
import { UpdateUserUseCase } from '../../application/users/updateUser.js';
import { DeleteUserUseCase } from '../../application/users/deleteUser.js';
import { SetUserStatusUseCase } from '../../application/users/setUserStatus.js';
import { NotFoundError } from '../../application/errors.js';
import type { Cache } from '../cache/cache.js';
import type { Logger } from '../logger.js';
import { createAuthRoutes } from './routes/auth.js';
import { createUserRoutes } from './routes/users.js';
import { createAdminRoutes } from './routes/admin.js';
import { createHealthRoutes } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { authMiddleware } from './middleware/auth.js';
import { errorHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import {
  createApiRateLimiter,
  createLoginRateLimiter,
  type RateLimitOptions,
} from './middleware/rateLimit.js';
import { requestContext } from './requestContext.js';

export interface AppDependencies {
  logger: Logger;
  userStore: UserStore;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  cache: Cache | null;
  pingDatabase: () => Promise<void>;
  rateLimit: RateLimitOptions;
  corsOrigin: true | string[];
}

export const API_PREFIX = '/api/v1';

/**
 * Wire use cases to routers. Owns no connections; the caller builds and
 * closes the stores.
 */
export function createApp(deps: AppDependencies): express.Express {
  const { logger, userStore, passwordHasher, tokenService } = deps;

  const listUsersUseCase = new ListUsersUseCase(userStore);
  const authenticate = authMiddleware(tokenService);

  const app = express();

  // Middleware
  app.use(requestContext());
  app.use(requestLogger(logger));
  app.use(
    cors({
      origin: deps.corsOrigin,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
      exposedHeaders: ['X-Request-Id'],
    })
  );
  app.use(express.json());
  app.use(createApiRateLimiter(deps.rateLimit));

  app.use(
    createHealthRoutes({
      pingDatabase: deps.pingDatabase,
      cache: deps.cache,
      logger,
    })
  );

  // Swagger/OpenAPI docs
  app.use(createSwaggerRoutes());

  app.use(
    `${API_PREFIX}/auth`,
    createAuthRoutes({
      registerUseCase: new RegisterUseCase(userStore, passwordHasher),
      loginUseCase: new LoginUseCase(userStore, passwordHasher, tokenService),
      loginRateLimiter: createLoginRateLimiter(deps.rateLimit),
    })
  );

  app.use(
    `${API_PREFIX}/users`,
    createUserRoutes({
      authenticate,
      getUserUseCase: new GetUserUseCase(userStore),
      listUsersUseCase,
      updateUserUseCase: new UpdateUserUseCase(userStore, passwordHasher),
      deleteUserUseCase: new DeleteUserUseCase(userStore),
    })
  );

  app.use(
    `${API_PREFIX}/admin`,
    createAdminRoutes({
      authenticate,
      listUsersUseCase,
      setUserStatusUseCase: new SetUserStatusUseCase(userStore),
    })
  );

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  });

  // Error handler (must be last)
  app.use(errorHandler(logger));

  return app;
}
