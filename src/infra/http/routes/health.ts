import { Router } from 'express';
import type { Cache } from '../../cache/cache.js';
import { withTimeout } from '../../db/abort.js';
import { errorMeta, type Logger } from '../../logger.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { sendError, sendSuccess } from '../response.js';

/**
 * @openapi
 * /health:
 *   get:
 *     tags: [Health]
 *     summary: Liveness check
 *     responses:
 *       200: { description: Service is running }
 *
 * /ready:
 *   get:
 *     tags: [Health]
 *     summary: Readiness check (database required, cache optional)
 *     responses:
 *       200: { description: Service is ready }
 *       503:
 *         description: Database unavailable
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 */

export type CheckStatus = 'up' | 'down' | 'disabled';

export interface HealthRouteDeps {
  pingDatabase: () => Promise<void>;
  cache: Cache | null;
  logger: Logger;
  timeoutMs?: number;
}

export function createHealthRoutes({ pingDatabase, cache, logger, timeoutMs = 2000 }: HealthRouteDeps) {
  const router = Router();

  const probe = async (name: string, check: () => Promise<void>): Promise<CheckStatus> => {
    try {
      await withTimeout(check, timeoutMs);
      return 'up';
    } catch (error) {
      logger.warn(`Readiness probe failed: ${name}`, errorMeta(error));
      return 'down';
    }
  };

  // Health check endpoint (no auth required)
  router.get('/health', (_req, res) => {
    sendSuccess(res, 'Service is running', { status: 'healthy' });
  });

  router.get(
    '/ready',
    asyncHandler(async (_req, res) => {
      const [database, cacheStatus] = await Promise.all([
        probe('database', pingDatabase),
        cache ? probe('cache', () => cache.ping()) : Promise.resolve<CheckStatus>('disabled'),
      ]);
      const checks = { database, cache: cacheStatus };

      if (database !== 'up') {
        sendError(res, 503, 'Service is not ready', { status: 'not_ready', checks });
        return;
      }

      sendSuccess(res, 'Service is ready', { status: 'ready', checks });
    })
  );

  return router;
}
