import type { NextFunction, Request, Response } from 'express';
import type { Logger } from '../../logger.js';

/**
 * Log one line per finished request, levelled by status code.
 */
export function requestLogger(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = process.hrtime.bigint();

    res.on('finish', () => {
      const latencyMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      const meta = {
        requestId: req.requestId,
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        latencyMs: Math.round(latencyMs * 100) / 100,
        clientIp: req.ip,
        userId: req.auth?.userId,
      };

      if (res.statusCode >= 500) {
        logger.error('Server error', meta);
      } else if (res.statusCode >= 400) {
        logger.warn('Client error', meta);
      } else {
        logger.info('Request completed', meta);
      }
    });

    next();
  };
}
