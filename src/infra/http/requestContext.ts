import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import type { TokenClaims } from '../../application/auth/tokenService.js';

export type AuthContext = TokenClaims;

declare global {
  namespace Express {
    interface Request {
      /** Set by requestContext() for every request. */
      requestId?: string;
      /** Fires when the client goes away before the response is finished. */
      abortSignal?: AbortSignal;
      /** Set by authMiddleware() on authenticated routes. */
      auth?: AuthContext;
    }
  }
}

/**
 * Assign a request id and an AbortSignal tied to the client connection.
 */
export function requestContext() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const controller = new AbortController();

    req.requestId = req.header('x-request-id') ?? randomUUID();
    req.abortSignal = controller.signal;
    res.setHeader('X-Request-Id', req.requestId);

    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    next();
  };
}
