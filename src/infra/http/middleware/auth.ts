import type { NextFunction, Request, Response } from 'express';
import type { TokenService } from '../../../application/auth/tokenService.js';
import { ForbiddenError, UnauthorizedError } from '../../../application/errors.js';
import type { AuthContext } from '../requestContext.js';

const BEARER_PREFIX = 'Bearer ';

/**
 * Require a valid bearer token. On success the decoded claims are attached as
 * `req.auth`; on failure the error handler answers 401 and no handler runs.
 */
export function authMiddleware(tokenService: TokenService) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
      next(new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }

    const token = authHeader.substring(BEARER_PREFIX.length).trim();

    try {
      req.auth = tokenService.verify(token);
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Require the authenticated role to equal `role`. Mount after authMiddleware.
 */
export function requireRole(role: string) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.auth) {
      next(new UnauthorizedError('Authentication required'));
      return;
    }
    if (req.auth.role !== role) {
      next(new ForbiddenError('Insufficient permissions'));
      return;
    }
    next();
  };
}

/**
 * Read the auth context inside a handler mounted behind authMiddleware.
 */
export function requireAuth(req: Request): AuthContext {
  if (!req.auth) {
    throw new UnauthorizedError('Authentication required');
  }
  return req.auth;
}
