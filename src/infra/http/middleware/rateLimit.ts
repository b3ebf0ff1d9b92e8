import rateLimit from 'express-rate-limit';
import type { ApiResponse } from '../response.js';

export interface RateLimitOptions {
  windowMs: number;
  max: number;
  loginMax: number;
}

function limitedResponse(message: string): ApiResponse {
  return { success: false, message };
}

/**
 * General API rate limiter, keyed by IP.
 * Uses in-memory store (resets on server restart).
 */
export function createApiRateLimiter(options: RateLimitOptions) {
  return rateLimit({
    windowMs: options.windowMs,
    max: options.max,
    message: limitedResponse('Too many requests, please try again later.'),
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter rate limiter for the login endpoint.
 */
export function createLoginRateLimiter(options: RateLimitOptions) {
  return rateLimit({
    windowMs: options.windowMs,
    max: options.loginMax,
    message: limitedResponse('Too many login attempts, please try again later.'),
    standardHeaders: true,
    legacyHeaders: false,
    // Use IP address for login (no user ID available yet)
    keyGenerator: (req) => {
      return req.ip || req.socket.remoteAddress || 'unknown';
    },
  });
}
