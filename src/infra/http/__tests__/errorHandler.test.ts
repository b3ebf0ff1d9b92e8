import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { z } from 'zod';
import { errorHandler } from '../middleware/errorHandler.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { requestContext } from '../requestContext.js';
import {
  BadRequestError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from '../../../application/errors.js';
import { silentLogger } from '../../../testing/fakes.js';
import { buildTestApp } from '../../../testing/testApp.js';

function appThrowing(error: unknown) {
  const app = express();
  app.use(requestContext());
  app.get(
    '/boom',
    asyncHandler(async () => {
      throw error;
    })
  );
  app.use(errorHandler(silentLogger()));
  return app;
}

describe('errorHandler', () => {
  it.each([
    [new BadRequestError('bad input'), 400],
    [new UnauthorizedError('who are you'), 401],
    [new ForbiddenError('not yours'), 403],
    [new NotFoundError('gone'), 404],
    [new ConflictError('taken'), 409],
  ])('should map %s to %i with its message', async (error, status) => {
    const response = await request(appThrowing(error)).get('/boom');

    expect(response.status).toBe(status);
    expect(response.body).toEqual({ success: false, message: error.message });
  });

  it('should map a ValidationError to 422 with its fields', async () => {
    const response = await request(appThrowing(new ValidationError({ email: 'Invalid email format' }))).get('/boom');

    expect(response.status).toBe(422);
    expect(response.body).toEqual({
      success: false,
      message: 'Validation failed',
      error: { email: 'Invalid email format' },
    });
  });

  it('should map a stray ZodError to 422', async () => {
    const parsed = z.object({ page: z.number() }).safeParse({ page: 'x' });
    const error = parsed.success ? new Error('unreachable') : parsed.error;

    const response = await request(appThrowing(error)).get('/boom');

    expect(response.status).toBe(422);
    expect(response.body.error).toEqual({ page: 'Expected number, received string' });
  });

  it('should hide the details of unexpected errors', async () => {
    const response = await request(appThrowing(new Error('connection string leaked'))).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ success: false, message: 'Internal server error' });
  });

  it('should answer unknown routes with 404', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/api/v1/nope');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ success: false, message: 'Route GET /api/v1/nope not found' });
  });

  it('should echo the request id', async () => {
    const { app } = buildTestApp();

    const supplied = await request(app).get('/health').set('X-Request-Id', 'req-123');
    const generated = await request(app).get('/health');

    expect(supplied.headers['x-request-id']).toBe('req-123');
    expect(generated.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });
});
