import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { RegisterUseCase } from '../../../application/auth/register.js';
import type { LoginUseCase } from '../../../application/auth/login.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { sendCreated, sendSuccess } from '../response.js';

/**
 * @openapi
 * /api/v1/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name, email, password]
 *             properties:
 *               name: { type: string, minLength: 2, maxLength: 100, example: Jane Doe }
 *               email: { type: string, format: email, example: jane@example.com }
 *               password: { type: string, minLength: 6, example: password123 }
 *     responses:
 *       201:
 *         description: User registered
 *         content:
 *           application/json:
 *             schema:
 *               allOf:
 *                 - $ref: '#/components/schemas/ApiResponse'
 *                 - type: object
 *                   properties:
 *                     data: { $ref: '#/components/schemas/User' }
 *       409:
 *         description: Email already registered
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 *       422:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 *
 * /api/v1/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive JWT
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               allOf:
 *                 - $ref: '#/components/schemas/ApiResponse'
 *                 - type: object
 *                   properties:
 *                     data:
 *                       type: object
 *                       properties:
 *                         token: { type: string }
 *                         user: { $ref: '#/components/schemas/User' }
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 *       403:
 *         description: Account is not active
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 *       422:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 */

const REQUIRED = 'This field is required';

export const registerBodySchema = z.object({
  name: z
    .string({ required_error: REQUIRED })
    .min(2, 'Value is too short')
    .max(100, 'Value is too long'),
  email: z.string({ required_error: REQUIRED }).email('Invalid email format'),
  password: z.string({ required_error: REQUIRED }).min(6, 'Value is too short'),
});

export const loginBodySchema = z.object({
  email: z.string({ required_error: REQUIRED }).email('Invalid email format'),
  password: z.string({ required_error: REQUIRED }).min(1, REQUIRED),
});

export interface AuthRouteDeps {
  registerUseCase: RegisterUseCase;
  loginUseCase: LoginUseCase;
  loginRateLimiter: RequestHandler;
}

export function createAuthRoutes({ registerUseCase, loginUseCase, loginRateLimiter }: AuthRouteDeps) {
  const router = Router();

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const user = await registerUseCase.execute(body, req.abortSignal);
      sendCreated(res, 'User registered successfully', user);
    })
  );

  router.post(
    '/login',
    loginRateLimiter,
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body, req.abortSignal);
      sendSuccess(res, 'Login successful', result);
    })
  );

  return router;
}
