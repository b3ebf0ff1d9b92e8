import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { GetUserUseCase } from '../../../application/users/getUser.js';
import type { ListUsersUseCase } from '../../../application/users/listUsers.js';
import type { UpdateUserUseCase } from '../../../application/users/updateUser.js';
import type { DeleteUserUseCase } from '../../../application/users/deleteUser.js';
import { requireAuth } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { sendSuccess, sendSuccessWithMeta } from '../response.js';
import { paginationQuerySchema, parseUserId } from './params.js';

/**
 * @openapi
 * /api/v1/users/me:
 *   get:
 *     tags: [Users]
 *     summary: Get the authenticated user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               allOf:
 *                 - $ref: '#/components/schemas/ApiResponse'
 *                 - type: object
 *                   properties:
 *                     data: { $ref: '#/components/schemas/User' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 *
 * /api/v1/users:
 *   get:
 *     tags: [Users]
 *     summary: List users (paginated)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: query
 *         name: page
 *         schema: { type: integer, minimum: 1, default: 1 }
 *       - in: query
 *         name: limit
 *         schema: { type: integer, minimum: 1, maximum: 100, default: 10 }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               allOf:
 *                 - $ref: '#/components/schemas/ApiResponse'
 *                 - type: object
 *                   properties:
 *                     data:
 *                       type: array
 *                       items: { $ref: '#/components/schemas/User' }
 *                     meta: { $ref: '#/components/schemas/PaginationMeta' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 *
 * /api/v1/users/{id}:
 *   get:
 *     tags: [Users]
 *     summary: Get a user by ID
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200: { description: OK }
 *       400:
 *         description: Invalid user ID
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 *   put:
 *     tags: [Users]
 *     summary: Update a user
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               name: { type: string, minLength: 2, maxLength: 100 }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 6 }
 *     responses:
 *       200: { description: OK }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 *       409:
 *         description: Email already taken
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 *       422:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 *   delete:
 *     tags: [Users]
 *     summary: Soft-delete a user
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200: { description: Deleted }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 */

// Empty strings count as "not supplied"
const optionalField = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((val) => (val === '' ? undefined : val), schema.optional());

export const updateUserBodySchema = z.object({
  name: optionalField(z.string().min(2, 'Value is too short').max(100, 'Value is too long')),
  email: optionalField(z.string().email('Invalid email format')),
  password: optionalField(z.string().min(6, 'Value is too short')),
});

export interface UserRouteDeps {
  authenticate: RequestHandler;
  getUserUseCase: GetUserUseCase;
  listUsersUseCase: ListUsersUseCase;
  updateUserUseCase: UpdateUserUseCase;
  deleteUserUseCase: DeleteUserUseCase;
}

export function createUserRoutes(deps: UserRouteDeps) {
  const router = Router();

  // All routes require authentication
  router.use(deps.authenticate);

  router.get(
    '/me',
    asyncHandler(async (req, res) => {
      const { userId } = requireAuth(req);
      const user = await deps.getUserUseCase.execute(userId, req.abortSignal);
      sendSuccess(res, 'User retrieved successfully', user);
    })
  );

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const query = paginationQuerySchema.parse(req.query);
      const result = await deps.listUsersUseCase.execute(query, req.abortSignal);
      sendSuccessWithMeta(res, 'Users retrieved successfully', result.users, result.meta);
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const id = parseUserId(req.params.id);
      const user = await deps.getUserUseCase.execute(id, req.abortSignal);
      sendSuccess(res, 'User retrieved successfully', user);
    })
  );

  router.put(
    '/:id',
    validate({ body: updateUserBodySchema }),
    asyncHandler(async (req, res) => {
      const id = parseUserId(req.params.id);
      const body = updateUserBodySchema.parse(req.body);
      const user = await deps.updateUserUseCase.execute(id, body, req.abortSignal);
      sendSuccess(res, 'User updated successfully', user);
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      const id = parseUserId(req.params.id);
      await deps.deleteUserUseCase.execute(id, req.abortSignal);
      sendSuccess(res, 'User deleted successfully');
    })
  );

  return router;
}
