import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { ListUsersUseCase } from '../../../application/users/listUsers.js';
import type { SetUserStatusUseCase } from '../../../application/users/setUserStatus.js';
import { Roles } from '../../../domain/user/user.js';
import { requireRole } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { sendSuccess, sendSuccessWithMeta } from '../response.js';
import { paginationQuerySchema, parseUserId } from './params.js';

/**
 * @openapi
 * /api/v1/admin/users:
 *   get:
 *     tags: [Admin]
 *     summary: List users (admin only)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: query
 *         name: page
 *         schema: { type: integer, minimum: 1, default: 1 }
 *       - in: query
 *         name: limit
 *         schema: { type: integer, minimum: 1, maximum: 100, default: 10 }
 *     responses:
 *       200: { description: OK }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 *       403:
 *         description: Caller is not an admin
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 *
 * /api/v1/admin/users/{id}/status:
 *   patch:
 *     tags: [Admin]
 *     summary: Activate or deactivate a user (admin only)
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
 *             required: [is_active]
 *             properties:
 *               is_active: { type: boolean }
 *     responses:
 *       200: { description: OK }
 *       403:
 *         description: Caller is not an admin
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ApiResponse' }
 */

export const setStatusBodySchema = z.object({
  is_active: z.boolean({
    required_error: 'This field is required',
    invalid_type_error: 'Value must be a boolean',
  }),
});

export interface AdminRouteDeps {
  authenticate: RequestHandler;
  listUsersUseCase: ListUsersUseCase;
  setUserStatusUseCase: SetUserStatusUseCase;
}

export function createAdminRoutes(deps: AdminRouteDeps) {
  const router = Router();

  router.use(deps.authenticate, requireRole(Roles.Admin));

  router.get(
    '/users',
    asyncHandler(async (req, res) => {
      const query = paginationQuerySchema.parse(req.query);
      const result = await deps.listUsersUseCase.execute(query, req.abortSignal);
      sendSuccessWithMeta(res, 'Users retrieved successfully', result.users, result.meta);
    })
  );

  router.patch(
    '/users/:id/status',
    validate({ body: setStatusBodySchema }),
    asyncHandler(async (req, res) => {
      const id = parseUserId(req.params.id);
      const body = setStatusBodySchema.parse(req.body);
      const user = await deps.setUserStatusUseCase.execute(id, body.is_active, req.abortSignal);
      sendSuccess(res, 'User status updated successfully', user);
    })
  );

  return router;
}
