import { z } from 'zod';
import { BadRequestError } from '../../../application/errors.js';

// users.id is a SERIAL (int4) column
export const MAX_USER_ID = 2_147_483_647;

const userIdSchema = z
  .string()
  .regex(/^\d+$/)
  .transform((val) => parseInt(val, 10))
  .pipe(z.number().int().min(1).max(MAX_USER_ID));

/**
 * Parse the `:id` route parameter. Anything but plain decimal digits naming a
 * valid user id is a 400.
 */
export function parseUserId(raw: string): number {
  const result = userIdSchema.safeParse(raw);
  if (!result.success) {
    throw new BadRequestError('Invalid user ID');
  }
  return result.data;
}

const pageNumber = z
  .string()
  .optional()
  .transform((val) => (val ? parseInt(val, 10) : undefined))
  .transform((val) => (val === undefined || Number.isNaN(val) ? undefined : val));

/**
 * `?page` and `?limit`. Garbage becomes undefined and is normalized later.
 */
export const paginationQuerySchema = z.object({
  page: pageNumber,
  limit: pageNumber,
});
