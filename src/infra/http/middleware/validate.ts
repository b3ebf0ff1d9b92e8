import type { NextFunction, Request, Response } from 'express';
import type { ZodError, ZodSchema } from 'zod';
import { ValidationError } from '../../../application/errors.js';

export interface ValidationSchemas {
  body?: ZodSchema;
}

/**
 * Flatten zod issues into a field → message map, first message per field.
 */
export function toFieldErrors(error: ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.errors) {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
    if (!(field in fields)) {
      fields[field] = issue.message;
    }
  }
  return fields;
}

/**
 * Zod validation middleware.
 * Replaces the body with the parsed value, or fails with a ValidationError.
 */
export function validate(schemas: ValidationSchemas) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (schemas.body) {
      const result = schemas.body.safeParse(req.body);
      if (!result.success) {
        next(new ValidationError(toFieldErrors(result.error)));
        return;
      }
      req.body = result.data;
    }
    next();
  };
}
