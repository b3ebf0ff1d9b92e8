import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import {
  BadRequestError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from '../../../application/errors.js';
import { RequestAbortedError } from '../../db/abort.js';
import { errorMeta, type Logger } from '../../logger.js';
import { sendError } from '../response.js';
import { toFieldErrors } from './validate.js';

type ErrorClass = new (...args: never[]) => Error;

/**
 * Classified errors and the status they answer with. Their messages are
 * safe to show to clients.
 */
const STATUS_BY_ERROR: ReadonlyArray<[ErrorClass, number]> = [
  [BadRequestError, 400],
  [UnauthorizedError, 401],
  [ForbiddenError, 403],
  [NotFoundError, 404],
  [ConflictError, 409],
];

/**
 * body-parser rejects malformed JSON with an error carrying `type`.
 */
function isJsonParseError(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

/**
 * The only place an error becomes a status code. Anything unclassified is a
 * 500 whose details stay in the log.
 */
export function errorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const context = { requestId: req.requestId, method: req.method, path: req.originalUrl };

    if (err instanceof RequestAbortedError) {
      logger.warn('Request aborted by client', context);
      return;
    }

    if (err instanceof ValidationError) {
      sendError(res, 422, err.message, err.fields);
      return;
    }

    if (err instanceof ZodError) {
      sendError(res, 422, 'Validation failed', toFieldErrors(err));
      return;
    }

    if (isJsonParseError(err)) {
      sendError(res, 400, 'Invalid JSON body');
      return;
    }

    for (const [errorClass, status] of STATUS_BY_ERROR) {
      if (err instanceof errorClass) {
        sendError(res, status, err.message);
        return;
      }
    }

    logger.error('Unhandled error', { ...context, ...errorMeta(err) });
    sendError(res, 500, 'Internal server error');
  };
}
