import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  ConflictError,
  NotFoundError,
  StorageError,
  UnauthorizedError,
  ValidationError,
} from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

// body-parser marks unparseable JSON bodies this way
function isMalformedBody(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

function send(res: Response, status: number, body: ErrorResponse): void {
  res.status(status).json(body);
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof StorageError) {
    console.error('Storage error:', err.cause ?? err);
  } else {
    console.error('Error:', err);
  }

  if (err instanceof ZodError) {
    send(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    });
    return;
  }

  if (err instanceof ValidationError) {
    send(res, 400, { code: 'VALIDATION_ERROR', message: err.message });
    return;
  }

  if (isMalformedBody(err)) {
    send(res, 400, { code: 'MALFORMED_BODY', message: 'Request body is not valid JSON' });
    return;
  }

  if (err instanceof UnauthorizedError) {
    send(res, 401, { code: 'UNAUTHORIZED', message: err.message });
    return;
  }

  if (err instanceof NotFoundError) {
    send(res, 404, { code: 'NOT_FOUND', message: err.message });
    return;
  }

  if (err instanceof ConflictError) {
    send(res, 409, { code: 'CONFLICT', message: err.message });
    return;
  }

  // Driver details stay in the log
  if (err instanceof StorageError) {
    send(res, 500, { code: 'STORAGE_ERROR', message: 'Storage failure' });
    return;
  }

  send(res, 500, { code: 'INTERNAL_ERROR', message: 'Internal server error' });
}
