import type { NextFunction, Request, Response } from 'express';
import { AppError, AuthenticationError, ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { ErrorCodes, fail } from '../utils/api-response';
import type { ErrorCode } from '../utils/api-response';
import { logger } from '../utils/logger';

function codeFor(error: AppError): ErrorCode {
  if (error instanceof ValidationError) return ErrorCodes.VALIDATION_ERROR;
  if (error instanceof AuthenticationError) return ErrorCodes.AUTHENTICATION_ERROR;
  if (error instanceof NotFoundError) return ErrorCodes.NOT_FOUND;
  if (error instanceof ConflictError) return ErrorCodes.CONFLICT;
  return ErrorCodes.INTERNAL_ERROR;
}

export function notFoundHandler(_req: Request, res: Response) {
  fail(res, ErrorCodes.NOT_FOUND, 'The requested resource was not found', 404);
}

// Express recognises error handlers by arity, so `_next` has to stay.
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError && err.isOperational) {
    fail(res, codeFor(err), err.message, err.statusCode);
    return;
  }
  logger.error('http:error', { method: req.method, route: req.path, error: err });
  const message = process.env.NODE_ENV === 'development' && err instanceof Error ? err.message : 'An unexpected error occurred';
  fail(res, ErrorCodes.INTERNAL_ERROR, message, 500);
}
