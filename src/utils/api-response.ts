import type { Response } from 'express';
import { ZodError } from 'zod';
import { getTraceId } from '../middleware/trace-id.middleware';

export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  AUTHENTICATION_ERROR: 'AUTHENTICATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ApiError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type ApiResponse<T> =
  | { success: true; data: T; timestamp: string; requestId?: string }
  | { success: false; error: ApiError; timestamp: string; requestId?: string };

// Build a standard ApiResponse without sending
export function buildOk<T>(data: T, requestId?: string): ApiResponse<T> {
  return {
    success: true,
    data,
    timestamp: new Date().toISOString(),
    ...(requestId ? { requestId } : {}),
  };
}

export function buildError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ApiResponse<never> {
  const err: ApiError = { code, message, ...(details ? { details } : {}) };
  return {
    success: false,
    error: err,
    timestamp: new Date().toISOString(),
    ...(requestId ? { requestId } : {}),
  };
}

// Express helpers
export function ok<T>(res: Response, data: T, status = 200): Response {
  return res.status(status).json(buildOk(data, getTraceId(res)));
}

export function fail(
  res: Response,
  code: ErrorCode,
  message: string,
  status = 400,
  details?: Record<string, unknown>
): Response {
  return res.status(status).json(buildError(code, message, details, getTraceId(res)));
}

export function mapZodIssues(error: ZodError): Record<string, unknown> {
  return {
    issues: error.issues.map((i) => ({
      path: i.path.join('.'),
      message: i.message,
      code: i.code,
    })),
  };
}

export function failFromZod(
  res: Response,
  error: ZodError,
  source: 'body' | 'params' | 'query' = 'body'
) {
  const details = { source, ...mapZodIssues(error) };
  return fail(res, ErrorCodes.VALIDATION_ERROR, 'Invalid request data', 400, details);
}
