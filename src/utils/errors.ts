export class AppError extends Error {
  public statusCode: number;
  public errors?: unknown[];
  public isOperational: boolean;

  constructor(message: string, statusCode: number, errors?: unknown[]) {
    super(message);
    this.statusCode = statusCode;
    this.errors = errors;
    this.isOperational = true;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, errors?: unknown[]) {
    super(message, 400, errors);
    this.name = 'ValidationError';
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication failed') {
    super(message, 401);
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string = 'Resource conflict') {
    super(message, 409);
    this.name = 'ConflictError';
  }
}

export class ScanInProgressError extends ConflictError {
  constructor() {
    super('A retention scan is already running');
    this.name = 'ScanInProgressError';
  }
}

// Errors raised by chat platform adapters. The batching engine only ever sees these.

export class PlatformError extends Error {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'PlatformError';
  }
}

/** The message (or the only message of a bulk call) no longer exists. */
export class MessageNotFoundError extends PlatformError {
  constructor(message: string = 'Unknown message', originalError?: unknown) {
    super(message, originalError);
    this.name = 'MessageNotFoundError';
  }
}

/** The client library refused the bulk call before sending it (size, age, duplicates). */
export class BulkDeleteRejectedError extends PlatformError {
  constructor(message: string, originalError?: unknown) {
    super(message, originalError);
    this.name = 'BulkDeleteRejectedError';
  }
}

export class DeleteRequestFailedError extends PlatformError {
  constructor(message: string, public readonly status?: number, originalError?: unknown) {
    super(message, originalError);
    this.name = 'DeleteRequestFailedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
