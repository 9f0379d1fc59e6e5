/**
 * Application errors
 * Every error carries an HTTP status and a stable code for the API envelope.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = 'AppError';

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation Error (400)
 */
export class ValidationError extends AppError {
  constructor(message: string = 'Invalid request data', code: string = 'VALIDATION_ERROR') {
    super(message, 400, code);
    this.name = 'ValidationError';
  }
}

/**
 * Unauthorized Error (401)
 */
export class UnauthorizedError extends AppError {
  constructor(message: string = 'Invalid or missing authentication credentials') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

/**
 * Forbidden Error (403)
 */
export class ForbiddenError extends AppError {
  constructor(message: string = 'Insufficient permissions') {
    super(message, 403, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

/**
 * Conflict Error (409)
 */
export class ConflictError extends AppError {
  constructor(message: string = 'Conflict', code: string = 'CONFLICT') {
    super(message, 409, code);
    this.name = 'ConflictError';
  }
}

/**
 * Payload Too Large Error (413)
 */
export class PayloadTooLargeError extends AppError {
  constructor(message: string = 'Payload too large', code: string = 'PAYLOAD_TOO_LARGE') {
    super(message, 413, code);
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * CSRF token mismatch (422)
 */
export class CsrfMismatchError extends AppError {
  constructor() {
    super('CSRF token does not match the session', 422, 'CSRF_MISMATCH');
    this.name = 'CsrfMismatchError';
  }
}

/**
 * A relational query failed. The driver error is kept as `cause`.
 */
export class StoreQueryFailedError extends AppError {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Store query failed: ${operation}`, 500, 'STORE_QUERY_FAILED', false, { cause });
    this.name = 'StoreQueryFailedError';
    this.operation = operation;
  }
}

/**
 * Not Found Error (404), for writes that reference a missing row.
 * Reads return `null` instead.
 */
export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}
