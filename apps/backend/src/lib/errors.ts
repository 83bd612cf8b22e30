import { StatusCodes } from 'http-status-codes';

/**
 * Base class for every error the backend raises on purpose.
 *
 * The error handler turns it into `{ success: false, error, code, details }`
 * with `status` as the HTTP status code.
 */
export class EverlyError extends Error {
  constructor(
    public readonly message: string,
    public readonly code = 'INTERNAL_ERROR',
    public readonly details?: unknown,
    public readonly status: number = StatusCodes.BAD_REQUEST
  ) {
    super(message);
    this.name = 'EverlyError';
  }
}

export class NotFoundError extends EverlyError {
  constructor(message = 'Resource not found', details?: unknown) {
    super(message, 'NOT_FOUND', details, StatusCodes.NOT_FOUND);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends EverlyError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR', details, StatusCodes.BAD_REQUEST);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends EverlyError {
  constructor(message = 'Authentication required', details?: unknown) {
    super(message, 'UNAUTHORIZED', details, StatusCodes.UNAUTHORIZED);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends EverlyError {
  constructor(message = 'Forbidden', details?: unknown) {
    super(message, 'FORBIDDEN', details, StatusCodes.FORBIDDEN);
    this.name = 'ForbiddenError';
  }
}

export class ConflictError extends EverlyError {
  constructor(message = 'Resource already exists', details?: unknown) {
    super(message, 'CONFLICT', details, StatusCodes.CONFLICT);
    this.name = 'ConflictError';
  }
}

export class PayloadTooLargeError extends EverlyError {
  constructor(message = 'Payload too large', details?: unknown) {
    super(message, 'PAYLOAD_TOO_LARGE', details, StatusCodes.REQUEST_TOO_LONG);
    this.name = 'PayloadTooLargeError';
  }
}

export class UnsupportedMediaTypeError extends EverlyError {
  constructor(message = 'Unsupported media type', details?: unknown) {
    super(message, 'UNSUPPORTED_MEDIA_TYPE', details, StatusCodes.UNSUPPORTED_MEDIA_TYPE);
    this.name = 'UnsupportedMediaTypeError';
  }
}
