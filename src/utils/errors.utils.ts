/**
 * Error Taxonomy
 *
 * Services throw these; the error middleware is the only place that turns
 * them into HTTP responses. Anything that is not an AppError is treated as
 * an unhandled failure (500).
 */

export class AppError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(status: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

/**
 * Malformed or missing input. The client must fix the payload.
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown, code: string = 'VALIDATION_ERROR') {
    super(400, code, message, details);
  }
}

/**
 * Missing/invalid credential or failed login
 */
export class AuthError extends AppError {
  constructor(message: string, code: string = 'UNAUTHORIZED') {
    super(401, code, message);
  }
}

/**
 * Referenced entity is absent or logically deleted
 */
export class NotFoundError extends AppError {
  constructor(message: string, code: string = 'NOT_FOUND') {
    super(404, code, message);
  }
}

/**
 * Uniqueness or scheduling collision
 */
export class ConflictError extends AppError {
  constructor(message: string, code: string = 'CONFLICT') {
    super(409, code, message);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
