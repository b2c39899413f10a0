import { ZodError } from 'zod';

/**
 * Application error taxonomy.
 * Every error is terminal: callers get it verbatim, nothing is retried here.
 */
export type ErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'FORBIDDEN'
  | 'CONFLICT'
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED';

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, statusCode: number, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 404, 'NOT_FOUND', details);
  }
}

/**
 * Guard violation on the order state machine. The message always names the
 * status that blocked the transition.
 */
export class InvalidStateError extends AppError {
  readonly status: string;

  constructor(message: string, status: string, details?: Record<string, unknown>) {
    super(message, 409, 'INVALID_STATE', { status, ...details });
    this.status = status;
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 403, 'FORBIDDEN', details);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 409, 'CONFLICT', details);
  }
}

export class ValidationFailedError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string) {
    super(message, 401, 'UNAUTHORIZED');
  }
}

const PG_UNIQUE_VIOLATION = '23505';
const PG_FOREIGN_KEY_VIOLATION = '23503';

const pgErrorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

/**
 * Map known failures (our own errors, zod issues and pg constraint violations)
 * onto the taxonomy. Returns null for anything unexpected.
 */
export const toAppError = (error: unknown): AppError | null => {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof ZodError) {
    return new ValidationFailedError('Invalid request data', { issues: error.errors });
  }

  switch (pgErrorCode(error)) {
    case PG_UNIQUE_VIOLATION:
      return new ConflictError('Duplicate value for a unique field', {
        constraint: error instanceof Error && 'constraint' in error ? String(error.constraint) : undefined,
      });
    case PG_FOREIGN_KEY_VIOLATION:
      return new ValidationFailedError('Referenced record does not exist');
    default:
      return null;
  }
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
