/**
 * Application errors
 *
 * Every error that crosses the HTTP boundary extends AppError so the
 * global error handler can map it to a status code and an error code.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, statusCode = 400, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    if (details && typeof details === 'object' && !Array.isArray(details)) {
      this.details = details;
    }
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super('NOT_FOUND', `${entity} not found: ${id}`, 404, { entity, id });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, 400, details);
    this.name = 'ValidationError';
  }
}

export class ConcurrentModificationError extends AppError {
  constructor(entity: string, id: string, expectedRevision: number) {
    super(
      'CONCURRENT_MODIFICATION',
      `${entity} ${id} was modified concurrently (expected revision ${expectedRevision})`,
      409,
      { entity, id, expectedRevision },
    );
    this.name = 'ConcurrentModificationError';
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
