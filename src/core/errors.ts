/**
 * Error taxonomy shared by services and routes.
 * Each error carries the HTTP status the API answers with.
 */

export abstract class AppError extends Error {
  abstract readonly statusCode: number;

  constructor(message: string, public readonly details?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
}

/**
 * A storage-level conflict the upsert clause could not resolve. Treated as a defect.
 */
export class ConflictError extends AppError {
  readonly statusCode = 500;

  constructor(
    public readonly constraint?: string,
    detail?: string
  ) {
    super('Unresolved storage conflict', detail);
  }
}

/**
 * Connectivity or timeout problem with the backing store. Callers decide whether to retry.
 */
export class TransientStorageError extends AppError {
  readonly statusCode = 503;
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
