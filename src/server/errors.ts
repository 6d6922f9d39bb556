/**
 * Error taxonomy shared by the services and the HTTP layer.
 * Each error carries the status code it maps to; errorHandler in app.ts
 * is the only place that turns them into responses.
 */

export abstract class AppError extends Error {
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ValidationErrorKind = 'missing' | 'wrong_type' | 'invalid_date' | 'negative' | 'too_large' | 'empty';

export class ValidationError extends AppError {
  readonly status = 400;

  constructor(
    readonly kind: ValidationErrorKind,
    readonly field: string,
    message: string
  ) {
    super(message);
  }
}

export const NO_DATA = 'No data found';

export class NotFoundError extends AppError {
  readonly status = 404;

  constructor(message: string = NO_DATA) {
    super(message);
  }
}

export class StorageError extends AppError {
  readonly status = 500;

  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
