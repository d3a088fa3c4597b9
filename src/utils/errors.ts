/**
 * Errors that carry an HTTP status. Controllers map them to `{ error }`
 * responses; anything else becomes a 500.
 */
export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/**
 * Missing or invalid configuration. Raised while loading config at startup,
 * never in the middle of a computation.
 */
export class ConfigurationError extends AppError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 500);
    this.issues = issues;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class DuplicateFactError extends AppError {
  readonly date: string;
  readonly adId: string;

  constructor(date: string, adId: string) {
    super(`Performance row for ad ${adId} on ${date} already exists`, 409);
    this.date = date;
    this.adId = adId;
  }
}

export class MissingReferenceError extends AppError {
  constructor(kind: 'ad' | 'campaign', id: string) {
    super(`Unknown ${kind} ${id}`, 422);
  }
}

export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(`Cannot change status from ${from} to ${to}`, 409);
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
