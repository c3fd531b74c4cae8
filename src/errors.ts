/**
 * Raised before any statement is generated when the inputs cannot produce
 * one: empty staging data, or no columns inferred from its header row.
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

/**
 * Two arrays that must be paired position by position have different lengths.
 */
export class LengthMismatchError extends Error {
  readonly leftLength: number;
  readonly rightLength: number;

  constructor(leftLength: number, rightLength: number, message?: string) {
    super(message ?? `Array lengths differ: ${leftLength} vs ${rightLength}`);
    this.name = 'LengthMismatchError';
    this.leftLength = leftLength;
    this.rightLength = rightLength;
  }
}

export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function notFound(message = 'not found'): HttpError {
  return new HttpError(404, message);
}

export function badRequest(message: string, details?: unknown): HttpError {
  return new HttpError(400, message, details);
}
