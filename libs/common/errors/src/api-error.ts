import { ErrorCode } from './error-codes';
import { ERROR_CATALOG } from './error-messages';

export interface ApiErrorOptions {
  code: ErrorCode;
  detail?: string;
  originalError?: Error;
}

export interface ApiErrorBody {
  message: string;
}

export class ApiError extends Error {
  readonly code: ErrorCode;
  readonly detail?: string;
  readonly originalError?: Error;

  constructor(options: ApiErrorOptions) {
    super(ERROR_CATALOG[options.code].message(options.detail));
    this.name = 'ApiError';
    this.code = options.code;
    this.detail = options.detail;
    this.originalError = options.originalError;

    Error.captureStackTrace(this, this.constructor);
  }

  get httpStatusCode(): number {
    return ERROR_CATALOG[this.code].httpStatusCode;
  }

  toJSON(): ApiErrorBody {
    return { message: this.message };
  }
}

/**
 * Normalizes anything caught in a `catch` clause into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
