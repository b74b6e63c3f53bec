import { Result } from 'neverthrow';
import { ApiError } from './api-error';

/**
 * Unwraps a core result at the HTTP boundary.
 * The error is rethrown for ApiErrorFilter to translate.
 */
export function orThrow<T>(result: Result<T, ApiError>): T {
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}
