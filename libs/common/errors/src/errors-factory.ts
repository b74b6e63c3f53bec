import { ErrorCode } from './error-codes';
import { ApiError } from './api-error';

export const ERRORS = {
  // Token errors
  MissingToken: () => new ApiError({ code: ErrorCode.MissingToken }),

  InvalidToken: (e?: Error) =>
    new ApiError({
      code: ErrorCode.InvalidToken,
      originalError: e,
    }),

  ExpiredToken: (e?: Error) =>
    new ApiError({
      code: ErrorCode.ExpiredToken,
      originalError: e,
    }),

  // Credential errors
  InvalidCredentials: () => new ApiError({ code: ErrorCode.AuthenticationError }),

  // Domain errors
  ValidationFailed: (violations: readonly string[], e?: Error) =>
    new ApiError({
      code: ErrorCode.ValidationError,
      detail: violations.join(', '),
      originalError: e,
    }),

  NotFound: (resource: string, id: number | string) =>
    new ApiError({
      code: ErrorCode.NotFound,
      detail: `Couldn't find ${resource} with 'id'=${id}`,
    }),

  // General
  InternalError: (e?: Error) =>
    new ApiError({
      code: ErrorCode.InternalError,
      originalError: e,
    }),
};
