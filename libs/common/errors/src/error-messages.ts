/**
 * Error catalog
 * One entry per error kind: the HTTP status it is reported with and the
 * message shown to the client. Token and credential messages are fixed and
 * never include the detail that produced the error.
 */

import { HttpStatus } from '@nestjs/common';
import { ErrorCode } from './error-codes';

export interface ErrorDescriptor {
  readonly httpStatusCode: number;
  readonly message: (detail?: string) => string;
}

export const ERROR_CATALOG: Readonly<Record<ErrorCode, ErrorDescriptor>> = {
  [ErrorCode.MissingToken]: {
    httpStatusCode: HttpStatus.UNAUTHORIZED,
    message: () => 'Missing token',
  },
  [ErrorCode.InvalidToken]: {
    httpStatusCode: HttpStatus.UNAUTHORIZED,
    message: () => 'Invalid token',
  },
  [ErrorCode.ExpiredToken]: {
    httpStatusCode: HttpStatus.UNAUTHORIZED,
    message: () => 'Sorry, your token has expired. Please login to continue.',
  },
  [ErrorCode.AuthenticationError]: {
    httpStatusCode: HttpStatus.UNAUTHORIZED,
    message: () => 'Invalid credentials',
  },
  [ErrorCode.ValidationError]: {
    httpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY,
    message: (detail) => (detail ? `Validation failed: ${detail}` : 'Validation failed'),
  },
  [ErrorCode.NotFound]: {
    httpStatusCode: HttpStatus.NOT_FOUND,
    message: (detail) => detail ?? 'Record not found',
  },
  [ErrorCode.InternalError]: {
    httpStatusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    message: () => 'Internal server error',
  },
};
