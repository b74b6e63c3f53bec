import { ValidationError as ClassValidationError } from 'class-validator';
import { ApiError } from './api-error';
import { ERRORS } from './errors-factory';

// Set by ValidationPipe's forbidNonWhitelisted for keys the DTO does not declare
const UNPERMITTED_CONSTRAINT = 'whitelistValidation';

/**
 * exceptionFactory for Nest's ValidationPipe.
 * Flattens nested constraint messages, in declaration order, without repeats.
 */
export function validationExceptionFactory(errors: ClassValidationError[]): ApiError {
  const violations = new Set<string>();
  collectViolations(errors, violations);
  return ERRORS.ValidationFailed([...violations]);
}

function collectViolations(errors: ClassValidationError[], into: Set<string>): void {
  for (const error of errors) {
    for (const [constraint, message] of Object.entries(error.constraints ?? {})) {
      into.add(
        constraint === UNPERMITTED_CONSTRAINT
          ? `Unpermitted parameter: ${error.property}`
          : message,
      );
    }
    if (error.children && error.children.length > 0) {
      collectViolations(error.children, into);
    }
  }
}
