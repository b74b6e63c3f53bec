export { ErrorCode } from './error-codes';
export { ERROR_CATALOG, ErrorDescriptor } from './error-messages';
export { ApiError, ApiErrorBody, ApiErrorOptions, toError } from './api-error';
export { ApiErrorFilter } from './api-error.filter';
export { ERRORS } from './errors-factory';
export { validationExceptionFactory } from './validation-exception.factory';
export { orThrow } from './result';
