import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { ApiError, ApiErrorBody, toError } from './api-error';
import { ERRORS } from './errors-factory';

/**
 * Single translation point from failures to HTTP responses.
 * Every error body has the shape `{ message }`.
 */
@Catch()
export class ApiErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();

    const { status, body } = this.translate(exception);
    response.status(status).json(body);
  }

  translate(exception: unknown): { status: number; body: ApiErrorBody } {
    if (exception instanceof ApiError) {
      const summary = `${exception.code}: ${exception.message}`;
      const stack = exception.originalError?.stack;
      if (stack) {
        this.logger.warn(summary, stack);
      } else {
        this.logger.warn(summary);
      }
      return { status: exception.httpStatusCode, body: exception.toJSON() };
    }

    if (exception instanceof HttpException) {
      return {
        status: exception.getStatus(),
        body: { message: messageOf(exception) },
      };
    }

    const error = toError(exception);
    this.logger.error(`Unhandled error: ${error.message}`, error.stack);
    const internal = ERRORS.InternalError(error);
    return { status: internal.httpStatusCode, body: internal.toJSON() };
  }
}

function messageOf(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === 'string') {
    return response;
  }
  if ('message' in response) {
    const { message } = response;
    if (typeof message === 'string') {
      return message;
    }
    if (Array.isArray(message)) {
      return message.join(', ');
    }
  }
  return exception.message;
}
