import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { ERRORS } from '@todos/common/errors';
import { Principal } from '@todos/common/types';
import { AuthenticatedRequest } from './auth.types';

/**
 * The principal AuthGuard attached to the request.
 */
export const CurrentPrincipal = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Principal => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.principal) {
      // handler is missing @UseGuards(AuthGuard)
      throw ERRORS.MissingToken();
    }
    return request.principal;
  },
);
