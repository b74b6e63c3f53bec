/**
 * Auth Guard
 * Runs the request authorizer before any protected handler
 */

import { Injectable, CanActivate, ExecutionContext } from '@nestjs/common';
import { orThrow } from '@todos/common/errors';
import { RequestAuthorizer } from '../request-authorizer.service';
import { AuthenticatedRequest } from '../auth.types';

@Injectable()
export class AuthGuard implements CanActivate {
  constructor(private requestAuthorizer: RequestAuthorizer) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    // Fail-closed: any error surfaces through ApiErrorFilter
    request.principal = orThrow(await this.requestAuthorizer.authorizeRequest(request));
    return true;
  }
}
