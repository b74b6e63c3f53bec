/**
 * Request Authorizer
 * Bearer token -> claims -> stored identity -> principal
 */

import { Injectable, Logger } from '@nestjs/common';
import { err, ok } from 'neverthrow';
import { ERRORS } from '@todos/common/errors';
import { HeaderBag, readHeader } from '@todos/common/http';
import { JwtService } from '@todos/common/jwt';
import { UsersRepository } from '../users/users.repository';
import { AuthorizableRequest, AuthorizationResult, toPrincipal } from './auth.types';

@Injectable()
export class RequestAuthorizer {
  private readonly logger = new Logger(RequestAuthorizer.name);

  constructor(
    private jwtService: JwtService,
    private usersRepository: UsersRepository,
  ) {}

  /**
   * Authorize a request once; later calls for the same request reuse the
   * first outcome. Nothing is shared between requests.
   */
  authorizeRequest(request: AuthorizableRequest): Promise<AuthorizationResult> {
    if (!request.authorization) {
      request.authorization = this.authorize(request.headers);
    }
    return request.authorization;
  }

  /**
   * Resolve the principal named by the Authorization header.
   * The token is the header's last whitespace-separated segment, whatever
   * scheme word (if any) precedes it.
   */
  async authorize(headers: HeaderBag): Promise<AuthorizationResult> {
    const header = readHeader(headers, 'authorization')?.trim();
    if (!header) {
      return err(ERRORS.MissingToken());
    }

    const segments = header.split(/\s+/);
    const token = segments[segments.length - 1];

    const claims = this.jwtService.decode(token);
    if (claims.isErr()) {
      return err(claims.error);
    }

    const identity = await this.usersRepository.findById(claims.value.sub);
    if (!identity) {
      // A stale subject reads exactly like a forged token
      this.logger.warn(`Token subject ${claims.value.sub} has no stored identity`);
      return err(ERRORS.InvalidToken());
    }

    return ok(toPrincipal(identity));
  }
}
