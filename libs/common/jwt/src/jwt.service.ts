/**
 * Todos JWT Service
 * Signed, time-bounded auth tokens (HS256)
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService as NestJwtService } from '@nestjs/jwt';
import { err, ok, Result } from 'neverthrow';
import { ApiError, ERRORS, toError } from '@todos/common/errors';
import { DEFAULT_TOKEN_TTL_SECONDS, TokenClaims, TokenPayload } from './jwt.types';

@Injectable()
export class JwtService {
  private readonly logger = new Logger(JwtService.name);
  private readonly ttlSeconds: number;

  constructor(
    private nestJwtService: NestJwtService,
    configService: ConfigService,
  ) {
    this.ttlSeconds =
      configService.get<number>('tokenTtlSeconds') ?? DEFAULT_TOKEN_TTL_SECONDS;
  }

  /**
   * Encode claims into a signed token
   * Expires after the configured TTL unless an explicit expiry is given
   */
  encode(payload: TokenPayload, expiresAt: Date = this.defaultExpiry()): string {
    const claims: TokenClaims = {
      ...payload,
      exp: Math.floor(expiresAt.getTime() / 1000),
    };

    try {
      return this.nestJwtService.sign(claims, { algorithm: 'HS256' });
    } catch (error) {
      this.logger.error(`JWT encoding failed: ${toError(error).message}`);
      throw new Error('JWT encoding failed');
    }
  }

  /**
   * Verify signature and expiry, then return the claims
   */
  decode(token: string): Result<TokenClaims, ApiError> {
    let payload: Record<string, unknown>;
    try {
      payload = this.nestJwtService.verify<Record<string, unknown>>(token, {
        algorithms: ['HS256'],
        clockTolerance: 0,
      });
    } catch (error) {
      const cause = toError(error);
      if (cause.name === 'TokenExpiredError') {
        this.logger.warn('JWT verification failed: token expired');
        return err(ERRORS.ExpiredToken(cause));
      }
      this.logger.warn(`JWT verification failed: ${cause.name} - ${cause.message}`);
      return err(ERRORS.InvalidToken(cause));
    }

    const { sub, exp, iat } = payload;
    if (!isWholeNumber(sub) || !isWholeNumber(exp)) {
      this.logger.warn('JWT verification failed: malformed claims');
      return err(ERRORS.InvalidToken());
    }

    return ok({ ...payload, sub, exp, iat: isWholeNumber(iat) ? iat : undefined });
  }

  private defaultExpiry(): Date {
    return new Date(Date.now() + this.ttlSeconds * 1000);
  }
}

function isWholeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}
