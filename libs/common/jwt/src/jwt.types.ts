/**
 * Todos JWT Types
 */

export const DEFAULT_TOKEN_TTL_SECONDS = 24 * 60 * 60; // 24 hours

/**
 * Claims embedded in an auth token.
 * `sub` is the numeric id of the stored identity.
 */
export interface TokenClaims {
  sub: number;
  exp: number; // expiration timestamp (seconds)
  iat?: number; // issued at timestamp (seconds)
  [claim: string]: unknown;
}

/**
 * Claims supplied by callers. `exp` is always set by the codec.
 */
export interface TokenPayload {
  sub: number;
  [claim: string]: unknown;
}
