import { Request } from 'express';
import { Result } from 'neverthrow';
import { ApiError } from '@todos/common/errors';
import { HeaderBag } from '@todos/common/http';
import { Principal, StoredIdentity } from '@todos/common/types';

export type AuthorizationResult = Result<Principal, ApiError>;

/**
 * Express request as seen by handlers behind AuthGuard.
 * Both fields live and die with the request object.
 */
export interface AuthenticatedRequest extends Request {
  principal?: Principal;
  authorization?: Promise<AuthorizationResult>;
}

/**
 * The part of a request the authorizer reads and memoizes on.
 */
export interface AuthorizableRequest {
  readonly headers: HeaderBag;
  authorization?: Promise<AuthorizationResult>;
}

export function toPrincipal(identity: StoredIdentity): Principal {
  return {
    id: identity.id,
    name: identity.name,
    email: identity.email,
  };
}
