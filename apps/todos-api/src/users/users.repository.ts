/**
 * Users Repository
 * Storage of stored identities (the `users` table)
 */

import { Result } from 'neverthrow';
import { ApiError } from '@todos/common/errors';
import { NewIdentity, StoredIdentity } from '@todos/common/types';

export const EMAIL_TAKEN = 'Email has already been taken';

export abstract class UsersRepository {
  abstract findById(id: number): Promise<StoredIdentity | null>;

  /**
   * Exact (case-sensitive) email match
   */
  abstract findByEmail(email: string): Promise<StoredIdentity | null>;

  /**
   * Fails with ValidationError on a blank field or an email already in use
   */
  abstract create(identity: NewIdentity): Promise<Result<StoredIdentity, ApiError>>;
}

/**
 * Presence checks every repository applies before inserting.
 */
export function identityViolations(identity: NewIdentity): string[] {
  const violations: string[] = [];
  if (!identity.name?.trim()) {
    violations.push("Name can't be blank");
  }
  if (!identity.email?.trim()) {
    violations.push("Email can't be blank");
  }
  if (!identity.passwordDigest) {
    violations.push("Password digest can't be blank");
  }
  return violations;
}
