/**
 * Credential Verifier
 * Checks an email/password pair against stored identities
 */

import { Injectable, Logger } from '@nestjs/common';
import { err, ok, Result } from 'neverthrow';
import { PasswordService } from '@todos/common/crypto';
import { ApiError, ERRORS } from '@todos/common/errors';
import { StoredIdentity } from '@todos/common/types';
import { UsersRepository } from '../users/users.repository';

@Injectable()
export class CredentialVerifier {
  private readonly logger = new Logger(CredentialVerifier.name);

  constructor(
    private usersRepository: UsersRepository,
    private passwordService: PasswordService,
  ) {}

  /**
   * Unknown email, empty password and wrong password all fail the same way
   */
  async verify(email: string, password: string): Promise<Result<StoredIdentity, ApiError>> {
    const identity = await this.usersRepository.findByEmail(email);

    if (!identity || !password) {
      return err(ERRORS.InvalidCredentials());
    }

    const isValid = await this.passwordService.verify(identity.passwordDigest, password);
    if (!isValid) {
      return err(ERRORS.InvalidCredentials());
    }

    this.logger.debug(`Credentials verified for user ${identity.id}`);
    return ok(identity);
  }
}
