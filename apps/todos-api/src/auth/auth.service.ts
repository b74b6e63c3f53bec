/**
 * Auth Service
 * Turns credentials into tokens (login) and creates identities (signup)
 */

import { Injectable, Logger } from '@nestjs/common';
import { err, ok, Result } from 'neverthrow';
import { PasswordService } from '@todos/common/crypto';
import { ApiError, ERRORS } from '@todos/common/errors';
import { JwtService } from '@todos/common/jwt';
import { Credentials, StoredIdentity } from '@todos/common/types';
import { UsersRepository } from '../users/users.repository';
import { CredentialVerifier } from './credential-verifier.service';

export interface SignupInput extends Credentials {
  name: string;
  passwordConfirmation: string;
}

export interface SignupOutcome {
  user: StoredIdentity;
  authToken: string;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private credentialVerifier: CredentialVerifier,
    private usersRepository: UsersRepository,
    private passwordService: PasswordService,
    private jwtService: JwtService,
  ) {}

  /**
   * Verify credentials and issue a token for the identity
   */
  async login(email: string, password: string): Promise<Result<string, ApiError>> {
    const identity = await this.credentialVerifier.verify(email, password);
    if (identity.isErr()) {
      return err(identity.error);
    }

    this.logger.log(`User logged in: ${identity.value.id}`);
    return ok(this.jwtService.encode({ sub: identity.value.id }));
  }

  /**
   * Create the identity, then log in with the same credentials
   */
  async signup(input: SignupInput): Promise<Result<SignupOutcome, ApiError>> {
    const violations: string[] = [];
    if (!input.password) {
      violations.push("Password can't be blank");
    } else if (input.password !== input.passwordConfirmation) {
      violations.push("Password confirmation doesn't match Password");
    }
    if (violations.length > 0) {
      return err(ERRORS.ValidationFailed(violations));
    }

    const passwordDigest = await this.passwordService.hash(input.password);
    const created = await this.usersRepository.create({
      name: input.name,
      email: input.email,
      passwordDigest,
    });
    if (created.isErr()) {
      return err(created.error);
    }

    const token = await this.login(input.email, input.password);
    return token.map((authToken) => ({ user: created.value, authToken }));
  }
}
