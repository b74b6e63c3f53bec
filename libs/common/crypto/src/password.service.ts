/**
 * Todos Password Service
 * Argon2id password digests for stored identities
 */

import { Injectable, Logger } from '@nestjs/common';
import * as argon2 from 'argon2';
import { toError } from '@todos/common/errors';

@Injectable()
export class PasswordService {
  private readonly logger = new Logger(PasswordService.name);

  /**
   * Hash password using Argon2id
   * - time_cost: 2
   * - memory_cost: 65536 (64 MB)
   * - parallelism: 1
   * - hash_length: 32
   * - salt_length: 16
   */
  async hash(password: string): Promise<string> {
    try {
      return await argon2.hash(password, {
        type: argon2.argon2id,
        timeCost: 2,
        memoryCost: 65536, // 64 MB
        parallelism: 1,
        hashLength: 32,
        saltLength: 16,
      });
    } catch (error) {
      this.logger.error(`Password hashing failed: ${toError(error).message}`);
      throw new Error('Password hashing failed');
    }
  }

  /**
   * Verify password against a stored digest
   * A digest that cannot be parsed counts as a mismatch
   */
  async verify(digest: string, password: string): Promise<boolean> {
    try {
      return await argon2.verify(digest, password);
    } catch (error) {
      this.logger.error(`Password verification failed: ${toError(error).message}`);
      return false;
    }
  }
}
