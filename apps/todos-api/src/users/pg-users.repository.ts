import { Injectable, Logger } from '@nestjs/common';
import { err, ok, Result } from 'neverthrow';
import { DatabaseService, isUniqueViolation } from '@todos/common/database';
import { ApiError, ERRORS, toError } from '@todos/common/errors';
import { NewIdentity, StoredIdentity } from '@todos/common/types';
import { EMAIL_TAKEN, identityViolations, UsersRepository } from './users.repository';

interface UserRow {
  id: number;
  name: string;
  email: string;
  password_digest: string;
}

const USER_COLUMNS = 'id, name, email, password_digest';

@Injectable()
export class PgUsersRepository extends UsersRepository {
  private readonly logger = new Logger(PgUsersRepository.name);

  constructor(private databaseService: DatabaseService) {
    super();
  }

  async findById(id: number): Promise<StoredIdentity | null> {
    const row = await this.databaseService.queryOne<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id],
    );
    return row ? toIdentity(row) : null;
  }

  async findByEmail(email: string): Promise<StoredIdentity | null> {
    const row = await this.databaseService.queryOne<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email],
    );
    return row ? toIdentity(row) : null;
  }

  async create(identity: NewIdentity): Promise<Result<StoredIdentity, ApiError>> {
    const violations = identityViolations(identity);
    if (violations.length > 0) {
      return err(ERRORS.ValidationFailed(violations));
    }

    // Unique constraint on email prevents duplicates
    let row: UserRow | null;
    try {
      row = await this.databaseService.queryOne<UserRow>(
        `INSERT INTO users (name, email, password_digest)
         VALUES ($1, $2, $3)
         RETURNING ${USER_COLUMNS}`,
        [identity.name, identity.email, identity.passwordDigest],
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        return err(ERRORS.ValidationFailed([EMAIL_TAKEN], toError(error)));
      }
      throw error;
    }

    if (!row) {
      throw new Error('INSERT INTO users returned no row');
    }

    this.logger.log(`User created: ${row.id}`);
    return ok(toIdentity(row));
  }
}

function toIdentity(row: UserRow): StoredIdentity {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    passwordDigest: row.password_digest,
  };
}
