/**
 * Users Module
 * Stored identity persistence
 */

import { Module } from '@nestjs/common';
import { DatabaseModule } from '@todos/common/database';
import { PgUsersRepository } from './pg-users.repository';
import { UsersRepository } from './users.repository';

@Module({
  imports: [DatabaseModule],
  providers: [{ provide: UsersRepository, useClass: PgUsersRepository }],
  exports: [UsersRepository],
})
export class UsersModule {}
