/**
 * Todos API - App Module
 * Root module
 */

import { Module } from '@nestjs/common';
import { TodosConfigModule } from '@todos/common/config';
import { DatabaseModule } from '@todos/common/database';
import { CryptoModule } from '@todos/common/crypto';
import { JwtModule } from '@todos/common/jwt';
import { ApiVersioningModule } from '@todos/common/versioning';
import { AuthModule } from './auth/auth.module';
import { UsersModule } from './users/users.module';
import { TodosModule } from './todos/todos.module';
import { HealthController } from './health.controller';
import { API_VERSION_ROUTES, assertControllerVersions } from './versioning/api-versions';

@Module({
  imports: [
    TodosConfigModule,
    DatabaseModule,
    CryptoModule,
    JwtModule,
    ApiVersioningModule.forRoot({
      routes: API_VERSION_ROUTES,
      strictOrdering: true,
      validateBinding: assertControllerVersions,
    }),
    UsersModule,
    AuthModule,
    TodosModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
