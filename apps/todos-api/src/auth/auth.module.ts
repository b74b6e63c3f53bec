/**
 * Auth Module
 * Credential verification, token issuance and request authorization
 */

import { Module } from '@nestjs/common';
import { CryptoModule } from '@todos/common/crypto';
import { JwtModule } from '@todos/common/jwt';
import { UsersModule } from '../users/users.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { CredentialVerifier } from './credential-verifier.service';
import { RequestAuthorizer } from './request-authorizer.service';
import { AuthGuard } from './guards/auth.guard';

@Module({
  imports: [CryptoModule, JwtModule, UsersModule],
  controllers: [AuthController],
  providers: [AuthService, CredentialVerifier, RequestAuthorizer, AuthGuard],
  exports: [RequestAuthorizer, AuthGuard],
})
export class AuthModule {}
