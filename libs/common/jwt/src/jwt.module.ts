/**
 * Todos JWT Module
 * Provides JWT encoding/decoding services
 */

import { Module } from '@nestjs/common';
import { JwtModule as NestJwtModule } from '@nestjs/jwt';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { JwtService } from './jwt.service';

@Module({
  imports: [
    ConfigModule,
    NestJwtModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const secret = config.get<string>('jwtSecret');

        if (!secret) {
          throw new Error('JWT secret is required. Set JWT_SECRET in environment');
        }

        return {
          secret,
          signOptions: {
            // NOTE: no expiresIn here - exp is always set explicitly in claims
            algorithm: 'HS256',
          },
        };
      },
    }),
  ],
  providers: [JwtService],
  exports: [JwtService],
})
export class JwtModule {}
