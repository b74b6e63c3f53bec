import { ConfigService } from '@nestjs/config';
import { JwtService as NestJwtService } from '@nestjs/jwt';
import { JwtService } from '@todos/common/jwt';

export const TEST_JWT_SECRET = 'test-secret';

export function createJwtService(tokenTtlSeconds = 86400): JwtService {
  return new JwtService(
    new NestJwtService({ secret: TEST_JWT_SECRET, signOptions: { algorithm: 'HS256' } }),
    new ConfigService({ tokenTtlSeconds }),
  );
}
