export { JwtModule } from './jwt.module';
export { JwtService } from './jwt.service';
export { DEFAULT_TOKEN_TTL_SECONDS, TokenClaims, TokenPayload } from './jwt.types';
