/**
 * Todos API Configuration
 * Environment variables read once at startup
 */

import * as path from 'path';

export default () => ({
  // Database Configuration
  databaseDsn: process.env.DATABASE_URL,
  runMigrations: (process.env.RUN_MIGRATIONS ?? 'true') !== 'false',
  migrationsDir:
    process.env.MIGRATIONS_DIR || path.resolve(process.cwd(), 'libs/sql/migrations'),

  // Secrets (REQUIRED - no defaults for security)
  jwtSecret: process.env.JWT_SECRET,
  tokenTtlSeconds: parseInt(process.env.TOKEN_TTL_SECONDS || '86400', 10), // 24 hours

  // HTTP
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigin: process.env.CORS_ORIGIN,

  // Pagination is fixed, not negotiated per request
  pageSize: 20,
});
