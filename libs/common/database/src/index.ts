export { DatabaseModule } from './database.module';
export { DatabaseService } from './database.service';
export { MigrationsService, Migration } from './migrations.service';
export { withTransaction, TransactionPool } from './with-transaction';
export { isTransientError, isUniqueViolation, pgErrorCode } from './pg-errors';
