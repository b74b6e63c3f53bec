/**
 * Todos Database Service
 * PostgreSQL connection pooling and query utilities
 */

import { Injectable, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import retry from 'async-retry';
import { toError } from '@todos/common/errors';
import { isTransientError } from './pg-errors';
import { withTransaction } from './with-transaction';

const RETRIES = 5;

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool?: Pool;

  constructor(private configService: ConfigService) {}

  async onModuleInit() {
    const dsn = this.configService.get<string>('databaseDsn');
    if (!dsn) {
      throw new Error('databaseDsn is required. Set DATABASE_URL in environment');
    }

    this.pool = new Pool({
      connectionString: dsn,
      max: 20,
      connectionTimeoutMillis: 60000,
      idleTimeoutMillis: 30000,
    });

    this.logger.log('Database pool initialized');
  }

  async onModuleDestroy() {
    await this.pool?.end();
  }

  /**
   * Get the connection pool
   */
  getPool(): Pool {
    if (!this.pool) {
      throw new Error('Database pool is not initialized');
    }
    return this.pool;
  }

  /**
   * Execute query with retry logic
   */
  async query<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params?: unknown[],
  ): Promise<QueryResult<T>> {
    return this.withRetry('Query', () => this.getPool().query<T>(sql, params));
  }

  /**
   * Execute query and return single row with retry logic
   */
  async queryOne<T extends QueryResultRow>(sql: string, params?: unknown[]): Promise<T | null> {
    const result = await this.query<T>(sql, params);
    return result.rows[0] ?? null;
  }

  /**
   * Execute query and return all rows with retry logic
   */
  async queryMany<T extends QueryResultRow>(sql: string, params?: unknown[]): Promise<T[]> {
    const result = await this.query<T>(sql, params);
    return result.rows;
  }

  /**
   * Run a callback inside a transaction on a dedicated client
   */
  async transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    return withTransaction(this.getPool(), fn);
  }

  private async withRetry<R>(label: string, operation: () => Promise<R>): Promise<R> {
    const outcome = await retry(
      async (bail): Promise<{ value: R } | undefined> => {
        try {
          return { value: await operation() };
        } catch (error) {
          if (!isTransientError(error)) {
            bail(toError(error));
            return undefined;
          }
          throw error;
        }
      },
      {
        retries: RETRIES,
        minTimeout: 1000, // 1 second
        maxTimeout: 10000, // 10 seconds
        onRetry: (error, attempt) => {
          this.logger.warn(
            `${label} retry attempt ${attempt}/${RETRIES}: ${toError(error).message}`,
          );
        },
      },
    );

    // bail() rejects the retry promise, so an empty outcome never gets here
    if (!outcome) {
      throw new Error(`${label} aborted`);
    }
    return outcome.value;
  }
}
