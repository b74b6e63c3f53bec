/**
 * Migrations Service
 * Applies SQL files from the migrations directory at startup, in lexical order
 */

import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as crypto from 'crypto';
import { DatabaseService } from './database.service';

export interface Migration {
  name: string;
  filename: string;
  sql: string;
  checksum: string;
}

interface AppliedMigrationRow {
  name: string;
  checksum: string;
}

@Injectable()
export class MigrationsService implements OnApplicationBootstrap {
  private readonly logger = new Logger(MigrationsService.name);

  constructor(
    private databaseService: DatabaseService,
    private configService: ConfigService,
  ) {}

  async onApplicationBootstrap() {
    if (!this.configService.get<boolean>('runMigrations')) {
      this.logger.log('Migrations disabled (RUN_MIGRATIONS=false)');
      return;
    }
    await this.migrate();
  }

  /**
   * Load all migration files (001_, 002_, ...)
   */
  async loadMigrations(): Promise<Migration[]> {
    const dir = this.configService.get<string>('migrationsDir');
    if (!dir) {
      throw new Error('migrationsDir is required');
    }

    const files = (await fs.readdir(dir)).filter((f) => f.endsWith('.sql')).sort();

    const migrations: Migration[] = [];
    for (const filename of files) {
      const sql = await fs.readFile(path.join(dir, filename), 'utf8');
      migrations.push({
        name: filename.replace(/\.sql$/, ''),
        filename,
        sql,
        checksum: crypto.createHash('sha256').update(sql).digest('hex'),
      });
    }
    return migrations;
  }

  /**
   * Apply pending migrations, each in its own transaction.
   * Returns the names of the migrations that ran.
   */
  async migrate(): Promise<string[]> {
    const migrations = await this.loadMigrations();

    await this.databaseService.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
         name text PRIMARY KEY,
         checksum text NOT NULL,
         applied_at timestamptz NOT NULL DEFAULT now()
       )`,
    );

    const applied = await this.databaseService.queryMany<AppliedMigrationRow>(
      'SELECT name, checksum FROM schema_migrations',
    );
    const appliedByName = new Map(applied.map((row) => [row.name, row.checksum]));

    const ran: string[] = [];
    for (const migration of migrations) {
      const checksum = appliedByName.get(migration.name);
      if (checksum !== undefined) {
        if (checksum !== migration.checksum) {
          this.logger.warn(
            `Migration ${migration.filename} changed after it was applied (checksum mismatch)`,
          );
        }
        continue;
      }

      await this.databaseService.transaction(async (client) => {
        await client.query(migration.sql);
        await client.query(
          'INSERT INTO schema_migrations (name, checksum) VALUES ($1, $2)',
          [migration.name, migration.checksum],
        );
      });

      this.logger.log(
        `Applied migration: ${migration.filename} (checksum: ${migration.checksum.substring(0, 8)}...)`,
      );
      ran.push(migration.name);
    }

    this.logger.log(`Migrations up to date (${ran.length} applied)`);
    return ran;
  }
}
