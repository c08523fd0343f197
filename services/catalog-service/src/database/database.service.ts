/**
 * Owns the SQLite connection and the drizzle handle built on it.
 *
 * Writes go through `transaction()`, which opens a BEGIN IMMEDIATE transaction:
 * the write lock is taken up front, so two writers never both read a snapshot
 * and then race to commit. better-sqlite3 runs the callback synchronously,
 * which also serialises writers inside one process.
 */

import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import { sql } from 'drizzle-orm';
import { BetterSQLite3Database, drizzle } from 'drizzle-orm/better-sqlite3';
import { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { existsSync, mkdirSync, readFileSync } from 'fs';
import path from 'path';
import * as schema from './schema';
import {
  CatalogError,
  ConfigurationException,
  StorageException,
} from '../common/exceptions';

export type CatalogSchema = typeof schema;

/** The database handle or an open transaction; repositories accept either. */
export type CatalogExecutor = BaseSQLiteDatabase<'sync', Database.RunResult, CatalogSchema>;

export const IN_MEMORY_DATABASE = ':memory:';

const SCHEMA_FILE = path.resolve(__dirname, '..', '..', 'sql', 'schema.sql');

const CONTENTION_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED']);

export function toStorageException(error: unknown, operation: string): CatalogError {
  if (error instanceof CatalogError) {
    return error;
  }
  if (error instanceof Database.SqliteError) {
    return new StorageException(`${operation} failed: ${error.message}`, operation, {
      retryable: CONTENTION_CODES.has(error.code),
      originalError: error,
      context: { additionalData: { code: error.code } },
    });
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  return new StorageException(`${operation} failed: ${cause.message}`, operation, {
    originalError: cause,
  });
}

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private connection: Database.Database | null = null;
  private handle: BetterSQLite3Database<CatalogSchema> | null = null;

  constructor(private readonly configService: ConfigService) {}

  onModuleInit() {
    const filename = this.configService.get<string>('database.path', 'data/catalog.db');
    const busyTimeoutMs = this.configService.get<number>('database.busyTimeoutMs', 5000);
    this.open(filename, busyTimeoutMs);
  }

  onModuleDestroy() {
    if (this.connection) {
      this.connection.close();
      this.logger.log('Database connection closed');
    }
    this.connection = null;
    this.handle = null;
  }

  get db(): CatalogExecutor {
    if (!this.handle) {
      throw new StorageException('Database is not open', 'connect');
    }
    return this.handle;
  }

  /**
   * Runs `work` inside one immediate transaction. Anything thrown rolls the
   * transaction back; driver errors are rethrown as StorageException.
   */
  transaction<T>(operation: string, work: (tx: CatalogExecutor) => T): T {
    const db = this.db;
    try {
      return db.transaction((tx) => work(tx), { behavior: 'immediate' });
    } catch (error) {
      throw toStorageException(error, operation);
    }
  }

  /**
   * Runs reads inside one deferred transaction, so every statement in `work`
   * sees the same snapshot. Driver errors are normalised as in `transaction()`.
   */
  read<T>(operation: string, work: (db: CatalogExecutor) => T): T {
    const db = this.db;
    try {
      return db.transaction((tx) => work(tx), { behavior: 'deferred' });
    } catch (error) {
      throw toStorageException(error, operation);
    }
  }

  isHealthy(): boolean {
    if (!this.handle) return false;
    try {
      this.handle.get(sql`select 1`);
      return true;
    } catch (error) {
      this.logger.error(`Database health check failed: ${error instanceof Error ? error.message : error}`);
      return false;
    }
  }

  private open(filename: string, busyTimeoutMs: number): void {
    if (!existsSync(SCHEMA_FILE)) {
      throw new ConfigurationException(`Schema file not found at ${SCHEMA_FILE}`, 'database.schema');
    }

    if (filename !== IN_MEMORY_DATABASE) {
      mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
    }

    const connection = new Database(filename, { timeout: busyTimeoutMs });
    connection.pragma('foreign_keys = ON');
    if (filename !== IN_MEMORY_DATABASE) {
      connection.pragma('journal_mode = WAL');
    }
    connection.exec(readFileSync(SCHEMA_FILE, 'utf8'));

    this.connection = connection;
    this.handle = drizzle(connection, { schema });
    this.logger.log(`Opened catalog database at ${filename}`);
  }
}
