import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DatabaseError } from '../domain/errors.js';
import { logger } from './logger.js';
import type { Env } from './env.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const IN_MEMORY = ':memory:';
const SCHEMA_VERSION = 1;

/**
 * SQLite database adapter for the job store
 * Repositories receive it by injection. The schema is applied once per
 * database file and tracked in `user_version`.
 */
export class DatabaseAdapter {
  private db: Database.Database;

  constructor(env: Pick<Env, 'SQLITE_DB_PATH'>) {
    try {
      if (env.SQLITE_DB_PATH !== IN_MEMORY) {
        mkdirSync(dirname(env.SQLITE_DB_PATH), { recursive: true });
        this.db = new Database(env.SQLITE_DB_PATH);
        this.db.pragma('journal_mode = WAL');
      } else {
        this.db = new Database(IN_MEMORY);
      }
      this.db.pragma('foreign_keys = ON');
      this.db.pragma('busy_timeout = 5000');
      this.applySchema();
      logger.info('Database initialized', { path: env.SQLITE_DB_PATH, schemaVersion: SCHEMA_VERSION });
    } catch (error) {
      throw new DatabaseError('Failed to initialize database', { error });
    }
  }

  private applySchema(): void {
    const current = this.db.pragma('user_version', { simple: true });
    if (current === SCHEMA_VERSION) {
      return;
    }

    const schema = readFileSync(join(__dirname, 'db', 'schema.sql'), 'utf-8');
    this.db.transaction(() => {
      this.db.exec(schema);
      this.db.pragma(`user_version = ${SCHEMA_VERSION}`);
    })();
    logger.debug('Database schema applied', { from: current, to: SCHEMA_VERSION });
  }

  query<T>(sql: string, params: unknown[] = []): T[] {
    try {
      return this.db.prepare<unknown[], T>(sql).all(...params);
    } catch (error) {
      logger.error('Database query failed', { sql, error });
      throw new DatabaseError('Query execution failed', { sql, error });
    }
  }

  queryOne<T>(sql: string, params: unknown[] = []): T | null {
    const [row] = this.query<T>(sql, params);
    return row ?? null;
  }

  /**
   * Runs an INSERT/UPDATE/DELETE and returns the number of affected rows
   */
  execute(sql: string, params: unknown[] = []): number {
    try {
      return this.db.prepare(sql).run(...params).changes;
    } catch (error) {
      logger.error('Database execute failed', { sql, error });
      throw new DatabaseError('Execute failed', { sql, error });
    }
  }

  /**
   * Runs `fn` atomically; any throw rolls back every statement it issued
   */
  transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (error) {
      logger.error('Transaction failed, rolling back', { error });
      throw error instanceof DatabaseError ? error : new DatabaseError('Transaction failed', { error });
    }
  }

  /**
   * Cheap liveness check for the health endpoint
   */
  ping(): boolean {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      logger.warn('Database ping failed', { error });
      return false;
    }
  }

  close(): void {
    this.db.close();
    logger.info('Database connection closed');
  }
}
