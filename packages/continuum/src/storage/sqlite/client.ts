/**
 * SQLite Client Wrapper
 *
 * Wraps better-sqlite3 with WAL mode and foreign key support.
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType, Statement } from 'better-sqlite3';

/**
 * SQLite client configuration
 */
export interface SQLiteClientConfig {
  /** Path to the database file, or ':memory:' */
  dbPath: string;
  /** Enable WAL mode (default: true) */
  walMode?: boolean;
  /** Enable foreign keys (default: true) */
  foreignKeys?: boolean;
  /** Milliseconds to wait on a locked database (default: 5000) */
  busyTimeoutMs?: number;
  /** Log every statement */
  verbose?: boolean;
}

export type TransactionMode = 'deferred' | 'immediate';

/**
 * SQLite client wrapper
 */
export class SQLiteClient {
  private db: DatabaseType;
  private readonly config: Required<SQLiteClientConfig>;

  constructor(config: SQLiteClientConfig) {
    this.config = {
      dbPath: config.dbPath,
      walMode: config.walMode ?? true,
      foreignKeys: config.foreignKeys ?? true,
      busyTimeoutMs: config.busyTimeoutMs ?? 5000,
      verbose: config.verbose ?? false,
    };

    this.db = new Database(this.config.dbPath, {
      verbose: this.config.verbose ? (message?: unknown) => console.log('[continuum:sql]', message) : undefined,
    });

    // WAL is meaningless for in-memory databases
    if (this.config.walMode && this.config.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    if (this.config.foreignKeys) {
      this.db.pragma('foreign_keys = ON');
    }
    this.db.pragma(`busy_timeout = ${this.config.busyTimeoutMs}`);
  }

  /**
   * Get the underlying database instance
   */
  get database(): DatabaseType {
    return this.db;
  }

  /**
   * Execute raw SQL
   */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  /**
   * Prepare a statement whose rows have the given shape
   */
  prepare<Row = unknown>(sql: string): Statement<unknown[], Row> {
    return this.db.prepare<unknown[], Row>(sql);
  }

  /**
   * Run a transaction; immediate mode takes the write lock up front
   */
  transaction<T>(fn: () => T, mode: TransactionMode = 'deferred'): T {
    const tx = this.db.transaction(fn);
    return mode === 'immediate' ? tx.immediate() : tx();
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
