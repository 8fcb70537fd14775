/**
 * Catalog Database Client
 *
 * The narrow relational-store interface the catalog runs on, a prepared
 * statement API (prepare / bind / all / first / run / batch), and its
 * implementation on top of better-sqlite3.
 *
 * Rows come back as unknown values from the driver; every read takes a zod
 * schema that validates the row shape.
 */

import Database from 'better-sqlite3';
import type { z } from 'zod';

// ============================================================================
// Interface
// ============================================================================

/** Values that can be bound to a statement placeholder */
export type SqlValue = string | number | bigint | null;

/** Schema that validates a single result row */
export type RowSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** Outcome of a write statement */
export interface RunResult {
  /** Number of rows changed */
  changes: number;
  /** Row id of the last inserted row */
  lastRowId: number;
}

/**
 * A prepared statement. `bind` returns a new statement with its values set;
 * placeholders are bound by position.
 */
export interface CatalogStatement {
  bind(...values: SqlValue[]): CatalogStatement;
  all<T>(schema: RowSchema<T>): Promise<T[]>;
  first<T>(schema: RowSchema<T>): Promise<T | null>;
  run(): Promise<RunResult>;
}

/**
 * Relational store client used by the catalog.
 */
export interface CatalogDatabase {
  /** Prepare a single SQL statement */
  prepare(query: string): CatalogStatement;
  /** Run statements in order inside one transaction; nothing is kept if any fails */
  batch(statements: readonly CatalogStatement[]): Promise<RunResult[]>;
  /** Release the connection */
  close(): Promise<void>;
}

// ============================================================================
// SQLite Implementation
// ============================================================================

/** Options for opening a SQLite catalog database */
export interface SqliteDatabaseOptions {
  /** Open the file read-only */
  readonly?: boolean;
  /** Fail instead of creating a missing file */
  fileMustExist?: boolean;
  /** Milliseconds to wait on a locked database */
  timeout?: number;
}

/**
 * Statements are compiled when they run, so a batch may hold DDL that refers
 * to tables created earlier in the same batch.
 */
class SqliteStatement implements CatalogStatement {
  constructor(
    private readonly db: Database.Database,
    private readonly query: string,
    private readonly values: readonly SqlValue[] = []
  ) {}

  bind(...values: SqlValue[]): CatalogStatement {
    return new SqliteStatement(this.db, this.query, values);
  }

  async all<T>(schema: RowSchema<T>): Promise<T[]> {
    return this.compile().all(...this.values).map((row) => schema.parse(row));
  }

  async first<T>(schema: RowSchema<T>): Promise<T | null> {
    const row = this.compile().get(...this.values);
    return row === undefined ? null : schema.parse(row);
  }

  async run(): Promise<RunResult> {
    return this.execute();
  }

  /** Run synchronously; used inside transactions */
  execute(): RunResult {
    const result = this.compile().run(...this.values);
    return {
      changes: result.changes,
      lastRowId: Number(result.lastInsertRowid),
    };
  }

  private compile(): Database.Statement<SqlValue[]> {
    return this.db.prepare<SqlValue[]>(this.query);
  }
}

/**
 * CatalogDatabase backed by a better-sqlite3 connection.
 *
 * @example
 * ```ts
 * const db = SqliteCatalogDatabase.open('/var/lib/fibermeta/catalog.db');
 * const row = await db
 *   .prepare('SELECT name FROM dbs WHERE name = ?')
 *   .bind('default')
 *   .first(z.object({ name: z.string() }));
 * ```
 */
export class SqliteCatalogDatabase implements CatalogDatabase {
  constructor(private readonly db: Database.Database) {}

  /**
   * Open a database file, or an in-memory database for `:memory:`.
   */
  static open(filename: string, options: SqliteDatabaseOptions = {}): SqliteCatalogDatabase {
    const db = new Database(filename, options);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    return new SqliteCatalogDatabase(db);
  }

  prepare(query: string): CatalogStatement {
    return new SqliteStatement(this.db, query);
  }

  async batch(statements: readonly CatalogStatement[]): Promise<RunResult[]> {
    const owned = statements.map((statement) => {
      if (!(statement instanceof SqliteStatement)) {
        throw new TypeError('batch() only accepts statements prepared by this database');
      }
      return statement;
    });

    const runAll = this.db.transaction((items: SqliteStatement[]) =>
      items.map((item) => item.execute())
    );
    return runAll(owned);
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
