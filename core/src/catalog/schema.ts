/**
 * Catalog Schema Bootstrap
 *
 * Checks the backing store for the catalog tables before the store is used.
 * A fresh store gets every table in one atomic batch; a store holding only
 * some of the tables is corrupted and startup aborts.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { CorruptedCatalogError } from '../errors.js';
import type { CatalogDatabase, CatalogStatement } from './database.js';

// ============================================================================
// Schema
// ============================================================================

/**
 * DDL for each required table, keyed by table name.
 * Uniqueness lives in separate indexes so each constraint can be named.
 */
export const CATALOG_TABLES: Readonly<Record<string, readonly string[]>> = Object.freeze({
  dbs: Object.freeze([
    `CREATE TABLE dbs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      comment TEXT NOT NULL DEFAULT '',
      owner TEXT NOT NULL,
      location TEXT NOT NULL
    )`,
    `CREATE UNIQUE INDEX dbs_name_unique ON dbs(name)`,
  ]),
  tbls: Object.freeze([
    `CREATE TABLE tbls (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      db_id INTEGER NOT NULL REFERENCES dbs(id),
      db_name TEXT NOT NULL,
      name TEXT NOT NULL,
      location TEXT NOT NULL,
      storage TEXT NOT NULL,
      fib_k TEXT,
      fib_func TEXT,
      time_k TEXT
    )`,
    `CREATE UNIQUE INDEX tbls_db_name_unique ON tbls(db_id, name)`,
  ]),
  cols: Object.freeze([
    `CREATE TABLE cols (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      tbl_id INTEGER NOT NULL REFERENCES tbls(id),
      tbl_name TEXT NOT NULL,
      db_name TEXT NOT NULL,
      name TEXT NOT NULL,
      data_type TEXT NOT NULL,
      col_type TEXT NOT NULL
    )`,
    `CREATE UNIQUE INDEX cols_tbl_name_unique ON cols(tbl_id, name)`,
  ]),
  fibers: Object.freeze([
    `CREATE TABLE fibers (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      tbl_id INTEGER NOT NULL REFERENCES tbls(id),
      fiber_v INTEGER NOT NULL
    )`,
    `CREATE UNIQUE INDEX fibers_tbl_value_unique ON fibers(tbl_id, fiber_v)`,
  ]),
  fiberfiles: Object.freeze([
    `CREATE TABLE fiberfiles (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      fiber_id INTEGER NOT NULL REFERENCES fibers(id),
      time_b INTEGER NOT NULL,
      time_e INTEGER NOT NULL,
      path TEXT NOT NULL
    )`,
    `CREATE UNIQUE INDEX fiberfiles_path_unique ON fiberfiles(path)`,
    `CREATE INDEX fiberfiles_fiber_time ON fiberfiles(fiber_id, time_b, time_e)`,
  ]),
});

/** Names of the required tables */
export const CATALOG_TABLE_NAMES: readonly string[] = Object.freeze(Object.keys(CATALOG_TABLES));

// ============================================================================
// Bootstrapper
// ============================================================================

/** How many of the required tables the store holds */
export enum SchemaState {
  Absent = 'absent',
  Complete = 'complete',
  Partial = 'partial',
}

/** Options for {@link SchemaBootstrapper} */
export interface SchemaBootstrapOptions {
  logger: Logger;
  /**
   * Called before a fresh schema is created. The returned statements commit
   * in the same batch as the tables, so seed rows exist exactly when the
   * tables do.
   */
  seed?: () => Promise<readonly CatalogStatement[]>;
}

const tableNameRow = z.object({ name: z.string() });

/**
 * Brings a backing store to the complete catalog schema.
 */
export class SchemaBootstrapper {
  constructor(
    private readonly db: CatalogDatabase,
    private readonly options: SchemaBootstrapOptions
  ) {}

  /**
   * Report which required tables exist.
   */
  async verify(): Promise<SchemaState> {
    const present = await this.presentTables();
    if (present.length === 0) {
      return SchemaState.Absent;
    }
    return present.length === CATALOG_TABLE_NAMES.length ? SchemaState.Complete : SchemaState.Partial;
  }

  /**
   * Create the schema if absent; do nothing if complete.
   * @throws CorruptedCatalogError if only some tables exist
   */
  async run(): Promise<SchemaState> {
    const present = await this.presentTables();
    const { logger } = this.options;

    if (present.length === CATALOG_TABLE_NAMES.length) {
      logger.info({ tables: present }, 'catalog schema is complete');
      return SchemaState.Complete;
    }

    if (present.length > 0) {
      const missing = CATALOG_TABLE_NAMES.filter((name) => !present.includes(name));
      logger.error({ present, missing }, 'catalog schema is partial');
      throw new CorruptedCatalogError(present, missing);
    }

    const seed = this.options.seed ? await this.options.seed() : [];
    const statements = CATALOG_TABLE_NAMES.flatMap((name) =>
      CATALOG_TABLES[name].map((ddl) => this.db.prepare(ddl))
    );
    await this.db.batch([...statements, ...seed]);
    logger.info({ tables: CATALOG_TABLE_NAMES, seeded: seed.length }, 'created catalog schema');

    return SchemaState.Absent;
  }

  private async presentTables(): Promise<string[]> {
    const placeholders = CATALOG_TABLE_NAMES.map(() => '?').join(', ');
    const rows = await this.db
      .prepare(
        `SELECT name FROM sqlite_master WHERE type = 'table' AND name IN (${placeholders}) ORDER BY name`
      )
      .bind(...CATALOG_TABLE_NAMES)
      .all(tableNameRow);
    return rows.map((row) => row.name);
  }
}
