/**
 * Catalog Store
 *
 * CRUD over databases, tables, columns and fibers in the backing store.
 * Lookups by name must match exactly one row: zero rows is a NotFound
 * error and more than one is an Ambiguous error, since the unique indexes
 * should have made that impossible.
 *
 * Creates run in two phases. The physical directory is created first and
 * the metadata rows are written after it, so every row always has its
 * directory. A table row and its column rows are committed together.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import {
  AmbiguousRecordError,
  ColumnsNotFoundError,
  DatabaseAlreadyExistsError,
  DatabaseNotFoundError,
  FiberFileAlreadyExistsError,
  InvalidColumnRoleError,
  InvalidInputError,
  InvalidTypeError,
  StorageError,
  TableAlreadyExistsError,
  TableNotFoundError,
  UnsupportedFunctionError,
  formName,
  isUniqueConstraintError,
} from '../errors.js';
import { silentLogger } from '../logging.js';
import {
  createDefaultRegistry,
  type FiberColumnValue,
  type PartitionFunction,
  type PartitionFunctionRegistry,
} from '../metadata/partition.js';
import { formatType, isUnknownType, parseType } from '../metadata/type-translator.js';
import {
  COLUMN_ROLES,
  DEFAULT_STORAGE_FORMAT,
  STORAGE_FORMATS,
  type ColumnHandle,
  type ColumnMetadata,
  type ColumnRole,
  type DatabaseData,
  type FiberData,
  type FiberFile,
  type FiberFileFilter,
  type FiberPartitioning,
  type SchemaTableName,
  type StorageFormat,
  type StructuredType,
  type TableHandle,
  type TableMetadata,
} from '../metadata/types.js';
import { resolvePath, validatePathSegment } from '../utils/path-resolver.js';
import type { CatalogDatabase, CatalogStatement } from './database.js';
import { SchemaBootstrapper } from './schema.js';
import type { StorageDirectories } from './storage.js';

// ============================================================================
// Types
// ============================================================================

/** Options for {@link CatalogStore} */
export interface CatalogStoreOptions {
  /** Backing relational store */
  db: CatalogDatabase;
  /** Creates database and table directories */
  storage: StorageDirectories;
  /** Root every database directory is placed under */
  storageRoot: string;
  /** Partition functions tables may name, default built-ins */
  registry?: PartitionFunctionRegistry;
  logger?: Logger;
}

/** Options for {@link CatalogStore.createDatabase} */
export interface CreateDatabaseOptions {
  /** Default `db <name>` */
  comment?: string;
  /** Default `default` */
  owner?: string;
}

/** Resolved partitioning descriptor a scan is planned with */
export interface TableLayout {
  readonly table: TableHandle;
  readonly fiberColumn?: ColumnHandle;
  readonly timeColumn?: ColumnHandle;
  readonly partitionFunction?: PartitionFunction;
  readonly storageFormat: StorageFormat;
}

/** Name of the database every fresh catalog starts with */
export const DEFAULT_DATABASE = 'default';

/** Owner recorded when a database is created without one */
export const DEFAULT_OWNER = 'default';

// ============================================================================
// Row Schemas
// ============================================================================

const databaseRow = z.object({
  id: z.number(),
  name: z.string(),
  comment: z.string(),
  owner: z.string(),
  location: z.string(),
});

type DatabaseRow = z.infer<typeof databaseRow>;

const tableRow = z.object({
  id: z.number(),
  db_name: z.string(),
  name: z.string(),
  location: z.string(),
  storage: z.string(),
  fib_k: z.string().nullable(),
  fib_func: z.string().nullable(),
  time_k: z.string().nullable(),
});

type TableRow = z.infer<typeof tableRow>;

const columnRow = z.object({
  name: z.string(),
  data_type: z.string(),
  col_type: z.string(),
});

type ColumnRow = z.infer<typeof columnRow>;

const nameRow = z.object({ name: z.string() });

const tableNameRow = z.object({ db_name: z.string(), name: z.string() });

const fiberRow = z.object({ id: z.number(), fiber_v: z.number() });

const fiberFileRow = z.object({
  fiber_v: z.number(),
  time_b: z.number(),
  time_e: z.number(),
  path: z.string(),
});

function isColumnRole(value: string): value is ColumnRole {
  return COLUMN_ROLES.some((role) => role === value);
}

function isStorageFormat(value: string): value is StorageFormat {
  return STORAGE_FORMATS.some((format) => format === value);
}

// ============================================================================
// Catalog Store
// ============================================================================

/**
 * CatalogStore - metadata operations over a bootstrapped backing store.
 *
 * Obtain one through {@link openCatalogStore}, which brings the schema up to
 * date before handing the store out.
 */
export class CatalogStore {
  private readonly db: CatalogDatabase;
  private readonly storage: StorageDirectories;
  private readonly storageRoot: string;
  private readonly registry: PartitionFunctionRegistry;
  private readonly logger: Logger;

  constructor(options: CatalogStoreOptions) {
    this.db = options.db;
    this.storage = options.storage;
    this.storageRoot = options.storageRoot;
    this.registry = options.registry ?? createDefaultRegistry();
    this.logger = options.logger ?? silentLogger();
  }

  // ==========================================================================
  // Database Operations
  // ==========================================================================

  /**
   * List database names in name order.
   */
  async listDatabases(): Promise<string[]> {
    const rows = await this.db.prepare(`SELECT name FROM dbs ORDER BY name`).all(nameRow);
    this.logger.debug({ count: rows.length }, 'listed databases');
    return rows.map((row) => row.name);
  }

  /**
   * Load a database by exact name.
   * @throws DatabaseNotFoundError
   * @throws AmbiguousRecordError if more than one row matches
   */
  async getDatabase(name: string): Promise<DatabaseData> {
    const row = await this.findDatabase(name);
    return {
      name: row.name,
      comment: row.comment,
      owner: row.owner,
      location: row.location,
    };
  }

  /**
   * Create a database and its directory under the storage root.
   * @throws InvalidInputError if the name cannot be a directory
   * @throws StorageError if the directory cannot be created
   * @throws DatabaseAlreadyExistsError
   */
  async createDatabase(name: string, options: CreateDatabaseOptions = {}): Promise<DatabaseData> {
    const { database, insert } = await this.prepareDatabase(name, options);

    try {
      await insert.run();
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        throw new DatabaseAlreadyExistsError(name);
      }
      throw error;
    }

    this.logger.info({ db: name, location: database.location }, 'created database');
    return database;
  }

  /**
   * Create the `default` database directory and return the statement that
   * inserts its row, for the bootstrap batch to commit with the tables.
   * @throws StorageError if the directory cannot be created
   */
  async seedDefaultDatabase(): Promise<CatalogStatement[]> {
    const { insert } = await this.prepareDatabase(DEFAULT_DATABASE, {});
    return [insert];
  }

  // ==========================================================================
  // Table Operations
  // ==========================================================================

  /**
   * List tables, ordered by database then table name.
   * Each filter matches names exactly; an omitted filter matches everything.
   */
  async listTables(schemaFilter?: string, tableFilter?: string): Promise<SchemaTableName[]> {
    const schema = schemaFilter ?? null;
    const table = tableFilter ?? null;
    const rows = await this.db
      .prepare(
        `SELECT db_name, name FROM tbls
         WHERE (? IS NULL OR db_name = ?) AND (? IS NULL OR name = ?)
         ORDER BY db_name, name`
      )
      .bind(schema, schema, table, table)
      .all(tableNameRow);

    this.logger.debug({ schema, table, count: rows.length }, 'listed tables');
    return rows.map((row) => ({ schema: row.db_name, table: row.name }));
  }

  /**
   * Resolve a table to its handle.
   * @throws TableNotFoundError
   * @throws AmbiguousRecordError if more than one row matches
   */
  async getTableHandle(database: string, table: string): Promise<TableHandle> {
    return toTableHandle(await this.findTable(database, table));
  }

  /**
   * Resolve a table's partitioning descriptor.
   * @throws TableNotFoundError
   * @throws InvalidColumnRoleError if a key names no column of the table
   * @throws UnsupportedFunctionError if the stored function is not registered
   */
  async getTableLayout(database: string, table: string): Promise<TableLayout> {
    const row = await this.findTable(database, table);
    const qualified = formName(database, table);

    const fiberColumn = row.fib_k === null ? undefined : await this.findColumn(row, row.fib_k);
    const timeColumn = row.time_k === null ? undefined : await this.findColumn(row, row.time_k);

    let partitionFunction: PartitionFunction | undefined;
    if (row.fib_func !== null) {
      partitionFunction = this.registry.resolve(row.fib_func);
      if (!partitionFunction) {
        throw new UnsupportedFunctionError(row.fib_func);
      }
    }

    if (!isStorageFormat(row.storage)) {
      throw new InvalidInputError(`Table ${qualified} has unknown storage format: ${row.storage}`);
    }

    return {
      table: toTableHandle(row),
      fiberColumn,
      timeColumn,
      partitionFunction,
      storageFormat: row.storage,
    };
  }

  /**
   * Resolve every column of a table with its structured type and role.
   * @throws TableNotFoundError
   * @throws ColumnsNotFoundError if the table has no column rows
   * @throws InvalidTypeError if a stored type does not parse
   * @throws InvalidColumnRoleError if a stored role is not valid
   */
  async getColumns(database: string, table: string): Promise<ColumnHandle[]> {
    const row = await this.findTable(database, table);
    const rows = await this.db
      .prepare(`SELECT name, data_type, col_type FROM cols WHERE tbl_id = ? ORDER BY id`)
      .bind(row.id)
      .all(columnRow);

    if (rows.length === 0) {
      throw new ColumnsNotFoundError(database, table);
    }

    this.logger.debug({ db: database, table, count: rows.length }, 'loaded columns');
    return rows.map((column) => toColumnHandle(column));
  }

  /**
   * Describe a table's columns for query planning.
   */
  async getColumnMetadata(database: string, table: string): Promise<ColumnMetadata[]> {
    const columns = await this.getColumns(database, table);
    return columns.map((column) => ({
      name: column.name,
      type: column.type,
      comment: '',
      nullable: true,
      hidden: false,
    }));
  }

  /**
   * Create a table, its directory, and its columns.
   *
   * Everything is validated before any side effect. Partitioning counts as
   * requested when any of its fields is present; then both keys must name
   * supplied columns and the function must be registered.
   *
   * @throws InvalidInputError for bad names, empty or duplicate columns, or an unknown format
   * @throws InvalidTypeError for unparseable column types
   * @throws InvalidColumnRoleError for keys that name no column
   * @throws UnsupportedFunctionError for unregistered functions
   * @throws DatabaseNotFoundError
   * @throws StorageError if the directory cannot be created
   * @throws TableAlreadyExistsError
   */
  async createTable(metadata: TableMetadata, partitioning: FiberPartitioning = {}): Promise<TableHandle> {
    const { schema, name, columns } = metadata;
    validatePathSegment('database', schema);
    validatePathSegment('table', name);

    const types = validateColumns(metadata);
    const fiber = this.validatePartitioning(metadata, partitioning);

    const storageFormat = metadata.storageFormat ?? DEFAULT_STORAGE_FORMAT;
    if (!isStorageFormat(storageFormat)) {
      throw new InvalidInputError(`Unknown storage format: ${String(storageFormat)}`);
    }

    const database = await this.findDatabase(schema);
    const location = resolvePath(database.location, name);

    await this.createDirectory(location, { db: schema, table: name });

    const statements: CatalogStatement[] = [
      this.db
        .prepare(
          `INSERT INTO tbls (db_id, db_name, name, location, storage, fib_k, fib_func, time_k)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .bind(
          database.id,
          schema,
          name,
          location,
          storageFormat,
          fiber?.fiberKey ?? null,
          fiber?.function ?? null,
          fiber?.timeKey ?? null
        ),
      ...columns.map((column, index) => {
        const role: ColumnRole =
          column.name === fiber?.fiberKey ? 'fiber' : column.name === fiber?.timeKey ? 'time' : 'regular';
        return this.db
          .prepare(
            `INSERT INTO cols (tbl_id, tbl_name, db_name, name, data_type, col_type)
             SELECT id, ?, ?, ?, ?, ? FROM tbls WHERE db_id = ? AND name = ?`
          )
          .bind(name, schema, column.name, formatType(types[index]), role, database.id, name);
      }),
    ];

    try {
      await this.db.batch(statements);
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        throw new TableAlreadyExistsError(schema, name);
      }
      throw error;
    }

    this.logger.info(
      { db: schema, table: name, location, columns: columns.length, partitioned: fiber !== undefined },
      'created table'
    );
    return { schema, name, physicalPath: location };
  }

  // ==========================================================================
  // Fiber Operations
  // ==========================================================================

  /**
   * List the fibers of a table, ordered by value.
   * @throws TableNotFoundError
   */
  async listFibers(database: string, table: string): Promise<FiberData[]> {
    const row = await this.findTable(database, table);
    const rows = await this.db
      .prepare(`SELECT id, fiber_v FROM fibers WHERE tbl_id = ? ORDER BY fiber_v`)
      .bind(row.id)
      .all(fiberRow);
    return rows.map((fiber) => ({ id: fiber.id, value: fiber.fiber_v }));
  }

  /**
   * Register a data segment of a partitioned table.
   * The fiber row is created on first use.
   * @throws TableNotFoundError
   * @throws InvalidInputError if the table is unpartitioned or the segment is malformed
   * @throws FiberFileAlreadyExistsError if the path is already registered
   */
  async addFiberFile(database: string, table: string, file: FiberFile): Promise<FiberFile> {
    const row = await this.findTable(database, table);
    if (row.fib_k === null) {
      throw new InvalidInputError(`Table ${formName(database, table)} is not partitioned`);
    }
    validateFiberFile(file);

    try {
      await this.db.batch([
        this.db
          .prepare(
            `INSERT INTO fibers (tbl_id, fiber_v) VALUES (?, ?)
             ON CONFLICT (tbl_id, fiber_v) DO NOTHING`
          )
          .bind(row.id, file.fiberValue),
        this.db
          .prepare(
            `INSERT INTO fiberfiles (fiber_id, time_b, time_e, path)
             SELECT id, ?, ?, ? FROM fibers WHERE tbl_id = ? AND fiber_v = ?`
          )
          .bind(file.timeBegin, file.timeEnd, file.path, row.id, file.fiberValue),
      ]);
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        throw new FiberFileAlreadyExistsError(file.path);
      }
      throw error;
    }

    this.logger.info({ db: database, table, fiber: file.fiberValue, path: file.path }, 'added fiber file');
    return {
      fiberValue: file.fiberValue,
      timeBegin: file.timeBegin,
      timeEnd: file.timeEnd,
      path: file.path,
    };
  }

  /**
   * List the data segments of a table.
   * `from` and `to` keep the segments whose time range overlaps them.
   * @throws TableNotFoundError
   */
  async listFiberFiles(database: string, table: string, filter: FiberFileFilter = {}): Promise<FiberFile[]> {
    const row = await this.findTable(database, table);
    const fiber = filter.fiberValue ?? null;
    const from = filter.from ?? null;
    const to = filter.to ?? null;

    const rows = await this.db
      .prepare(
        `SELECT f.fiber_v, ff.time_b, ff.time_e, ff.path
         FROM fiberfiles ff JOIN fibers f ON f.id = ff.fiber_id
         WHERE f.tbl_id = ?
           AND (? IS NULL OR f.fiber_v = ?)
           AND (? IS NULL OR ff.time_e >= ?)
           AND (? IS NULL OR ff.time_b <= ?)
         ORDER BY f.fiber_v, ff.time_b, ff.path`
      )
      .bind(row.id, fiber, fiber, from, from, to, to)
      .all(fiberFileRow);

    this.logger.debug({ db: database, table, fiber, from, to, count: rows.length }, 'listed fiber files');
    return rows.map((file) => ({
      fiberValue: file.fiber_v,
      timeBegin: file.time_b,
      timeEnd: file.time_e,
      path: file.path,
    }));
  }

  /**
   * Map a fiber column value to its fiber with the table's partition function.
   * @throws UnsupportedFunctionError if the table has no partition function
   */
  async resolveFiberValue(database: string, table: string, value: FiberColumnValue): Promise<number> {
    const layout = await this.getTableLayout(database, table);
    if (!layout.partitionFunction) {
      throw new UnsupportedFunctionError('none');
    }
    return layout.partitionFunction.apply(value);
  }

  /**
   * Close the backing store.
   */
  async close(): Promise<void> {
    await this.db.close();
    this.logger.info('closed catalog store');
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async prepareDatabase(
    name: string,
    options: CreateDatabaseOptions
  ): Promise<{ database: DatabaseData; insert: CatalogStatement }> {
    validatePathSegment('database', name);

    const database: DatabaseData = {
      name,
      comment: options.comment ?? `db ${name}`,
      owner: options.owner ?? DEFAULT_OWNER,
      location: resolvePath(this.storageRoot, name),
    };

    await this.createDirectory(database.location, { db: name });

    const insert = this.db
      .prepare(`INSERT INTO dbs (name, comment, owner, location) VALUES (?, ?, ?, ?)`)
      .bind(database.name, database.comment, database.owner, database.location);
    return { database, insert };
  }

  private async findDatabase(name: string): Promise<DatabaseRow> {
    const rows = await this.db
      .prepare(`SELECT id, name, comment, owner, location FROM dbs WHERE name = ?`)
      .bind(name)
      .all(databaseRow);
    if (rows.length === 0) {
      throw new DatabaseNotFoundError(name);
    }
    if (rows.length > 1) {
      throw new AmbiguousRecordError('database', name, rows.length);
    }
    return rows[0];
  }

  private async findTable(database: string, table: string): Promise<TableRow> {
    const rows = await this.db
      .prepare(
        `SELECT id, db_name, name, location, storage, fib_k, fib_func, time_k
         FROM tbls WHERE db_name = ? AND name = ?`
      )
      .bind(database, table)
      .all(tableRow);
    if (rows.length === 0) {
      throw new TableNotFoundError(database, table);
    }
    if (rows.length > 1) {
      throw new AmbiguousRecordError('table', formName(database, table), rows.length);
    }
    return rows[0];
  }

  private async findColumn(table: TableRow, column: string): Promise<ColumnHandle> {
    const rows = await this.db
      .prepare(`SELECT name, data_type, col_type FROM cols WHERE tbl_id = ? AND name = ?`)
      .bind(table.id, column)
      .all(columnRow);
    const qualified = formName(table.db_name, table.name, column);
    if (rows.length === 0) {
      throw new InvalidColumnRoleError(`Partition column does not exist: ${qualified}`);
    }
    if (rows.length > 1) {
      throw new AmbiguousRecordError('column', qualified, rows.length);
    }
    return toColumnHandle(rows[0]);
  }

  private validatePartitioning(
    metadata: TableMetadata,
    partitioning: FiberPartitioning
  ): Required<FiberPartitioning> | undefined {
    const { fiberKey, timeKey } = partitioning;
    const fn = partitioning.function;
    if (fiberKey === undefined && timeKey === undefined && fn === undefined) {
      return undefined;
    }

    const names = new Set(metadata.columns.map((column) => column.name));
    if (fiberKey === undefined || !names.has(fiberKey)) {
      throw new InvalidColumnRoleError(`Fiber key is not a column of the table: ${fiberKey ?? '(none)'}`);
    }
    if (timeKey === undefined || !names.has(timeKey)) {
      throw new InvalidColumnRoleError(`Time key is not a column of the table: ${timeKey ?? '(none)'}`);
    }
    if (fiberKey === timeKey) {
      throw new InvalidColumnRoleError(`Fiber key and time key must differ: ${fiberKey}`);
    }
    const canonical = fn === undefined ? undefined : this.registry.canonicalName(fn);
    if (canonical === undefined) {
      throw new UnsupportedFunctionError(fn ?? '(none)');
    }
    return { fiberKey, function: canonical, timeKey };
  }

  private async createDirectory(path: string, context: Record<string, string>): Promise<void> {
    try {
      await this.storage.mkdirs(path);
    } catch (error) {
      this.logger.error({ ...context, path, err: error }, 'failed to create directory');
      throw new StorageError(path, error);
    }
  }
}

// ============================================================================
// Row Conversion
// ============================================================================

function toTableHandle(row: TableRow): TableHandle {
  return { schema: row.db_name, name: row.name, physicalPath: row.location };
}

function toColumnHandle(row: ColumnRow): ColumnHandle {
  const type = parseType(row.data_type);
  if (isUnknownType(type)) {
    throw new InvalidTypeError(row.data_type);
  }
  if (!isColumnRole(row.col_type)) {
    throw new InvalidColumnRoleError(`Invalid role for column ${row.name}: ${row.col_type}`);
  }
  return { name: row.name, type, role: row.col_type };
}

function validateColumns(metadata: TableMetadata): StructuredType[] {
  const { columns } = metadata;
  if (columns.length === 0) {
    throw new InvalidInputError(`Table ${formName(metadata.schema, metadata.name)} has no columns`);
  }

  const seen = new Set<string>();
  for (const column of columns) {
    if (column.name.trim() === '') {
      throw new InvalidInputError('Column name must not be empty');
    }
    if (seen.has(column.name)) {
      throw new InvalidInputError(`Duplicate column name: ${column.name}`);
    }
    seen.add(column.name);
  }

  return columns.map((column) => {
    const type = parseType(column.type);
    if (isUnknownType(type)) {
      throw new InvalidTypeError(column.type);
    }
    return type;
  });
}

function validateFiberFile(file: FiberFile): void {
  if (!Number.isSafeInteger(file.fiberValue) || file.fiberValue < 0) {
    throw new InvalidInputError(`Fiber value must be a non-negative integer: ${file.fiberValue}`);
  }
  if (!Number.isSafeInteger(file.timeBegin) || !Number.isSafeInteger(file.timeEnd)) {
    throw new InvalidInputError('Fiber file times must be integer epoch milliseconds');
  }
  if (file.timeBegin > file.timeEnd) {
    throw new InvalidInputError(
      `Fiber file time range is inverted: ${file.timeBegin} > ${file.timeEnd}`
    );
  }
  if (file.path.trim() === '') {
    throw new InvalidInputError('Fiber file path must not be empty');
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Bootstrap the catalog schema and return a ready store.
 * A fresh catalog is seeded with the `default` database.
 *
 * @throws CorruptedCatalogError if the backing store holds part of the schema
 *
 * @example
 * ```ts
 * const store = await openCatalogStore({
 *   db: SqliteCatalogDatabase.open('catalog.db'),
 *   storage: new LocalStorageDirectories(),
 *   storageRoot: '/data/warehouse',
 * });
 * await store.listDatabases(); // ['default']
 * ```
 */
export async function openCatalogStore(options: CatalogStoreOptions): Promise<CatalogStore> {
  const store = new CatalogStore(options);
  const bootstrapper = new SchemaBootstrapper(options.db, {
    logger: options.logger ?? silentLogger(),
    seed: () => store.seedDefaultDatabase(),
  });
  await bootstrapper.run();
  return store;
}
