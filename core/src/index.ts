/**
 * @fibermeta/core
 *
 * Catalog for a fiber-partitioned storage connector. Tracks databases, tables
 * and columns in a relational store, maps them onto directories, and resolves
 * each table's fiber partitioning for scan pruning.
 *
 * @example
 * ```ts
 * import {
 *   LocalStorageDirectories,
 *   SqliteCatalogDatabase,
 *   openCatalogStore,
 * } from '@fibermeta/core';
 *
 * const store = await openCatalogStore({
 *   db: SqliteCatalogDatabase.open('catalog.db'),
 *   storage: new LocalStorageDirectories(),
 *   storageRoot: '/data/warehouse',
 * });
 *
 * await store.createTable(
 *   {
 *     schema: 'default',
 *     name: 'readings',
 *     columns: [
 *       { name: 'device', type: 'varchar(64)' },
 *       { name: 'ts', type: 'timestamp' },
 *       { name: 'value', type: 'double' },
 *     ],
 *   },
 *   { fiberKey: 'device', function: 'function0', timeKey: 'ts' }
 * );
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export type {
  SimpleTypeName,
  SimpleType,
  VarcharType,
  CharType,
  DecimalType,
  UnknownType,
  StructuredType,
  ParsedType,
  ColumnRole,
  StorageFormat,
  DatabaseData,
  SchemaTableName,
  TableHandle,
  ColumnHandle,
  ColumnMetadata,
  ColumnDefinition,
  TableMetadata,
  FiberPartitioning,
  FiberData,
  FiberFile,
  FiberFileFilter,
} from './types.js';

export { COLUMN_ROLES, STORAGE_FORMATS, DEFAULT_STORAGE_FORMAT } from './metadata/types.js';

// ============================================================================
// Type Translation
// ============================================================================

export {
  UNKNOWN_TYPE,
  MAX_VARCHAR_LENGTH,
  MAX_CHAR_LENGTH,
  MAX_DECIMAL_PRECISION,
  parseType,
  requireType,
  isUnknownType,
  formatType,
  typesEqual,
} from './metadata/type-translator.js';

// ============================================================================
// Partition Functions
// ============================================================================

export {
  type FiberColumnValue,
  type PartitionFunction,
  type PartitionFunctionFactory,
  type ParsedFunctionName,
  DEFAULT_PARTITION_FUNCTION,
  FUNCTION0_BUCKETS,
  parseFunctionName,
  formatFunctionName,
  createBucketFunction,
  identityFunction,
  function0,
  murmur3Hash32,
  PartitionFunctionRegistry,
  createDefaultRegistry,
} from './metadata/partition.js';

// ============================================================================
// Paths
// ============================================================================

export * from './utils/index.js';

// ============================================================================
// Catalog
// ============================================================================

export * from './catalog/index.js';

// ============================================================================
// Errors and Logging
// ============================================================================

export {
  CatalogErrorCode,
  CatalogError,
  formName,
  DatabaseNotFoundError,
  TableNotFoundError,
  ColumnsNotFoundError,
  AmbiguousRecordError,
  InvalidTypeError,
  InvalidColumnRoleError,
  UnsupportedFunctionError,
  InvalidInputError,
  DatabaseAlreadyExistsError,
  TableAlreadyExistsError,
  FiberFileAlreadyExistsError,
  CorruptedCatalogError,
  StorageError,
  isUniqueConstraintError,
} from './errors.js';

export {
  createLogger,
  silentLogger,
  type Logger,
  type Level,
  type LevelWithSilent,
  type LoggerOptions,
} from './logging.js';
