/**
 * Catalog Module
 *
 * The catalog store, its schema bootstrap, and the backing-store and
 * storage-directory adapters it runs on.
 */

// ============================================================================
// Backing Store
// ============================================================================

export {
  type SqlValue,
  type RowSchema,
  type RunResult,
  type CatalogStatement,
  type CatalogDatabase,
  type SqliteDatabaseOptions,
  SqliteCatalogDatabase,
} from './database.js';

export {
  type StorageDirectories,
  LocalStorageDirectories,
  toLocalPath,
} from './storage.js';

// ============================================================================
// Schema Bootstrap
// ============================================================================

export {
  CATALOG_TABLES,
  CATALOG_TABLE_NAMES,
  SchemaState,
  SchemaBootstrapper,
  type SchemaBootstrapOptions,
} from './schema.js';

// ============================================================================
// Catalog Store
// ============================================================================

export {
  CatalogStore,
  openCatalogStore,
  DEFAULT_DATABASE,
  DEFAULT_OWNER,
  type CatalogStoreOptions,
  type CreateDatabaseOptions,
  type TableLayout,
} from './store.js';
