/**
 * Opens the catalog store the service runs against.
 */

import {
  LocalStorageDirectories,
  SqliteCatalogDatabase,
  openCatalogStore,
  type CatalogStore,
  type Logger,
} from '@fibermeta/core';
import type { ServiceConfig } from './config.js';

/**
 * Open the SQLite catalog named by the configuration, with database
 * directories under its storage root, and bootstrap the schema.
 * @throws CorruptedCatalogError if the catalog holds only some tables
 * @throws StorageError if the default database directory cannot be created
 */
export async function openServiceStore(
  config: Pick<ServiceConfig, 'metaserverUri' | 'storageRoot'>,
  logger: Logger
): Promise<CatalogStore> {
  return openCatalogStore({
    db: SqliteCatalogDatabase.open(config.metaserverUri),
    storage: new LocalStorageDirectories(),
    storageRoot: config.storageRoot,
    logger,
  });
}
