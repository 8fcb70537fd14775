/**
 * Storage Directories
 *
 * The catalog only needs one capability from physical storage: creating the
 * directory that backs a database or table. Creation must be idempotent, so
 * a retried create reuses a directory left behind by an earlier attempt.
 */

import { mkdir } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

/** Directory-creation capability */
export interface StorageDirectories {
  /** Create the directory and any missing parents; succeed if it exists */
  mkdirs(path: string): Promise<void>;
}

const PROTOCOL_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//;

/**
 * StorageDirectories on the local filesystem.
 * Accepts plain paths and `file://` URLs.
 */
export class LocalStorageDirectories implements StorageDirectories {
  async mkdirs(path: string): Promise<void> {
    await mkdir(toLocalPath(path), { recursive: true });
  }
}

/**
 * Convert a storage path to a local filesystem path.
 * @throws Error for URLs of any scheme other than file
 */
export function toLocalPath(path: string): string {
  const protocol = path.match(PROTOCOL_PATTERN);
  if (!protocol) {
    return path;
  }
  if (protocol[1].toLowerCase() !== 'file') {
    throw new Error(`Local storage cannot create ${protocol[1]} paths: ${path}`);
  }
  return fileURLToPath(path);
}
