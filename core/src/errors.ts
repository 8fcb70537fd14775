/**
 * Catalog Error Classes
 *
 * Centralized error definitions for the fibermeta catalog.
 * Every error raised by the catalog extends CatalogError, which carries a
 * machine-readable code and the HTTP status the service layer answers with.
 *
 * @example
 * ```ts
 * import { CatalogError, CatalogErrorCode } from '@fibermeta/core';
 *
 * try {
 *   await store.getTableHandle('sales', 'orders');
 * } catch (error) {
 *   if (error instanceof CatalogError && error.code === CatalogErrorCode.NOT_FOUND) {
 *     // ...
 *   }
 * }
 * ```
 */

// ============================================================================
// Base Error
// ============================================================================

/** Catalog error codes for typed error handling */
export enum CatalogErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  AMBIGUOUS = 'AMBIGUOUS',
  INVALID_TYPE = 'INVALID_TYPE',
  INVALID_COLUMN_ROLE = 'INVALID_COLUMN_ROLE',
  UNSUPPORTED_FUNCTION = 'UNSUPPORTED_FUNCTION',
  ALREADY_EXISTS = 'ALREADY_EXISTS',
  CORRUPTED_CATALOG = 'CORRUPTED_CATALOG',
  INVALID_INPUT = 'INVALID_INPUT',
  STORAGE_ERROR = 'STORAGE_ERROR',
}

/**
 * Base error class for all catalog errors.
 */
export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly code: CatalogErrorCode,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = 'CatalogError';

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Form the dotted display name of a catalog entity.
 */
export function formName(...parts: string[]): string {
  return parts.join('.');
}

// ============================================================================
// Lookup Errors
// ============================================================================

/** Database not found error */
export class DatabaseNotFoundError extends CatalogError {
  constructor(readonly database: string) {
    super(`Database does not exist: ${database}`, CatalogErrorCode.NOT_FOUND, 404);
    this.name = 'DatabaseNotFoundError';
  }
}

/** Table not found error */
export class TableNotFoundError extends CatalogError {
  constructor(
    readonly database: string,
    readonly table: string
  ) {
    super(
      `Table does not exist: ${formName(database, table)}`,
      CatalogErrorCode.NOT_FOUND,
      404
    );
    this.name = 'TableNotFoundError';
  }
}

/** A table row exists but no column rows belong to it */
export class ColumnsNotFoundError extends CatalogError {
  constructor(
    readonly database: string,
    readonly table: string
  ) {
    super(
      `Table has no columns: ${formName(database, table)}`,
      CatalogErrorCode.NOT_FOUND,
      404
    );
    this.name = 'ColumnsNotFoundError';
  }
}

/**
 * More than one row matched a lookup that must be unique.
 * The backing store is corrupted; one of the rows is never picked silently.
 */
export class AmbiguousRecordError extends CatalogError {
  constructor(
    readonly entity: 'database' | 'table' | 'column',
    readonly qualifiedName: string,
    readonly matches: number
  ) {
    super(
      `Expected exactly one ${entity} named ${qualifiedName}, found ${matches}`,
      CatalogErrorCode.AMBIGUOUS,
      500
    );
    this.name = 'AmbiguousRecordError';
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

/** Data type text that the type translator does not recognise */
export class InvalidTypeError extends CatalogError {
  constructor(readonly typeText: string) {
    super(`Unknown data type: ${typeText}`, CatalogErrorCode.INVALID_TYPE, 400);
    this.name = 'InvalidTypeError';
  }
}

/** Fiber or time key missing from the columns, or a stored role that is not valid */
export class InvalidColumnRoleError extends CatalogError {
  constructor(message: string) {
    super(message, CatalogErrorCode.INVALID_COLUMN_ROLE, 400);
    this.name = 'InvalidColumnRoleError';
  }
}

/** Partition function name that is not registered */
export class UnsupportedFunctionError extends CatalogError {
  constructor(readonly functionName: string) {
    super(
      `Partition function is not supported: ${functionName}`,
      CatalogErrorCode.UNSUPPORTED_FUNCTION,
      400
    );
    this.name = 'UnsupportedFunctionError';
  }
}

/** Malformed request input (names, column lists, ranges) */
export class InvalidInputError extends CatalogError {
  constructor(message: string) {
    super(message, CatalogErrorCode.INVALID_INPUT, 400);
    this.name = 'InvalidInputError';
  }
}

// ============================================================================
// Uniqueness Errors
// ============================================================================

/** Database already exists error */
export class DatabaseAlreadyExistsError extends CatalogError {
  constructor(readonly database: string) {
    super(`Database already exists: ${database}`, CatalogErrorCode.ALREADY_EXISTS, 409);
    this.name = 'DatabaseAlreadyExistsError';
  }
}

/** Table already exists error */
export class TableAlreadyExistsError extends CatalogError {
  constructor(
    readonly database: string,
    readonly table: string
  ) {
    super(
      `Table already exists: ${formName(database, table)}`,
      CatalogErrorCode.ALREADY_EXISTS,
      409
    );
    this.name = 'TableAlreadyExistsError';
  }
}

/** A data segment path is already registered */
export class FiberFileAlreadyExistsError extends CatalogError {
  constructor(readonly path: string) {
    super(`Fiber file already registered: ${path}`, CatalogErrorCode.ALREADY_EXISTS, 409);
    this.name = 'FiberFileAlreadyExistsError';
  }
}

// ============================================================================
// Fatal and Storage Errors
// ============================================================================

/**
 * Bootstrap found only part of the catalog tables.
 * Startup must abort; this error is never retried or repaired.
 */
export class CorruptedCatalogError extends CatalogError {
  constructor(
    readonly present: readonly string[],
    readonly missing: readonly string[]
  ) {
    super(
      `Catalog tables are corrupted: found [${present.join(', ')}], missing [${missing.join(', ')}]`,
      CatalogErrorCode.CORRUPTED_CATALOG,
      500
    );
    this.name = 'CorruptedCatalogError';
  }
}

/** The physical directory for a database or table could not be created */
export class StorageError extends CatalogError {
  constructor(
    readonly path: string,
    readonly reason?: unknown
  ) {
    super(`Failed to create directory: ${path}`, CatalogErrorCode.STORAGE_ERROR, 500);
    this.name = 'StorageError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Check whether an error raised by the backing store is a uniqueness violation.
 */
export function isUniqueConstraintError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if ('code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
    return true;
  }
  return error.message.includes('UNIQUE constraint');
}
