/**
 * Catalog Type Definitions
 *
 * Core type definitions for the fibermeta catalog: structured column types,
 * column roles, storage formats, and the records the catalog hands out.
 */

// ============================================================================
// Column Types
// ============================================================================

/** Column types without parameters */
export type SimpleTypeName =
  | 'boolean'
  | 'tinyint'
  | 'smallint'
  | 'integer'
  | 'bigint'
  | 'real'
  | 'double'
  | 'date'
  | 'time'
  | 'timestamp';

/** A type from the closed unparameterized set */
export interface SimpleType {
  readonly kind: SimpleTypeName;
}

/** Variable-length string bounded to `length` characters */
export interface VarcharType {
  readonly kind: 'varchar';
  readonly length: number;
}

/** Fixed-length string of `length` characters */
export interface CharType {
  readonly kind: 'char';
  readonly length: number;
}

/** Exact numeric with `precision` digits, `scale` of them after the point */
export interface DecimalType {
  readonly kind: 'decimal';
  readonly precision: number;
  readonly scale: number;
}

/** Placeholder for type text that could not be recognised */
export interface UnknownType {
  readonly kind: 'unknown';
}

/** Structured column type */
export type StructuredType = SimpleType | VarcharType | CharType | DecimalType;

/** Result of parsing type text */
export type ParsedType = StructuredType | UnknownType;

// ============================================================================
// Roles and Formats
// ============================================================================

/** Column role, driving partition pruning */
export type ColumnRole = 'fiber' | 'time' | 'regular';

/** All column roles */
export const COLUMN_ROLES: readonly ColumnRole[] = ['fiber', 'time', 'regular'];

/** Physical file format of a table's data segments */
export type StorageFormat = 'parquet' | 'orc' | 'text';

/** All storage formats */
export const STORAGE_FORMATS: readonly StorageFormat[] = ['parquet', 'orc', 'text'];

/** Format used when a table does not name one */
export const DEFAULT_STORAGE_FORMAT: StorageFormat = 'parquet';

// ============================================================================
// Catalog Records
// ============================================================================

/** Database stored in the catalog */
export interface DatabaseData {
  readonly name: string;
  readonly comment: string;
  readonly owner: string;
  readonly location: string;
}

/** Database table and its schema */
export interface SchemaTableName {
  readonly schema: string;
  readonly table: string;
}

/** Resolved reference to a table and its directory */
export interface TableHandle {
  readonly schema: string;
  readonly name: string;
  readonly physicalPath: string;
}

/** Resolved column with structured type and role */
export interface ColumnHandle {
  readonly name: string;
  readonly type: StructuredType;
  readonly role: ColumnRole;
}

/** Column description the engine plans with */
export interface ColumnMetadata {
  readonly name: string;
  readonly type: StructuredType;
  readonly comment: string;
  readonly nullable: boolean;
  readonly hidden: boolean;
}

/** Column as supplied by a create-table request */
export interface ColumnDefinition {
  readonly name: string;
  /** Type text, e.g. `varchar(32)` or `decimal(10,2)` */
  readonly type: string;
}

/** Structured table-creation metadata from the engine */
export interface TableMetadata {
  readonly schema: string;
  readonly name: string;
  readonly columns: readonly ColumnDefinition[];
  readonly storageFormat?: StorageFormat;
}

/** Partitioning requested for a new table */
export interface FiberPartitioning {
  readonly fiberKey?: string;
  readonly function?: string;
  readonly timeKey?: string;
}

// ============================================================================
// Fibers
// ============================================================================

/** A partition unit of a table */
export interface FiberData {
  readonly id: number;
  readonly value: number;
}

/** A data segment of a fiber covering a time range */
export interface FiberFile {
  readonly fiberValue: number;
  /** Epoch milliseconds */
  readonly timeBegin: number;
  /** Epoch milliseconds */
  readonly timeEnd: number;
  readonly path: string;
}

/** Restrictions for listing fiber files */
export interface FiberFileFilter {
  readonly fiberValue?: number;
  /** Keep segments ending at or after this time */
  readonly from?: number;
  /** Keep segments beginning at or before this time */
  readonly to?: number;
}
