/**
 * Core Types for @fibermeta/core
 *
 * Re-exports all types from metadata/types.ts for convenience.
 */

export type {
  // Column types
  SimpleTypeName,
  SimpleType,
  VarcharType,
  CharType,
  DecimalType,
  UnknownType,
  StructuredType,
  ParsedType,
  // Roles and formats
  ColumnRole,
  StorageFormat,
  // Catalog records
  DatabaseData,
  SchemaTableName,
  TableHandle,
  ColumnHandle,
  ColumnMetadata,
  ColumnDefinition,
  TableMetadata,
  FiberPartitioning,
  // Fibers
  FiberData,
  FiberFile,
  FiberFileFilter,
} from './metadata/types.js';
