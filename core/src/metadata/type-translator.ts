/**
 * Column Type Translation
 *
 * Translates between the textual type descriptors stored in the catalog
 * (e.g. "varchar(32)", "decimal(10,2)", "BIGINT") and structured types.
 */

import { InvalidTypeError } from '../errors.js';
import type {
  ParsedType,
  SimpleTypeName,
  StructuredType,
  UnknownType,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** The value returned for unrecognised type text */
export const UNKNOWN_TYPE: UnknownType = Object.freeze({ kind: 'unknown' });

/** Largest varchar length */
export const MAX_VARCHAR_LENGTH = 2_147_483_646;

/** Largest char length */
export const MAX_CHAR_LENGTH = 65_536;

/** Largest decimal precision */
export const MAX_DECIMAL_PRECISION = 38;

const SIMPLE_TYPES: ReadonlySet<string> = new Set<SimpleTypeName>([
  'boolean',
  'tinyint',
  'smallint',
  'integer',
  'bigint',
  'real',
  'double',
  'date',
  'time',
  'timestamp',
]);

const VARCHAR_PATTERN = /^varchar\(\s*(\d*)\s*\)$/;
const CHAR_PATTERN = /^char\(\s*(\d*)\s*\)$/;
const DECIMAL_PATTERN = /^decimal\(\s*(\d*)\s*(?:,\s*(\d*)\s*)?\)$/;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse type text into a structured type.
 *
 * Matching is case-insensitive. Malformed parameters yield {@link UNKNOWN_TYPE}
 * instead of throwing.
 *
 * @example
 * ```ts
 * parseType('varchar(10)');   // { kind: 'varchar', length: 10 }
 * parseType('DECIMAL(10)');   // { kind: 'decimal', precision: 10, scale: 0 }
 * parseType('varchar()');     // { kind: 'unknown' }
 * ```
 */
export function parseType(text: string): ParsedType {
  const normalized = text.trim().toLowerCase();

  const varcharMatch = normalized.match(VARCHAR_PATTERN);
  if (varcharMatch) {
    const length = parseCapture(varcharMatch[1]);
    if (length === undefined || length > MAX_VARCHAR_LENGTH) {
      return UNKNOWN_TYPE;
    }
    return { kind: 'varchar', length };
  }

  const charMatch = normalized.match(CHAR_PATTERN);
  if (charMatch) {
    const length = parseCapture(charMatch[1]);
    if (length === undefined || length > MAX_CHAR_LENGTH) {
      return UNKNOWN_TYPE;
    }
    return { kind: 'char', length };
  }

  const decimalMatch = normalized.match(DECIMAL_PATTERN);
  if (decimalMatch) {
    const precision = parseCapture(decimalMatch[1]);
    // No comma means no scale; a comma with nothing after it is malformed
    const scale = decimalMatch[2] === undefined ? 0 : parseCapture(decimalMatch[2]);
    if (
      precision === undefined ||
      scale === undefined ||
      precision < 1 ||
      precision > MAX_DECIMAL_PRECISION ||
      scale > precision
    ) {
      return UNKNOWN_TYPE;
    }
    return { kind: 'decimal', precision, scale };
  }

  if (isSimpleTypeName(normalized)) {
    return { kind: normalized };
  }

  return UNKNOWN_TYPE;
}

/**
 * Parse type text, throwing when it is not recognised.
 *
 * @throws InvalidTypeError if the text yields the unknown type
 */
export function requireType(text: string): StructuredType {
  const parsed = parseType(text);
  if (parsed.kind === 'unknown') {
    throw new InvalidTypeError(text);
  }
  return parsed;
}

/**
 * Check whether a parsed type is the unknown type.
 */
export function isUnknownType(type: ParsedType): type is UnknownType {
  return type.kind === 'unknown';
}

function isSimpleTypeName(value: string): value is SimpleTypeName {
  return SIMPLE_TYPES.has(value);
}

function parseCapture(capture: string): number | undefined {
  if (capture === '') {
    return undefined;
  }
  const value = Number(capture);
  return Number.isSafeInteger(value) ? value : undefined;
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format a structured type as canonical type text.
 *
 * @example
 * ```ts
 * formatType({ kind: 'decimal', precision: 10, scale: 2 }); // 'decimal(10,2)'
 * ```
 */
export function formatType(type: StructuredType): string {
  switch (type.kind) {
    case 'varchar':
    case 'char':
      return `${type.kind}(${type.length})`;
    case 'decimal':
      return `decimal(${type.precision},${type.scale})`;
    default:
      return type.kind;
  }
}

/**
 * Compare two structured types for equality.
 */
export function typesEqual(a: ParsedType, b: ParsedType): boolean {
  if (a.kind === 'unknown' || b.kind === 'unknown') {
    return false;
  }
  return formatType(a) === formatType(b);
}
