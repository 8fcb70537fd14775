/**
 * Path Resolution Utilities
 *
 * Derives physical storage paths from logical catalog names, and guards the
 * names that become directories.
 */

import { InvalidInputError } from '../errors.js';

// ============================================================================
// Constants
// ============================================================================

/** Separator between path segments */
export const PATH_SEPARATOR = '/';

/**
 * Patterns that must not appear in a logical name.
 * Covers traversal, URL-encoded traversal, and separators.
 */
const FORBIDDEN_SEGMENT_PATTERNS = [
  /^\.\.?$/,           // "." and ".."
  /[/\\]/,             // Unix or Windows separators
  /%2e%2e/i,           // URL-encoded ..
  /%2f|%5c/i,          // URL-encoded separators
  // eslint-disable-next-line no-control-regex
  /[\x00-\x1f]/,       // Control characters
];

// ============================================================================
// Resolution
// ============================================================================

/**
 * Joins a storage root with logical segments into a canonical physical path.
 *
 * The root loses every trailing separator character. Each segment is given
 * exactly one leading separator and loses its trailing separators. With no
 * segments the trimmed root is returned, so resolving an already resolved path
 * returns it unchanged. A root made only of separators resolves to `/`.
 *
 * @example
 * ```ts
 * resolvePath('hdfs://nn:9000/warehouse/', 'sales', 'orders');
 * // 'hdfs://nn:9000/warehouse/sales/orders'
 * resolvePath('/data//', '//sales/'); // '/data/sales'
 * ```
 */
export function resolvePath(root: string, ...segments: string[]): string {
  let result = trimTrailingSeparators(root);

  for (const segment of segments) {
    const body = trimTrailingSeparators(trimLeadingSeparators(segment));
    result += PATH_SEPARATOR + body;
  }

  if (result === '' && root.length > 0) {
    return PATH_SEPARATOR;
  }
  return result;
}

/**
 * Removes separator characters from the end of a path, one character at a time.
 */
export function trimTrailingSeparators(path: string): string {
  let end = path.length;
  while (end > 0 && path[end - 1] === PATH_SEPARATOR) {
    end--;
  }
  return path.slice(0, end);
}

function trimLeadingSeparators(path: string): string {
  let start = 0;
  while (start < path.length && path[start] === PATH_SEPARATOR) {
    start++;
  }
  return path.slice(start);
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validates that a logical name can be used as a single directory segment.
 *
 * @param kind - What the name identifies, used in the error message
 * @param segment - The name to validate
 * @throws InvalidInputError if the name is empty, contains a separator, or is a traversal
 *
 * @example
 * ```ts
 * validatePathSegment('table', 'orders'); // OK
 * validatePathSegment('table', '../etc'); // throws InvalidInputError
 * ```
 */
export function validatePathSegment(kind: string, segment: string): void {
  if (segment.trim() === '') {
    throw new InvalidInputError(`Invalid ${kind} name: name must not be empty`);
  }

  for (const pattern of FORBIDDEN_SEGMENT_PATTERNS) {
    if (pattern.test(segment)) {
      throw new InvalidInputError(`Invalid ${kind} name: "${segment}" cannot be used as a directory`);
    }
  }
}
