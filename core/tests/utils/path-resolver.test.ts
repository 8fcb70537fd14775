/**
 * Path Resolver Tests
 */

import { describe, it, expect } from 'vitest';
import {
  resolvePath,
  trimTrailingSeparators,
  validatePathSegment,
  InvalidInputError,
} from '../../src/index.js';

describe('resolvePath', () => {
  it('should join a root and segments with single separators', () => {
    expect(resolvePath('/data/warehouse', 'sales', 'orders')).toBe('/data/warehouse/sales/orders');
  });

  it('should strip every trailing separator of the root', () => {
    expect(resolvePath('/data/', 'sales')).toBe('/data/sales');
    expect(resolvePath('/data///', 'sales')).toBe('/data/sales');
  });

  it('should give each segment exactly one leading separator', () => {
    expect(resolvePath('/data', '//sales/', 'orders//')).toBe('/data/sales/orders');
  });

  it('should keep URL roots intact', () => {
    expect(resolvePath('hdfs://nn:9000/warehouse/', 'sales')).toBe('hdfs://nn:9000/warehouse/sales');
  });

  it('should return the trimmed root without segments', () => {
    expect(resolvePath('/data//')).toBe('/data');
  });

  it('should be idempotent on resolved paths', () => {
    const resolved = resolvePath('/data/', 'db1', 't1');
    expect(resolvePath(resolved)).toBe(resolved);
  });

  it('should keep a filesystem root', () => {
    expect(resolvePath('/')).toBe('/');
    expect(resolvePath('///')).toBe('/');
    expect(resolvePath(resolvePath('/'))).toBe('/');
    expect(resolvePath('/', 'sales')).toBe('/sales');
    expect(resolvePath('')).toBe('');
  });
});

describe('trimTrailingSeparators', () => {
  it('should remove separators one character at a time', () => {
    expect(trimTrailingSeparators('a/b/')).toBe('a/b');
    expect(trimTrailingSeparators('a/b')).toBe('a/b');
    expect(trimTrailingSeparators('///')).toBe('');
  });
});

describe('validatePathSegment', () => {
  it('should accept plain names', () => {
    expect(() => validatePathSegment('table', 'orders_2024')).not.toThrow();
    expect(() => validatePathSegment('database', 'db1')).not.toThrow();
  });

  it('should reject empty names', () => {
    expect(() => validatePathSegment('table', '')).toThrow('Invalid table name: name must not be empty');
    expect(() => validatePathSegment('table', '   ')).toThrow(InvalidInputError);
  });

  it('should reject traversal and separators', () => {
    for (const name of ['.', '..', 'a/b', 'a\\b', '%2e%2e', 'a%2Fb', 'tab\tname']) {
      expect(() => validatePathSegment('database', name)).toThrow(InvalidInputError);
    }
  });
});
