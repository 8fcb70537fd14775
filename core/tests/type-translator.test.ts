/**
 * Type Translator Tests
 *
 * Tests for parsing column type text into structured types and back.
 */

import { describe, it, expect } from 'vitest';
import {
  parseType,
  requireType,
  formatType,
  typesEqual,
  isUnknownType,
  UNKNOWN_TYPE,
  InvalidTypeError,
  type StructuredType,
} from '../src/index.js';

describe('parseType', () => {
  describe('unparameterized types', () => {
    it.each([
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
    ])('should parse %s', (name) => {
      const first = parseType(name);
      const second = parseType(name);
      expect(first).toEqual({ kind: name });
      expect(second).toEqual(first);
      expect(second).not.toBe(first);

      Object.assign(first, { kind: 'varchar', length: 1 });
      expect(parseType(name)).toEqual({ kind: name });
    });

    it('should return a fresh parameterized type on every call', () => {
      const first = parseType('decimal(12,2)');
      Object.assign(first, { precision: 1 });
      expect(parseType('decimal(12,2)')).toEqual({ kind: 'decimal', precision: 12, scale: 2 });
    });

    it('should ignore case and surrounding whitespace', () => {
      expect(parseType('  BigInt ')).toEqual({ kind: 'bigint' });
      expect(parseType('TIMESTAMP')).toEqual({ kind: 'timestamp' });
    });

    it('should not accept names outside the closed set', () => {
      expect(parseType('int')).toBe(UNKNOWN_TYPE);
      expect(parseType('string')).toBe(UNKNOWN_TYPE);
      expect(parseType('')).toBe(UNKNOWN_TYPE);
    });
  });

  describe('varchar and char', () => {
    it('should parse the length', () => {
      expect(parseType('varchar(10)')).toEqual({ kind: 'varchar', length: 10 });
      expect(parseType('char(3)')).toEqual({ kind: 'char', length: 3 });
    });

    it('should allow whitespace inside the parentheses', () => {
      expect(parseType('VARCHAR( 255 )')).toEqual({ kind: 'varchar', length: 255 });
    });

    it('should accept the boundary lengths', () => {
      expect(parseType('varchar(0)')).toEqual({ kind: 'varchar', length: 0 });
      expect(parseType('varchar(2147483646)')).toEqual({ kind: 'varchar', length: 2147483646 });
      expect(parseType('char(65536)')).toEqual({ kind: 'char', length: 65536 });
    });

    it('should return unknown for out-of-range lengths', () => {
      expect(parseType('varchar(2147483647)')).toBe(UNKNOWN_TYPE);
      expect(parseType('char(65537)')).toBe(UNKNOWN_TYPE);
    });

    it('should return unknown for empty or malformed parameters', () => {
      expect(parseType('varchar()')).toBe(UNKNOWN_TYPE);
      expect(parseType('varchar(abc)')).toBe(UNKNOWN_TYPE);
      expect(parseType('varchar(-1)')).toBe(UNKNOWN_TYPE);
      expect(parseType('varchar(10')).toBe(UNKNOWN_TYPE);
      expect(parseType('char')).toBe(UNKNOWN_TYPE);
    });
  });

  describe('decimal', () => {
    it('should parse precision and scale', () => {
      expect(parseType('decimal(10,2)')).toEqual({ kind: 'decimal', precision: 10, scale: 2 });
      expect(parseType('DECIMAL( 38 , 38 )')).toEqual({ kind: 'decimal', precision: 38, scale: 38 });
    });

    it('should default the scale to zero', () => {
      expect(parseType('decimal(10)')).toEqual({ kind: 'decimal', precision: 10, scale: 0 });
    });

    it('should return unknown for out-of-range parameters', () => {
      expect(parseType('decimal(0)')).toBe(UNKNOWN_TYPE);
      expect(parseType('decimal(39,0)')).toBe(UNKNOWN_TYPE);
      expect(parseType('decimal(5,6)')).toBe(UNKNOWN_TYPE);
    });

    it('should return unknown for empty captures', () => {
      expect(parseType('decimal()')).toBe(UNKNOWN_TYPE);
      expect(parseType('decimal(10,)')).toBe(UNKNOWN_TYPE);
      expect(parseType('decimal(,2)')).toBe(UNKNOWN_TYPE);
    });
  });
});

describe('requireType', () => {
  it('should return the structured type', () => {
    expect(requireType('char(8)')).toEqual({ kind: 'char', length: 8 });
  });

  it('should throw InvalidTypeError for unknown text', () => {
    expect(() => requireType('varchar()')).toThrow(InvalidTypeError);
    expect(() => requireType('blob')).toThrow('Unknown data type: blob');
  });
});

describe('formatType', () => {
  it('should produce canonical text', () => {
    expect(formatType({ kind: 'varchar', length: 10 })).toBe('varchar(10)');
    expect(formatType({ kind: 'char', length: 1 })).toBe('char(1)');
    expect(formatType({ kind: 'decimal', precision: 10, scale: 2 })).toBe('decimal(10,2)');
    expect(formatType({ kind: 'double' })).toBe('double');
  });

  it('should agree with parseType', () => {
    const types: StructuredType[] = [
      { kind: 'varchar', length: 32 },
      { kind: 'decimal', precision: 18, scale: 4 },
      { kind: 'timestamp' },
    ];
    for (const type of types) {
      expect(parseType(formatType(type))).toEqual(type);
    }
  });
});

describe('typesEqual', () => {
  it('should compare structurally', () => {
    expect(typesEqual(parseType('DECIMAL(10)'), parseType('decimal(10,0)'))).toBe(true);
    expect(typesEqual(parseType('varchar(1)'), parseType('varchar(2)'))).toBe(false);
  });

  it('should never treat unknown as equal', () => {
    expect(typesEqual(UNKNOWN_TYPE, UNKNOWN_TYPE)).toBe(false);
    expect(isUnknownType(parseType('nope'))).toBe(true);
  });
});
