/**
 * Partition Function Tests
 *
 * Tests for the built-in fiber partition functions and the registry that
 * resolves them by name.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  createBucketFunction,
  createDefaultRegistry,
  formatFunctionName,
  function0,
  identityFunction,
  murmur3Hash32,
  parseFunctionName,
  FUNCTION0_BUCKETS,
  InvalidInputError,
  PartitionFunctionRegistry,
  type PartitionFunction,
} from '../src/index.js';

// ============================================================================
// Hashing
// ============================================================================

describe('murmur3Hash32', () => {
  it('should match the reference vectors', () => {
    const encoder = new TextEncoder();
    expect(murmur3Hash32(new Uint8Array(0))).toBe(0);
    expect(murmur3Hash32(encoder.encode('hello'))).toBe(613153351);
    expect(murmur3Hash32(encoder.encode('The quick brown fox jumps over the lazy dog'))).toBe(776992547);
  });
});

// ============================================================================
// Built-in Functions
// ============================================================================

describe('function0', () => {
  it('should hash strings into 1024 buckets', () => {
    expect(FUNCTION0_BUCKETS).toBe(1024);
    expect(function0.apply('hello')).toBe(583);
    expect(function0.apply('device-17')).toBe(248);
  });

  it('should hash integers as 8-byte longs', () => {
    expect(function0.apply(42)).toBe(318);
    expect(function0.apply(42n)).toBe(318);
  });

  it('should be deterministic and in range', () => {
    for (const value of ['a', 'b', 7, 12345678901, true, new Date(0)]) {
      const fiber = function0.apply(value);
      expect(fiber).toBe(function0.apply(value));
      expect(fiber).toBeGreaterThanOrEqual(0);
      expect(fiber).toBeLessThan(1024);
    }
  });
});

describe('createBucketFunction', () => {
  it('should hash into N buckets', () => {
    const bucket16 = createBucketFunction(16);
    expect(bucket16.name).toBe('bucket[16]');
    expect(bucket16.apply(42)).toBe(14);
  });

  it('should reject non-positive bucket counts', () => {
    expect(() => createBucketFunction(0)).toThrow(InvalidInputError);
    expect(() => createBucketFunction(-3)).toThrow(InvalidInputError);
    expect(() => createBucketFunction(1.5)).toThrow(InvalidInputError);
  });
});

describe('identityFunction', () => {
  it('should pass integral values through', () => {
    expect(identityFunction.apply(0)).toBe(0);
    expect(identityFunction.apply(17)).toBe(17);
    expect(identityFunction.apply(17n)).toBe(17);
  });

  it('should reject values that are not non-negative integers', () => {
    expect(() => identityFunction.apply(-1)).toThrow(InvalidInputError);
    expect(() => identityFunction.apply(1.5)).toThrow(InvalidInputError);
    expect(() => identityFunction.apply('17')).toThrow(InvalidInputError);
  });
});

// ============================================================================
// Names
// ============================================================================

describe('parseFunctionName', () => {
  it('should parse plain and parameterized names', () => {
    expect(parseFunctionName('function0')).toEqual({ base: 'function0' });
    expect(parseFunctionName('bucket[16]')).toEqual({ base: 'bucket', arg: 16 });
  });

  it('should reject malformed names', () => {
    expect(parseFunctionName('')).toBeUndefined();
    expect(parseFunctionName('Bucket')).toBeUndefined();
    expect(parseFunctionName('bucket[]')).toBeUndefined();
    expect(parseFunctionName('bucket[16')).toBeUndefined();
  });

  it('should format back to the same name', () => {
    expect(formatFunctionName({ base: 'bucket', arg: 8 })).toBe('bucket[8]');
    expect(formatFunctionName({ base: 'identity' })).toBe('identity');
  });
});

// ============================================================================
// Registry
// ============================================================================

describe('PartitionFunctionRegistry', () => {
  let registry: PartitionFunctionRegistry;

  beforeEach(() => {
    registry = createDefaultRegistry();
  });

  it('should resolve the built-in functions', () => {
    expect(registry.resolve('function0')).toBe(function0);
    expect(registry.resolve('identity')).toBe(identityFunction);
    expect(registry.names()).toEqual(['bucket[N]', 'function0', 'identity']);
  });

  it('should return undefined for unregistered names', () => {
    expect(registry.resolve('function1')).toBeUndefined();
    expect(registry.resolve('')).toBeUndefined();
    expect(registry.has('nope')).toBe(false);
  });

  it('should build parameterized functions once', () => {
    const first = registry.resolve('bucket[8]');
    expect(first?.name).toBe('bucket[8]');
    expect(registry.resolve('bucket[8]')).toBe(first);
    expect(registry.names()).toEqual(['bucket[N]', 'function0', 'identity']);
  });

  it('should key parameterized functions by their canonical name', () => {
    const padded = registry.resolve('bucket[016]');
    expect(padded?.name).toBe('bucket[16]');
    expect(registry.resolve('bucket[16]')).toBe(padded);
    expect(registry.canonicalName('bucket[016]')).toBe('bucket[16]');
    expect(registry.canonicalName('function0')).toBe('function0');
    expect(registry.canonicalName('bucket[0]')).toBeUndefined();
  });

  it('should check names without building functions', () => {
    const factory = vi.fn((n: number) => createBucketFunction(n, `ring[${n}]`));
    const custom = new PartitionFunctionRegistry().registerFactory('ring', factory);

    expect(custom.has('ring[4]')).toBe(true);
    expect(custom.has('ring[04]')).toBe(true);
    expect(custom.has('ring[0]')).toBe(false);
    expect(factory).not.toHaveBeenCalled();

    expect(custom.resolve('ring[04]')).toBe(custom.resolve('ring[4]'));
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('should not resolve parameters the factory cannot take', () => {
    expect(registry.resolve('bucket[0]')).toBeUndefined();
    expect(registry.resolve('identity[4]')).toBeUndefined();
  });

  it('should register custom functions', () => {
    const modulo: PartitionFunction = {
      name: 'modulo_ten',
      apply: (value) => Number(value) % 10,
    };
    registry.register(modulo);
    expect(registry.resolve('modulo_ten')?.apply(123)).toBe(3);
  });

  it('should reject duplicate and malformed registrations', () => {
    expect(() => registry.register({ name: 'function0', apply: () => 0 })).toThrow(
      'Partition function already registered: function0'
    );
    expect(() => registry.register({ name: 'bucket', apply: () => 0 })).toThrow(InvalidInputError);
    expect(() => registry.register({ name: 'Bad Name', apply: () => 0 })).toThrow(InvalidInputError);
    expect(() => registry.registerFactory('bucket', (n) => createBucketFunction(n))).toThrow(
      InvalidInputError
    );
  });

  it('should start empty', () => {
    expect(new PartitionFunctionRegistry().names()).toEqual([]);
  });
});
