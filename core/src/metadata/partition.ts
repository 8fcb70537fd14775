/**
 * Fiber Partition Functions
 *
 * A partition function maps the value of a table's fiber column to a fiber
 * id. Data segments are grouped by fiber, so a scan that knows the fiber
 * column value only reads the segments of one fiber.
 *
 * Functions are looked up by name in a {@link PartitionFunctionRegistry}.
 * Built-in names:
 * - `function0`: hash bucketing into {@link FUNCTION0_BUCKETS} buckets
 * - `identity`: integral values are their own fiber id
 * - `bucket[N]`: hash bucketing into N buckets
 */

import { InvalidInputError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

/** Values a fiber column may hold */
export type FiberColumnValue = string | number | bigint | boolean | Date;

/** A named mapping from fiber column values to fiber ids */
export interface PartitionFunction {
  /** Name the function is registered and persisted under */
  readonly name: string;
  /** Map a fiber column value to a non-negative integer fiber id */
  apply(value: FiberColumnValue): number;
}

/** Factory for parameterized functions such as `bucket[16]` */
export type PartitionFunctionFactory = (arg: number) => PartitionFunction;

/** Parsed function name with optional argument */
export interface ParsedFunctionName {
  /** Base name, e.g. `bucket` */
  base: string;
  /** Argument for parameterized names */
  arg?: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Name of the default function */
export const DEFAULT_PARTITION_FUNCTION = 'function0';

/** Number of buckets `function0` hashes into */
export const FUNCTION0_BUCKETS = 1024;

// ============================================================================
// Name Parsing
// ============================================================================

/**
 * Parse a function name (e.g., "bucket[16]", "identity") into its base name
 * and argument. Returns undefined for malformed names.
 */
export function parseFunctionName(name: string): ParsedFunctionName | undefined {
  const parameterized = name.match(/^([a-z_][a-z0-9_]*)\[(\d+)\]$/);
  if (parameterized) {
    return { base: parameterized[1], arg: parseInt(parameterized[2], 10) };
  }
  if (/^[a-z_][a-z0-9_]*$/.test(name)) {
    return { base: name };
  }
  return undefined;
}

/**
 * Format a parsed function name (e.g., { base: 'bucket', arg: 16 } -> "bucket[16]").
 */
export function formatFunctionName(parsed: ParsedFunctionName): string {
  if (parsed.arg !== undefined) {
    return `${parsed.base}[${parsed.arg}]`;
  }
  return parsed.base;
}

// ============================================================================
// Built-in Functions
// ============================================================================

/**
 * Hash bucketing: murmur3_32(v) % N.
 */
export function createBucketFunction(numBuckets: number, name = `bucket[${numBuckets}]`): PartitionFunction {
  if (!Number.isSafeInteger(numBuckets) || numBuckets <= 0) {
    throw new InvalidInputError('Number of buckets must be a positive integer');
  }
  return {
    name,
    apply(value: FiberColumnValue): number {
      return murmur3Hash32(encodeValue(value)) % numBuckets;
    },
  };
}

/**
 * Identity: an integral value is its own fiber id.
 */
export const identityFunction: PartitionFunction = {
  name: 'identity',
  apply(value: FiberColumnValue): number {
    const numeric = typeof value === 'bigint' ? Number(value) : value;
    if (typeof numeric !== 'number' || !Number.isSafeInteger(numeric) || numeric < 0) {
      throw new InvalidInputError(`identity requires a non-negative integer, got ${String(value)}`);
    }
    return numeric;
  },
};

/**
 * The default function tables are created with.
 */
export const function0: PartitionFunction = createBucketFunction(
  FUNCTION0_BUCKETS,
  DEFAULT_PARTITION_FUNCTION
);

/**
 * Encode a value to bytes for hashing.
 * Integers hash as 8-byte little-endian longs so 5 and 5n land in the same bucket.
 */
function encodeValue(value: FiberColumnValue): Uint8Array {
  if (typeof value === 'string') {
    return new TextEncoder().encode(value);
  }
  if (typeof value === 'boolean') {
    return new Uint8Array([value ? 1 : 0]);
  }

  const view = new DataView(new ArrayBuffer(8));
  if (typeof value === 'bigint') {
    view.setBigInt64(0, BigInt.asIntN(64, value), true);
  } else if (value instanceof Date) {
    view.setBigInt64(0, BigInt(value.getTime()), true);
  } else if (Number.isSafeInteger(value)) {
    view.setBigInt64(0, BigInt(value), true);
  } else {
    view.setFloat64(0, value, true);
  }
  return new Uint8Array(view.buffer);
}

/**
 * MurmurHash3 32-bit hash, seed 0, unsigned result.
 */
export function murmur3Hash32(data: Uint8Array): number {
  const c1 = 0xcc9e2d51;
  const c2 = 0x1b873593;

  let h1 = 0;
  const len = data.length;
  const nblocks = Math.floor(len / 4);

  // Body
  for (let i = 0; i < nblocks; i++) {
    let k1 =
      (data[i * 4] | (data[i * 4 + 1] << 8) | (data[i * 4 + 2] << 16) | (data[i * 4 + 3] << 24)) >>>
      0;

    k1 = Math.imul(k1, c1);
    k1 = ((k1 << 15) | (k1 >>> 17)) >>> 0;
    k1 = Math.imul(k1, c2);

    h1 ^= k1;
    h1 = ((h1 << 13) | (h1 >>> 19)) >>> 0;
    h1 = (Math.imul(h1, 5) + 0xe6546b64) >>> 0;
  }

  // Tail - intentional fallthrough behavior for MurmurHash3
  const tail = data.subarray(nblocks * 4);
  let k1 = 0;

  if (tail.length >= 3) {
    k1 ^= tail[2] << 16;
  }
  if (tail.length >= 2) {
    k1 ^= tail[1] << 8;
  }
  if (tail.length >= 1) {
    k1 ^= tail[0];
    k1 = Math.imul(k1, c1);
    k1 = ((k1 << 15) | (k1 >>> 17)) >>> 0;
    k1 = Math.imul(k1, c2);
    h1 ^= k1;
  }

  // Finalization
  h1 ^= len;
  h1 ^= h1 >>> 16;
  h1 = Math.imul(h1, 0x85ebca6b);
  h1 ^= h1 >>> 13;
  h1 = Math.imul(h1, 0xc2b2ae35);
  h1 ^= h1 >>> 16;

  return h1 >>> 0;
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Registry of partition functions, keyed by name.
 *
 * Plain names resolve to registered instances. Names of the form `base[N]`
 * resolve through the factory registered for `base`, and the instance is kept
 * for later lookups.
 *
 * @example
 * ```ts
 * const registry = createDefaultRegistry();
 * registry.resolve('function0')?.apply('device-17');
 * registry.resolve('bucket[16]')?.apply(42);
 * registry.resolve('nope'); // undefined
 * ```
 */
export class PartitionFunctionRegistry {
  private readonly functions = new Map<string, PartitionFunction>();
  private readonly factories = new Map<string, PartitionFunctionFactory>();

  /**
   * Register a function under its name.
   * @throws InvalidInputError if the name is malformed or already taken
   */
  register(fn: PartitionFunction): this {
    const parsed = parseFunctionName(fn.name);
    if (!parsed || parsed.arg !== undefined) {
      throw new InvalidInputError(`Invalid partition function name: ${fn.name}`);
    }
    if (this.functions.has(fn.name) || this.factories.has(fn.name)) {
      throw new InvalidInputError(`Partition function already registered: ${fn.name}`);
    }
    this.functions.set(fn.name, fn);
    return this;
  }

  /**
   * Register a factory for parameterized names `base[N]`.
   * @throws InvalidInputError if the base name is malformed or already taken
   */
  registerFactory(base: string, factory: PartitionFunctionFactory): this {
    const parsed = parseFunctionName(base);
    if (!parsed || parsed.arg !== undefined) {
      throw new InvalidInputError(`Invalid partition function name: ${base}`);
    }
    if (this.functions.has(base) || this.factories.has(base)) {
      throw new InvalidInputError(`Partition function already registered: ${base}`);
    }
    this.factories.set(base, factory);
    return this;
  }

  /**
   * Resolve a function by name. Returns undefined when nothing matches.
   * Parameterized instances are kept under their canonical name, so
   * `bucket[016]` and `bucket[16]` resolve to the same instance.
   */
  resolve(name: string): PartitionFunction | undefined {
    const canonical = this.canonicalName(name);
    if (canonical === undefined) {
      return undefined;
    }

    const known = this.functions.get(canonical);
    if (known) {
      return known;
    }

    const parsed = parseFunctionName(canonical);
    const factory = parsed ? this.factories.get(parsed.base) : undefined;
    if (!parsed || parsed.arg === undefined || !factory) {
      return undefined;
    }

    const created = factory(parsed.arg);
    this.functions.set(canonical, created);
    return created;
  }

  /**
   * Canonical form of a name that resolves, or undefined. Creates nothing.
   */
  canonicalName(name: string): string | undefined {
    if (this.functions.has(name)) {
      return name;
    }

    const parsed = parseFunctionName(name);
    if (!parsed || parsed.arg === undefined) {
      return undefined;
    }
    if (!this.factories.has(parsed.base) || parsed.arg <= 0 || !Number.isSafeInteger(parsed.arg)) {
      return undefined;
    }
    return formatFunctionName(parsed);
  }

  /**
   * Check whether a name resolves.
   */
  has(name: string): boolean {
    return this.canonicalName(name) !== undefined;
  }

  /**
   * Names of the plain functions and factory bases, sorted.
   */
  names(): string[] {
    return [
      ...this.functions.keys(),
      ...[...this.factories.keys()].map((base) => `${base}[N]`),
    ]
      .filter((name) => parseFunctionName(name)?.arg === undefined)
      .sort();
  }
}

/**
 * Create a registry holding the built-in functions.
 */
export function createDefaultRegistry(): PartitionFunctionRegistry {
  return new PartitionFunctionRegistry()
    .register(function0)
    .register(identityFunction)
    .registerFactory('bucket', (arg) => createBucketFunction(arg));
}
