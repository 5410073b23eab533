import type { Algorithm, CallArguments } from '@memokit/types';

/**
 * Canonical form of a hashable value: a type tag and a textual representation. Carrying the type tag keeps
 * `3`, `'3'` and `3n` apart.
 */
export type CanonicalValue = readonly [tag: string, text: string];

export interface CanonicalCall {
  args: CanonicalValue[];
  kwargs: [name: string, value: CanonicalValue][];
}

/**
 * Key of a call whose arguments can all be hashed. Looked up through its hash, the canonical form is used to
 * verify the match.
 */
export interface HashableKey {
  kind: 'hashable';
  hash: string;
  canonical: CanonicalCall;
  call: CallArguments;
}

/**
 * Key of a call with at least one argument that can not be hashed. Compared by deep equality of the snapshot
 * against every other structural key.
 */
export interface StructuralKey {
  kind: 'structural';
  snapshot: unknown;
  call: CallArguments;
}

export type CacheKey = HashableKey | StructuralKey;

/**
 * A single stored result.
 * @template T - The type of the stored value.
 */
export interface CacheEntry<T> {
  key: CacheKey;
  value: T;
  /**
   * Insertion sequence number, unique within a store.
   */
  sequence: number;
  /**
   * Number of accesses, starting at 1 for the insertion.
   */
  frequency: number;
  /**
   * Position in the access order of the store. Higher is more recent.
   */
  lastAccess: number;
  /**
   * Timestamp in milliseconds after which the entry is considered expired.
   */
  expiresAt?: number;
}

/**
 * Store for cache entries with an eviction algorithm.
 * @template T - The type of the stored values.
 */
export interface CacheStore<T> {
  readonly algorithm: Algorithm;

  /**
   * The size limit, `Infinity` if the store is unbounded.
   */
  readonly maxSize: number;

  /**
   * Returns the entry for the given key and records the access with the eviction algorithm.
   */
  get(key: CacheKey): CacheEntry<T> | undefined;

  /**
   * Returns the entry for the given key without recording an access.
   */
  peek(key: CacheKey): CacheEntry<T> | undefined;

  /**
   * Stores a value. Storing a new key in a full store evicts exactly one entry first.
   * @returns The key of the evicted entry or `null` if nothing has been evicted.
   */
  put(key: CacheKey, value: T, expiresAt?: number): CacheKey | null;

  contains(key: CacheKey): boolean;

  delete(key: CacheKey): boolean;

  size(): number;

  clear(): void;

  entries(): IterableIterator<CacheEntry<T>>;
}
