import type { Algorithm, KeyMaker } from './cache';

/**
 * Options for a single cache instance.
 */
export interface CacheOptions {
  /**
   * The TTL (time to live) of an entry in milliseconds. If set, an entry is treated as absent once this amount
   * of time has passed since it was stored, regardless of whether the eviction algorithm would keep it or not.
   * Entries never expire if not set.
   */
  ttl?: number;
  /**
   * The maximum number of entries. Once reached, storing a new entry evicts exactly one existing entry
   * according to `algorithm`. The cache is unbounded if not set.
   */
  maxSize?: number;
  /**
   * The eviction algorithm. Only takes effect if `maxSize` is set.
   * @default Algorithm.LRU
   */
  algorithm?: Algorithm | `${Algorithm}`;
  /**
   * Whether concurrent callers are serialized, which guarantees that a computation runs at most once for a
   * given call.
   * @default true
   */
  threadSafe?: boolean;
  /**
   * Replaces the default call-to-key derivation.
   */
  keyMaker?: KeyMaker;
}

/**
 * Cache options after validation and defaults have been applied.
 */
export interface CacheConfiguration {
  ttl: number | undefined;
  maxSize: number | undefined;
  algorithm: Algorithm;
  threadSafe: boolean;
  keyMaker: KeyMaker | undefined;
}
