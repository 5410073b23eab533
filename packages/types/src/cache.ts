/**
 * The available eviction algorithms.
 */
export enum Algorithm {
  LRU = 'LRU',
  LFU = 'LFU',
  FIFO = 'FIFO',
}

/**
 * Positional and keyword arguments of a single call.
 */
export interface CallArguments {
  args: readonly unknown[];
  kwargs: Readonly<Record<string, unknown>>;
}

/**
 * Derives a custom identity from a call. The returned value is treated like a single argument when
 * building the cache key.
 */
export type KeyMaker = (args: readonly unknown[], kwargs: Readonly<Record<string, unknown>>) => unknown;

/**
 * Snapshot of the statistics of a single cache instance.
 */
export interface CacheInfo {
  /**
   * Number of lookups answered from the cache since creation or the last clear.
   */
  hits: number;
  /**
   * Number of successful computations stored since creation or the last clear.
   */
  misses: number;
  /**
   * Number of live entries.
   */
  currentSize: number;
  /**
   * The size limit, `undefined` if the cache is unbounded.
   */
  maxSize: number | undefined;
  algorithm: Algorithm;
  /**
   * The TTL in milliseconds, `undefined` if entries never expire.
   */
  ttl: number | undefined;
  threadSafe: boolean;
  useCustomKey: boolean;
}
