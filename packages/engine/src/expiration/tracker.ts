import type { Logger } from 'winston';

import type { Algorithm } from '@memokit/types';

import type { CacheEntry, CacheKey, CacheStore } from '@/types/cache';
import { componentLogger } from '@/utils/logger';
import { totalEvictionsCounter, ttlEvictionsCounter } from '@/utils/opentelemetry';

export type Clock = () => number;

interface ExpiryRecord {
  key: CacheKey;
  expiresAt: number;
}

/**
 * Adds TTL semantics to a store. Expired entries are removed lazily, either when `get` finds them or when a
 * purge runs before an insertion. Every other read skips expired entries and leaves the store as it is.
 *
 * Since every entry lives for the same TTL, entries expire in the order they have been stored. The tracker
 * keeps that order in a queue, which makes purging O(1) amortized.
 * @template T - The type of the stored values.
 */
export class ExpirationTracker<T> implements CacheStore<T> {
  readonly ttl: number;

  protected _store: CacheStore<T>;

  protected _now: Clock;

  protected _queue: ExpiryRecord[] = [];

  protected _head: number = 0;

  protected _logger: Logger;

  constructor(store: CacheStore<T>, ttl: number, now: Clock = () => Date.now()) {
    this._store = store;
    this.ttl = ttl;
    this._now = now;
    this._logger = componentLogger('ExpirationTracker', { algorithm: store.algorithm, ttl });
  }

  get algorithm(): Algorithm {
    return this._store.algorithm;
  }

  get maxSize(): number {
    return this._store.maxSize;
  }

  get(key: CacheKey): CacheEntry<T> | undefined {
    if (this._expireIfStale(key)) return undefined;

    return this._store.get(key);
  }

  peek(key: CacheKey): CacheEntry<T> | undefined {
    const entry = this._store.peek(key);
    return entry === undefined || this._isExpired(entry, this._now()) ? undefined : entry;
  }

  contains(key: CacheKey): boolean {
    return this.peek(key) !== undefined;
  }

  put(key: CacheKey, value: T): CacheKey | null {
    // Expired entries have to free up space before a live entry gets evicted
    this.purge();

    const expiresAt = this._now() + this.ttl;
    const evicted = this._store.put(key, value, expiresAt);
    this._queue.push({ key, expiresAt });

    return evicted;
  }

  delete(key: CacheKey): boolean {
    return this._store.delete(key);
  }

  size(): number {
    const now = this._now();
    const expired = new Set<CacheEntry<T>>();

    for (let index = this._head; index < this._queue.length; index += 1) {
      const record = this._queue[index];
      if (record === undefined || record.expiresAt > now) break;

      const entry = this._store.peek(record.key);
      if (entry !== undefined && entry.expiresAt === record.expiresAt) expired.add(entry);
    }

    return this._store.size() - expired.size;
  }

  clear(): void {
    this._store.clear();
    this._queue = [];
    this._head = 0;
  }

  *entries(): IterableIterator<CacheEntry<T>> {
    const now = this._now();

    for (const entry of this._store.entries()) {
      if (!this._isExpired(entry, now)) yield entry;
    }
  }

  /**
   * Removes every expired entry from the underlying store.
   * @returns The number of removed entries.
   */
  purge(): number {
    const now = this._now();
    let removed = 0;

    while (this._head < this._queue.length) {
      const record = this._queue[this._head];
      if (record === undefined || record.expiresAt > now) break;

      this._head += 1;
      // Records of entries which have been replaced, evicted or removed in the meantime are stale, only the
      // record matching the current expiry of a live entry may remove it
      const entry = this._store.peek(record.key);
      if (entry !== undefined && entry.expiresAt === record.expiresAt) {
        this._remove(record.key);
        removed += 1;
      }
    }

    if (this._head > 0 && this._head * 2 >= this._queue.length) {
      this._queue = this._queue.slice(this._head);
      this._head = 0;
    }

    if (removed > 0) this._logger.verbose(`Purged ${removed} expired entries`);
    return removed;
  }

  private _isExpired(entry: CacheEntry<T>, now: number): boolean {
    return entry.expiresAt !== undefined && entry.expiresAt <= now;
  }

  private _expireIfStale(key: CacheKey): boolean {
    const entry = this._store.peek(key);
    if (entry === undefined || !this._isExpired(entry, this._now())) return false;

    this._remove(key);
    return true;
  }

  private _remove(key: CacheKey): void {
    this._logger.debug('Entry expired');
    this._store.delete(key);

    totalEvictionsCounter.add(1, { 'cache.algorithm': this.algorithm });
    ttlEvictionsCounter.add(1, { 'cache.algorithm': this.algorithm });
  }
}
