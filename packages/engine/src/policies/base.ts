import { isEqual } from 'lodash-es';
import type { Logger } from 'winston';

import type { Algorithm } from '@memokit/types';

import { KeyIndex } from '@/keys/key-index';
import type { CacheEntry, CacheKey, CacheStore } from '@/types/cache';
import { InvariantViolationError } from '@/utils/errors';
import { componentLogger } from '@/utils/logger';
import { sizeLimitEvictionsCounter, totalEvictionsCounter, tracer } from '@/utils/opentelemetry';

/**
 * Store which keeps the entries and delegates the eviction order to the policy implemented by a subclass.
 * Subclasses only ever see the internal ids of entries.
 * @template T - The type of the stored values.
 */
export abstract class BasePolicy<T> implements CacheStore<T> {
  readonly algorithm: Algorithm;

  readonly maxSize: number;

  protected _logger: Logger;

  protected _entries: Map<string, CacheEntry<T>> = new Map();

  protected _keys: KeyIndex = new KeyIndex();

  protected _sequence: number = 0;

  protected _accessClock: number = 0;

  constructor(algorithm: Algorithm, maxSize: number = Infinity) {
    this.algorithm = algorithm;
    this.maxSize = maxSize;
    this._logger = componentLogger('Store', { algorithm: this.algorithm });
    this._logger.verbose(`Initialized ${this.algorithm} store with a size limit of ${this.maxSize}`);
  }

  /**
   * Starts tracking a new id.
   * @abstract
   * @param id - The id to track.
   */
  protected abstract track(id: string): void;

  /**
   * Stops tracking an existing id.
   * @abstract
   * @param id - The id to stop tracking.
   */
  protected abstract stopTracking(id: string): void;

  /**
   * Updates the tracking of an id after it has been accessed.
   * @abstract
   * @param id - The id to hit.
   */
  protected abstract hit(id: string): void;

  /**
   * Stops tracking the id which should be evicted next according to the policy.
   * @abstract
   * @returns The evicted id or `null` if nothing is tracked.
   */
  protected abstract evict(): string | null;

  /**
   * Stops tracking every id.
   * @abstract
   */
  protected abstract reset(): void;

  get(key: CacheKey): CacheEntry<T> | undefined {
    const resolved = this._resolve(key);
    if (resolved === undefined) return undefined;

    const [id, entry] = resolved;
    this._accessClock += 1;
    entry.frequency += 1;
    entry.lastAccess = this._accessClock;
    this.hit(id);

    return entry;
  }

  peek(key: CacheKey): CacheEntry<T> | undefined {
    return this._resolve(key)?.[1];
  }

  contains(key: CacheKey): boolean {
    return this._resolve(key) !== undefined;
  }

  put(key: CacheKey, value: T, expiresAt?: number): CacheKey | null {
    this._accessClock += 1;

    // A hash collision also ends up here, in which case the entry is taken over by the new key
    const existingId = this._keys.idOf(key);
    const existing = existingId === undefined ? undefined : this._entries.get(existingId);
    if (existing !== undefined) {
      this._logger.debug(`Replacing value of existing entry ${existingId}`);
      existing.key = key;
      existing.value = value;
      existing.expiresAt = expiresAt;
      existing.lastAccess = this._accessClock;
      return null;
    }

    const evicted = this._entries.size >= this.maxSize ? this._evictOne() : null;

    const id = this._keys.register(key);
    this._sequence += 1;
    this._entries.set(id, {
      key,
      value,
      sequence: this._sequence,
      frequency: 1,
      lastAccess: this._accessClock,
      expiresAt,
    });
    this.track(id);
    this._logger.debug(`Stored entry ${id}`);

    if (this._entries.size > this.maxSize) {
      this._logger.error(`Store holds ${this._entries.size} entries with a size limit of ${this.maxSize}`);
      throw new InvariantViolationError({ detail: 'Store exceeds its size limit after insertion' });
    }

    return evicted;
  }

  delete(key: CacheKey): boolean {
    const resolved = this._resolve(key);
    if (resolved === undefined) return false;

    const [id] = resolved;
    this._logger.debug(`Deleting entry ${id}`);
    this.stopTracking(id);
    this._entries.delete(id);
    this._keys.release(id);
    return true;
  }

  size(): number {
    return this._entries.size;
  }

  clear(): void {
    this._logger.verbose(`Clearing ${this._entries.size} entries`);
    this._entries.clear();
    this._keys.clear();
    this.reset();
  }

  entries(): IterableIterator<CacheEntry<T>> {
    return this._entries.values();
  }

  /**
   * Looks up the id and entry of a key. Hashable keys are verified against the canonical form of the stored
   * key, so a hash collision is reported as a miss.
   */
  protected _resolve(key: CacheKey): [string, CacheEntry<T>] | undefined {
    const id = this._keys.idOf(key);
    if (id === undefined) return undefined;

    const entry = this._entries.get(id);
    if (entry === undefined) return undefined;
    if (key.kind === 'hashable' && (entry.key.kind !== 'hashable' || !isEqual(entry.key.canonical, key.canonical))) {
      this._logger.warn(`Hash collision for entry ${id}`);
      return undefined;
    }

    return [id, entry];
  }

  private _evictOne(): CacheKey {
    return tracer.startActiveSpan(
      'Evict',
      {
        attributes: {
          'cache.algorithm': this.algorithm,
          'eviction.cause': 'size',
        },
      },
      (span) => {
        try {
          const id = this.evict();
          const entry = id === null ? undefined : this._entries.get(id);
          if (id === null || entry === undefined) {
            this._logger.error(`Policy returned ${id} as eviction candidate for a full store`);
            throw new InvariantViolationError({ detail: 'Full store has no entry to evict' });
          }

          this._logger.verbose(`Evicting entry ${id}`);
          span.setAttribute('cache.id', id);
          this._entries.delete(id);
          this._keys.release(id);

          totalEvictionsCounter.add(1, { 'cache.algorithm': this.algorithm });
          sizeLimitEvictionsCounter.add(1, { 'cache.algorithm': this.algorithm });
          return entry.key;
        } finally {
          span.end();
        }
      },
    );
  }
}
