import { isEqual } from 'lodash-es';
import type { Logger } from 'winston';

import type { CacheConfiguration, CacheInfo, CacheOptions, CallArguments, MaybePromise } from '@memokit/types';

import { ExpirationTracker, type Clock } from '@/expiration/tracker';
import { createGuard, type ConcurrencyGuard } from '@/guards';
import { KeyBuilder } from '@/keys/key-builder';
import { isSameKey } from '@/keys/key-index';
import { createPolicy } from '@/policies';
import { parseCacheOptions } from '@/setup/configuration-setup';
import { StatisticsRecorder } from '@/statistics/recorder';
import type { CacheKey, CacheStore } from '@/types/cache';
import { KeyConstructionError } from '@/utils/errors';
import { componentLogger } from '@/utils/logger';
import {
  cacheBypassesCounter,
  cacheHitsCounter,
  cacheLookupsCounter,
  cacheMissesCounter,
  createdCachesCounter,
  removalsCounter,
  tracer,
} from '@/utils/opentelemetry';

export type Computation<T> = () => MaybePromise<T>;

export type EntryCallback<T, R> = (call: CallArguments, value: T) => R;

interface InFlightComputation<T> {
  key: CacheKey;
  result: Promise<T>;
}

export interface ControllerOverrides {
  /**
   * Clock used for TTL expiry, defaults to `Date.now()`.
   */
  now?: Clock;
}

/**
 * A single memoization cache bound to one computation. Composes key derivation, the eviction store, TTL
 * expiry, the concurrency guard and statistics into fetch-or-compute.
 * @template T - The type of the computed values.
 */
export class CacheController<T> {
  readonly configuration: Readonly<CacheConfiguration>;

  protected _keyBuilder: KeyBuilder;

  protected _store: CacheStore<T>;

  protected _guard: ConcurrencyGuard;

  protected _statistics: StatisticsRecorder;

  protected _logger: Logger;

  protected _inFlight: InFlightComputation<T>[] = [];

  /**
   * @throws {ConfigurationError} If any option is invalid.
   */
  constructor(options?: CacheOptions, overrides: ControllerOverrides = {}) {
    this.configuration = Object.freeze(parseCacheOptions(options));
    const { ttl, maxSize, algorithm, threadSafe, keyMaker } = this.configuration;

    const policy = createPolicy<T>(algorithm, maxSize);
    this._store = ttl === undefined ? policy : new ExpirationTracker(policy, ttl, overrides.now);
    this._guard = createGuard(threadSafe);
    this._keyBuilder = new KeyBuilder(keyMaker);
    this._statistics = new StatisticsRecorder(this._store, {
      maxSize,
      algorithm,
      ttl,
      threadSafe,
      useCustomKey: this._keyBuilder.usesCustomKey,
    });

    this._logger = componentLogger('CacheController', { algorithm, maxSize, ttl, threadSafe });
    this._logger.info('Created cache');
    createdCachesCounter.add(1, { 'cache.algorithm': algorithm });
  }

  /**
   * Returns the stored value for the call if there is a live one. Otherwise runs the computation, stores its
   * value and returns it. Failed computations are never stored, their error is passed on unchanged.
   *
   * If no key can be built from the arguments, the computation runs without the cache and the call counts as
   * neither hit nor miss.
   * @param args - Positional arguments of the call.
   * @param kwargs - Keyword arguments of the call.
   * @param compute - Produces the value on a miss.
   */
  async fetchOrCompute(
    args: readonly unknown[],
    kwargs: Readonly<Record<string, unknown>>,
    compute: Computation<T>,
  ): Promise<T> {
    let key: CacheKey;

    try {
      key = this._keyBuilder.build(args, kwargs);
    } catch (err) {
      if (!(err instanceof KeyConstructionError)) throw err;

      this._logger.verbose(`Bypassing cache: ${err.detail ?? err.message}`);
      cacheBypassesCounter.add(1, { 'cache.algorithm': this.configuration.algorithm });
      return compute();
    }

    return tracer.startActiveSpan(
      'FetchOrCompute',
      {
        attributes: {
          'cache.algorithm': this.configuration.algorithm,
          'cache.key.kind': key.kind,
        },
      },
      async (span) => {
        try {
          return await this._guard.runExclusive(async () => {
            cacheLookupsCounter.add(1, { 'cache.algorithm': this.configuration.algorithm });
            const entry = this._store.get(key);

            if (entry !== undefined) {
              this._logger.debug('Cache hit');
              this._statistics.recordHit();
              cacheHitsCounter.add(1, { 'cache.algorithm': this.configuration.algorithm });
              span.setAttribute('cache.hit', true);
              return entry.value;
            }

            // Calls made by a computation holding the lock pass the guard, so they have to wait for a
            // computation of the same call that is still running
            const inFlight = this._inFlight.find((computation) => isSameKey(computation.key, key));
            if (inFlight !== undefined) {
              this._logger.debug('Waiting for computation in flight');
              span.setAttribute('cache.hit', true);
              const value = await inFlight.result;

              this._statistics.recordHit();
              cacheHitsCounter.add(1, { 'cache.algorithm': this.configuration.algorithm });
              return value;
            }

            this._logger.debug('Cache miss, running computation');
            span.setAttribute('cache.hit', false);
            return this._computeAndStore(key, compute);
          });
        } finally {
          span.end();
        }
      },
    );
  }

  private async _computeAndStore(key: CacheKey, compute: Computation<T>): Promise<T> {
    const result = (async () => {
      const value = await compute();

      this._store.put(key, value);
      this._statistics.recordMiss();
      cacheMissesCounter.add(1, { 'cache.algorithm': this.configuration.algorithm });
      return value;
    })();

    if (!this._guard.threadSafe) return result;

    const inFlight: InFlightComputation<T> = { key, result };
    this._inFlight.push(inFlight);

    try {
      return await result;
    } finally {
      this._inFlight = this._inFlight.filter((computation) => computation !== inFlight);
    }
  }

  /**
   * Removes every entry and resets the hit and miss counters to zero. Waits for an in-flight computation
   * if the cache is thread safe.
   */
  async clear(): Promise<void> {
    await this._guard.runExclusive(() =>
      tracer.startActiveSpan('ClearCache', { attributes: { 'cache.algorithm': this.configuration.algorithm } }, (span) => {
        this._store.clear();
        this._statistics.reset();
        this._logger.info('Cleared cache');
        span.end();
      }),
    );
  }

  info(): Readonly<CacheInfo> {
    return this._statistics.snapshot();
  }

  isEmpty(): boolean {
    return this._store.size() === 0;
  }

  isFull(): boolean {
    return this._store.size() >= this._store.maxSize;
  }

  /**
   * Checks for a live entry of the call without counting a hit or touching the eviction order.
   */
  containsArgument(args: readonly unknown[], kwargs: Readonly<Record<string, unknown>> = {}): boolean {
    try {
      return this._store.contains(this._keyBuilder.build(args, kwargs));
    } catch (err) {
      if (err instanceof KeyConstructionError) return false;
      throw err;
    }
  }

  /**
   * Checks whether any live entry holds a value deeply equal to the given one.
   */
  containsResult(value: T): boolean {
    for (const entry of this._store.entries()) {
      if (isEqual(entry.value, value)) return true;
    }

    return false;
  }

  forEach(callback: EntryCallback<T, void>): void {
    for (const entry of Array.from(this._store.entries())) {
      callback(entry.key.call, entry.value);
    }
  }

  arguments(): CallArguments[] {
    return Array.from(this._store.entries(), (entry) => entry.key.call);
  }

  results(): T[] {
    return Array.from(this._store.entries(), (entry) => entry.value);
  }

  items(): [CallArguments, T][] {
    return Array.from(this._store.entries(), (entry): [CallArguments, T] => [entry.key.call, entry.value]);
  }

  /**
   * Removes every live entry matching the predicate.
   * @returns Whether any entry has been removed.
   */
  async removeIf(predicate: EntryCallback<T, boolean>): Promise<boolean> {
    return this._guard.runExclusive(() =>
      tracer.startActiveSpan('RemoveIf', { attributes: { 'cache.algorithm': this.configuration.algorithm } }, (span) => {
        const keys = Array.from(this._store.entries())
          .filter((entry) => predicate(entry.key.call, entry.value))
          .map((entry) => entry.key);

        keys.forEach((key) => this._store.delete(key));
        this._logger.verbose(`Removed ${keys.length} entries`);
        removalsCounter.add(keys.length, { 'cache.algorithm': this.configuration.algorithm });

        span.setAttribute('cache.removed', keys.length);
        span.end();
        return keys.length > 0;
      }),
    );
  }
}
