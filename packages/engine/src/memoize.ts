import type { CacheInfo, CacheOptions, CallArguments } from '@memokit/types';

import { CacheController, type ControllerOverrides, type EntryCallback } from '@/controller';

export interface MemoizedMembers<A extends unknown[], R> {
  cacheInfo(): Readonly<CacheInfo>;
  cacheClear(): Promise<void>;
  cacheIsEmpty(): boolean;
  cacheIsFull(): boolean;
  cacheContainsArgument(...args: A): boolean;
  cacheContainsResult(value: R): boolean;
  cacheForEach(callback: EntryCallback<R, void>): void;
  cacheArguments(): CallArguments[];
  cacheResults(): R[];
  cacheItems(): [CallArguments, R][];
  cacheRemoveIf(predicate: EntryCallback<R, boolean>): Promise<boolean>;
  /**
   * The function without the cache.
   */
  readonly original: (...args: A) => R | Promise<R>;
  readonly controller: CacheController<R>;
}

export type Memoized<A extends unknown[], R> = ((...args: A) => Promise<R>) & MemoizedMembers<A, R>;

/**
 * Wraps a function with its own cache. The wrapped function always resolves asynchronously, even when the
 * original function is synchronous.
 *
 * @example
 * const fetchUser = memoize((id: number) => api.getUser(id), { maxSize: 100, ttl: 60_000 });
 * await fetchUser(1);
 * fetchUser.cacheInfo(); // { hits: 0, misses: 1, currentSize: 1, ... }
 *
 * @throws {ConfigurationError} If any option is invalid.
 */
export function memoize<A extends unknown[], R>(
  fn: (...args: A) => R | Promise<R>,
  options?: CacheOptions,
  overrides?: ControllerOverrides,
): Memoized<A, R> {
  const controller = new CacheController<R>(options, overrides);
  const wrapped = (...args: A): Promise<R> => controller.fetchOrCompute(args, {}, () => fn(...args));

  const members: MemoizedMembers<A, R> = {
    cacheInfo: () => controller.info(),
    cacheClear: () => controller.clear(),
    cacheIsEmpty: () => controller.isEmpty(),
    cacheIsFull: () => controller.isFull(),
    cacheContainsArgument: (...args: A) => controller.containsArgument(args),
    cacheContainsResult: (value: R) => controller.containsResult(value),
    cacheForEach: (callback) => controller.forEach(callback),
    cacheArguments: () => controller.arguments(),
    cacheResults: () => controller.results(),
    cacheItems: () => controller.items(),
    cacheRemoveIf: (predicate) => controller.removeIf(predicate),
    original: fn,
    controller,
  };

  return Object.assign(wrapped, members);
}
