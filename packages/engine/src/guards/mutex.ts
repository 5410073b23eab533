import { Mutex } from 'async-mutex';
import { AsyncLocalStorage } from 'async_hooks';

import type { MaybePromise } from '@memokit/types';

import type { ConcurrencyGuard } from '@/guards/base';

/**
 * Serializes every critical section through a single mutex, which is held for the whole duration of the
 * given function including any awaited computation.
 *
 * The guard is reentrant for the async context holding it. A memoized function calling itself while its own
 * computation holds the lock runs straight through instead of waiting for a lock that would never be
 * released. Every acquisition gets its own token, so work the holder leaves running after it released the
 * lock has to queue up like any other caller.
 */
export class MutexGuard implements ConcurrencyGuard {
  readonly threadSafe = true;

  protected _mutex: Mutex = new Mutex();

  protected _context: AsyncLocalStorage<symbol> = new AsyncLocalStorage();

  protected _holder: symbol | null = null;

  get isLocked(): boolean {
    return this._mutex.isLocked();
  }

  async runExclusive<T>(fn: () => MaybePromise<T>): Promise<T> {
    const token = this._context.getStore();
    if (token !== undefined && token === this._holder) return fn();

    return this._mutex.runExclusive(async () => {
      const acquired = Symbol('lock');
      this._holder = acquired;

      try {
        return await this._context.run(acquired, fn);
      } finally {
        this._holder = null;
      }
    });
  }
}
