import type { MaybePromise } from '@memokit/types';

import type { ConcurrencyGuard } from '@/guards/base';

/**
 * Runs everything immediately. Concurrent misses for the same call may each run the computation.
 */
export class NoopGuard implements ConcurrencyGuard {
  readonly threadSafe = false;

  async runExclusive<T>(fn: () => MaybePromise<T>): Promise<T> {
    return fn();
  }
}
