import type { MaybePromise } from '@memokit/types';

/**
 * Critical section around compound cache operations.
 */
export interface ConcurrencyGuard {
  readonly threadSafe: boolean;

  /**
   * Runs the given function inside the critical section and resolves with its result.
   */
  runExclusive<T>(fn: () => MaybePromise<T>): Promise<T>;
}
