import { Algorithm } from '@memokit/types';

import { BasePolicy } from '@/policies/base';
import { FIFOPolicy } from '@/policies/fifo';
import { LFUPolicy } from '@/policies/lfu';
import { LRUPolicy } from '@/policies/lru';

/**
 * Creates an empty store using the given eviction algorithm.
 * @template T - The type of the stored values.
 * @param algorithm - The eviction algorithm.
 * @param maxSize - The size limit, unbounded if omitted.
 */
export function createPolicy<T>(algorithm: Algorithm, maxSize?: number): BasePolicy<T> {
  switch (algorithm) {
    case Algorithm.LRU:
      return new LRUPolicy<T>(maxSize);
    case Algorithm.LFU:
      return new LFUPolicy<T>(maxSize);
    case Algorithm.FIFO:
      return new FIFOPolicy<T>(maxSize);
  }
}

export { BasePolicy, FIFOPolicy, LFUPolicy, LRUPolicy };
