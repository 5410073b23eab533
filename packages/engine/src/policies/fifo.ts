import { Algorithm } from '@memokit/types';

import { BasePolicy } from '@/policies/base';
import { LinkedList } from '@/utils/linked-list';

/**
 * Evicts the oldest entry. Hits never change the order.
 */
export class FIFOPolicy<T> extends BasePolicy<T> {
  protected _queue: LinkedList;

  constructor(maxSize?: number) {
    super(Algorithm.FIFO, maxSize);

    this._queue = new LinkedList(this._logger);
  }

  protected track(id: string): void {
    if (!this._queue.add(id)) this._logger.warn(`Id ${id} is already being tracked`);
  }

  protected stopTracking(id: string): void {
    if (!this._queue.remove(id)) this._logger.warn(`Id ${id} is not being tracked, can not stop tracking`);
  }

  protected hit(): void {}

  protected evict(): string | null {
    return this._queue.shift();
  }

  protected reset(): void {
    this._queue.clear();
  }
}
