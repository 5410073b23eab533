import { Algorithm } from '@memokit/types';

import { BasePolicy } from '@/policies/base';
import { LinkedList } from '@/utils/linked-list';

/**
 * Evicts the least recently used entry. Every hit moves the entry to the newest end of the recency list.
 */
export class LRUPolicy<T> extends BasePolicy<T> {
  protected _linkedList: LinkedList;

  constructor(maxSize?: number) {
    super(Algorithm.LRU, maxSize);

    this._linkedList = new LinkedList(this._logger);
  }

  protected track(id: string): void {
    const added = this._linkedList.add(id);
    if (!added) this._logger.warn(`Id ${id} is already being tracked`);
  }

  protected stopTracking(id: string): void {
    const removed = this._linkedList.remove(id);
    if (!removed) this._logger.warn(`Id ${id} is not being tracked, can not stop tracking`);
  }

  protected hit(id: string): void {
    const promoted = this._linkedList.moveToNewest(id);
    if (!promoted) this._logger.debug(`Id ${id} is already the most recently used, skipping`);
  }

  protected evict(): string | null {
    return this._linkedList.shift();
  }

  protected reset(): void {
    this._linkedList.clear();
  }
}
