import { Algorithm } from '@memokit/types';

import { BasePolicy } from '@/policies/base';
import { InvariantViolationError } from '@/utils/errors';
import { LinkedList } from '@/utils/linked-list';

/**
 * Evicts the least frequently used entry. Entries sharing a frequency live in the same bucket, ordered by
 * the time they reached it, so ties are broken by evicting the oldest one.
 */
export class LFUPolicy<T> extends BasePolicy<T> {
  protected _frequencies: Map<string, number> = new Map<string, number>();

  protected _buckets: Map<number, LinkedList> = new Map<number, LinkedList>();

  protected _lowestFrequency: number = 0;

  constructor(maxSize?: number) {
    super(Algorithm.LFU, maxSize);
  }

  protected track(id: string): void {
    if (this._frequencies.has(id)) {
      this._logger.warn(`Id ${id} is already being tracked`);
      return;
    }

    this._frequencies.set(id, 1);
    this._bucket(1).add(id);
    this._lowestFrequency = 1;
  }

  protected stopTracking(id: string): void {
    const frequency = this._frequencies.get(id);
    if (frequency === undefined) {
      this._logger.warn(`Id ${id} is not being tracked, can not stop tracking`);
      return;
    }

    // The lowest frequency may now point at a missing bucket. The store is below its size limit
    // afterwards, so the next insertion resets it to 1 before anything can be evicted
    this._frequencies.delete(id);
    this._unlink(id, frequency);
  }

  protected hit(id: string): void {
    const frequency = this._frequencies.get(id);
    if (frequency === undefined) {
      this._logger.warn(`Id ${id} is not being tracked, can not increase frequency`);
      return;
    }

    const newFrequency = frequency + 1;
    this._unlink(id, frequency);
    if (frequency === this._lowestFrequency && !this._buckets.has(frequency)) this._lowestFrequency = newFrequency;

    this._frequencies.set(id, newFrequency);
    this._bucket(newFrequency).add(id);
  }

  protected evict(): string | null {
    if (this._frequencies.size === 0) return null;

    const bucket = this._buckets.get(this._lowestFrequency);
    if (bucket === undefined)
      throw new InvariantViolationError({ detail: `No bucket for lowest frequency ${this._lowestFrequency}` });

    const id = bucket.shift();
    if (id === null) return null;

    this._frequencies.delete(id);
    if (bucket.size === 0) this._buckets.delete(this._lowestFrequency);

    return id;
  }

  protected reset(): void {
    this._frequencies.clear();
    this._buckets.clear();
    this._lowestFrequency = 0;
  }

  private _bucket(frequency: number): LinkedList {
    let bucket = this._buckets.get(frequency);
    if (bucket === undefined) {
      bucket = new LinkedList(this._logger);
      this._buckets.set(frequency, bucket);
    }

    return bucket;
  }

  private _unlink(id: string, frequency: number): void {
    const bucket = this._buckets.get(frequency);
    if (bucket === undefined || !bucket.remove(id))
      throw new InvariantViolationError({ detail: `Id ${id} is missing from bucket ${frequency}` });

    if (bucket.size === 0) this._buckets.delete(frequency);
  }
}
