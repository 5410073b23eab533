import type { CacheInfo } from '@memokit/types';

export interface SizedStore {
  size(): number;
}

export type CacheDescriptor = Omit<CacheInfo, 'hits' | 'misses' | 'currentSize'>;

export class StatisticsRecorder {
  protected _hits: number = 0;

  protected _misses: number = 0;

  protected _store: SizedStore;

  protected _descriptor: Readonly<CacheDescriptor>;

  constructor(store: SizedStore, descriptor: CacheDescriptor) {
    this._store = store;
    this._descriptor = Object.freeze({ ...descriptor });
  }

  get hits(): number {
    return this._hits;
  }

  get misses(): number {
    return this._misses;
  }

  recordHit(): void {
    this._hits += 1;
  }

  recordMiss(): void {
    this._misses += 1;
  }

  reset(): void {
    this._hits = 0;
    this._misses = 0;
  }

  snapshot(): Readonly<CacheInfo> {
    return Object.freeze({
      hits: this._hits,
      misses: this._misses,
      currentSize: this._store.size(),
      ...this._descriptor,
    });
  }
}
