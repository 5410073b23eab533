export { CacheController, type Computation, type ControllerOverrides, type EntryCallback } from '@/controller';
export { ExpirationTracker, type Clock } from '@/expiration/tracker';
export { createGuard, MutexGuard, NoopGuard, type ConcurrencyGuard } from '@/guards';
export { KeyBuilder } from '@/keys/key-builder';
export { memoize, type Memoized, type MemoizedMembers } from '@/memoize';
export { BasePolicy, createPolicy, FIFOPolicy, LFUPolicy, LRUPolicy } from '@/policies';
export { parseCacheOptions } from '@/setup/configuration-setup';
export { StatisticsRecorder } from '@/statistics/recorder';
export type { CacheEntry, CacheKey, CacheStore, HashableKey, StructuralKey } from '@/types/cache';
export { ConfigurationError, InvariantViolationError, KeyConstructionError, MemokitError } from '@/utils/errors';
export * from '@memokit/types';
