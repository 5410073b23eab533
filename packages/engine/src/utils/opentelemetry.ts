import { trace, metrics, ValueType } from '@opentelemetry/api';

const meter = metrics.getMeter('memokit');
export const tracer = trace.getTracer('memokit');

export const createdCachesCounter = meter.createCounter('memokit_caches_created_total', {
  description: 'Number of created caches',
  valueType: ValueType.INT,
});
export const cacheLookupsCounter = meter.createCounter('memokit_cache_lookups_total', {
  description: 'Number of cache lookups',
  valueType: ValueType.INT,
});
export const cacheHitsCounter = meter.createCounter('memokit_cache_hits_total', {
  description: 'Number of cache hits',
  valueType: ValueType.INT,
});
export const cacheMissesCounter = meter.createCounter('memokit_cache_misses_total', {
  description: 'Number of cache misses',
  valueType: ValueType.INT,
});
export const cacheBypassesCounter = meter.createCounter('memokit_cache_bypasses_total', {
  description: 'Number of calls executed without the cache because no key could be built',
  valueType: ValueType.INT,
});
export const totalEvictionsCounter = meter.createCounter('memokit_cache_evictions_total', {
  description: 'Number of cache evictions',
  valueType: ValueType.INT,
});
export const ttlEvictionsCounter = meter.createCounter('memokit_cache_evictions_ttl_total', {
  description: 'Number of cache evictions due to TTL',
  valueType: ValueType.INT,
});
export const sizeLimitEvictionsCounter = meter.createCounter('memokit_cache_evictions_size_limit_total', {
  description: 'Number of cache evictions due to a size limit',
  valueType: ValueType.INT,
});
export const removalsCounter = meter.createCounter('memokit_cache_removals_total', {
  description: 'Number of entries removed manually',
  valueType: ValueType.INT,
});
