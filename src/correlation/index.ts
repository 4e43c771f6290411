/**
 * Correlation Module
 *
 * Shares in-flight trace contexts between the disjoint callbacks of a request.
 */

export {
  type CorrelationCache,
  type CorrelationCacheConfig,
  DEFAULT_CACHE_CAPACITY,
  LruCorrelationCache,
  getCorrelationCache,
  resetCorrelationCache,
} from './correlationCache.js';

export {
  type TraceContext,
  TRACE_ID_VAR,
  readTraceId,
  storeContext,
  getContext,
  removeContext,
} from './contextStore.js';
