/** Cache — per-source-instance memoization */
export { SourceValueCache, CacheEntry, Lazy } from './SourceValueCache.js';
