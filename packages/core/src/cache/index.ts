/**
 * Cache Module
 */

export {
  type CacheEntry,
  type RetrievalKey,
  type PartitionStats,
  type CacheStats,
  CACHE_PARTITIONS,
  TieredCache,
  isExpired,
  retrievalLookupKey,
} from './tiered-cache.js';
