/**
 * @hopdns/cache
 *
 * Bounded LRU cache with per-entry TTL for resolved addresses.
 *
 * @example
 * ```typescript
 * import { ResolutionCache } from '@hopdns/cache'
 *
 * const cache = new ResolutionCache({ capacity: 1000, ttlSeconds: 300 })
 * cache.put('example.com', '203.0.113.5')
 * cache.get('example.com') // '203.0.113.5'
 * cache.hitRate() // 1
 * ```
 */

export { ResolutionCache } from './resolution-cache'

// Types
export {
  type CacheEntry,
  CacheError,
  CacheErrorCode,
  type CacheStats,
  type ResolutionCacheOptions,
  ResolutionCacheOptionsSchema,
} from './types'
