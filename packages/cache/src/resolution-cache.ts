/**
 * Resolution Cache
 *
 * Bounded, time-expiring, least-recently-used map from domain to
 * address. Expiry is lazy (checked on read); eviction happens on write
 * when the cache is full. Recency is refreshed by both reads and writes.
 */

import { LRUCache } from 'lru-cache'
import {
  type CacheEntry,
  CacheError,
  CacheErrorCode,
  type CacheStats,
  type ResolutionCacheOptions,
  ResolutionCacheOptionsSchema,
} from './types'

export class ResolutionCache {
  readonly capacity: number
  readonly ttlSeconds: number
  private readonly entries: LRUCache<string, CacheEntry>
  private readonly now: () => number
  private hitCount = 0
  private missCount = 0

  constructor(options: ResolutionCacheOptions) {
    const parsed = ResolutionCacheOptionsSchema.safeParse(options)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new CacheError(
        `Invalid cache options: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'rejected'}`,
        CacheErrorCode.INVALID_CONFIG,
      )
    }

    this.capacity = parsed.data.capacity
    this.ttlSeconds = parsed.data.ttlSeconds
    this.now = options.now ?? Date.now
    this.entries = new LRUCache<string, CacheEntry>({ max: this.capacity })
  }

  /**
   * Look up a fresh address. Expired entries are dropped and count as a
   * miss.
   */
  get(domain: string): string | undefined {
    const entry = this.entries.peek(domain)
    if (!entry) {
      this.missCount++
      return undefined
    }

    if (this.now() - entry.insertedAt >= this.ttlSeconds * 1000) {
      this.entries.delete(domain)
      this.missCount++
      return undefined
    }

    // Mark most recently used
    this.entries.get(domain)
    this.hitCount++
    return entry.address
  }

  /**
   * Insert or refresh an entry. A new key evicts the least recently used
   * entry when the cache is full.
   */
  put(domain: string, address: string): void {
    this.entries.set(domain, { domain, address, insertedAt: this.now() })
  }

  /**
   * Inspect an entry, stale or not, without counting a lookup or
   * touching its recency
   */
  peek(domain: string): CacheEntry | undefined {
    const entry = this.entries.peek(domain)
    return entry ? { ...entry } : undefined
  }

  invalidate(domain: string): boolean {
    return this.entries.delete(domain)
  }

  clear(): void {
    this.entries.clear()
  }

  has(domain: string): boolean {
    return this.entries.has(domain)
  }

  get size(): number {
    return this.entries.size
  }

  get hits(): number {
    return this.hitCount
  }

  get misses(): number {
    return this.missCount
  }

  hitRate(): number {
    const total = this.hitCount + this.missCount
    if (total === 0) return 0
    return this.hitCount / total
  }

  stats(): CacheStats {
    return {
      hits: this.hitCount,
      misses: this.missCount,
      hitRate: this.hitRate(),
      size: this.entries.size,
      capacity: this.capacity,
      ttlSeconds: this.ttlSeconds,
    }
  }
}
