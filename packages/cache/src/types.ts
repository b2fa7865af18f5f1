import { z } from 'zod'

export const ResolutionCacheOptionsSchema = z.object({
  /** Maximum number of entries held at once */
  capacity: z.number().int().positive(),
  /** Maximum entry age before it is treated as stale */
  ttlSeconds: z.number().positive(),
})

export type ResolutionCacheOptions = z.infer<
  typeof ResolutionCacheOptionsSchema
> & {
  /** Clock in milliseconds, Date.now by default */
  now?: () => number
}

/** One cached answer */
export interface CacheEntry {
  domain: string
  address: string
  /** Clock reading at insertion, in milliseconds */
  insertedAt: number
}

export interface CacheStats {
  hits: number
  misses: number
  hitRate: number
  size: number
  capacity: number
  ttlSeconds: number
}

// ============================================================================
// Error Types
// ============================================================================

export const CacheErrorCode = {
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const

export type CacheErrorCode =
  (typeof CacheErrorCode)[keyof typeof CacheErrorCode]

export class CacheError extends Error {
  constructor(
    message: string,
    public readonly code: CacheErrorCode,
  ) {
    super(message)
    this.name = 'CacheError'
  }
}
