/**
 * Caching Resolver
 *
 * Answers client queries from the resolution cache, or on a miss walks
 * the delegation chain iteratively: root -> TLD -> authoritative. The
 * chain is exactly three hops with no retry and no alternate path; any
 * failing hop fails the whole query. Only successful answers are cached.
 */

import type { ResolutionCache } from '@hopdns/cache'
import {
  createAddressResponse,
  createErrorResponse,
  createQuery,
  type DNSMessage,
  type DNSQuery,
  type DNSResponse,
  type Delegation,
  DelegationRole,
  formatAddress,
  type MessageHandler,
  MessageType,
  normalizeDomain,
  ResultKind,
  type ServerAddress,
  TransportError,
} from '@hopdns/protocol'
import { createLogger } from '../lib/logger'
import type { QueryChannel } from '../transport/channel'

const log = createLogger('resolver')

export type Hop = 'root' | 'tld' | 'auth'

export interface ResolverOptions {
  rootServer: ServerAddress
  channel: QueryChannel
  cache: ResolutionCache
  /** Clock in milliseconds, Date.now by default */
  now?: () => number
}

export interface ResolverStats {
  totalQueries: number
  failedQueries: number
  cacheHits: number
  cacheMisses: number
  hitRate: number
  averageLatencyMs: number
  cacheSize: number
  cacheCapacity: number
}

type Resolution =
  | { ok: true; address: string; cached: boolean }
  | { ok: false; reason: string }

type HopReply =
  | { ok: true; response: DNSResponse }
  | { ok: false; reason: string }

function failed(reason: string): Resolution {
  return { ok: false, reason }
}

function serverOf(delegation: Delegation): ServerAddress {
  return { host: delegation.host, port: delegation.port }
}

export class Resolver implements MessageHandler {
  private readonly rootServer: ServerAddress
  private readonly channel: QueryChannel
  private readonly cache: ResolutionCache
  private readonly now: () => number
  private totalQueries = 0
  private failedQueries = 0
  private totalResolutionTimeMs = 0

  constructor(options: ResolverOptions) {
    this.rootServer = { ...options.rootServer }
    this.channel = options.channel
    this.cache = options.cache
    this.now = options.now ?? Date.now
  }

  /**
   * Resolve one client query. Always yields a well-formed response;
   * every failure becomes an ERROR result.
   */
  async handle(query: DNSQuery): Promise<DNSResponse> {
    const startedAt = this.now()
    this.totalQueries++
    const queryNumber = this.totalQueries

    const resolution = await this.resolve(
      query.id,
      normalizeDomain(query.domain),
    )

    const elapsedMs = this.now() - startedAt
    this.totalResolutionTimeMs += elapsedMs

    if (resolution.ok) {
      log.info('Resolved', {
        query: queryNumber,
        domain: query.domain,
        address: resolution.address,
        cached: resolution.cached,
        elapsedMs,
      })
      return createAddressResponse(query, resolution.address)
    }

    this.failedQueries++
    log.warn('Resolution failed', {
      query: queryNumber,
      domain: query.domain,
      reason: resolution.reason,
      elapsedMs,
    })
    return createErrorResponse(query, resolution.reason)
  }

  private async resolve(id: number, domain: string): Promise<Resolution> {
    const cached = this.cache.get(domain)
    if (cached !== undefined) {
      return { ok: true, address: cached, cached: true }
    }

    log.debug('Cache miss, starting iterative resolution', { domain })
    // Every hop receives the same query: same id, same normalized name
    const hopQuery = createQuery(id, domain)

    const root = await this.ask('root', this.rootServer, hopQuery)
    if (!root.ok) return root
    const rootResult = root.response.result
    if (rootResult.kind === ResultKind.ERROR) {
      return failed(rootResult.reason)
    }
    if (
      rootResult.kind !== ResultKind.NS ||
      rootResult.delegation.role !== DelegationRole.TLD
    ) {
      return failed('unexpected response from root')
    }

    const tldServer = serverOf(rootResult.delegation)
    const tld = await this.ask('tld', tldServer, hopQuery)
    if (!tld.ok) return tld
    const tldResult = tld.response.result
    if (tldResult.kind === ResultKind.ERROR) {
      return failed(tldResult.reason)
    }
    if (tldResult.kind === ResultKind.IP) {
      // Permissive fallback: a TLD server may answer as if authoritative
      log.warn('TLD server answered directly', {
        domain,
        server: formatAddress(tldServer),
      })
      return this.answer(domain, tldResult.address)
    }
    if (tldResult.delegation.role !== DelegationRole.AUTH) {
      return failed('unexpected response from tld')
    }

    const authServer = serverOf(tldResult.delegation)
    const auth = await this.ask('auth', authServer, hopQuery)
    if (!auth.ok) return auth
    const authResult = auth.response.result
    if (authResult.kind === ResultKind.IP) {
      return this.answer(domain, authResult.address)
    }
    if (authResult.kind === ResultKind.ERROR) {
      return failed(authResult.reason || 'unexpected response from auth')
    }
    return failed('unexpected response from auth')
  }

  private answer(domain: string, address: string): Resolution {
    this.cache.put(domain, address)
    return { ok: true, address, cached: false }
  }

  /**
   * One round trip to one hop. Transport failures and unreadable replies
   * end the query; they are never retried.
   */
  private async ask(
    hop: Hop,
    server: ServerAddress,
    query: DNSQuery,
  ): Promise<HopReply> {
    let reply: DNSMessage
    try {
      reply = await this.channel.send(server, query)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      log.warn(`Error querying ${hop} server`, {
        server: formatAddress(server),
        error: message,
      })
      if (error instanceof TransportError && error.reason === 'timeout') {
        return { ok: false, reason: 'timeout' }
      }
      return { ok: false, reason: `${hop} server error` }
    }

    if (reply.type !== MessageType.RESPONSE) {
      return { ok: false, reason: `unexpected response from ${hop}` }
    }

    log.debug(`${hop} replied`, {
      server: formatAddress(server),
      kind: reply.result.kind,
    })
    return { ok: true, response: reply }
  }

  getStats(): ResolverStats {
    const cache = this.cache.stats()
    return {
      totalQueries: this.totalQueries,
      failedQueries: this.failedQueries,
      cacheHits: cache.hits,
      cacheMisses: cache.misses,
      hitRate: cache.hitRate,
      averageLatencyMs:
        this.totalQueries === 0
          ? 0
          : this.totalResolutionTimeMs / this.totalQueries,
      cacheSize: cache.size,
      cacheCapacity: cache.capacity,
    }
  }
}

/**
 * Statistics block logged when the local server shuts down
 */
export function formatStats(stats: ResolverStats): string {
  return [
    '===== STATISTICS =====',
    `Total Queries: ${stats.totalQueries}`,
    `Failed Queries: ${stats.failedQueries}`,
    `Cache Hits: ${stats.cacheHits}`,
    `Cache Misses: ${stats.cacheMisses}`,
    `Cache Hit Rate: ${(stats.hitRate * 100).toFixed(2)}%`,
    `Average Resolution Time: ${stats.averageLatencyMs.toFixed(2)}ms`,
    `Cache Size: ${stats.cacheSize}/${stats.cacheCapacity}`,
    '======================',
  ].join('\n')
}
