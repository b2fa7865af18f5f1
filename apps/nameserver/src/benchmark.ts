/**
 * Resolver Benchmark
 *
 * Drives a DnsClient against a running local resolver:
 * - Cache effectiveness (first pass vs repeated passes over the same names)
 * - Sequential throughput
 * - Concurrent throughput with a bounded pool of workers
 */

import type { ClientResult } from './client'
import { createLogger } from './lib/logger'

const log = createLogger('benchmark')

const PROGRESS_EVERY = 100

// ============ Types ============

export interface BenchmarkTarget {
  resolve(domain: string): Promise<ClientResult>
}

export interface BenchmarkOptions {
  /** Clock in milliseconds, performance.now by default */
  now?: () => number
  /** Uniform [0, 1), Math.random by default */
  random?: () => number
}

export interface QuerySample {
  domain: string
  ok: boolean
  elapsedMs: number
}

export interface RunResult {
  samples: QuerySample[]
  totalMs: number
}

export interface CacheEffectiveness {
  firstPass: QuerySample[]
  cachedPasses: QuerySample[]
  avgFirstMs: number
  avgCachedMs: number
  /** Relative latency drop of cached passes, in percent */
  improvementPct: number
}

export interface BenchmarkSummary {
  total: number
  successful: number
  failed: number
  /** Percent */
  successRate: number
  totalMs: number
  queriesPerSecond: number
  latency: {
    avg: number
    min: number
    max: number
    p50: number
    p95: number
    p99: number
  }
}

// ============ Benchmark ============

export class Benchmark {
  private readonly target: BenchmarkTarget
  private readonly now: () => number
  private readonly random: () => number

  constructor(target: BenchmarkTarget, options: BenchmarkOptions = {}) {
    this.target = target
    this.now = options.now ?? (() => performance.now())
    this.random = options.random ?? Math.random
  }

  async timeQuery(domain: string): Promise<QuerySample> {
    const start = this.now()
    const result = await this.target.resolve(domain)
    return { domain, ok: result.ok, elapsedMs: this.now() - start }
  }

  pick(domains: readonly string[]): string {
    if (domains.length === 0) {
      throw new Error('Benchmark needs at least one domain')
    }
    const index = Math.floor(this.random() * domains.length)
    return domains[Math.min(index, domains.length - 1)]
  }

  /** Up to `n` distinct names, in random order */
  sample(domains: readonly string[], n: number): string[] {
    const pool = [...domains]
    const count = Math.min(n, pool.length)
    for (let i = 0; i < count; i++) {
      const j = i + Math.floor(this.random() * (pool.length - i))
      const picked = pool[j]
      pool[j] = pool[i]
      pool[i] = picked
    }
    return pool.slice(0, count)
  }

  /**
   * Query every name once to fill the cache, then `passes - 1` more times
   */
  async cacheEffectiveness(
    domains: readonly string[],
    passes = 5,
  ): Promise<CacheEffectiveness> {
    if (domains.length === 0) {
      throw new Error('Benchmark needs at least one domain')
    }

    const firstPass: QuerySample[] = []
    for (const domain of domains) {
      firstPass.push(await this.timeQuery(domain))
    }

    const cachedPasses: QuerySample[] = []
    for (let pass = 1; pass < passes; pass++) {
      log.info('Cached pass', { pass: pass + 1, of: passes })
      for (const domain of domains) {
        cachedPasses.push(await this.timeQuery(domain))
      }
    }

    const avgFirstMs = average(firstPass.map((s) => s.elapsedMs))
    const avgCachedMs = average(cachedPasses.map((s) => s.elapsedMs))
    const improvementPct =
      avgFirstMs === 0 ? 0 : ((avgFirstMs - avgCachedMs) / avgFirstMs) * 100

    return { firstPass, cachedPasses, avgFirstMs, avgCachedMs, improvementPct }
  }

  async sequential(
    domains: readonly string[],
    queries: number,
  ): Promise<RunResult> {
    const start = this.now()
    const samples: QuerySample[] = []

    for (let i = 0; i < queries; i++) {
      samples.push(await this.timeQuery(this.pick(domains)))
      reportProgress(samples.length, queries)
    }

    return { samples, totalMs: this.now() - start }
  }

  /**
   * `workers` async loops pull from one shared queue of picked names
   */
  async concurrent(
    domains: readonly string[],
    queries: number,
    workers: number,
  ): Promise<RunResult> {
    const queue: string[] = []
    for (let i = 0; i < queries; i++) {
      queue.push(this.pick(domains))
    }

    const start = this.now()
    const samples: QuerySample[] = []

    const worker = async () => {
      let domain = queue.shift()
      while (domain !== undefined) {
        samples.push(await this.timeQuery(domain))
        reportProgress(samples.length, queries)
        domain = queue.shift()
      }
    }

    const poolSize = Math.max(1, Math.min(workers, queries))
    await Promise.all(Array.from({ length: poolSize }, () => worker()))

    return { samples, totalMs: this.now() - start }
  }
}

function reportProgress(completed: number, total: number): void {
  if (completed % PROGRESS_EVERY === 0) {
    log.info('Progress', { completed, total })
  }
}

// ============ Reporting ============

function average(values: readonly number[]): number {
  if (values.length === 0) return 0
  return values.reduce((a, b) => a + b, 0) / values.length
}

/**
 * Nearest-rank percentile without interpolation: `sorted[floor(len * q)]`
 */
export function percentile(sorted: readonly number[], q: number): number {
  const index = Math.min(Math.floor(sorted.length * q), sorted.length - 1)
  return sorted[index] ?? 0
}

export function summarize(
  samples: readonly QuerySample[],
  totalMs: number,
): BenchmarkSummary {
  const successful = samples.filter((s) => s.ok).length
  const latencies = samples.map((s) => s.elapsedMs).sort((a, b) => a - b)

  return {
    total: samples.length,
    successful,
    failed: samples.length - successful,
    successRate:
      samples.length === 0 ? 0 : (successful / samples.length) * 100,
    totalMs,
    queriesPerSecond: totalMs > 0 ? samples.length / (totalMs / 1000) : 0,
    latency: {
      avg: average(latencies),
      min: latencies[0] ?? 0,
      max: latencies[latencies.length - 1] ?? 0,
      p50: percentile(latencies, 0.5),
      p95: percentile(latencies, 0.95),
      p99: percentile(latencies, 0.99),
    },
  }
}

export function formatCacheEffectiveness(result: CacheEffectiveness): string {
  return [
    'Cache Performance:',
    `  Avg first query time:  ${result.avgFirstMs.toFixed(2)} ms`,
    `  Avg cached query time: ${result.avgCachedMs.toFixed(2)} ms`,
    `  Performance improvement: ${result.improvementPct.toFixed(1)}%`,
  ].join('\n')
}

export function formatReport(summary: BenchmarkSummary): string {
  const rule = '='.repeat(60)
  const lines = [
    rule,
    'BENCHMARK RESULTS',
    rule,
    '',
    `Total Queries: ${summary.total}`,
    `Successful: ${summary.successful}`,
    `Failed: ${summary.failed}`,
    `Success Rate: ${summary.successRate.toFixed(2)}%`,
  ]

  if (summary.totalMs > 0) {
    lines.push(
      '',
      `Total Time: ${(summary.totalMs / 1000).toFixed(2)} seconds`,
      `Queries Per Second: ${summary.queriesPerSecond.toFixed(2)}`,
    )
  }

  if (summary.total > 0) {
    const { latency } = summary
    lines.push(
      '',
      'Latency Statistics:',
      `  Average: ${latency.avg.toFixed(2)} ms`,
      `  Min: ${latency.min.toFixed(2)} ms`,
      `  Max: ${latency.max.toFixed(2)} ms`,
      `  P50 (median): ${latency.p50.toFixed(2)} ms`,
      `  P95: ${latency.p95.toFixed(2)} ms`,
      `  P99: ${latency.p99.toFixed(2)} ms`,
    )
  }

  lines.push(rule)
  return lines.join('\n')
}
