/**
 * hopdns CLI
 *
 * - hopdns stack                      All servers in one process
 * - hopdns root|tld|auth|local        One server per process
 * - hopdns resolve [domain]           One query, or an interactive prompt
 * - hopdns benchmark                  Load test a running local server
 */

import { readFileSync } from 'node:fs'
import { createInterface } from 'node:readline/promises'
import { DNS_PORTS } from '@hopdns/config'
import { formatAddress, type ServerAddress } from '@hopdns/protocol'
import chalk from 'chalk'
import { Command, InvalidArgumentError } from 'commander'
import {
  Benchmark,
  formatCacheEffectiveness,
  formatReport,
  type QuerySample,
  summarize,
} from './benchmark'
import { DnsClient, formatClientResult } from './client'
import { configureNameserver, getConfig } from './config'
import { createLogger } from './lib/logger'
import {
  type RunningServer,
  startAuthServer,
  startLocalServer,
  startRootServer,
  startStack,
  startTldServer,
} from './servers'
import { TcpQueryChannel } from './transport/channel'
import {
  defaultRootHints,
  loadRootHints,
  loadZoneRecords,
  parseZoneRecords,
} from './zones/zone-file'

const log = createLogger('cli')

function parseInteger(value: string): number {
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.')
  }
  return parsed
}

/**
 * Keep the process alive until SIGINT/SIGTERM, then stop
 */
function stopOnSignal(server: Pick<RunningServer, 'stop'>): void {
  const shutdown = (signal: string) => {
    log.info('Shutting down', { signal })
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error('Shutdown failed', {
          error: err instanceof Error ? err.message : String(err),
        })
        process.exit(1)
      })
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

function portOption(port: { ENV_VAR: string }): string {
  return `Port to listen on (env ${port.ENV_VAR})`
}

function localServer(options: {
  host?: string
  port?: number
}): ServerAddress {
  const config = getConfig()
  return {
    host: options.host ?? config.host,
    port: options.port ?? config.localPort,
  }
}

// ============================================================================
// Server commands
// ============================================================================

const rootCommand = new Command('root')
  .description('Start the root server')
  .option('-p, --port <n>', portOption(DNS_PORTS.ROOT), parseInteger)
  .option('--hints <file>', 'Root hints file (tld,host,port per line)')
  .action(async (options: { port?: number; hints?: string }) => {
    configureNameserver({
      rootPort: options.port,
      rootHintsPath: options.hints,
    })
    const config = getConfig()
    const hints = config.rootHintsPath
      ? loadRootHints(config.rootHintsPath)
      : defaultRootHints(config.host)
    const server = await startRootServer(hints, config.host, config.rootPort)
    stopOnSignal(server)
  })

const tldCommand = new Command('tld')
  .description('Start a TLD server')
  .requiredOption('--tld <name>', 'TLD name (e.g. com, edu)')
  .requiredOption('-p, --port <n>', 'Port to listen on', parseInteger)
  .option('--auth-host <host>', 'Authoritative server host')
  .option('--auth-port <n>', 'Authoritative server port', parseInteger)
  .action(
    async (options: {
      tld: string
      port: number
      authHost?: string
      authPort?: number
    }) => {
      const config = getConfig()
      const authServer = {
        host: options.authHost ?? config.host,
        port: options.authPort ?? config.authPort,
      }
      const server = await startTldServer(
        options.tld,
        authServer,
        config.host,
        options.port,
      )
      stopOnSignal(server)
    },
  )

const authCommand = new Command('auth')
  .description('Start the authoritative server')
  .option('-p, --port <n>', portOption(DNS_PORTS.AUTH), parseInteger)
  .option('--records <file>', 'Records file (domain,ip per line)')
  .action(async (options: { port?: number; records?: string }) => {
    configureNameserver({
      authPort: options.port,
      recordsPath: options.records,
    })
    const config = getConfig()
    const server = await startAuthServer(
      loadZoneRecords(config.recordsPath),
      config.host,
      config.authPort,
    )
    stopOnSignal(server)
  })

const localCommand = new Command('local')
  .description('Start the caching local resolver')
  .option('-p, --port <n>', portOption(DNS_PORTS.LOCAL), parseInteger)
  .option('--root-host <host>', 'Root server host')
  .option('--root-port <n>', 'Root server port', parseInteger)
  .option('--cache-size <n>', 'Maximum cached names', parseInteger)
  .option('--cache-ttl <seconds>', 'Cache entry lifetime', parseInteger)
  .option('--timeout <ms>', 'Per-hop timeout', parseInteger)
  .action(
    async (options: {
      port?: number
      rootHost?: string
      rootPort?: number
      cacheSize?: number
      cacheTtl?: number
      timeout?: number
    }) => {
      configureNameserver({
        localPort: options.port,
        rootPort: options.rootPort,
        cacheSize: options.cacheSize,
        cacheTtlSeconds: options.cacheTtl,
        hopTimeoutMs: options.timeout,
      })
      const config = getConfig()
      const server = await startLocalServer({
        host: config.host,
        port: config.localPort,
        rootServer: {
          host: options.rootHost ?? config.host,
          port: config.rootPort,
        },
        cacheSize: config.cacheSize,
        cacheTtlSeconds: config.cacheTtlSeconds,
        hopTimeoutMs: config.hopTimeoutMs,
      })
      stopOnSignal(server)
    },
  )

const stackCommand = new Command('stack')
  .description('Start root, TLD, authoritative and local servers together')
  .option('--records <file>', 'Records file for the authoritative server')
  .option('--hints <file>', 'Root hints file')
  .action(async (options: { records?: string; hints?: string }) => {
    configureNameserver({
      recordsPath: options.records,
      rootHintsPath: options.hints,
    })
    const stack = await startStack(getConfig())

    console.log(chalk.bold('\nhopdns stack running'))
    for (const server of stack.servers) {
      const name = chalk.cyan(server.name.padEnd(8))
      console.log(`  ${name} ${formatAddress(server.address)}`)
    }
    console.log(chalk.dim('\nPress Ctrl+C to stop\n'))

    stopOnSignal(stack)
  })

// ============================================================================
// Client commands
// ============================================================================

async function interactive(client: DnsClient): Promise<void> {
  console.log(chalk.bold('DNS Client - Interactive Mode'))
  console.log(`Connected to Local Server: ${formatAddress(client.server)}`)
  console.log("Enter domain names to resolve (or 'quit' to exit)\n")

  const rl = createInterface({ input: process.stdin, output: process.stdout })
  rl.on('SIGINT', () => rl.close())
  const closed = new Promise<null>((resolve) => {
    rl.once('close', () => resolve(null))
  })

  try {
    for (;;) {
      const line = await Promise.race([rl.question('Enter domain: '), closed])
      if (line === null) break

      const domain = line.trim()
      if (['quit', 'exit', 'q'].includes(domain.toLowerCase())) break
      if (!domain) continue

      const result = await client.resolve(domain)
      const text = formatClientResult(domain, result)
      console.log(result.ok ? chalk.green(text) : chalk.red(text))
    }
  } finally {
    rl.close()
  }
}

const resolveCommand = new Command('resolve')
  .description('Resolve a name through the local server')
  .argument('[domain]', 'Name to resolve; omit for interactive mode')
  .option('--server-host <host>', 'Local server host')
  .option('--server-port <n>', 'Local server port', parseInteger)
  .action(
    async (
      domain: string | undefined,
      options: { serverHost?: string; serverPort?: number },
    ) => {
      const client = new DnsClient({
        server: localServer({
          host: options.serverHost,
          port: options.serverPort,
        }),
        channel: new TcpQueryChannel({ timeoutMs: getConfig().hopTimeoutMs }),
      })

      if (!domain) {
        await interactive(client)
        return
      }

      const result = await client.resolve(domain)
      console.log(formatClientResult(domain, result))
      if (!result.ok) process.exitCode = 1
    },
  )

function completedIn(totalMs: number): string {
  return `Completed in ${(totalMs / 1000).toFixed(2)} seconds`
}

const benchmarkCommand = new Command('benchmark')
  .description('Measure cache effect, throughput and latency')
  .option('--server-host <host>', 'Local server host')
  .option('--server-port <n>', 'Local server port', parseInteger)
  .option('--records <file>', 'Records file to draw names from')
  .option('--sample <n>', 'Names in the cache test', parseInteger, 20)
  .option('--passes <n>', 'Passes in the cache test', parseInteger, 5)
  .option('--queries <n>', 'Sequential queries', parseInteger, 200)
  .option('--concurrent <n>', 'Concurrent queries', parseInteger, 500)
  .option('--workers <n>', 'Concurrent workers', parseInteger, 20)
  .action(
    async (options: {
      serverHost?: string
      serverPort?: number
      records?: string
      sample: number
      passes: number
      queries: number
      concurrent: number
      workers: number
    }) => {
      configureNameserver({ recordsPath: options.records })
      const records = readFileSync(getConfig().recordsPath, 'utf-8')
      const domains = [...parseZoneRecords(records).keys()]
      if (domains.length === 0) {
        console.error(chalk.red('No domains in the records file'))
        process.exitCode = 1
        return
      }
      console.log(`Loaded ${domains.length} domains`)

      const client = new DnsClient({
        server: localServer({
          host: options.serverHost,
          port: options.serverPort,
        }),
        channel: new TcpQueryChannel({ timeoutMs: getConfig().hopTimeoutMs }),
      })
      const benchmark = new Benchmark(client)
      const samples: QuerySample[] = []
      const started = performance.now()

      console.log(chalk.bold('\n=== Cache Effectiveness Test ==='))
      const cache = await benchmark.cacheEffectiveness(
        benchmark.sample(domains, options.sample),
        options.passes,
      )
      samples.push(...cache.firstPass, ...cache.cachedPasses)
      console.log(formatCacheEffectiveness(cache))

      console.log(
        chalk.bold(
          `\n=== Sequential Benchmark (${options.queries} queries) ===`,
        ),
      )
      const sequential = await benchmark.sequential(domains, options.queries)
      samples.push(...sequential.samples)
      console.log(completedIn(sequential.totalMs))

      console.log(
        chalk.bold(
          `\n=== Concurrent Benchmark (${options.concurrent} queries, ` +
            `${options.workers} workers) ===`,
        ),
      )
      const concurrent = await benchmark.concurrent(
        domains,
        options.concurrent,
        options.workers,
      )
      samples.push(...concurrent.samples)
      console.log(completedIn(concurrent.totalMs))

      const summary = summarize(samples, performance.now() - started)
      console.log(`\n${formatReport(summary)}`)
    },
  )

// ============================================================================
// Program
// ============================================================================

const program = new Command('hopdns')
  .description('Iterative DNS resolution over a root, TLD and auth chain')
  .version('1.0.0')
  .addCommand(stackCommand)
  .addCommand(rootCommand)
  .addCommand(tldCommand)
  .addCommand(authCommand)
  .addCommand(localCommand)
  .addCommand(resolveCommand)
  .addCommand(benchmarkCommand)

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)))
  process.exit(1)
})
