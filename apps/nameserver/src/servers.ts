/**
 * Server wiring
 *
 * Builds each role's handler and serves it over TCP. `startStack`
 * brings the whole chain up in one process, leaves first so the root
 * table can point at the ports actually bound.
 */

import { ResolutionCache } from '@hopdns/cache'
import { formatAddress, type ServerAddress } from '@hopdns/protocol'
import type { NameserverConfig } from './config'
import { createLogger } from './lib/logger'
import { formatStats, Resolver } from './resolver/resolver'
import { TcpQueryChannel } from './transport/channel'
import { DnsServer } from './transport/server'
import { AuthoritativeZoneStub } from './zones/authoritative'
import { RootZoneStub } from './zones/root'
import { TldZoneStub } from './zones/tld'
import { loadRootHints, loadZoneRecords } from './zones/zone-file'

const log = createLogger('servers')

export interface RunningServer {
  name: string
  address: ServerAddress
  stop: () => Promise<void>
}

export interface RunningResolver extends RunningServer {
  resolver: Resolver
}

export interface Stack {
  servers: RunningServer[]
  local: RunningResolver
  stop: () => Promise<void>
}

async function serve(
  name: string,
  server: DnsServer,
): Promise<RunningServer> {
  const address = await server.start()
  return { name, address, stop: () => server.stop() }
}

export function startRootServer(
  tldServers: ReadonlyMap<string, ServerAddress>,
  host: string,
  port: number,
): Promise<RunningServer> {
  const stub = new RootZoneStub(tldServers)
  log.info('Root zone', {
    tlds: Object.fromEntries(
      [...tldServers].map(([tld, server]) => [tld, formatAddress(server)]),
    ),
  })
  return serve('root', new DnsServer(stub, { name: 'root', host, port }))
}

export function startTldServer(
  tld: string,
  authServer: ServerAddress,
  host: string,
  port: number,
): Promise<RunningServer> {
  const stub = new TldZoneStub(tld, authServer)
  const name = `tld-${stub.tld}`
  return serve(name, new DnsServer(stub, { name, host, port }))
}

export function startAuthServer(
  records: ReadonlyMap<string, string>,
  host: string,
  port: number,
): Promise<RunningServer> {
  const stub = new AuthoritativeZoneStub(records)
  return serve('auth', new DnsServer(stub, { name: 'auth', host, port }))
}

export interface LocalServerOptions {
  host: string
  port: number
  rootServer: ServerAddress
  cacheSize: number
  cacheTtlSeconds: number
  hopTimeoutMs: number
}

/**
 * Client-facing resolver. Logs its statistics when stopped.
 */
export async function startLocalServer(
  options: LocalServerOptions,
): Promise<RunningResolver> {
  const resolver = new Resolver({
    rootServer: options.rootServer,
    channel: new TcpQueryChannel({ timeoutMs: options.hopTimeoutMs }),
    cache: new ResolutionCache({
      capacity: options.cacheSize,
      ttlSeconds: options.cacheTtlSeconds,
    }),
  })
  const server = new DnsServer(resolver, {
    name: 'local',
    host: options.host,
    port: options.port,
  })
  const address = await server.start()

  return {
    name: 'local',
    address,
    resolver,
    stop: async () => {
      await server.stop()
      log.info(`\n${formatStats(resolver.getStats())}`)
    },
  }
}

export async function startStack(config: NameserverConfig): Promise<Stack> {
  const { host } = config
  const servers: RunningServer[] = []

  const stopAll = async () => {
    for (const server of servers.splice(0).reverse()) {
      await server.stop()
    }
  }

  try {
    const auth = await startAuthServer(
      loadZoneRecords(config.recordsPath),
      host,
      config.authPort,
    )
    servers.push(auth)

    const tldCom = await startTldServer(
      'com',
      auth.address,
      host,
      config.tldComPort,
    )
    servers.push(tldCom)
    const tldEdu = await startTldServer(
      'edu',
      auth.address,
      host,
      config.tldEduPort,
    )
    servers.push(tldEdu)

    // .org has no server of its own and lands on the .com server, which
    // rejects it as outside its zone
    const hints = config.rootHintsPath
      ? loadRootHints(config.rootHintsPath)
      : new Map([
          ['com', tldCom.address],
          ['org', tldCom.address],
          ['edu', tldEdu.address],
        ])
    const root = await startRootServer(hints, host, config.rootPort)
    servers.push(root)

    const local = await startLocalServer({
      host,
      port: config.localPort,
      rootServer: root.address,
      cacheSize: config.cacheSize,
      cacheTtlSeconds: config.cacheTtlSeconds,
      hopTimeoutMs: config.hopTimeoutMs,
    })
    servers.push(local)

    log.info('Stack started', {
      servers: servers.map((s) => `${s.name}@${formatAddress(s.address)}`),
    })
    return { servers: [...servers], local, stop: stopAll }
  } catch (error) {
    await stopAll()
    throw error
  }
}
