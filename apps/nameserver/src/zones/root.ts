/**
 * Root Zone Stub
 *
 * Maps the rightmost label of a name to the TLD server that owns it.
 */

import {
  createDelegationResponse,
  createErrorResponse,
  type DNSQuery,
  type DNSResponse,
  DelegationRole,
  extractTld,
  type ServerAddress,
} from '@hopdns/protocol'
import { BaseZoneStub } from './base'
import { ZoneRole } from './types'

export class RootZoneStub extends BaseZoneStub {
  readonly role = ZoneRole.ROOT
  private readonly tldServers: ReadonlyMap<string, ServerAddress>

  constructor(tldServers: ReadonlyMap<string, ServerAddress>) {
    super('root')
    const table = new Map<string, ServerAddress>()
    for (const [tld, address] of tldServers) {
      table.set(tld.toLowerCase(), { ...address })
    }
    this.tldServers = table
  }

  get tlds(): string[] {
    return [...this.tldServers.keys()]
  }

  protected lookup(query: DNSQuery): DNSResponse {
    const tld = extractTld(query.domain)
    if (tld === null) {
      return createErrorResponse(
        query,
        `no TLD in unqualified name ${query.domain}`,
      )
    }

    const server = this.tldServers.get(tld)
    if (!server) {
      return createErrorResponse(query, `no TLD server for .${tld}`)
    }

    return createDelegationResponse(query, {
      role: DelegationRole.TLD,
      host: server.host,
      port: server.port,
    })
  }
}
