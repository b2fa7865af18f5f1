/**
 * TLD Zone Stub
 *
 * Owns one TLD and delegates every name under it to a single
 * authoritative server. Only the suffix gates delegation; the rest of
 * the name is not inspected.
 */

import {
  createDelegationResponse,
  createErrorResponse,
  type DNSQuery,
  type DNSResponse,
  DelegationRole,
  normalizeDomain,
  type ServerAddress,
} from '@hopdns/protocol'
import { BaseZoneStub } from './base'
import { ZoneRole } from './types'

export class TldZoneStub extends BaseZoneStub {
  readonly role = ZoneRole.TLD
  readonly tld: string
  private readonly authServer: ServerAddress

  constructor(tld: string, authServer: ServerAddress) {
    super(`tld-${normalizeDomain(tld)}`)
    this.tld = normalizeDomain(tld)
    this.authServer = { ...authServer }
  }

  protected lookup(query: DNSQuery): DNSResponse {
    if (!normalizeDomain(query.domain).endsWith(`.${this.tld}`)) {
      return createErrorResponse(query, `domain not under .${this.tld}`)
    }

    return createDelegationResponse(query, {
      role: DelegationRole.AUTH,
      host: this.authServer.host,
      port: this.authServer.port,
    })
  }
}
