import {
  createAddressResponse,
  createErrorResponse,
  type DNSQuery,
  type DNSResponse,
  normalizeDomain,
} from '@hopdns/protocol'
import { BaseZoneStub } from './base'
import { ZoneRole } from './types'

/**
 * Authoritative Zone Stub - exact-match table of final addresses.
 */
export class AuthoritativeZoneStub extends BaseZoneStub {
  readonly role = ZoneRole.AUTH
  private readonly records: ReadonlyMap<string, string>

  constructor(records: ReadonlyMap<string, string>) {
    super('auth')
    const table = new Map<string, string>()
    for (const [domain, address] of records) {
      table.set(normalizeDomain(domain), address)
    }
    this.records = table
  }

  get recordCount(): number {
    return this.records.size
  }

  protected lookup(query: DNSQuery): DNSResponse {
    const address = this.records.get(normalizeDomain(query.domain))
    if (address === undefined) {
      return createErrorResponse(query, 'domain not found')
    }
    return createAddressResponse(query, address)
  }
}
