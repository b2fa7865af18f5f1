import type { DNSQuery, DNSResponse, MessageHandler } from '@hopdns/protocol'

export const ZoneRole = {
  ROOT: 'root',
  TLD: 'tld',
  AUTH: 'auth',
} as const

export type ZoneRole = (typeof ZoneRole)[keyof typeof ZoneRole]

/**
 * A stateless-per-query lookup: answers with a delegation to the next
 * hop, a final address, or an error. Tables are fixed at construction.
 */
export interface ZoneStub extends MessageHandler {
  readonly role: ZoneRole
  /** Queries handled so far; observability only */
  readonly queryCount: number
  handle(query: DNSQuery): DNSResponse
}
