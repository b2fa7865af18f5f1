/**
 * Message types for the hop-by-hop resolution protocol
 *
 * A simplified text analogue of DNS: every participant exchanges
 * QUERY and RESPONSE frames, and a response carries exactly one result
 * (an address, a delegation to the next server, or an error).
 */

import { z } from 'zod'

// Frame tags
export const MessageType = {
  QUERY: 'QUERY',
  RESPONSE: 'RESPONSE',
} as const

export type MessageType = (typeof MessageType)[keyof typeof MessageType]

// Result kinds carried by a RESPONSE
export const ResultKind = {
  IP: 'IP', // Final address
  NS: 'NS', // Delegation to the next hop
  ERROR: 'ERROR', // Human-readable failure reason
} as const

export type ResultKind = (typeof ResultKind)[keyof typeof ResultKind]

// Who a delegation points at
export const DelegationRole = {
  TLD: 'TLD',
  AUTH: 'AUTH',
} as const

export type DelegationRole =
  (typeof DelegationRole)[keyof typeof DelegationRole]

export const DelegationSchema = z.object({
  role: z.enum([DelegationRole.TLD, DelegationRole.AUTH]),
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
})

export type Delegation = z.infer<typeof DelegationSchema>

// host:port pair of a participant
export interface ServerAddress {
  host: string
  port: number
}

export interface AddressResult {
  kind: typeof ResultKind.IP
  address: string
}

export interface DelegationResult {
  kind: typeof ResultKind.NS
  delegation: Delegation
}

export interface ErrorResult {
  kind: typeof ResultKind.ERROR
  reason: string
}

export type ResolutionResult = AddressResult | DelegationResult | ErrorResult

export interface DNSQuery {
  type: typeof MessageType.QUERY
  /** Caller-assigned correlation id, unique per caller session */
  id: number
  /** Name as the caller wrote it; matching is case-insensitive */
  domain: string
}

export interface DNSResponse {
  type: typeof MessageType.RESPONSE
  id: number
  domain: string
  result: ResolutionResult
}

export type DNSMessage = DNSQuery | DNSResponse

/**
 * Anything that answers a query: a zone stub or the resolver
 */
export interface MessageHandler {
  handle(query: DNSQuery): DNSResponse | Promise<DNSResponse>
}
