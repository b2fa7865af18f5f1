/**
 * Wire Format Encoder/Decoder
 *
 * Frames are UTF-8 text with `|` between fields:
 *
 *   QUERY|<id>|<domain>
 *   RESPONSE|<id>|<domain>|<IP|NS|ERROR>|<value>
 *
 * NS values use the sub-format `<role>:<host>:<port>`. Field values are
 * not escaped: domains and error reasons are assumed never to contain
 * the separator.
 */

import { MalformedMessageError } from './errors'
import type {
  Delegation,
  DNSMessage,
  DNSQuery,
  DNSResponse,
  ResolutionResult,
} from './types'
import { DelegationSchema, MessageType, ResultKind } from './types'

export const FIELD_SEPARATOR = '|'
export const DELEGATION_SEPARATOR = ':'

/** Largest frame any participant reads */
export const MAX_MESSAGE_BYTES = 1024

const QUERY_FIELDS = 3
const RESPONSE_FIELDS = 5

const INTEGER_PATTERN = /^-?\d+$/

/**
 * Encode a message into wire format
 */
export function encodeMessage(message: DNSMessage): Buffer {
  const fields: string[] = [message.type, String(message.id), message.domain]

  if (message.type === MessageType.RESPONSE) {
    fields.push(message.result.kind, encodeResultValue(message.result))
  }

  return Buffer.from(fields.join(FIELD_SEPARATOR), 'utf-8')
}

function encodeResultValue(result: ResolutionResult): string {
  switch (result.kind) {
    case ResultKind.IP:
      return result.address
    case ResultKind.NS:
      return encodeDelegation(result.delegation)
    case ResultKind.ERROR:
      return result.reason
  }
}

export function encodeDelegation(delegation: Delegation): string {
  return [delegation.role, delegation.host, String(delegation.port)].join(
    DELEGATION_SEPARATOR,
  )
}

/**
 * Decode a wire format frame into a structured message
 */
export function decodeMessage(data: Uint8Array | string): DNSMessage {
  const frame =
    typeof data === 'string' ? data : Buffer.from(data).toString('utf-8')
  const parts = frame.split(FIELD_SEPARATOR)
  const type = parts[0]

  if (type === MessageType.QUERY) {
    if (parts.length !== QUERY_FIELDS) {
      throw new MalformedMessageError(
        `expected ${QUERY_FIELDS} fields for QUERY, got ${parts.length}`,
        frame,
      )
    }
    return {
      type: MessageType.QUERY,
      id: decodeQueryId(parts[1], frame),
      domain: parts[2],
    }
  }

  if (type === MessageType.RESPONSE) {
    if (parts.length !== RESPONSE_FIELDS) {
      throw new MalformedMessageError(
        `expected ${RESPONSE_FIELDS} fields for RESPONSE, got ${parts.length}`,
        frame,
      )
    }
    return {
      type: MessageType.RESPONSE,
      id: decodeQueryId(parts[1], frame),
      domain: parts[2],
      result: decodeResult(parts[3], parts[4], frame),
    }
  }

  throw new MalformedMessageError(`unknown message type "${type}"`, frame)
}

function decodeQueryId(raw: string, frame: string): number {
  const id = Number(raw)
  if (!INTEGER_PATTERN.test(raw) || !Number.isSafeInteger(id)) {
    throw new MalformedMessageError(`query id "${raw}" is not an integer`, frame)
  }
  return id
}

function decodeResult(
  kind: string,
  value: string,
  frame: string,
): ResolutionResult {
  switch (kind) {
    case ResultKind.IP:
      return { kind: ResultKind.IP, address: value }
    case ResultKind.NS:
      return { kind: ResultKind.NS, delegation: decodeDelegation(value, frame) }
    case ResultKind.ERROR:
      return { kind: ResultKind.ERROR, reason: value }
    default:
      throw new MalformedMessageError(`unknown result kind "${kind}"`, frame)
  }
}

export function decodeDelegation(value: string, frame = value): Delegation {
  const parts = value.split(DELEGATION_SEPARATOR)
  if (parts.length !== 3 || !INTEGER_PATTERN.test(parts[2])) {
    throw new MalformedMessageError(
      `delegation "${value}" is not role:host:port`,
      frame,
    )
  }

  const parsed = DelegationSchema.safeParse({
    role: parts[0],
    host: parts[1],
    port: Number(parts[2]),
  })
  if (!parsed.success) {
    throw new MalformedMessageError(
      `invalid delegation "${value}": ${parsed.error.issues[0]?.message ?? 'rejected'}`,
      frame,
    )
  }
  return parsed.data
}

// ============================================================================
// Message constructors
// ============================================================================

export function createQuery(id: number, domain: string): DNSQuery {
  return { type: MessageType.QUERY, id, domain }
}

function respond(query: DNSQuery, result: ResolutionResult): DNSResponse {
  return {
    type: MessageType.RESPONSE,
    id: query.id,
    domain: query.domain,
    result,
  }
}

export function createAddressResponse(
  query: DNSQuery,
  address: string,
): DNSResponse {
  return respond(query, { kind: ResultKind.IP, address })
}

export function createDelegationResponse(
  query: DNSQuery,
  delegation: Delegation,
): DNSResponse {
  return respond(query, { kind: ResultKind.NS, delegation })
}

export function createErrorResponse(
  query: DNSQuery,
  reason: string,
): DNSResponse {
  return respond(query, { kind: ResultKind.ERROR, reason })
}

/**
 * One-line description for logs
 */
export function formatMessage(message: DNSMessage): string {
  if (message.type === MessageType.QUERY) {
    return `QUERY(id=${message.id}, domain=${message.domain})`
  }
  return `RESPONSE(id=${message.id}, domain=${message.domain}, ${message.result.kind}=${encodeResultValue(message.result)})`
}
