/**
 * @hopdns/protocol
 *
 * Message types, error taxonomy and the text wire codec spoken between
 * the resolver and the root, TLD and authoritative servers.
 *
 * @example
 * ```typescript
 * import { createQuery, decodeMessage, encodeMessage } from '@hopdns/protocol'
 *
 * const frame = encodeMessage(createQuery(1, 'example.com'))
 * const message = decodeMessage(frame)
 * ```
 */

// Domain helpers
export { extractTld, formatAddress, normalizeDomain } from './domain'
// Errors
export {
  DNSError,
  DNSErrorCode,
  MalformedMessageError,
  TransportError,
  type TransportFailureReason,
} from './errors'
// Types
export {
  type AddressResult,
  type Delegation,
  type DelegationResult,
  DelegationRole,
  DelegationSchema,
  type DNSMessage,
  type DNSQuery,
  type DNSResponse,
  type ErrorResult,
  type MessageHandler,
  MessageType,
  type ResolutionResult,
  ResultKind,
  type ServerAddress,
} from './types'
// Wire format encoder/decoder
export {
  createAddressResponse,
  createDelegationResponse,
  createErrorResponse,
  createQuery,
  DELEGATION_SEPARATOR,
  decodeDelegation,
  decodeMessage,
  encodeDelegation,
  encodeMessage,
  FIELD_SEPARATOR,
  formatMessage,
  MAX_MESSAGE_BYTES,
} from './wire-format'
