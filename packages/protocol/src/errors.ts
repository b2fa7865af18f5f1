// ============================================================================
// Error Types
// ============================================================================

export const DNSErrorCode = {
  MALFORMED_MESSAGE: 'MALFORMED_MESSAGE',
  TRANSPORT_FAILURE: 'TRANSPORT_FAILURE',
} as const

export type DNSErrorCode = (typeof DNSErrorCode)[keyof typeof DNSErrorCode]

export class DNSError extends Error {
  constructor(
    message: string,
    public readonly code: DNSErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'DNSError'
  }
}

/**
 * A frame that does not match the wire grammar. Raised locally by the
 * decoder; never sent back to the peer.
 */
export class MalformedMessageError extends DNSError {
  constructor(reason: string, frame: string) {
    super(`Malformed message: ${reason}`, DNSErrorCode.MALFORMED_MESSAGE, {
      frame,
    })
    this.name = 'MalformedMessageError'
  }
}

export type TransportFailureReason = 'connect' | 'timeout' | 'closed' | 'oversize'

/**
 * Connect, send or receive did not complete.
 */
export class TransportError extends DNSError {
  constructor(
    public readonly reason: TransportFailureReason,
    target: string,
    cause?: string,
  ) {
    super(
      cause
        ? `Transport failure (${reason}) to ${target}: ${cause}`
        : `Transport failure (${reason}) to ${target}`,
      DNSErrorCode.TRANSPORT_FAILURE,
      { target, reason },
    )
    this.name = 'TransportError'
  }
}
