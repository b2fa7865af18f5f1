/**
 * Query Channels
 *
 * How the resolver reaches the next hop: send one message to an address
 * and wait for exactly one message back. Every failure to complete the
 * exchange is reported as a TransportError; no retry is attempted.
 */

import { createConnection } from 'node:net'
import {
  type DNSMessage,
  decodeMessage,
  encodeMessage,
  formatAddress,
  MAX_MESSAGE_BYTES,
  type MessageHandler,
  MessageType,
  type ServerAddress,
  TransportError,
} from '@hopdns/protocol'

export interface QueryChannel {
  send(address: ServerAddress, message: DNSMessage): Promise<DNSMessage>
}

export interface TcpQueryChannelOptions {
  /** Bound on one full exchange (connect, write, read) */
  timeoutMs: number
}

/**
 * One TCP connection per message: write the frame, half-close, read
 * until the peer closes.
 */
export class TcpQueryChannel implements QueryChannel {
  private readonly timeoutMs: number

  constructor(options: TcpQueryChannelOptions) {
    this.timeoutMs = options.timeoutMs
  }

  send(address: ServerAddress, message: DNSMessage): Promise<DNSMessage> {
    const target = formatAddress(address)
    const frame = encodeMessage(message)

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = []
      let received = 0
      let connected = false
      let settled = false

      const socket = createConnection({
        host: address.host,
        port: address.port,
      })

      const settle = (outcome: () => void) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        outcome()
      }

      const fail = (error: Error) => {
        settle(() => {
          socket.destroy()
          reject(error)
        })
      }

      const timer = setTimeout(() => {
        fail(
          new TransportError(
            'timeout',
            target,
            `no reply within ${this.timeoutMs}ms`,
          ),
        )
      }, this.timeoutMs)

      socket.on('connect', () => {
        connected = true
        socket.end(frame)
      })

      socket.on('data', (chunk: Buffer) => {
        received += chunk.length
        if (received > MAX_MESSAGE_BYTES) {
          fail(
            new TransportError(
              'oversize',
              target,
              `reply exceeds ${MAX_MESSAGE_BYTES} bytes`,
            ),
          )
          return
        }
        chunks.push(chunk)
      })

      socket.on('error', (err) => {
        const reason = connected ? 'closed' : 'connect'
        fail(new TransportError(reason, target, err.message))
      })

      socket.on('end', () => {
        settle(() => {
          if (received === 0) {
            reject(new TransportError('closed', target, 'no reply'))
            return
          }
          try {
            resolve(decodeMessage(Buffer.concat(chunks)))
          } catch (error) {
            reject(error)
          }
        })
      })
    })
  }
}

/**
 * Routes messages to handlers registered in this process. Frames still
 * pass through the codec so both channels exchange identical bytes.
 */
export class InProcessChannel implements QueryChannel {
  private readonly handlers = new Map<string, MessageHandler>()

  register(address: ServerAddress, handler: MessageHandler): this {
    this.handlers.set(formatAddress(address), handler)
    return this
  }

  unregister(address: ServerAddress): boolean {
    return this.handlers.delete(formatAddress(address))
  }

  async send(address: ServerAddress, message: DNSMessage): Promise<DNSMessage> {
    const target = formatAddress(address)
    const handler = this.handlers.get(target)
    if (!handler) {
      throw new TransportError('connect', target, 'no server registered')
    }

    const received = decodeMessage(encodeMessage(message))
    if (received.type !== MessageType.QUERY) {
      throw new TransportError('closed', target, 'not a query')
    }

    const response = await handler.handle(received)
    return decodeMessage(encodeMessage(response))
  }
}
