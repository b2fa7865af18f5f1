/**
 * DNS Server
 *
 * Serves one MessageHandler over TCP. Each connection carries exactly
 * one exchange: the client writes a query frame, the server answers with
 * one response frame and closes. Clients may half-close after writing;
 * the server does not wait for it. Connections are
 * handled concurrently; the handler decides what shared state it guards.
 */

import { createServer, type Server, type Socket } from 'node:net'
import {
  type DNSMessage,
  decodeMessage,
  encodeMessage,
  formatAddress,
  formatMessage,
  MalformedMessageError,
  MAX_MESSAGE_BYTES,
  type MessageHandler,
  MessageType,
  type ServerAddress,
} from '@hopdns/protocol'
import { createLogger, type Logger } from '../lib/logger'

const IDLE_TIMEOUT_MS = 10_000

export interface DnsServerOptions {
  /** Component name for logs, e.g. 'root' or 'tld-com' */
  name: string
  host: string
  /** 0 picks a free port */
  port: number
}

export class DnsServer {
  private readonly handler: MessageHandler
  private readonly options: DnsServerOptions
  private readonly log: Logger
  private readonly sockets = new Set<Socket>()
  private server: Server | null = null
  private boundAddress: ServerAddress | null = null

  constructor(handler: MessageHandler, options: DnsServerOptions) {
    this.handler = handler
    this.options = options
    this.log = createLogger(`${options.name}-server`)
  }

  get address(): ServerAddress | null {
    return this.boundAddress
  }

  /**
   * Bind and start accepting connections
   */
  async start(): Promise<ServerAddress> {
    if (this.server) {
      throw new Error(`${this.options.name} server already started`)
    }

    const server = createServer({ allowHalfOpen: true }, (socket) => {
      this.onConnection(socket)
    })
    this.server = server

    const bound = await new Promise<ServerAddress>((resolve, reject) => {
      server.once('error', reject)
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject)
        const info = server.address()
        if (info === null || typeof info === 'string') {
          reject(new Error(`Unexpected listen address: ${String(info)}`))
          return
        }
        resolve({ host: info.address, port: info.port })
      })
    })

    server.on('error', (err) => {
      this.log.error('Server error', { error: err.message })
    })

    this.boundAddress = bound
    this.log.info('Server started', { address: formatAddress(bound) })
    return bound
  }

  /**
   * Stop accepting connections and drop any still open
   */
  async stop(): Promise<void> {
    const server = this.server
    if (!server) return
    this.server = null

    for (const socket of this.sockets) {
      socket.destroy()
    }
    this.sockets.clear()

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()))
    })
    this.log.info('Server stopped')
  }

  private onConnection(socket: Socket): void {
    this.sockets.add(socket)
    const chunks: Buffer[] = []
    let received = 0
    let answered = false
    let malformed = ''

    socket.setTimeout(IDLE_TIMEOUT_MS, () => {
      this.log.warn('Connection idle, closing')
      socket.destroy()
    })

    const answer = (message: DNSMessage) => {
      answered = true
      this.respond(socket, message).catch((err: unknown) => {
        this.log.error('Failed to answer query', {
          error: err instanceof Error ? err.message : String(err),
        })
        socket.destroy()
      })
    }

    // Answer as soon as the buffered bytes form a frame; the peer need
    // not half-close first
    socket.on('data', (chunk: Buffer) => {
      if (answered) return
      received += chunk.length
      if (received > MAX_MESSAGE_BYTES) {
        this.log.warn('Frame too large, dropping connection', { received })
        socket.destroy()
        return
      }
      chunks.push(chunk)
      const outcome = decodeFrame(Buffer.concat(chunks))
      if ('message' in outcome) {
        answer(outcome.message)
      } else {
        malformed = outcome.reason
      }
    })

    socket.on('end', () => {
      if (answered) return
      answered = true
      // A peer that sent garbage gets no reply
      if (malformed) {
        this.log.warn('Malformed frame, closing', { error: malformed })
      }
      socket.end()
    })

    socket.on('error', (err) => {
      this.log.warn('Connection error', { error: err.message })
    })

    socket.on('close', () => {
      this.sockets.delete(socket)
    })
  }

  private async respond(socket: Socket, message: DNSMessage): Promise<void> {
    if (message.type !== MessageType.QUERY) {
      this.log.warn('Expected a query, closing', {
        message: formatMessage(message),
      })
      socket.end()
      return
    }

    const response = await this.handler.handle(message)
    socket.end(encodeMessage(response))
  }
}

type DecodeOutcome = { message: DNSMessage } | { reason: string }

function decodeFrame(frame: Buffer): DecodeOutcome {
  try {
    return { message: decodeMessage(frame) }
  } catch (error) {
    if (!(error instanceof MalformedMessageError)) throw error
    return { reason: error.message }
  }
}
