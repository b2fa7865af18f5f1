/**
 * DNS Client
 *
 * Sends one query per call to the local resolver and flattens the reply
 * into a success or an error string.
 */

import {
  createQuery,
  DNSError,
  type DNSMessage,
  formatAddress,
  MessageType,
  ResultKind,
  type ServerAddress,
} from '@hopdns/protocol'
import type { QueryChannel } from './transport/channel'

export interface DnsClientOptions {
  server: ServerAddress
  channel: QueryChannel
}

export type ClientResult =
  | { ok: true; address: string }
  | { ok: false; error: string }

export class DnsClient {
  readonly server: ServerAddress
  private readonly channel: QueryChannel
  private nextId = 0

  constructor(options: DnsClientOptions) {
    this.server = { ...options.server }
    this.channel = options.channel
  }

  /** Id of the most recent query, 0 before the first */
  get lastQueryId(): number {
    return this.nextId
  }

  async resolve(domain: string): Promise<ClientResult> {
    this.nextId++
    const query = createQuery(this.nextId, domain)

    let reply: DNSMessage
    try {
      reply = await this.channel.send(this.server, query)
    } catch (error) {
      if (error instanceof DNSError) {
        return { ok: false, error: error.message }
      }
      throw error
    }

    if (reply.type !== MessageType.RESPONSE) {
      return {
        ok: false,
        error: `unexpected reply from ${formatAddress(this.server)}`,
      }
    }

    switch (reply.result.kind) {
      case ResultKind.IP:
        return { ok: true, address: reply.result.address }
      case ResultKind.ERROR:
        return { ok: false, error: reply.result.reason }
      case ResultKind.NS:
        return {
          ok: false,
          error: `unexpected delegation from ${formatAddress(this.server)}`,
        }
    }
  }
}

export function formatClientResult(domain: string, result: ClientResult) {
  return result.ok
    ? `${domain} -> ${result.address}`
    : `${domain} -> ERROR: ${result.error}`
}
