/**
 * Tests for DnsClient
 */

import {
  createDelegationResponse,
  type DNSMessage,
  type ServerAddress,
} from '@hopdns/protocol'
import { describe, expect, test, vi } from 'vitest'
import { DnsClient, formatClientResult } from './client'
import { InProcessChannel } from './transport/channel'
import { AuthoritativeZoneStub } from './zones/authoritative'

const LOCAL: ServerAddress = { host: '127.0.0.1', port: 53004 }

function createClient() {
  const channel = new InProcessChannel().register(
    LOCAL,
    new AuthoritativeZoneStub(new Map([['example.com', '203.0.113.5']])),
  )
  return { client: new DnsClient({ server: LOCAL, channel }), channel }
}

describe('DnsClient', () => {
  test('returns the resolved address', async () => {
    const { client } = createClient()

    expect(await client.resolve('example.com')).toEqual({
      ok: true,
      address: '203.0.113.5',
    })
  })

  test('returns the server error reason', async () => {
    const { client } = createClient()

    expect(await client.resolve('nosuch.com')).toEqual({
      ok: false,
      error: 'domain not found',
    })
  })

  test('numbers queries sequentially per client', async () => {
    const { client, channel } = createClient()
    const send = vi.spyOn(channel, 'send')
    expect(client.lastQueryId).toBe(0)

    await client.resolve('example.com')
    await client.resolve('example.com')
    await client.resolve('nosuch.com')

    expect(send.mock.calls.map(([, message]) => message.id)).toEqual([1, 2, 3])
    expect(client.lastQueryId).toBe(3)
  })

  test('reports an unreachable server as an error result', async () => {
    const client = new DnsClient({
      server: LOCAL,
      channel: new InProcessChannel(),
    })

    expect(await client.resolve('example.com')).toEqual({
      ok: false,
      error:
        'Transport failure (connect) to 127.0.0.1:53004: no server registered',
    })
  })

  test('rejects a delegation from the resolver', async () => {
    const client = new DnsClient({
      server: LOCAL,
      channel: {
        send: async (_address: ServerAddress, message: DNSMessage) => {
          if (message.type !== 'QUERY') throw new Error('expected a query')
          return createDelegationResponse(message, {
            role: 'TLD',
            host: '127.0.0.1',
            port: 53001,
          })
        },
      },
    })

    expect(await client.resolve('example.com')).toEqual({
      ok: false,
      error: 'unexpected delegation from 127.0.0.1:53004',
    })
  })

  test('does not swallow programming errors', async () => {
    const client = new DnsClient({
      server: LOCAL,
      channel: {
        send: async () => {
          throw new TypeError('broken channel')
        },
      },
    })

    await expect(client.resolve('example.com')).rejects.toThrow(
      'broken channel',
    )
  })
})

describe('formatClientResult', () => {
  test('formats both outcomes', () => {
    expect(
      formatClientResult('example.com', { ok: true, address: '203.0.113.5' }),
    ).toBe('example.com -> 203.0.113.5')
    expect(
      formatClientResult('nosuch.com', { ok: false, error: 'domain not found' }),
    ).toBe('nosuch.com -> ERROR: domain not found')
  })
})
