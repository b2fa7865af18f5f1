/**
 * Tests for the TCP server and the query channels, over loopback
 */

import { createConnection, createServer, type Socket } from 'node:net'
import {
  createAddressResponse,
  createQuery,
  MalformedMessageError,
  type ServerAddress,
  TransportError,
} from '@hopdns/protocol'
import { afterEach, describe, expect, test } from 'vitest'
import { AuthoritativeZoneStub } from '../zones/authoritative'
import { InProcessChannel, TcpQueryChannel } from './channel'
import { DnsServer } from './server'

const cleanup: Array<() => Promise<void>> = []

afterEach(async () => {
  for (const step of cleanup.splice(0)) {
    await step()
  }
})

function createAuth() {
  return new AuthoritativeZoneStub(new Map([['example.com', '203.0.113.5']]))
}

async function startServer(): Promise<ServerAddress> {
  const server = new DnsServer(createAuth(), {
    name: 'auth',
    host: '127.0.0.1',
    port: 0,
  })
  const address = await server.start()
  cleanup.push(() => server.stop())
  return address
}

/**
 * A bare TCP peer whose behaviour each test scripts
 */
async function startRawServer(
  onSocket: (socket: Socket) => void,
): Promise<ServerAddress> {
  const sockets = new Set<Socket>()
  const server = createServer({ allowHalfOpen: true }, (socket) => {
    sockets.add(socket)
    socket.on('close', () => sockets.delete(socket))
    socket.on('error', () => socket.destroy())
    onSocket(socket)
  })
  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', resolve)
  })
  const info = server.address()
  if (info === null || typeof info === 'string') {
    throw new Error('expected a TCP address')
  }
  cleanup.push(
    () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) socket.destroy()
        server.close(() => resolve())
      }),
  )
  return { host: '127.0.0.1', port: info.port }
}

/**
 * Write raw bytes, half-close, collect everything until the peer closes
 */
function rawExchange(address: ServerAddress, bytes: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    const socket = createConnection(address, () => {
      socket.end(bytes)
    })
    socket.on('data', (chunk: Buffer) => chunks.push(chunk))
    socket.on('error', reject)
    socket.on('close', () => resolve(Buffer.concat(chunks).toString('utf-8')))
  })
}

/**
 * Write raw bytes without half-closing, collect until the peer closes
 */
function rawWrite(address: ServerAddress, bytes: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    const socket = createConnection(address, () => {
      socket.write(bytes)
    })
    socket.on('data', (chunk: Buffer) => chunks.push(chunk))
    socket.on('error', reject)
    socket.on('close', () => resolve(Buffer.concat(chunks).toString('utf-8')))
  })
}

const channel = new TcpQueryChannel({ timeoutMs: 2000 })

describe('DnsServer', () => {
  test('answers a query over TCP', async () => {
    const address = await startServer()

    const reply = await channel.send(address, createQuery(5, 'example.com'))

    expect(reply).toEqual(
      createAddressResponse(createQuery(5, 'example.com'), '203.0.113.5'),
    )
  })

  test('answers a client that never half-closes', async () => {
    const address = await startServer()

    expect(await rawWrite(address, 'QUERY|1|example.com')).toBe(
      'RESPONSE|1|example.com|IP|203.0.113.5',
    )
  })

  test('reports the bound address', async () => {
    const server = new DnsServer(createAuth(), {
      name: 'auth',
      host: '127.0.0.1',
      port: 0,
    })
    expect(server.address).toBeNull()

    const address = await server.start()
    cleanup.push(() => server.stop())

    expect(address.host).toBe('127.0.0.1')
    expect(address.port).toBeGreaterThan(0)
    expect(server.address).toEqual(address)
  })

  test('refuses to start twice', async () => {
    const server = new DnsServer(createAuth(), {
      name: 'auth',
      host: '127.0.0.1',
      port: 0,
    })
    await server.start()
    cleanup.push(() => server.stop())

    await expect(server.start()).rejects.toThrow('auth server already started')
  })

  test('serves concurrent connections', async () => {
    const address = await startServer()

    const replies = await Promise.all(
      [1, 2, 3, 4].map((id) =>
        channel.send(address, createQuery(id, 'example.com')),
      ),
    )

    expect(replies.map((reply) => reply.id)).toEqual([1, 2, 3, 4])
  })

  test('closes without reply on a malformed frame', async () => {
    const address = await startServer()

    expect(await rawExchange(address, 'HELLO|there')).toBe('')
  })

  test('closes without reply when sent a response', async () => {
    const address = await startServer()

    expect(
      await rawExchange(address, 'RESPONSE|1|example.com|IP|192.0.2.1'),
    ).toBe('')
  })

  test('keeps serving after a bad frame', async () => {
    const address = await startServer()
    await rawExchange(address, 'garbage')

    expect(await rawExchange(address, 'QUERY|9|example.com')).toBe(
      'RESPONSE|9|example.com|IP|203.0.113.5',
    )
  })

  test('stop is idempotent', async () => {
    const server = new DnsServer(createAuth(), {
      name: 'auth',
      host: '127.0.0.1',
      port: 0,
    })
    await server.start()
    await server.stop()
    await expect(server.stop()).resolves.toBeUndefined()
  })
})

describe('TcpQueryChannel', () => {
  test('fails to connect to a closed port', async () => {
    const server = new DnsServer(createAuth(), {
      name: 'auth',
      host: '127.0.0.1',
      port: 0,
    })
    const address = await server.start()
    await server.stop()

    const error = await channel
      .send(address, createQuery(1, 'example.com'))
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(TransportError)
    expect(error).toMatchObject({ reason: 'connect' })
  })

  test('times out when the peer never answers', async () => {
    const address = await startRawServer((socket) => {
      socket.resume()
    })
    const impatient = new TcpQueryChannel({ timeoutMs: 50 })

    const error = await impatient
      .send(address, createQuery(1, 'example.com'))
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(TransportError)
    expect(error).toMatchObject({ reason: 'timeout' })
  })

  test('reports a peer that closes without answering', async () => {
    const address = await startRawServer((socket) => {
      socket.resume()
      socket.on('end', () => socket.end())
    })

    const error = await channel
      .send(address, createQuery(1, 'example.com'))
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(TransportError)
    expect(error).toMatchObject({ reason: 'closed' })
  })

  test('rejects an unreadable reply', async () => {
    const address = await startRawServer((socket) => {
      socket.resume()
      socket.on('end', () => socket.end('not a dns frame'))
    })

    await expect(
      channel.send(address, createQuery(1, 'example.com')),
    ).rejects.toBeInstanceOf(MalformedMessageError)
  })

  test('rejects a reply over the frame limit', async () => {
    const address = await startRawServer((socket) => {
      socket.resume()
      socket.on('end', () => socket.end('x'.repeat(4096)))
    })

    const error = await channel
      .send(address, createQuery(1, 'example.com'))
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(TransportError)
    expect(error).toMatchObject({ reason: 'oversize' })
  })
})

describe('InProcessChannel', () => {
  const address = { host: '127.0.0.1', port: 53003 }

  test('routes to a registered handler', async () => {
    const inProcess = new InProcessChannel().register(address, createAuth())

    const reply = await inProcess.send(address, createQuery(3, 'EXAMPLE.com'))

    expect(reply).toEqual({
      type: 'RESPONSE',
      id: 3,
      domain: 'EXAMPLE.com',
      result: { kind: 'IP', address: '203.0.113.5' },
    })
  })

  test('fails like a refused connection when nothing is registered', async () => {
    const inProcess = new InProcessChannel()

    const error = await inProcess
      .send(address, createQuery(1, 'example.com'))
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(TransportError)
    expect(error).toMatchObject({ reason: 'connect' })
  })

  test('unregister removes the handler', async () => {
    const inProcess = new InProcessChannel().register(address, createAuth())

    expect(inProcess.unregister(address)).toBe(true)
    expect(inProcess.unregister(address)).toBe(false)
    await expect(
      inProcess.send(address, createQuery(1, 'example.com')),
    ).rejects.toBeInstanceOf(TransportError)
  })

  test('only carries queries to handlers', async () => {
    const inProcess = new InProcessChannel().register(address, createAuth())
    const response = createAddressResponse(
      createQuery(1, 'example.com'),
      '192.0.2.1',
    )

    const error = await inProcess
      .send(address, response)
      .catch((err: unknown) => err)

    expect(error).toMatchObject({ reason: 'closed' })
  })
})
