import { describe, it, expect, afterEach } from 'vitest'
import type { Socket } from 'net'
import { BANNER_MAX_BYTES, readBanner } from '../banner.js'
import { probePort } from '../tcp.js'
import { listen, type TestServer } from './helpers.js'

describe('readBanner', () => {
  let server: TestServer | null = null

  afterEach(async () => {
    await server?.close()
    server = null
  })

  async function connect(onConnection: (socket: Socket) => void): Promise<Socket> {
    server = await listen(onConnection)
    const socket = await probePort('127.0.0.1', server.port, 1000)
    if (!socket) throw new Error('test server refused the connection')
    return socket
  }

  it('returns the trimmed greeting and closes the socket', async () => {
    const socket = await connect(s => s.write('SSH-2.0-OpenSSH_8.0\r\n'))
    await expect(readBanner(socket, 1000)).resolves.toBe('SSH-2.0-OpenSSH_8.0')
    expect(socket.destroyed).toBe(true)
  })

  it('returns null when the service stays silent', async () => {
    const socket = await connect(() => {})
    const started = Date.now()
    await expect(readBanner(socket, 100)).resolves.toBeNull()
    expect(Date.now() - started).toBeGreaterThanOrEqual(90)
    expect(socket.destroyed).toBe(true)
  })

  it('returns null when the peer closes without sending', async () => {
    const socket = await connect(s => s.end())
    await expect(readBanner(socket, 1000)).resolves.toBeNull()
    expect(socket.destroyed).toBe(true)
  })

  it('returns null for a whitespace-only greeting', async () => {
    const socket = await connect(s => s.write('  \r\n'))
    await expect(readBanner(socket, 1000)).resolves.toBeNull()
  })

  it('keeps at most BANNER_MAX_BYTES bytes', async () => {
    const socket = await connect(s => s.write('A'.repeat(300)))
    const banner = await readBanner(socket, 1000)
    expect(banner).toBe('A'.repeat(BANNER_MAX_BYTES))
  })

  it('drops invalid byte sequences instead of failing', async () => {
    const socket = await connect(s => s.write(Buffer.from([0x48, 0x69, 0xff, 0x21])))
    await expect(readBanner(socket, 1000)).resolves.toBe('Hi!')
  })

  it('returns null for a socket that is already destroyed', async () => {
    const socket = await connect(() => {})
    socket.destroy()
    await expect(readBanner(socket, 1000)).resolves.toBeNull()
  })
})
