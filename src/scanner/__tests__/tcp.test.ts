import { describe, it, expect, afterEach, vi } from 'vitest'
import * as net from 'net'
import { MAX_TIMER_MS, probePort, timerDelay } from '../tcp.js'
import { freePort, listen, type TestServer } from './helpers.js'

describe('probePort', () => {
  let server: TestServer | null = null

  afterEach(async () => {
    vi.restoreAllMocks()
    await server?.close()
    server = null
  })

  it('hands back a connected socket when the port is open', async () => {
    server = await listen()
    const socket = await probePort('127.0.0.1', server.port, 1000)
    expect(socket).not.toBeNull()
    expect(socket?.remotePort).toBe(server.port)
    expect(socket?.destroyed).toBe(false)
    socket?.destroy()
  })

  it('resolves null when the connection is refused', async () => {
    const port = await freePort()
    await expect(probePort('127.0.0.1', port, 1000)).resolves.toBeNull()
  })

  it('clears the connect timeout once connected', async () => {
    server = await listen()
    const socket = await probePort('127.0.0.1', server.port, 50)
    expect(socket?.timeout).toBe(0)
    socket?.destroy()
  })

  it('gives up and destroys the socket when the connect never completes', async () => {
    const sockets: net.Socket[] = []
    vi.spyOn(net.Socket.prototype, 'connect').mockImplementation(function (this: net.Socket) {
      sockets.push(this)
      return this
    })

    const started = Date.now()
    const result = await probePort('127.0.0.1', 9, 50)
    const elapsed = Date.now() - started

    expect(result).toBeNull()
    expect(elapsed).toBeGreaterThanOrEqual(40)
    expect(elapsed).toBeLessThan(1000)
    expect(sockets).toHaveLength(1)
    expect(sockets[0].destroyed).toBe(true)
  })
})

describe('timerDelay', () => {
  it('passes delays inside the timer range through', () => {
    expect(timerDelay(800)).toBe(800)
    expect(timerDelay(MAX_TIMER_MS)).toBe(MAX_TIMER_MS)
  })

  it('caps longer delays', () => {
    expect(timerDelay(3_000_000_000)).toBe(2_147_483_647)
  })
})
