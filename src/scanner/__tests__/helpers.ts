import * as net from 'net'

export interface TestServer {
  port: number
  close(): Promise<void>
}

/**
 * Listen on an ephemeral loopback port; `onConnection` runs for each client
 */
export async function listen(onConnection: (socket: net.Socket) => void = () => {}): Promise<TestServer> {
  const sockets = new Set<net.Socket>()
  const server = net.createServer((socket) => {
    sockets.add(socket)
    socket.on('error', () => socket.destroy())
    socket.on('close', () => sockets.delete(socket))
    onConnection(socket)
  })

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve))
  const address = server.address()
  if (!address || typeof address === 'string') {
    throw new Error('test server has no port')
  }

  return {
    port: address.port,
    close: () => new Promise<void>((resolve) => {
      sockets.forEach(s => s.destroy())
      server.close(() => resolve())
    }),
  }
}

/**
 * A loopback port with nothing listening on it
 */
export async function freePort(): Promise<number> {
  const server = await listen()
  await server.close()
  return server.port
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}
