import * as net from 'net'

// Longer delays make Node timers fire after 1 ms
export const MAX_TIMER_MS = 2_147_483_647

export function timerDelay(ms: number): number {
  return Math.min(ms, MAX_TIMER_MS)
}

/**
 * Attempt a TCP connect to ip:port.
 *
 * Resolves with the connected socket, whose ownership passes to the caller,
 * or null when the connection is refused, times out or errors in any other way.
 * Never rejects.
 */
export function probePort(ip: string, port: number, timeout: number): Promise<net.Socket | null> {
  return new Promise((resolve) => {
    const socket = new net.Socket()
    let settled = false

    const fail = () => {
      if (settled) return
      settled = true
      socket.destroy()
      resolve(null)
    }

    socket.setTimeout(timerDelay(timeout))

    socket.once('connect', () => {
      if (settled) return
      settled = true
      socket.setTimeout(0)
      socket.removeListener('timeout', fail)
      resolve(socket)
    })

    // Stays attached after connect so a late error can never go unhandled
    socket.on('error', fail)
    socket.once('timeout', fail)

    socket.connect(port, ip)
  })
}
