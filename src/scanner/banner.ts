import type { Socket } from 'net'
import { timerDelay } from './tcp.js'

/**
 * Upper bound on bytes kept from the initial greeting
 */
export const BANNER_MAX_BYTES = 256

// Invalid byte sequences come back as U+FFFD and are dropped
function decodeBanner(data: Buffer): string | null {
  const text = data
    .subarray(0, BANNER_MAX_BYTES)
    .toString('utf8')
    .replace(/\uFFFD/g, '')
    .trim()
  return text.length > 0 ? text : null
}

/**
 * Read whatever the service sends unprompted right after connect.
 *
 * Resolves null on timeout, on close without data and on socket error:
 * plenty of services wait for the client to speak first. The socket is
 * destroyed before the promise settles, whatever the outcome.
 */
export function readBanner(socket: Socket, timeout: number): Promise<string | null> {
  return new Promise((resolve) => {
    let timer: ReturnType<typeof setTimeout> | null = null

    const finish = (banner: string | null) => {
      if (timer) {
        clearTimeout(timer)
        timer = null
      }
      socket.removeListener('data', onData)
      socket.removeListener('end', onClose)
      socket.removeListener('close', onClose)
      socket.removeListener('error', onClose)
      socket.destroy()
      resolve(banner)
    }

    const onData = (chunk: Buffer) => finish(decodeBanner(chunk))
    const onClose = () => finish(null)

    if (socket.destroyed) {
      finish(null)
      return
    }

    timer = setTimeout(onClose, timerDelay(timeout))
    socket.once('data', onData)
    socket.once('end', onClose)
    socket.once('close', onClose)
    socket.once('error', onClose)
  })
}
