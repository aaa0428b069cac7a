/**
 * Curated list of commonly exposed TCP ports, used when no port list is given
 */
export const DEFAULT_PORTS: readonly number[] = [
  21,    // FTP
  22,    // SSH
  23,    // Telnet
  25,    // SMTP
  53,    // DNS
  80,    // HTTP
  110,   // POP3
  111,   // RPCbind
  135,   // MSRPC
  139,   // NetBIOS
  143,   // IMAP
  443,   // HTTPS
  445,   // SMB
  587,   // SMTP submission
  993,   // IMAPS
  995,   // POP3S
  3306,  // MySQL
  3389,  // RDP
  5900,  // VNC
  8080,  // HTTP Alt
]

export const MIN_PORT = 1
export const MAX_PORT = 65535

const INTEGER = /^\+?\d+$/

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT
}

function parseToken(token: string): number[] {
  const dash = token.indexOf('-')
  if (dash === -1) {
    return INTEGER.test(token) ? [parseInt(token, 10)] : []
  }

  const start = token.slice(0, dash).trim()
  const end = token.slice(dash + 1).trim()
  if (!INTEGER.test(start) || !INTEGER.test(end)) return []

  // Clamped before expansion: "1-999999" expands to at most 65535 ports
  const from = Math.max(parseInt(start, 10), MIN_PORT)
  const to = Math.min(parseInt(end, 10), MAX_PORT)
  const ports: number[] = []
  for (let p = from; p <= to; p++) ports.push(p)
  return ports
}

/**
 * Parse a port specification such as "22,80,443", "1-1024" or "22-25,80".
 *
 * Invalid or out-of-range tokens are dropped. A missing or blank spec yields
 * DEFAULT_PORTS. The result is ascending and duplicate-free.
 */
export function parsePortSpec(spec?: string | null): number[] {
  if (!spec || spec.trim() === '') {
    return [...DEFAULT_PORTS]
  }

  const ports = spec
    .split(',')
    .map(part => part.trim())
    .filter(Boolean)
    .reduce((acc, token) => {
      for (const port of parseToken(token)) {
        if (isValidPort(port)) acc.add(port)
      }
      return acc
    }, new Set<number>())

  return [...ports].sort((a, b) => a - b)
}
