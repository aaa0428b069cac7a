/**
 * Check whether a string is a dotted-quad IPv4 literal (four decimal octets, 0-255)
 */
export function isIpv4Literal(value: string): boolean {
  const parts = value.split('.')
  if (parts.length !== 4) return false
  return parts.every(p => /^\d{1,3}$/.test(p) && parseInt(p, 10) <= 255)
}

/**
 * Convert IP address string to number
 */
export function ipToNum(ip: string): number {
  const parts = ip.split('.').map(p => parseInt(p, 10))
  return ((parts[0] << 24) | (parts[1] << 16) | (parts[2] << 8) | parts[3]) >>> 0
}

/**
 * Check if an IPv4 address is in 127.0.0.0/8
 */
export function isLoopback(ip: string): boolean {
  return isIpv4Literal(ip) && ipToNum(ip) >>> 24 === 127
}
