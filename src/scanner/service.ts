/**
 * Well-known port to service name mapping
 */
export const PORT_SERVICES: Readonly<Record<number, string>> = {
  21: 'ftp', 22: 'ssh', 23: 'telnet', 25: 'smtp', 53: 'dns',
  80: 'http', 110: 'pop3', 143: 'imap', 443: 'https', 3306: 'mysql',
  3389: 'rdp', 5900: 'vnc', 8080: 'http-alt',
}

interface BannerRule {
  keywords: string[]
  service: string
}

// Checked in order, first hit wins
const BANNER_RULES: readonly BannerRule[] = [
  { keywords: ['ssh'], service: 'ssh' },
  { keywords: ['http', 'apache', 'nginx'], service: 'http' },
  { keywords: ['smtp'], service: 'smtp' },
  { keywords: ['mysql', 'mariadb'], service: 'mysql' },
  { keywords: ['rdp', 'mstsc'], service: 'rdp' },
]

/**
 * Best-guess service label for an open port.
 *
 * A known port number always wins; the banner is only consulted for ports
 * missing from PORT_SERVICES.
 */
export function inferService(port: number, banner?: string | null): string | null {
  const known = PORT_SERVICES[port]
  if (known !== undefined) {
    return known
  }

  if (banner) {
    const text = banner.toLowerCase()
    const rule = BANNER_RULES.find(r => r.keywords.some(k => text.includes(k)))
    if (rule) return rule.service
  }

  return null
}
