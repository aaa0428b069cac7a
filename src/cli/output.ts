import type { PortResult } from '../scanner/port-scan.js'
import type { ScanReport } from '../scanner/scan-report.js'

const BANNER_PREVIEW_CHARS = 120

export function formatResultLine(r: PortResult): string {
  let line = `Port ${String(r.port).padStart(5)} | ${r.status.padEnd(6)} | Service: ${r.service || '-'}`
  if (r.banner) {
    line += ` | Banner: ${r.banner.replace(/[\r\n]+/g, ' ').slice(0, BANNER_PREVIEW_CHARS)}`
  }
  return line
}

export function formatSummary(report: ScanReport): string {
  return `[+] Scan finished in ${(report.durationMs / 1000).toFixed(2)}s, open ports: ${report.openCount}`
}

/**
 * Render the result table; with onlyOpen, closed ports are left out
 */
export function formatResults(results: readonly PortResult[], onlyOpen: boolean): string[] {
  return results
    .filter(r => !onlyOpen || r.status === 'open')
    .map(formatResultLine)
}
