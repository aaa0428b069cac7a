import { mkdir, writeFile } from 'fs/promises'
import path from 'path'
import type { PortResult } from '../scanner/port-scan.js'
import type { ScanReport } from '../scanner/scan-report.js'

export const CSV_FIELDS = ['port', 'status', 'service', 'banner'] as const

export interface ReportFiles {
  json: string
  csv: string
}

function toRecord(r: PortResult) {
  return { port: r.port, status: r.status, service: r.service, banner: r.banner }
}

/**
 * Results as a pretty-printed JSON array, one object per port
 */
export function toJson(results: readonly PortResult[]): string {
  return JSON.stringify(results.map(toRecord), null, 2)
}

/**
 * Results wrapped with scan metadata, for embedding into a larger document
 */
export function toJsonDocument(report: ScanReport): string {
  return JSON.stringify(
    {
      target: report.target,
      address: report.address,
      timestamp: report.finishedAt,
      port_count: report.portCount,
      open_count: report.openCount,
      duration_ms: report.durationMs,
      results: report.results.map(toRecord),
    },
    null,
    2
  )
}

function csvField(value: string): string {
  return /[",]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

export function toCsv(results: readonly PortResult[]): string {
  const rows = results.map(r => [
    String(r.port),
    r.status,
    r.service ?? '',
    (r.banner ?? '').replace(/[\r\n]/g, ' '),
  ].map(csvField).join(','))

  return [CSV_FIELDS.join(','), ...rows].join('\r\n') + '\r\n'
}

/**
 * Compact UTC timestamp used in report file names, e.g. 20240131_235959
 */
export function fileTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  )
}

export function reportFileNames(prefix: string, date: Date = new Date()): ReportFiles {
  const base = `${prefix || 'scan'}_${fileTimestamp(date)}`
  return { json: `${base}.json`, csv: `${base}.csv` }
}

/**
 * Write JSON and CSV reports into `dir`, returning the full paths
 */
export async function saveReports(
  results: readonly PortResult[],
  prefix: string,
  dir: string,
  date: Date = new Date()
): Promise<ReportFiles> {
  const names = reportFileNames(prefix, date)
  const files: ReportFiles = {
    json: path.join(dir, names.json),
    csv: path.join(dir, names.csv),
  }

  await mkdir(dir, { recursive: true })
  await Promise.all([
    writeFile(files.json, toJson(results), 'utf-8'),
    writeFile(files.csv, toCsv(results), 'utf-8'),
  ])

  return files
}
