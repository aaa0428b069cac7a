import { describe, it, expect, afterEach } from 'vitest'
import { mkdtemp, readFile, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import type { PortResult } from '../../scanner/port-scan.js'
import type { ScanReport } from '../../scanner/scan-report.js'
import {
  fileTimestamp,
  reportFileNames,
  saveReports,
  toCsv,
  toJson,
  toJsonDocument,
} from '../writer.js'

const results: PortResult[] = [
  { port: 22, status: 'open', service: 'ssh', banner: 'SSH-2.0-Test\r\nline2' },
  { port: 80, status: 'closed', service: null, banner: null },
  { port: 9999, status: 'open', service: null, banner: 'a,"b"' },
]

const when = new Date(Date.UTC(2024, 0, 31, 23, 5, 9))

describe('toJson', () => {
  it('writes one record per port with nulls for absent fields', () => {
    const parsed: unknown = JSON.parse(toJson(results))
    expect(parsed).toEqual([
      { port: 22, status: 'open', service: 'ssh', banner: 'SSH-2.0-Test\r\nline2' },
      { port: 80, status: 'closed', service: null, banner: null },
      { port: 9999, status: 'open', service: null, banner: 'a,"b"' },
    ])
  })

  it('indents with two spaces', () => {
    expect(toJson([results[1]])).toBe(
      '[\n  {\n    "port": 80,\n    "status": "closed",\n    "service": null,\n    "banner": null\n  }\n]'
    )
  })
})

describe('toJsonDocument', () => {
  it('wraps results with scan metadata', () => {
    const report: ScanReport = {
      target: 'host.test',
      address: '192.0.2.1',
      startedAt: '2024-01-31T23:05:08.000Z',
      finishedAt: '2024-01-31T23:05:09.000Z',
      durationMs: 1000,
      portCount: 3,
      openCount: 2,
      results,
    }
    const doc: unknown = JSON.parse(toJsonDocument(report))
    expect(doc).toEqual({
      target: 'host.test',
      address: '192.0.2.1',
      timestamp: '2024-01-31T23:05:09.000Z',
      port_count: 3,
      open_count: 2,
      duration_ms: 1000,
      results: JSON.parse(toJson(results)),
    })
  })
})

describe('toCsv', () => {
  it('writes a header and one sanitized row per port', () => {
    expect(toCsv(results)).toBe(
      'port,status,service,banner\r\n' +
      '22,open,ssh,SSH-2.0-Test  line2\r\n' +
      '80,closed,,\r\n' +
      '9999,open,,"a,""b"""\r\n'
    )
  })

  it('writes only the header for no results', () => {
    expect(toCsv([])).toBe('port,status,service,banner\r\n')
  })
})

describe('report file names', () => {
  it('formats a compact UTC timestamp', () => {
    expect(fileTimestamp(when)).toBe('20240131_230509')
  })

  it('combines prefix and timestamp', () => {
    expect(reportFileNames('lab', when)).toEqual({
      json: 'lab_20240131_230509.json',
      csv: 'lab_20240131_230509.csv',
    })
    expect(reportFileNames('', when).json).toBe('scan_20240131_230509.json')
  })
})

describe('saveReports', () => {
  let dir: string | null = null

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true })
    dir = null
  })

  it('writes both files into the target directory', async () => {
    const base = await mkdtemp(join(tmpdir(), 'portprobe-report-'))
    dir = base
    const out = join(base, 'nested')

    const files = await saveReports(results, 'lab', out, when)

    expect(files).toEqual({
      json: join(out, 'lab_20240131_230509.json'),
      csv: join(out, 'lab_20240131_230509.csv'),
    })
    expect(await readFile(files.json, 'utf-8')).toBe(toJson(results))
    expect(await readFile(files.csv, 'utf-8')).toBe(toCsv(results))
  })
})
