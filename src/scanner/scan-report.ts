import type { Logger } from '../utils/logger.js'
import {
  DEFAULT_BANNER_TIMEOUT_SECONDS,
  DEFAULT_CONCURRENCY,
  DEFAULT_CONNECT_TIMEOUT_SECONDS,
  performScan,
  validateScanParams,
  type PerformScanOptions,
  type PortResult,
} from './port-scan.js'
import { resolveTarget } from './resolve.js'

export interface ScanOptions {
  target: string
  ports?: string | null
  timeout?: number // seconds
  bannerTimeout?: number // seconds
  concurrency?: number
}

export interface ScanReport {
  target: string
  address: string
  startedAt: string
  finishedAt: string
  durationMs: number
  portCount: number
  openCount: number
  results: readonly PortResult[]
}

/**
 * Run a scan and wrap the results with target and timing metadata
 */
export async function runScan(
  options: ScanOptions,
  logger: Logger,
  scanOptions: PerformScanOptions = {}
): Promise<ScanReport> {
  const started = new Date()
  const timeout = options.timeout ?? DEFAULT_CONNECT_TIMEOUT_SECONDS
  const bannerTimeout = options.bannerTimeout ?? DEFAULT_BANNER_TIMEOUT_SECONDS
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY
  validateScanParams(timeout, bannerTimeout, concurrency)

  // Resolve once up front so the report can carry the address; performScan
  // gets the literal and skips the lookup.
  const address = await resolveTarget(options.target, scanOptions.lookup)
  const results = await performScan(
    address,
    options.ports,
    timeout,
    bannerTimeout,
    concurrency,
    logger,
    scanOptions
  )
  const finished = new Date()

  return {
    target: options.target,
    address,
    startedAt: started.toISOString(),
    finishedAt: finished.toISOString(),
    durationMs: finished.getTime() - started.getTime(),
    portCount: results.length,
    openCount: results.filter(r => r.status === 'open').length,
    results,
  }
}

export function openOnly(results: readonly PortResult[]): PortResult[] {
  return results.filter(r => r.status === 'open')
}
