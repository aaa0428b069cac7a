import type { Socket } from 'net'
import { z } from 'zod'
import type { Logger } from '../utils/logger.js'
import { createQuietLogger } from '../utils/logger.js'
import { readBanner } from './banner.js'
import { InvalidScanRequestError } from './errors.js'
import { parsePortSpec } from './ports.js'
import { resolveTarget, type LookupFn } from './resolve.js'
import { inferService } from './service.js'
import { probePort } from './tcp.js'

export const DEFAULT_CONNECT_TIMEOUT_SECONDS = 3
export const DEFAULT_BANNER_TIMEOUT_SECONDS = 0.8
export const DEFAULT_CONCURRENCY = 500

export type PortStatus = 'open' | 'closed'

export interface PortResult {
  readonly port: number
  readonly status: PortStatus
  readonly service: string | null
  readonly banner: string | null
}

export interface ScanRequest {
  readonly address: string
  readonly ports: readonly number[]
  readonly connectTimeoutMs: number
  readonly bannerTimeoutMs: number
  readonly concurrency: number
}

/**
 * Connection primitives used by the coordinator. Swappable in tests.
 */
export interface ScannerDeps {
  probe: (ip: string, port: number, timeout: number) => Promise<Socket | null>
  readBanner: (socket: Socket, timeout: number) => Promise<string | null>
}

const defaultDeps: ScannerDeps = {
  probe: probePort,
  readBanner,
}

const scanRequestSchema = z.object({
  address: z.string().min(1, 'address is required'),
  ports: z.array(z.number().int().min(1).max(65535)),
  connectTimeoutMs: z.number().finite().positive('connect timeout must be > 0'),
  bannerTimeoutMs: z.number().finite().positive('banner timeout must be > 0'),
  concurrency: z.number().int('concurrency must be an integer').min(1, 'concurrency must be >= 1'),
})

const scanParamsSchema = scanRequestSchema.pick({
  connectTimeoutMs: true,
  bannerTimeoutMs: true,
  concurrency: true,
})

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input)
  if (!parsed.success) {
    throw new InvalidScanRequestError(
      parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    )
  }
  return parsed.data
}

/**
 * Validate and freeze a scan request
 *
 * @throws InvalidScanRequestError
 */
export function createScanRequest(input: ScanRequest): ScanRequest {
  const data = validate(scanRequestSchema, input)
  return Object.freeze({
    ...data,
    ports: Object.freeze([...data.ports]),
  })
}

function closedResult(port: number): PortResult {
  const result: PortResult = { port, status: 'closed', service: null, banner: null }
  return Object.freeze(result)
}

async function scanOne(
  request: ScanRequest,
  port: number,
  deps: ScannerDeps,
  logger: Logger
): Promise<PortResult> {
  try {
    const socket = await deps.probe(request.address, port, request.connectTimeoutMs)
    if (!socket) {
      return closedResult(port)
    }
    const banner = await deps.readBanner(socket, request.bannerTimeoutMs)
    const result: PortResult = {
      port,
      status: 'open',
      service: inferService(port, banner),
      banner,
    }
    return Object.freeze(result)
  } catch (err) {
    logger.debug(`Port ${request.address}:${port} probe failed: ${err instanceof Error ? err.message : String(err)}`)
    return closedResult(port)
  }
}

/**
 * Scan every port of the request, at most `concurrency` at a time.
 *
 * Every port yields exactly one result; the returned list is ascending by port.
 *
 * @param deps - Override probe/banner functions (tests)
 */
export async function scanPorts(
  request: ScanRequest,
  logger: Logger,
  deps: Partial<ScannerDeps> = {}
): Promise<readonly PortResult[]> {
  const resolved: ScannerDeps = { ...defaultDeps, ...deps }
  const queue = request.ports.map((port, index) => ({ port, index }))
  const results: PortResult[] = new Array(queue.length)

  logger.debug(`Port scan ${request.address}: ${queue.length} ports, concurrency ${request.concurrency}`)

  const workers = Array(Math.min(request.concurrency, queue.length))
    .fill(null)
    .map(async () => {
      while (queue.length > 0) {
        const next = queue.shift()
        if (next === undefined) break
        results[next.index] = await scanOne(request, next.port, resolved, logger)
      }
    })

  await Promise.all(workers)

  const open = results.filter(r => r.status === 'open')
  if (open.length > 0) {
    logger.debug(`Port scan ${request.address}: ${open.length} open ports [${open.map(r => r.port).join(', ')}]`)
  }

  return Object.freeze(results.sort((a, b) => a.port - b.port))
}

export interface PerformScanOptions {
  lookup?: LookupFn
  deps?: Partial<ScannerDeps>
}

export type ScanParams = Pick<ScanRequest, 'connectTimeoutMs' | 'bannerTimeoutMs' | 'concurrency'>

/**
 * Convert timeouts from seconds to ms and check them with the concurrency
 * limit. Throws InvalidScanRequestError.
 */
export function validateScanParams(
  connectTimeoutSeconds: number,
  bannerTimeoutSeconds: number,
  concurrency: number
): ScanParams {
  return validate(scanParamsSchema, {
    connectTimeoutMs: connectTimeoutSeconds * 1000,
    bannerTimeoutMs: bannerTimeoutSeconds * 1000,
    concurrency,
  })
}

/**
 * Resolve the target, parse the port spec and run the scan.
 *
 * Either the full ordered result list comes back, or the call rejects with
 * ResolutionError (unresolvable target) / InvalidScanRequestError (bad
 * timeouts or concurrency) before any port is probed.
 *
 * @param portSpec - e.g. "22,80,8000-8100"; null/undefined means DEFAULT_PORTS
 */
export async function performScan(
  target: string,
  portSpec: string | null | undefined,
  connectTimeoutSeconds: number = DEFAULT_CONNECT_TIMEOUT_SECONDS,
  bannerTimeoutSeconds: number = DEFAULT_BANNER_TIMEOUT_SECONDS,
  concurrency: number = DEFAULT_CONCURRENCY,
  logger: Logger = createQuietLogger(),
  options: PerformScanOptions = {}
): Promise<readonly PortResult[]> {
  const ports = parsePortSpec(portSpec)

  // Checked before DNS so bad arguments never cause network activity
  const params = validateScanParams(connectTimeoutSeconds, bannerTimeoutSeconds, concurrency)

  const address = await resolveTarget(target, options.lookup)
  const request = createScanRequest({ address, ports, ...params })

  logger.info(
    `Scanning ${target} (${address}): ${ports.length} ports, timeout ${connectTimeoutSeconds}s, concurrency ${concurrency}`
  )
  const started = Date.now()
  const results = await scanPorts(request, logger, options.deps)
  const open = results.filter(r => r.status === 'open').length
  logger.info(`Scan of ${address} finished in ${((Date.now() - started) / 1000).toFixed(2)}s: ${open} open`)

  return results
}
