export { DEFAULT_PORTS, parsePortSpec } from './ports.js'
export { PORT_SERVICES, inferService } from './service.js'
export { resolveTarget, type LookupFn, type LookupAddress } from './resolve.js'
export { MAX_TIMER_MS, probePort } from './tcp.js'
export { BANNER_MAX_BYTES, readBanner } from './banner.js'
export {
  DEFAULT_BANNER_TIMEOUT_SECONDS,
  DEFAULT_CONCURRENCY,
  DEFAULT_CONNECT_TIMEOUT_SECONDS,
  createScanRequest,
  performScan,
  scanPorts,
  validateScanParams,
  type PerformScanOptions,
  type PortResult,
  type PortStatus,
  type ScanParams,
  type ScanRequest,
  type ScannerDeps,
} from './port-scan.js'
export { openOnly, runScan, type ScanOptions, type ScanReport } from './scan-report.js'
export { InvalidScanRequestError, PortprobeError, ResolutionError } from './errors.js'
