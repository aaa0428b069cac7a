export class PortprobeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * The target could not be turned into an IPv4 address. Fatal to the whole scan.
 */
export class ResolutionError extends PortprobeError {
  readonly target: string

  constructor(target: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : ''
    super(`Could not resolve ${target}${detail}`, { cause })
    this.target = target
  }
}

/**
 * Scan parameters failed validation (non-positive timeout, concurrency below 1, ...)
 */
export class InvalidScanRequestError extends PortprobeError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid scan request: ${issues.join('; ')}`)
    this.issues = issues
  }
}
