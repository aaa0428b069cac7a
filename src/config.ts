import { z } from 'zod'
import { PortprobeError } from './scanner/errors.js'
import {
  DEFAULT_BANNER_TIMEOUT_SECONDS,
  DEFAULT_CONCURRENCY,
  DEFAULT_CONNECT_TIMEOUT_SECONDS,
} from './scanner/port-scan.js'

export interface Config {
  timeout: number // seconds
  bannerTimeout: number // seconds
  concurrency: number
  logLevel: 'debug' | 'info' | 'warn' | 'error'
  logDir: string
  uiPort: number
  outputDir: string
}

const configSchema = z.object({
  PORTPROBE_TIMEOUT: z.coerce.number().positive().default(DEFAULT_CONNECT_TIMEOUT_SECONDS),
  PORTPROBE_BANNER_TIMEOUT: z.coerce.number().positive().default(DEFAULT_BANNER_TIMEOUT_SECONDS),
  PORTPROBE_CONCURRENCY: z.coerce.number().int().min(1).default(DEFAULT_CONCURRENCY),
  PORTPROBE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  PORTPROBE_LOG_DIR: z.string().min(1).default('./logs'),
  PORTPROBE_UI_PORT: z.coerce.number().int().min(0).max(65535).default(3100),
  PORTPROBE_OUTPUT_DIR: z.string().min(1).default('.'),
})

/**
 * Load configuration from environment variables.
 * Unset or empty variables fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Treat VAR= the same as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('PORTPROBE_') && value !== undefined && value !== '')
  )

  const parsed = configSchema.safeParse(present)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    throw new PortprobeError(`Invalid configuration: ${issues.join('; ')}`)
  }

  const vars = parsed.data
  return {
    timeout: vars.PORTPROBE_TIMEOUT,
    bannerTimeout: vars.PORTPROBE_BANNER_TIMEOUT,
    concurrency: vars.PORTPROBE_CONCURRENCY,
    logLevel: vars.PORTPROBE_LOG_LEVEL,
    logDir: vars.PORTPROBE_LOG_DIR,
    uiPort: vars.PORTPROBE_UI_PORT,
    outputDir: vars.PORTPROBE_OUTPUT_DIR,
  }
}
