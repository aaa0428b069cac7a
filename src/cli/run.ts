import { loadConfig, type Config } from '../config.js'
import { InvalidScanRequestError, PortprobeError, ResolutionError } from '../scanner/errors.js'
import { parsePortSpec } from '../scanner/ports.js'
import { runScan, type ScanOptions, type ScanReport } from '../scanner/scan-report.js'
import { saveReports } from '../report/writer.js'
import { ScanUIServer, type ScanRunner } from '../ui/server.js'
import { isLoopback } from '../utils/ip-utils.js'
import { createLogger, getLogDirectory, type Logger } from '../utils/logger.js'
import { versionString } from '../utils/version.js'
import { parseArgs } from './args.js'
import { formatResults, formatSummary } from './output.js'

export interface CliDeps {
  env?: NodeJS.ProcessEnv
  logger?: Logger
  scan?: ScanRunner
  stdout?: (text: string) => void
  stderr?: (text: string) => void
}

const HELP = `
Usage: portprobe <target> [options]
       portprobe --ui [--ui-port <n>]

Scan TCP ports on a single host, grab banners and guess services.
Only scan hosts you own or are authorized to test.

Options:
  -p, --ports <spec>            Ports, e.g. 22,80,443 or 1-1024 (default: common ports)
  -t, --timeout <s>             TCP connect timeout in seconds (default: 3)
  -b, --banner-timeout <s>      Banner read timeout in seconds (default: 0.8)
  -c, --concurrency <n>         Max concurrent connections (default: 500)
  -o, --output <prefix>         Report file prefix (default: scan)
      --output-dir <dir>        Directory for reports (default: current directory)
      --only-open               Print only open ports
      --no-save                 Do not write JSON/CSV reports
      --ui                      Start the web UI instead of scanning
      --ui-port <n>             Web UI port (default: 3100)
      --verbose                 Debug logging
  -h, --help                    Show this help
  -v, --version                 Print version

Environment:
  PORTPROBE_TIMEOUT, PORTPROBE_BANNER_TIMEOUT, PORTPROBE_CONCURRENCY,
  PORTPROBE_LOG_LEVEL, PORTPROBE_LOG_DIR, PORTPROBE_UI_PORT, PORTPROBE_OUTPUT_DIR
`

function numberArg(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : Number(value)
}

function scanOptionsFrom(args: Record<string, string>, target: string, config: Config): ScanOptions {
  return {
    target,
    ports: args['ports'],
    timeout: numberArg(args['timeout'], config.timeout),
    bannerTimeout: numberArg(args['banner-timeout'], config.bannerTimeout),
    concurrency: numberArg(args['concurrency'], config.concurrency),
  }
}

async function serveUI(port: number, options: ScanOptions, logger: Logger, scan: ScanRunner): Promise<number> {
  const server = new ScanUIServer(port, logger, {
    defaults: {
      ports: options.ports ?? '',
      timeout: options.timeout ?? 0,
      bannerTimeout: options.bannerTimeout ?? 0,
      concurrency: options.concurrency ?? 1,
    },
    runner: scan,
  })
  await server.start()

  await new Promise<void>((resolve) => {
    process.once('SIGINT', resolve)
    process.once('SIGTERM', resolve)
  })
  logger.info('Shutting down UI')
  await server.stop()
  return 0
}

/**
 * Run the command line. Resolves with the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.stdout ?? ((text: string) => { process.stdout.write(text + '\n') })
  const err = deps.stderr ?? ((text: string) => { process.stderr.write(text + '\n') })
  const scan = deps.scan ?? runScan

  const { args, positional, errors } = parseArgs(argv)
  if (errors.length > 0) {
    errors.forEach(e => err(`[portprobe] Error: ${e}`))
    err('Run portprobe --help for usage')
    return 1
  }
  if (args['help'] === 'true') {
    out(HELP)
    return 0
  }
  if (args['version'] === 'true') {
    out(versionString())
    return 0
  }

  let config: Config
  try {
    config = loadConfig(deps.env ?? process.env)
  } catch (e) {
    if (e instanceof PortprobeError) {
      err(`[portprobe] Error: ${e.message}`)
      return 1
    }
    throw e
  }

  const logger = deps.logger ?? createLogger(
    args['verbose'] === 'true' ? 'debug' : config.logLevel,
    getLogDirectory(config.logDir)
  )

  const target = positional[0]
  if (args['ui'] === 'true') {
    const uiPort = numberArg(args['ui-port'], config.uiPort)
    return serveUI(uiPort, scanOptionsFrom(args, target ?? '127.0.0.1', config), logger, scan)
  }

  if (!target) {
    err('[portprobe] Error: missing target')
    err('Run portprobe --help for usage')
    return 1
  }
  if (positional.length > 1) {
    err(`[portprobe] Error: unexpected argument ${positional[1]}`)
    return 1
  }

  const options = scanOptionsFrom(args, target, config)
  if (target !== 'localhost' && !isLoopback(target)) {
    logger.info(`Target ${target} is not a loopback address: make sure you are authorized to scan it`)
  }
  out(
    `[*] Resolving and scanning ${target} (${parsePortSpec(options.ports).length} ports) ` +
    `with timeout=${options.timeout}s concurrency=${options.concurrency}`
  )

  let report: ScanReport
  try {
    report = await scan(options, logger)
  } catch (e) {
    if (e instanceof ResolutionError || e instanceof InvalidScanRequestError) {
      err(`[portprobe] Error: ${e.message}`)
      return 1
    }
    throw e
  }

  out('')
  out(formatSummary(report))
  out('')
  formatResults(report.results, args['only-open'] === 'true').forEach(line => out(line))

  if (args['no-save'] !== 'true') {
    const files = await saveReports(report.results, args['output'] || 'scan', args['output-dir'] || config.outputDir)
    out('')
    out(`[+] Reports saved to ${files.json} and ${files.csv}`)
  }

  return 0
}
