import express from 'express'
import { createServer } from 'http'
import { Server as SocketIOServer } from 'socket.io'
import path from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import type { Logger } from '../utils/logger.js'
import { VERSION } from '../utils/version.js'
import { InvalidScanRequestError, ResolutionError } from '../scanner/errors.js'
import { openOnly, runScan, type ScanOptions, type ScanReport } from '../scanner/scan-report.js'
import { reportFileNames, toCsv, toJsonDocument } from '../report/writer.js'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

export type ScanRunner = (options: ScanOptions, logger: Logger) => Promise<ScanReport>

export interface ScanDefaults {
  ports: string
  timeout: number // seconds
  bannerTimeout: number // seconds
  concurrency: number
}

export interface ScanUIState {
  version: string
  scanning: boolean
  lastError: string | null
  report: ScanReport | null
  defaults: ScanDefaults
}

export interface ScanUIServerOptions {
  defaults: ScanDefaults
  runner?: ScanRunner
}

const scanBodySchema = z.object({
  target: z.string().trim().min(1, 'target is required'),
  ports: z.string().nullish(),
  timeout: z.coerce.number().positive().optional(),
  bannerTimeout: z.coerce.number().positive().optional(),
  concurrency: z.coerce.number().int().min(1).optional(),
})

const downloadFormatSchema = z.enum(['json', 'csv'])

function isTruthy(value: unknown): boolean {
  return value === 'true' || value === '1'
}

function prefixParam(value: unknown): string {
  if (typeof value !== 'string') return 'scan'
  // Keep the download name a plain file name
  const cleaned = value.replace(/[^A-Za-z0-9._-]/g, '_').slice(0, 64)
  return cleaned || 'scan'
}

export class ScanUIServer {
  private app: express.Application
  private httpServer: ReturnType<typeof createServer>
  private io: SocketIOServer
  private logger: Logger
  private state: ScanUIState
  private port: number
  private runner: ScanRunner

  constructor(port: number, logger: Logger, options: ScanUIServerOptions) {
    this.port = port
    this.logger = logger
    this.runner = options.runner ?? runScan
    this.app = express()
    this.httpServer = createServer(this.app)
    this.io = new SocketIOServer(this.httpServer)

    this.state = {
      version: VERSION,
      scanning: false,
      lastError: null,
      report: null,
      defaults: options.defaults,
    }

    this.setupRoutes()
    this.setupSocketIO()
  }

  private setupRoutes(): void {
    // Same relative location from src/ui and dist/ui
    const publicPath = path.resolve(__dirname, '..', '..', 'public')
    this.app.use(express.json())
    this.app.use(express.static(publicPath))

    this.app.get('/api/status', (_req, res) => {
      res.json(this.state)
    })

    this.app.post('/api/scan', (req, res, next) => {
      this.handleScan(req.body, res).catch(next)
    })

    this.app.get('/api/results', (req, res) => {
      const report = this.state.report
      if (!report) {
        res.json({ report: null, results: [] })
        return
      }
      const results = isTruthy(req.query.onlyOpen) ? openOnly(report.results) : report.results
      res.json({
        target: report.target,
        address: report.address,
        finishedAt: report.finishedAt,
        results,
      })
    })

    this.app.get('/api/download/:format', (req, res) => {
      const format = downloadFormatSchema.safeParse(req.params.format)
      if (!format.success) {
        res.status(400).json({ error: `Unknown format: ${req.params.format}` })
        return
      }
      const report = this.state.report
      if (!report) {
        res.status(404).json({ error: 'No scan results yet' })
        return
      }

      const names = reportFileNames(prefixParam(req.query.prefix))
      if (format.data === 'json') {
        res.attachment(names.json)
        res.type('application/json')
        res.send(toJsonDocument(report))
        return
      }

      const rows = isTruthy(req.query.onlyOpen) ? openOnly(report.results) : report.results
      res.attachment(names.csv)
      res.type('text/csv')
      res.send(toCsv(rows))
    })

    // Fallback to index.html for SPA routing
    this.app.get('*', (_req, res) => {
      res.sendFile(path.join(publicPath, 'index.html'))
    })

    this.app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      this.logger.error(err instanceof Error ? err : String(err))
      res.status(500).json({ error: 'Internal error' })
    })
  }

  private async handleScan(body: unknown, res: express.Response): Promise<void> {
    const parsed = scanBodySchema.safeParse(body)
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ') })
      return
    }
    if (this.state.scanning) {
      res.status(409).json({ error: 'A scan is already running' })
      return
    }

    const { defaults } = this.state
    const options: ScanOptions = {
      target: parsed.data.target,
      ports: parsed.data.ports ?? defaults.ports,
      timeout: parsed.data.timeout ?? defaults.timeout,
      bannerTimeout: parsed.data.bannerTimeout ?? defaults.bannerTimeout,
      concurrency: parsed.data.concurrency ?? defaults.concurrency,
    }

    this.setScanning(true)
    try {
      const report = await this.runner(options, this.logger)
      this.state.report = report
      this.state.lastError = null
      this.io.emit('report', report)
      res.json(report)
    } catch (err) {
      if (err instanceof ResolutionError || err instanceof InvalidScanRequestError) {
        this.state.report = null
        this.state.lastError = err.message
        this.logger.warn(`UI scan rejected: ${err.message}`)
        this.io.emit('scan_error', { error: err.message })
        res.status(err instanceof ResolutionError ? 422 : 400).json({ error: err.message })
        return
      }
      throw err
    } finally {
      this.setScanning(false)
    }
  }

  private setScanning(scanning: boolean): void {
    this.state.scanning = scanning
    this.io.emit('scanning', scanning)
  }

  private setupSocketIO(): void {
    this.io.on('connection', (socket) => {
      this.logger.debug(`UI client connected: ${socket.id}`)

      socket.emit('state', this.state)

      socket.on('disconnect', () => {
        this.logger.debug(`UI client disconnected: ${socket.id}`)
      })
    })
  }

  getState(): Readonly<ScanUIState> {
    return this.state
  }

  /**
   * Port actually bound; differs from the configured one when started on port 0
   */
  getPort(): number {
    const address = this.httpServer.address()
    if (address && typeof address === 'object') {
      return address.port
    }
    return this.port
  }

  async start(): Promise<void> {
    return new Promise((resolve) => {
      this.httpServer.listen(this.port, '127.0.0.1', () => {
        this.logger.info(`Scanner UI available at http://localhost:${this.getPort()}`)
        resolve()
      })
    })
  }

  // Closing socket.io also closes the underlying http server
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.io.close((err) => {
        if (err) reject(err)
        else resolve()
      }).catch(reject)
    })
  }
}
