import winston from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import path from 'path'

export type Logger = winston.Logger

export const LOG_FILE_PATTERN = 'portprobe-%DATE%.log'

interface LogLine {
  level: string
  message: unknown
  timestamp?: unknown
  stack?: unknown
}

// Stack traces replace the message when an Error was logged
export function formatLogLine({ level, message, timestamp, stack }: LogLine): string {
  const body = typeof stack === 'string' && stack.length > 0 ? stack : String(message)
  return timestamp === undefined ? `${level} ${body}` : `${String(timestamp)} ${level} ${body}`
}

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(info => formatLogLine({ ...info, level: `[${info.level.toUpperCase()}]` }))
)

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(info => formatLogLine({ ...info, level: `${info.level}:` }))
)

export function createLogger(level: string = 'info', logDir: string = './logs'): Logger {
  return winston.createLogger({
    level,
    format: fileFormat,
    exitOnError: false,
    transports: [
      // stdout carries the result table only
      new winston.transports.Console({
        format: consoleFormat,
        stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
      }),
      new DailyRotateFile({
        dirname: logDir,
        filename: LOG_FILE_PATTERN,
        datePattern: 'YYYY-MM-DD',
        maxSize: '10m',
        maxFiles: '7d',
        zippedArchive: true,
        format: fileFormat,
      }),
    ],
  })
}

/**
 * Logger that drops everything; the default when the scanner is used as a
 * library.
 */
export function createQuietLogger(): Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console()],
  })
}

export function getLogDirectory(customDir?: string): string {
  return customDir ? path.resolve(customDir) : path.resolve(process.cwd(), 'logs')
}
