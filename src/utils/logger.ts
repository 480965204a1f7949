/**
 * Structured JSON logger shared by the helpers and the browser widgets.
 *
 * Usage:
 *   import { logger } from './logger.ts'
 *   logger.warn('Copy button click failed', { widget: 'copy' })
 *
 * Output (one JSON object per line, written through the console):
 *   {"timestamp":"2025-06-01T12:00:00.000Z","level":"warn","message":"Copy button click failed","widget":"copy"}
 *
 * Configure via the LOG_LEVEL env var where a `process` exists (default: "info").
 * Levels in ascending severity: debug, info, warn, error
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

function isLogLevel(raw: string): raw is LogLevel {
  return raw in LEVEL_PRIORITY
}

function resolveLevel(env: string | undefined): LogLevel {
  const raw = (env ?? 'info').toLowerCase()
  if (isLogLevel(raw)) return raw
  return 'info'
}

function envLevel(): string | undefined {
  return typeof process !== 'undefined' ? process.env.LOG_LEVEL : undefined
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  [key: string]: unknown
}

/** Turn thrown values into something JSON.stringify keeps. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`
  return String(err)
}

export class Logger {
  private threshold: number

  constructor(level?: LogLevel) {
    const effective = level ?? resolveLevel(envLevel())
    this.threshold = LEVEL_PRIORITY[effective]
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < this.threshold) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    }

    const line = JSON.stringify(entry)

    if (level === 'error') {
      console.error(line)
    } else if (level === 'warn') {
      console.warn(line)
    } else {
      console.log(line)
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context)
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context)
  }

  /** Create a child logger that injects fixed context fields into every log line. */
  child(defaults: Record<string, unknown>): ChildLogger {
    return new ChildLogger(this, defaults)
  }
}

export class ChildLogger {
  constructor(
    private parent: Logger,
    private defaults: Record<string, unknown>,
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.parent.debug(message, { ...this.defaults, ...context })
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.parent.info(message, { ...this.defaults, ...context })
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.parent.warn(message, { ...this.defaults, ...context })
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.parent.error(message, { ...this.defaults, ...context })
  }
}

/** Singleton logger instance for the toolbox. */
export const logger = new Logger()
