/**
 * Logger
 *
 * Structured logging with component context. Entries render as single-line
 * JSON for aggregation or as a readable line for development. Output goes
 * through a pluggable writer so embedding apps and tests can capture it.
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  component?: string
  reminderId?: string
  userId?: string
  error?: {
    name: string
    message: string
    code?: string
    stack?: string
  }
  metadata?: Record<string, unknown>
}

export interface LogContext {
  component?: string
  reminderId?: string
  userId?: string
}

export type LogWriter = (entry: LogEntry, rendered: string) => void

export interface LoggerOptions {
  level?: LogLevel
  json?: boolean
  context?: LogContext
  writer?: LogWriter
}

// ============================================================================
// Levels
// ============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS
}

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel]
}

// ============================================================================
// Rendering
// ============================================================================

function serializeError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
    return { name: error.name, message: error.message, code, stack: error.stack }
  }
  return { name: 'NonError', message: String(error) }
}

function renderPretty(entry: LogEntry): string {
  const component = entry.component ? `[${entry.component}]` : ''
  const reminder = entry.reminderId ? `(${entry.reminderId.slice(0, 8)})` : ''
  let line = `${entry.timestamp} ${entry.level.toUpperCase().padEnd(5)} ${component}${reminder} ${entry.message}`
  if (entry.metadata && Object.keys(entry.metadata).length > 0) {
    line += ` ${JSON.stringify(entry.metadata)}`
  }
  if (entry.error) {
    line += `\n  ${entry.error.name}: ${entry.error.message}`
  }
  return line
}

const consoleWriter: LogWriter = (entry, rendered) => {
  if (entry.level === 'error') console.error(rendered)
  else if (entry.level === 'warn') console.warn(rendered)
  else console.log(rendered)
}

// ============================================================================
// Logger
// ============================================================================

export class Logger {
  private readonly context: LogContext
  private readonly minLevel: LogLevel
  private readonly json: boolean
  private readonly writer: LogWriter

  constructor(options: LoggerOptions = {}) {
    this.context = options.context ?? {}
    this.minLevel = options.level ?? 'info'
    this.json = options.json ?? false
    this.writer = options.writer ?? consoleWriter
  }

  private log(level: LogLevel, message: string, extra: Partial<LogEntry>): void {
    if (!shouldLog(level, this.minLevel)) return
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...extra,
    }
    if (entry.metadata === undefined) delete entry.metadata
    if (entry.error === undefined) delete entry.error
    this.writer(entry, this.json ? JSON.stringify(entry) : renderPretty(entry))
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, { metadata })
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, { metadata })
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, { metadata })
  }

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.log('error', message, {
      metadata,
      error: error === undefined ? undefined : serializeError(error),
    })
  }

  /** Logger sharing this one's settings with extra context merged in. */
  child(context: LogContext): Logger {
    return new Logger({
      level: this.minLevel,
      json: this.json,
      writer: this.writer,
      context: { ...this.context, ...context },
    })
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options)
}

/** Logger that drops everything; default for embedded use without config. */
export function createSilentLogger(): Logger {
  return new Logger({ writer: () => {} })
}
