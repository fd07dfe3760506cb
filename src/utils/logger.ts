export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'

export interface LogFields {
  [key: string]: unknown
  contextName?: string
}

interface LoggerOptions {
  level?: LogLevel
  json?: boolean
  base?: LogFields
}

export interface ScopedLogger {
  trace(message: string, fields?: LogFields | unknown): void
  debug(message: string, fields?: LogFields | unknown): void
  info(message: string, fields?: LogFields | unknown): void
  warn(message: string, fields?: LogFields | unknown): void
  error(message: string, fields?: LogFields | unknown): void
  fatal(message: string, fields?: LogFields | unknown): void
  with(fields: LogFields): ScopedLogger
}

const LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal']

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some((level) => level === value)
}

/**
 * Structured, context-aware logger with JSON output support and timing
 * utilities. Everything is written to stderr: stdout belongs to the MCP stdio
 * transport.
 */
export class Logger {
  private static level: LogLevel = ((): LogLevel => {
    const raw = (process.env.LOG_LEVEL || process.env.NODE_LOG_LEVEL || 'info').toLowerCase()
    return isLogLevel(raw) ? raw : 'info'
  })()

  private static json: boolean = ((): boolean => {
    const raw = process.env.LOG_FORMAT || process.env.LOG_JSON
    if (!raw) return process.env.NODE_ENV === 'production'
    return raw.toLowerCase() === 'true' || raw.toLowerCase() === 'json'
  })()

  private static base: LogFields = {}

  static configure(opts: LoggerOptions): void {
    if (opts.level) this.level = opts.level
    if (typeof opts.json === 'boolean') this.json = opts.json
    if (opts.base) this.base = { ...this.base, ...sanitizeFields(opts.base) }
  }

  /** Returns a logger that adds `fields` to every entry it writes. */
  static with(fields: LogFields): ScopedLogger {
    return scoped(sanitizeFields(fields))
  }

  static getLevel(): LogLevel {
    return this.level
  }

  static isJSON(): boolean {
    return this.json
  }

  static trace(message: string, fields?: LogFields | unknown): void {
    this.write('trace', message, fieldsToLogFields(fields))
  }
  static debug(message: string, fields?: LogFields | unknown): void {
    this.write('debug', message, fieldsToLogFields(fields))
  }
  static info(message: string, fields?: LogFields | unknown): void {
    this.write('info', message, fieldsToLogFields(fields))
  }
  static warn(message: string, fields?: LogFields | unknown): void {
    this.write('warn', message, fieldsToLogFields(fields))
  }
  static error(message: string, fields?: LogFields | unknown): void {
    this.write('error', message, fieldsToLogFields(fields))
  }
  static fatal(message: string, fields?: LogFields | unknown): void {
    this.write('fatal', message, fieldsToLogFields(fields))
  }

  /**
   * Session lifecycle events (spawn, evict, close) share one message so they
   * can be filtered together.
   */
  static logSessionEvent(event: string, contextName: string, fields?: LogFields): void {
    this.info('session_event', { event, contextName, ...(fields ?? {}) })
  }

  /**
   * Starts a performance timer, returning a function to log completion.
   *
   * const done = Logger.time('exchange', { contextName })
   * ...work...
   * done({ responses: 2 })
   */
  static time(name: string, fields?: LogFields): (extra?: LogFields) => void {
    const start = performance.now()
    const base = { name, ...(fields ? sanitizeFields(fields) : {}) }
    return (extra?: LogFields) => {
      const durationMs = Math.max(0, Math.round(performance.now() - start))
      this.debug('perf', { ...base, ...(extra ? sanitizeFields(extra) : {}), durationMs })
    }
  }

  static write(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.levelAllowed(level)) return
    const entry: LogFields = {
      ts: new Date().toISOString(),
      level,
      msg: message,
      ...this.base,
      ...(fields ? sanitizeFields(fields) : {}),
    }
    // eslint-disable-next-line no-console
    console.error(this.json ? JSON.stringify(entry) : formatHuman(entry))
  }

  private static levelAllowed(check: LogLevel): boolean {
    return LEVELS.indexOf(check) >= LEVELS.indexOf(this.level)
  }
}

function scoped(base: LogFields): ScopedLogger {
  const emit = (level: LogLevel) => (message: string, fields?: LogFields | unknown) =>
    Logger.write(level, message, { ...base, ...(fieldsToLogFields(fields) ?? {}) })
  return {
    trace: emit('trace'),
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    fatal: emit('fatal'),
    with: (fields: LogFields) => scoped({ ...base, ...sanitizeFields(fields) }),
  }
}

function sanitizeFields(fields: LogFields): LogFields {
  const out: LogFields = {}
  for (const [k, v] of Object.entries(fields)) {
    if (v === undefined) continue
    if (v instanceof Error) {
      out[k] = { name: v.name, message: v.message, stack: v.stack }
    } else if (typeof v === 'object' && v !== null) {
      try {
        // Avoid circular structures
        out[k] = JSON.parse(JSON.stringify(v))
      } catch {
        out[k] = String(v)
      }
    } else {
      out[k] = v
    }
  }
  return out
}

function formatHuman(entry: LogFields): string {
  const { ts, level, msg, ...rest } = entry
  const head = `[${String(level).toUpperCase()}] ${String(ts)} ${String(msg)}`
  if (Object.keys(rest).length === 0) return head
  return `${head} ${safeStringify(rest)}`
}

function safeStringify(obj: unknown): string {
  try {
    return JSON.stringify(obj)
  } catch {
    return '[object]'
  }
}

function fieldsToLogFields(f?: LogFields | unknown): LogFields | undefined {
  if (f === undefined || f === null) return undefined
  if (f instanceof Error) return { error: f }
  if (typeof f === 'object') return { ...f }
  return { detail: f }
}
