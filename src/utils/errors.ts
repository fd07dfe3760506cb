/**
 * Standardized error types and helpers.
 */

export type ErrorSeverity = 'fatal' | 'error' | 'warn'

export interface SerializedError {
  name: string
  message: string
  code?: string
  status?: number
  severity?: ErrorSeverity
  details?: unknown
  stack?: string
  cause?: SerializedError
}

export interface AppErrorOptions {
  code?: string
  status?: number
  severity?: ErrorSeverity
  details?: unknown
  cause?: unknown
}

export class AppError extends Error {
  code?: string
  status?: number
  severity: ErrorSeverity
  details?: unknown
  override cause?: unknown

  constructor(message: string, opts?: AppErrorOptions) {
    super(message)
    this.name = this.constructor.name
    this.code = opts?.code
    this.status = opts?.status
    this.severity = opts?.severity ?? 'error'
    this.details = opts?.details
    this.cause = opts?.cause
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, { code: 'CONFIG_ERROR', status: 500, details, severity: 'fatal' })
  }
}

export class UnknownContextError extends AppError {
  constructor(readonly contextName: string) {
    super(`Unknown context: ${contextName}`, { code: 'UNKNOWN_CONTEXT', status: 404, severity: 'warn' })
  }
}

export class UnknownServerError extends AppError {
  constructor(readonly serverName: string, contextName?: string) {
    super(`Unknown server: ${serverName}`, {
      code: 'UNKNOWN_SERVER',
      status: 404,
      details: contextName ? { context: contextName } : undefined,
    })
  }
}

export class NoActiveContextError extends AppError {
  constructor() {
    super('No active context. Use switch_context first.', { code: 'NO_ACTIVE_CONTEXT', status: 409, severity: 'warn' })
  }
}

export class SpawnError extends AppError {
  constructor(command: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : cause === undefined ? 'unknown error' : String(cause)
    super(`Failed to launch backend "${command}": ${reason}`, {
      code: 'SPAWN_FAILED',
      status: 502,
      details: { command },
      cause,
    })
  }
}

export class WriteError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'WRITE_FAILED', status: 502, cause })
  }
}

/** The backend answered a tool call with an `error` member; `details` holds it verbatim. */
export class ToolInvocationError extends AppError {
  constructor(readonly toolName: string, readonly payload: unknown) {
    super(`Tool ${toolName} failed: ${describePayload(payload)}`, { code: 'TOOL_ERROR', status: 502, details: payload })
  }
}

export class NoResponseError extends AppError {
  constructor(toolName: string, timeoutMs: number) {
    super(`No response from backend for tool ${toolName} within ${timeoutMs}ms`, {
      code: 'NO_RESPONSE',
      status: 504,
      details: { tool: toolName, timeoutMs },
    })
  }
}

export class PoolClosedError extends AppError {
  constructor(contextName: string) {
    super(`Context pool is shut down; not starting ${contextName}`, {
      code: 'POOL_CLOSED',
      status: 503,
      details: { contextName },
    })
  }
}

function describePayload(payload: unknown): string {
  if (payload && typeof payload === 'object' && 'message' in payload && typeof payload.message === 'string') {
    return payload.message
  }
  try {
    return JSON.stringify(payload)
  } catch {
    return String(payload)
  }
}

export function serializeError(err: unknown): SerializedError {
  if (err instanceof AppError) {
    return {
      name: err.name,
      message: err.message,
      code: err.code,
      status: err.status,
      severity: err.severity,
      details: err.details,
      stack: err.stack,
      cause: err.cause ? serializeError(err.cause) : undefined,
    }
  }
  if (err instanceof Error) {
    return {
      name: err.name,
      message: err.message,
      stack: err.stack,
    }
  }
  return { name: 'Error', message: String(err) }
}

export function isAppError(e: unknown): e is AppError {
  return e instanceof AppError
}
