import type { LogLevel } from '../utils/logger.js'

/** The configuration document as found on disk, after schema validation. */
export interface ProxyConfig {
  defaults?: Record<string, string>
  servers?: Record<string, ServerConfig>
  contexts?: Record<string, ContextConfig>
  current_context?: string
  pool?: PoolConfig
  logging?: LoggingConfig
  hosting?: HostingConfig
}

export interface ServerConfig {
  command: string
  args?: string[]
}

export interface ContextConfig {
  server: string
  env?: Record<string, string>
  description?: string
}

// Durations accept milliseconds or strings such as "30s".
export interface PoolConfig {
  max_sessions?: number
  list_timeout?: number | string
  call_timeout?: number | string
  spawn_timeout?: number | string
  request_pacing?: number | string
  grace_period?: number | string
  kill_period?: number | string
}

export interface LoggingConfig {
  level?: LogLevel
  json?: boolean
}

export type TransportKind = 'stdio' | 'http'

export interface HostingConfig {
  transport?: TransportKind
  port?: number
}

/** Pool settings after defaults are applied, all durations in milliseconds. */
export interface PoolSettings {
  maxSessions: number
  listTimeoutMs: number
  callTimeoutMs: number
  spawnTimeoutMs: number
  requestPacingMs: number
  gracePeriodMs: number
  killPeriodMs: number
}

/** Fully-defaulted configuration handed to the pool and the shell. */
export interface ResolvedConfig {
  defaults: Record<string, string>
  servers: Record<string, Required<ServerConfig>>
  contexts: Record<string, ContextConfig & { env: Record<string, string> }>
  currentContext?: string
  pool: PoolSettings
  logging: Required<LoggingConfig>
  hosting: Required<HostingConfig>
}

export const DefaultPoolSettings: PoolSettings = {
  maxSessions: 5,
  listTimeoutMs: 30_000,
  callTimeoutMs: 120_000,
  spawnTimeoutMs: 10_000,
  requestPacingMs: 10,
  gracePeriodMs: 2_000,
  killPeriodMs: 2_000,
}

export const DefaultHostingConfig: Required<HostingConfig> = {
  transport: 'stdio',
  port: 3000,
}
