import type { JsonObject, ToolDescriptor } from './mcp.js'

export type ReceivedLine =
  | { kind: 'message'; message: JsonObject; line: string }
  | { kind: 'timeout' }
  | { kind: 'closed' }

/** One backend subprocess speaking newline-delimited JSON. */
export interface BackendTransport {
  readonly pid?: number
  readonly alive: boolean
  send(document: JsonObject): Promise<void>
  receiveLine(deadline: number, signal?: AbortSignal): Promise<ReceivedLine>
  close(gracePeriodMs: number, killPeriodMs: number): Promise<void>
}

export interface LaunchSpec {
  command: string
  args: string[]
  env: Record<string, string>
}

export type TransportFactory = (contextName: string, launch: LaunchSpec) => Promise<BackendTransport>

export interface ContextSummary {
  name: string
  server: string
  command: string
  env: Record<string, string>
  description?: string
  active: boolean
  loaded: boolean
  toolsCached: boolean
  toolCount: number
}

export interface ContextInfo {
  context: string
  server: string
  description?: string
  env: Record<string, string>
  tools: ToolDescriptor[]
}
