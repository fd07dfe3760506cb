import type { ClientInfo, JsonObject, JsonRpcNotification, JsonRpcRequest, ToolDescriptor } from '../types/mcp.js'
import { isRecord } from '../utils/validation.js'
import { Logger } from '../utils/logger.js'

export const PROTOCOL_VERSION = '2025-06-18'

export const DefaultClientInfo: ClientInfo = {
  name: 'mcp-context-proxy',
  version: process.env.APP_VERSION ?? '0.1.0',
}

export function handshake(id: number, clientInfo: ClientInfo = DefaultClientInfo): JsonRpcRequest {
  return {
    jsonrpc: '2.0',
    id,
    method: 'initialize',
    params: {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: { ...clientInfo },
    },
  }
}

// Backends reject requests until they see this after the initialize response.
export function initializedNotification(): JsonRpcNotification {
  return { jsonrpc: '2.0', method: 'notifications/initialized' }
}

export function listToolsRequest(id: number): JsonRpcRequest {
  return { jsonrpc: '2.0', id, method: 'tools/list', params: {} }
}

export function callToolRequest(id: number, name: string, args: JsonObject): JsonRpcRequest {
  return { jsonrpc: '2.0', id, method: 'tools/call', params: { name, arguments: args } }
}

/** Extracts tool descriptors from a `tools/list` result, skipping malformed entries. */
export function parseTools(result: unknown): ToolDescriptor[] {
  if (!isRecord(result) || !Array.isArray(result.tools)) return []
  const tools: ToolDescriptor[] = []
  for (const entry of result.tools) {
    if (!isRecord(entry) || typeof entry.name !== 'string') {
      Logger.debug('Skipping malformed tool entry', { entry })
      continue
    }
    const tool: ToolDescriptor = { name: entry.name }
    if (typeof entry.description === 'string') tool.description = entry.description
    if (entry.inputSchema !== undefined) tool.inputSchema = entry.inputSchema
    tools.push(tool)
  }
  return tools
}
