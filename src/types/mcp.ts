// JSON-RPC 2.0 shapes spoken with backends over newline-delimited stdio.

export type JsonObject = Record<string, unknown>

export type JsonRpcRequest = {
  jsonrpc: '2.0'
  id: number
  method: string
  params: JsonObject
}

export type JsonRpcNotification = {
  jsonrpc: '2.0'
  method: string
  params?: JsonObject
}

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification

export interface JsonRpcResponse {
  jsonrpc?: string
  id: number
  result?: unknown
  error?: unknown
}

export interface ToolDescriptor {
  name: string
  description?: string
  inputSchema?: unknown
}

export interface ClientInfo {
  name: string
  version: string
}
