import type { JsonObject, ToolDescriptor } from '../types/mcp.js'
import type { ContextSummary } from '../types/server.js'
import type { ContextPool } from '../modules/context-pool.js'
import { Logger } from '../utils/logger.js'

export interface SwitchResult {
  context: string
  server: string
  description?: string
  env: Record<string, string>
  toolsAvailable: number
  tools: { name: string; description?: string }[]
}

export type CurrentContextResult =
  | { context: null; message: string }
  | {
      context: string
      server: string
      description?: string
      env: Record<string, string>
      toolsAvailable: number
      toolNames: string[]
    }

/** The operations a client sees; shapes results for the MCP tools. */
export class ProxyFacade {
  constructor(private readonly pool: ContextPool) {}

  listContexts(): ContextSummary[] {
    return this.pool.describe()
  }

  async switchContext(contextName: string): Promise<SwitchResult> {
    const info = await this.pool.activate(contextName)
    return {
      context: info.context,
      server: info.server,
      description: info.description,
      env: info.env,
      toolsAvailable: info.tools.length,
      tools: info.tools.map((t) => ({ name: t.name, description: t.description })),
    }
  }

  async getCurrentContext(): Promise<CurrentContextResult> {
    const current = this.pool.currentContext
    if (current === undefined) return { context: null, message: 'No context active' }
    const tools = await this.pool.listTools(current)
    const details = this.pool.contextDetails(current)
    return {
      context: details.context,
      server: details.server,
      description: details.description,
      env: details.env,
      toolsAvailable: tools.length,
      toolNames: tools.map((t) => t.name),
    }
  }

  async invokeTool(toolName: string, args: JsonObject = {}): Promise<unknown> {
    const done = Logger.time('proxy_tool', { tool: toolName, contextName: this.pool.currentContext })
    try {
      return await this.pool.invoke(toolName, args)
    } finally {
      done()
    }
  }

  async listAvailableTools(refresh = false): Promise<ToolDescriptor[]> {
    const current = this.pool.currentContext
    if (current === undefined) return []
    if (refresh) await this.pool.invalidateTools(current)
    const tools = await this.pool.listTools(current)
    return tools.map((t) => ({ name: t.name, description: t.description, inputSchema: t.inputSchema }))
  }
}
