import type { Server as HttpServer } from 'node:http'
import express from 'express'
import type { Express, Request, Response } from 'express'
import { z } from 'zod'
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js'
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'
import type { DependencyContainer } from './server/dependency-container.js'
import type { ProxyFacade } from './server/proxy-facade.js'
import { Logger } from './utils/logger.js'
import { isAppError } from './utils/errors.js'

export const SERVER_NAME = 'mcp-context-proxy'
export const SERVER_VERSION = process.env.APP_VERSION ?? '0.1.0'

export function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value ?? null, null, 2) }] }
}

export function errorResult(err: unknown): CallToolResult {
  const error = isAppError(err)
    ? { code: err.code ?? 'INTERNAL_ERROR', message: err.message, details: err.details }
    : { code: 'INTERNAL_ERROR', message: err instanceof Error ? err.message : String(err) }
  return { content: [{ type: 'text', text: JSON.stringify({ error }, null, 2) }], isError: true }
}

async function run(tool: string, fn: () => Promise<unknown> | unknown): Promise<CallToolResult> {
  try {
    return jsonResult(await fn())
  } catch (err) {
    Logger.warn('Tool execution failed', { tool, error: err })
    return errorResult(err)
  }
}

/** Registers the proxy's tools on an SDK server. */
export function createMcpServer(facade: ProxyFacade): McpServer {
  const mcpServer = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION }, { capabilities: { tools: {} } })

  mcpServer.tool('list_contexts', 'List configured contexts and whether each has a live backend session', async () =>
    run('list_contexts', () => facade.listContexts())
  )

  mcpServer.tool(
    'switch_context',
    'Make a context current, starting its backend if needed, and list its tools',
    { context_name: z.string().min(1).describe('Name of a configured context') },
    async ({ context_name }) => run('switch_context', () => facade.switchContext(context_name))
  )

  mcpServer.tool('get_current_context', 'Describe the current context and the names of its tools', async () =>
    run('get_current_context', () => facade.getCurrentContext())
  )

  mcpServer.tool(
    'proxy_tool',
    'Call a tool on the current context backend',
    {
      tool_name: z.string().min(1).describe('Tool exposed by the current backend'),
      arguments: z.record(z.unknown()).optional().describe('Arguments passed to the tool'),
    },
    async ({ tool_name, arguments: args }) => run('proxy_tool', () => facade.invokeTool(tool_name, args ?? {}))
  )

  mcpServer.tool(
    'list_proxied_tools',
    'List the tools of the current context backend with their input schemas',
    { refresh: z.boolean().optional().describe('Discard the cached tool list first') },
    async ({ refresh }) => run('list_proxied_tools', () => facade.listAvailableTools(refresh ?? false))
  )

  return mcpServer
}

export async function startStdio(container: DependencyContainer): Promise<McpServer> {
  const mcpServer = createMcpServer(container.facade)
  await mcpServer.connect(new StdioServerTransport())
  Logger.info('MCP server listening on stdio', { name: SERVER_NAME, version: SERVER_VERSION })
  return mcpServer
}

/**
 * Express app serving MCP over streamable HTTP. Stateless: every POST gets its
 * own server and transport, while the context pool behind them is shared.
 */
export function createHttpApp(container: DependencyContainer): Express {
  const app = express()
  app.use(express.json())

  app.get('/health', (_req, res) => {
    res.json({
      ok: true,
      currentContext: container.pool.currentContext ?? null,
      sessions: container.pool.sessionCount,
      maxSessions: container.pool.maxSessions,
    })
  })

  app.get('/contexts', (_req, res) => {
    res.json({ contexts: container.facade.listContexts() })
  })

  app.post('/mcp', async (req: Request, res: Response) => {
    const mcpServer = createMcpServer(container.facade)
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined })
    res.on('close', () => {
      Promise.all([transport.close(), mcpServer.close()]).catch((err) =>
        Logger.debug('Error closing HTTP MCP transport', { error: err })
      )
    })
    try {
      await mcpServer.connect(transport)
      await transport.handleRequest(req, res, req.body)
    } catch (error) {
      Logger.error('MCP request handling failed', { error })
      if (!res.headersSent) {
        res.status(500).json({ jsonrpc: '2.0', error: { code: -32603, message: 'Internal server error' }, id: null })
      }
    }
  })

  const notAllowed = (_req: Request, res: Response) => {
    res.status(405).json({ jsonrpc: '2.0', error: { code: -32000, message: 'Method not allowed.' }, id: null })
  }
  app.get('/mcp', notAllowed)
  app.delete('/mcp', notAllowed)

  return app
}

export async function startHttp(container: DependencyContainer, port: number): Promise<HttpServer> {
  const app = createHttpApp(container)
  return new Promise<HttpServer>((resolve, reject) => {
    const server = app.listen(port, () => {
      Logger.info('MCP server listening on HTTP', { url: `http://localhost:${port}/mcp` })
      resolve(server)
    })
    server.once('error', reject)
  })
}
