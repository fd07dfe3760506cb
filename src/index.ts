#!/usr/bin/env node
import 'dotenv/config'
import type { Server as HttpServer } from 'node:http'
import { realpathSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { DependencyContainer, type ContainerOptions } from './server/dependency-container.js'
import { SERVER_NAME, SERVER_VERSION, startHttp, startStdio } from './mcp-server.js'
import { Logger } from './utils/logger.js'

export interface RunningServer {
  name: string
  version: string
  container: DependencyContainer
  stop: () => Promise<void>
}

export interface CreateServerOptions extends ContainerOptions {
  // Install SIGINT/SIGTERM handlers that stop the server and exit
  handleSignals?: boolean
}

export async function createServer(options: CreateServerOptions = {}): Promise<RunningServer> {
  const container = new DependencyContainer(options)
  await container.initialize()
  const { hosting } = container.getConfig()

  let mcpServer: McpServer | undefined
  let httpServer: HttpServer | undefined
  if (hosting.transport === 'http') httpServer = await startHttp(container, hosting.port)
  else mcpServer = await startStdio(container)

  let stopping: Promise<void> | undefined
  const server: RunningServer = {
    name: SERVER_NAME,
    version: SERVER_VERSION,
    container,
    stop: () => {
      stopping ??= (async () => {
        Logger.info('Stopping server')
        await mcpServer?.close()
        if (httpServer) {
          const http = httpServer
          await new Promise<void>((resolve) => http.close(() => resolve()))
        }
        await container.shutdown()
      })()
      return stopping
    },
  }

  if (options.handleSignals ?? true) {
    const onSignal = (signal: NodeJS.Signals) => {
      Logger.info('Received signal', { signal })
      server.stop().then(
        () => process.exit(0),
        (err) => {
          Logger.error('Shutdown failed', { error: err })
          process.exit(1)
        }
      )
    }
    process.once('SIGINT', onSignal)
    process.once('SIGTERM', onSignal)
  }

  return server
}

export default createServer

function isEntryPoint(): boolean {
  const entry = process.argv[1]
  if (!entry) return false
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url))
  } catch {
    return false
  }
}

if (isEntryPoint()) {
  createServer().catch((err) => {
    Logger.fatal('Failed to start server', { error: err })
    process.exit(1)
  })
}
