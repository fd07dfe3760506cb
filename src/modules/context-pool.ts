import type { PoolSettings, ResolvedConfig } from '../types/config.js'
import type { ClientInfo, JsonObject, JsonRpcResponse, ToolDescriptor } from '../types/mcp.js'
import type { BackendTransport, ContextInfo, ContextSummary, TransportFactory } from '../types/server.js'
import { SessionTransport } from './session-transport.js'
import { RpcCorrelator, isFailure } from './rpc-correlator.js'
import {
  DefaultClientInfo,
  callToolRequest,
  handshake,
  initializedNotification,
  listToolsRequest,
  parseTools,
} from './backend-protocol.js'
import { ConfigManager } from '../server/config-manager.js'
import { Logger } from '../utils/logger.js'
import { Mutex } from '../utils/mutex.js'
import {
  NoActiveContextError,
  NoResponseError,
  PoolClosedError,
  ToolInvocationError,
  UnknownContextError,
} from '../utils/errors.js'

export interface ContextPoolOptions {
  transportFactory?: TransportFactory
  correlator?: RpcCorrelator
  clientInfo?: ClientInfo
  // Base environment the context overrides are layered onto
  baseEnv?: Record<string, string | undefined>
}

interface ManagedSession {
  contextName: string
  transport: BackendTransport
  nextId: number
  // Undefined until a tools/list round trip succeeds
  tools?: ToolDescriptor[]
  createdAt: number
  // Held for the duration of every exchange on this session
  lock: Mutex
}

/**
 * Keeps at most `maxSessions` backend processes alive, one per context.
 *
 * The pool lock covers the session table and the current-context pointer,
 * including spawning so a context never gets two sessions. Exchanges run
 * under the owning session's lock only, so a slow backend stalls nothing but
 * its own context. When the pool is full the oldest session that is not the
 * current context is evicted; if the current context is the only candidate
 * the pool grows past its limit instead.
 */
export class ContextPool {
  private readonly sessions = new Map<string, ManagedSession>()
  private readonly lock = new Mutex()
  private readonly settings: PoolSettings
  private readonly openTransport: TransportFactory
  private readonly correlator: RpcCorrelator
  private readonly clientInfo: ClientInfo
  private readonly baseEnv?: Record<string, string | undefined>
  private current?: string
  // Set once by shutdown(); no session is started afterwards
  private closed = false

  constructor(private readonly config: ResolvedConfig, options: ContextPoolOptions = {}) {
    this.settings = config.pool
    this.current = config.currentContext
    this.clientInfo = options.clientInfo ?? DefaultClientInfo
    this.baseEnv = options.baseEnv
    this.correlator = options.correlator ?? new RpcCorrelator({ pacingMs: this.settings.requestPacingMs })
    this.openTransport =
      options.transportFactory ??
      ((contextName, launch) =>
        SessionTransport.open(launch.command, launch.args, launch.env, {
          spawnTimeoutMs: this.settings.spawnTimeoutMs,
          label: contextName,
        }))
  }

  get currentContext(): string | undefined {
    return this.current
  }

  get sessionCount(): number {
    return this.sessions.size
  }

  get maxSessions(): number {
    return this.settings.maxSessions
  }

  /** Contexts with a session in the table, oldest first. */
  liveContexts(): string[] {
    return [...this.sessions.keys()]
  }

  hasContext(contextName: string): boolean {
    return Object.hasOwn(this.config.contexts, contextName)
  }

  async activate(contextName: string): Promise<ContextInfo> {
    this.assertKnown(contextName)
    await this.ensureSession(contextName)
    const previous = await this.lock.runExclusive(() => {
      const prev = this.current
      this.current = contextName
      return prev
    })
    if (previous !== contextName) Logger.info('Switched context', { contextName, previous })
    const tools = await this.listTools(contextName)
    return { ...this.contextDetails(contextName), tools }
  }

  async listTools(contextName?: string): Promise<ToolDescriptor[]> {
    const name = contextName ?? this.current
    if (name === undefined) throw new NoActiveContextError()
    this.assertKnown(name)

    const session = await this.ensureSession(name)
    if (session.tools) return [...session.tools]

    return session.lock.runExclusive(async () => {
      // Another caller may have filled the cache while we waited
      if (session.tools) return [...session.tools]
      const tools = await this.fetchTools(session)
      if (!tools) return []
      session.tools = tools
      Logger.info('Cached backend tools', { contextName: name, count: tools.length })
      return [...tools]
    })
  }

  async invalidateTools(contextName: string): Promise<void> {
    this.assertKnown(contextName)
    await this.lock.runExclusive(() => {
      const session = this.sessions.get(contextName)
      if (session) session.tools = undefined
    })
  }

  async invoke(toolName: string, args: JsonObject = {}): Promise<unknown> {
    const name = this.current
    if (name === undefined) throw new NoActiveContextError()

    const session = await this.ensureSession(name)
    return session.lock.runExclusive(async () => {
      const initId = session.nextId++
      const callId = session.nextId++
      const timeoutMs = this.settings.callTimeoutMs
      const { responses } = await this.correlator.exchange(
        session.transport,
        [handshake(initId, this.clientInfo), initializedNotification(), callToolRequest(callId, toolName, args)],
        2,
        timeoutMs,
        name
      )
      this.checkHandshake(name, responses.get(initId))

      const response = responses.get(callId)
      if (!response) throw new NoResponseError(toolName, timeoutMs)
      if (isFailure(response)) {
        Logger.warn('Backend reported a tool error', { contextName: name, tool: toolName, error: response.error })
        throw new ToolInvocationError(toolName, response.error)
      }
      return response.result
    })
  }

  describe(): ContextSummary[] {
    return Object.entries(this.config.contexts).map(([name, ctx]) => {
      const server = Object.hasOwn(this.config.servers, ctx.server) ? this.config.servers[ctx.server] : undefined
      const session = this.sessions.get(name)
      const summary: ContextSummary = {
        name,
        server: ctx.server,
        command: server ? [server.command, ...server.args].join(' ') : 'unknown',
        env: { ...ctx.env },
        active: name === this.current,
        loaded: session !== undefined && session.transport.alive,
        toolsCached: session?.tools !== undefined,
        toolCount: session?.tools?.length ?? 0,
      }
      if (ctx.description !== undefined) summary.description = ctx.description
      return summary
    })
  }

  /** Configuration of one context, without touching its session. */
  contextDetails(contextName: string): Omit<ContextInfo, 'tools'> {
    this.assertKnown(contextName)
    const ctx = this.config.contexts[contextName]
    const details: Omit<ContextInfo, 'tools'> = { context: contextName, server: ctx.server, env: { ...ctx.env } }
    if (ctx.description !== undefined) details.description = ctx.description
    return details
  }

  async shutdown(): Promise<void> {
    const sessions = await this.lock.runExclusive(() => {
      this.closed = true
      const all = [...this.sessions.values()]
      this.sessions.clear()
      return all
    })
    if (sessions.length === 0) return
    Logger.info('Shutting down context pool', { sessions: sessions.length })
    await this.closeSessions(sessions)
  }

  private assertKnown(contextName: string): void {
    if (!this.hasContext(contextName)) throw new UnknownContextError(contextName)
  }

  private async ensureSession(contextName: string): Promise<ManagedSession> {
    const retired: ManagedSession[] = []
    try {
      return await this.lock.runExclusive(async () => {
        if (this.closed) throw new PoolClosedError(contextName)
        const existing = this.sessions.get(contextName)
        if (existing?.transport.alive) return existing
        if (existing) {
          Logger.logSessionEvent('session_lost', contextName, { pid: existing.transport.pid })
          this.sessions.delete(contextName)
          retired.push(existing)
        }

        const launch = ConfigManager.resolveLaunch(this.config, contextName, this.baseEnv)
        const transport = await this.openTransport(contextName, launch)
        retired.push(...this.evictForCapacity())

        const session: ManagedSession = { contextName, transport, nextId: 0, createdAt: Date.now(), lock: new Mutex() }
        this.sessions.set(contextName, session)
        Logger.logSessionEvent('session_started', contextName, {
          pid: transport.pid,
          sessions: this.sessions.size,
          maxSessions: this.settings.maxSessions,
        })
        return session
      })
    } finally {
      await this.closeSessions(retired)
    }
  }

  // Caller holds the pool lock.
  private evictForCapacity(): ManagedSession[] {
    const victims: ManagedSession[] = []
    while (this.sessions.size >= this.settings.maxSessions) {
      const candidate = [...this.sessions.keys()].find((name) => name !== this.current)
      if (candidate === undefined) {
        Logger.warn('Pool at capacity with only the current context live; not evicting', {
          current: this.current,
          sessions: this.sessions.size,
          maxSessions: this.settings.maxSessions,
        })
        break
      }
      const victim = this.sessions.get(candidate)
      this.sessions.delete(candidate)
      if (victim) {
        victims.push(victim)
        Logger.logSessionEvent('session_evicted', candidate, {
          pid: victim.transport.pid,
          ageMs: Date.now() - victim.createdAt,
        })
      }
    }
    return victims
  }

  private async closeSessions(sessions: ManagedSession[]): Promise<void> {
    const { gracePeriodMs, killPeriodMs } = this.settings
    const results = await Promise.allSettled(
      sessions.map((s) => s.lock.runExclusive(() => s.transport.close(gracePeriodMs, killPeriodMs)))
    )
    results.forEach((r, i) => {
      if (r.status === 'rejected') {
        Logger.warn('Error closing backend session', { contextName: sessions[i].contextName, error: r.reason })
      } else {
        Logger.logSessionEvent('session_closed', sessions[i].contextName)
      }
    })
  }

  // Caller holds the session lock.
  private async fetchTools(session: ManagedSession): Promise<ToolDescriptor[] | undefined> {
    const name = session.contextName
    const initId = session.nextId++
    const listId = session.nextId++
    try {
      const { responses } = await this.correlator.exchange(
        session.transport,
        [handshake(initId, this.clientInfo), initializedNotification(), listToolsRequest(listId)],
        2,
        this.settings.listTimeoutMs,
        name
      )
      this.checkHandshake(name, responses.get(initId))

      const response = responses.get(listId)
      if (!response) {
        Logger.warn('No tools/list response from backend; reporting no tools', {
          contextName: name,
          timeoutMs: this.settings.listTimeoutMs,
        })
        return undefined
      }
      if (isFailure(response)) {
        Logger.warn('Backend rejected tools/list; reporting no tools', { contextName: name, error: response.error })
        return undefined
      }
      return parseTools(response.result)
    } catch (err) {
      Logger.warn('Tool discovery failed; reporting no tools', { contextName: name, error: err })
      return undefined
    }
  }

  private checkHandshake(contextName: string, response: JsonRpcResponse | undefined): void {
    if (!response) Logger.debug('No initialize response from backend', { contextName })
    else if (isFailure(response)) Logger.warn('Backend rejected initialize', { contextName, error: response.error })
  }
}
