import type { ContextConfig, ProxyConfig, ResolvedConfig, ServerConfig } from '../types/config.js'
import { DefaultHostingConfig, DefaultPoolSettings } from '../types/config.js'
import type { LaunchSpec } from '../types/server.js'
import { ConfigLoader, type LoadOptions } from '../config/config-loader.js'
import { Logger } from '../utils/logger.js'
import { UnknownContextError, UnknownServerError } from '../utils/errors.js'
import { toMilliseconds } from '../utils/time.js'

export class ConfigManager {
  private config: ResolvedConfig | null = null
  private source?: string

  constructor(private readonly options: LoadOptions = {}) {}

  async load(): Promise<ResolvedConfig> {
    const { config, source } = await ConfigLoader.load(this.options)
    this.config = ConfigManager.applyDefaults(config)
    this.source = source
    Logger.configure({ level: this.config.logging.level, json: this.config.logging.json })
    Logger.info('Configuration ready', {
      source,
      contexts: Object.keys(this.config.contexts),
      maxSessions: this.config.pool.maxSessions,
      transport: this.config.hosting.transport,
    })
    return this.config
  }

  getConfig(): ResolvedConfig {
    if (!this.config) throw new Error('Config not loaded')
    return this.config
  }

  getSource(): string | undefined {
    return this.source
  }

  static applyDefaults(cfg: ProxyConfig): ResolvedConfig {
    const servers: ResolvedConfig['servers'] = {}
    for (const [name, s] of Object.entries(cfg.servers ?? {})) {
      servers[name] = normalizeServer(s)
    }
    const contexts: ResolvedConfig['contexts'] = {}
    for (const [name, c] of Object.entries(cfg.contexts ?? {})) {
      contexts[name] = normalizeContext(c)
    }
    const pool = cfg.pool ?? {}
    const d = DefaultPoolSettings
    return {
      defaults: { ...(cfg.defaults ?? {}) },
      servers,
      contexts,
      currentContext: cfg.current_context && Object.hasOwn(contexts, cfg.current_context) ? cfg.current_context : undefined,
      pool: {
        maxSessions: pool.max_sessions ?? d.maxSessions,
        listTimeoutMs: toMilliseconds(pool.list_timeout, d.listTimeoutMs),
        callTimeoutMs: toMilliseconds(pool.call_timeout, d.callTimeoutMs),
        spawnTimeoutMs: toMilliseconds(pool.spawn_timeout, d.spawnTimeoutMs),
        requestPacingMs: toMilliseconds(pool.request_pacing, d.requestPacingMs),
        gracePeriodMs: toMilliseconds(pool.grace_period, d.gracePeriodMs),
        killPeriodMs: toMilliseconds(pool.kill_period, d.killPeriodMs),
      },
      logging: {
        level: cfg.logging?.level ?? Logger.getLevel(),
        json: cfg.logging?.json ?? Logger.isJSON(),
      },
      hosting: {
        transport: cfg.hosting?.transport ?? DefaultHostingConfig.transport,
        port: cfg.hosting?.port ?? DefaultHostingConfig.port,
      },
    }
  }

  /**
   * Effective environment for a context: the base environment, then the
   * document's defaults, then the context's own overrides.
   */
  static buildEnvironment(
    config: ResolvedConfig,
    contextName: string,
    base: Record<string, string | undefined> = process.env
  ): Record<string, string> {
    if (!Object.hasOwn(config.contexts, contextName)) throw new UnknownContextError(contextName)
    const context = config.contexts[contextName]
    const env: Record<string, string> = {}
    for (const [k, v] of Object.entries(base)) if (v !== undefined) env[k] = v
    return { ...env, ...config.defaults, ...context.env }
  }

  static resolveLaunch(
    config: ResolvedConfig,
    contextName: string,
    base: Record<string, string | undefined> = process.env
  ): LaunchSpec {
    if (!Object.hasOwn(config.contexts, contextName)) throw new UnknownContextError(contextName)
    const context = config.contexts[contextName]
    if (!Object.hasOwn(config.servers, context.server)) throw new UnknownServerError(context.server, contextName)
    const server = config.servers[context.server]
    return {
      command: server.command,
      args: [...server.args],
      env: ConfigManager.buildEnvironment(config, contextName, base),
    }
  }
}

function normalizeServer(s: ServerConfig): Required<ServerConfig> {
  return { command: s.command, args: s.args ?? [] }
}

function normalizeContext(c: ContextConfig): ResolvedConfig['contexts'][string] {
  return { server: c.server, env: { ...(c.env ?? {}) }, ...(c.description !== undefined ? { description: c.description } : {}) }
}
