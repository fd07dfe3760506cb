import { ConfigManager } from './config-manager.js'
import { ProxyFacade } from './proxy-facade.js'
import { ContextPool, type ContextPoolOptions } from '../modules/context-pool.js'
import type { LoadOptions } from '../config/config-loader.js'
import type { ResolvedConfig } from '../types/config.js'
import { Logger } from '../utils/logger.js'

export interface ContainerOptions {
  config?: LoadOptions
  pool?: ContextPoolOptions
}

/** Wires configuration, the context pool and the facade together. */
export class DependencyContainer {
  readonly configManager: ConfigManager
  private _pool?: ContextPool
  private _facade?: ProxyFacade

  constructor(private readonly options: ContainerOptions = {}) {
    this.configManager = new ConfigManager(options.config)
  }

  async initialize(): Promise<void> {
    const config = await this.configManager.load()
    this._pool = new ContextPool(config, this.options.pool)
    this._facade = new ProxyFacade(this._pool)
    Logger.debug('Dependency container initialized', { currentContext: config.currentContext })
  }

  get pool(): ContextPool {
    if (!this._pool) throw new Error('DependencyContainer not initialized')
    return this._pool
  }

  get facade(): ProxyFacade {
    if (!this._facade) throw new Error('DependencyContainer not initialized')
    return this._facade
  }

  getConfig(): ResolvedConfig {
    return this.configManager.getConfig()
  }

  async shutdown(): Promise<void> {
    await this._pool?.shutdown()
  }
}
