import fs from 'node:fs/promises'
import { existsSync } from 'node:fs'
import path from 'node:path'
import YAML from 'yaml'
import type { ProxyConfig } from '../types/config.js'
import { EnvironmentManager } from './environment-manager.js'
import { SchemaValidator } from './schema-validator.js'
import { Logger } from '../utils/logger.js'
import { ConfigError } from '../utils/errors.js'
import { isRecord, sanitizeObject } from '../utils/validation.js'

export type LoadOptions = {
  // Explicit path to the config file; overrides CLI, environment and search paths
  path?: string
  argv?: string[]
  env?: Record<string, string | undefined>
  cwd?: string
  homeDir?: string
}

export interface LoadedConfig {
  config: ProxyConfig
  // File the document came from, undefined when none was found
  source?: string
}

export class ConfigLoader {
  static async load(options: LoadOptions = {}): Promise<LoadedConfig> {
    const argv = options.argv ?? process.argv.slice(2)
    const env = options.env ?? process.env
    const cli = EnvironmentManager.parseCliArgs(argv)
    const explicit = options.path ?? EnvironmentManager.getExplicitConfigPath(argv, env)

    let source: string | undefined
    let document: Record<string, unknown> = {}
    if (explicit) {
      const resolved = path.resolve(options.cwd ?? process.cwd(), explicit)
      if (!existsSync(resolved)) throw new ConfigError(`Config file not found: ${resolved}`)
      document = await this.loadFromFile(resolved)
      source = resolved
    } else {
      source = EnvironmentManager.getSearchPaths(options.cwd, options.homeDir).find((p) => existsSync(p))
      if (source) document = await this.loadFromFile(source)
      else Logger.warn('No configuration file found; starting with no contexts')
    }

    document = deepMerge(document, EnvironmentManager.loadEnvOverrides(env))
    document = deepMerge(document, cli.overrides)

    SchemaValidator.assertValid(document)
    checkReferences(document)

    Logger.info('Configuration loaded', {
      source,
      servers: Object.keys(document.servers ?? {}).length,
      contexts: Object.keys(document.contexts ?? {}).length,
    })
    return { config: document, source }
  }

  static async loadFromFile(filePath: string): Promise<Record<string, unknown>> {
    let raw: string
    try {
      raw = await fs.readFile(filePath, 'utf8')
    } catch (err) {
      throw new ConfigError(`Cannot read config file ${filePath}`, { cause: String(err) })
    }
    const ext = path.extname(filePath).toLowerCase()
    let parsed: unknown
    try {
      if (ext === '.json') parsed = JSON.parse(raw)
      else if (ext === '.yaml' || ext === '.yml') parsed = YAML.parse(raw)
      else {
        // Fallback: try JSON then YAML
        try {
          parsed = JSON.parse(raw)
        } catch {
          parsed = YAML.parse(raw)
        }
      }
    } catch (err) {
      throw new ConfigError(`Cannot parse config file ${filePath}`, { cause: String(err) })
    }
    Logger.debug('Parsed config from file', { filePath })

    if (parsed === null || parsed === undefined) return {}
    if (!isRecord(parsed)) throw new ConfigError(`Config file ${filePath} must contain a mapping at the top level`)
    return dropNulls(parsed)
  }
}

// Empty YAML sections (`defaults:` with nothing under it) parse as null.
function dropNulls(doc: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(doc)) if (v !== null) out[k] = v
  return out
}

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base }
  for (const [k, v] of Object.entries(sanitizeObject(override))) {
    if (v === undefined) continue
    const prev = out[k]
    if (isRecord(v) && isRecord(prev)) out[k] = deepMerge(prev, v)
    else out[k] = v
  }
  return out
}

function checkReferences(config: ProxyConfig): void {
  const servers = config.servers ?? {}
  for (const [name, ctx] of Object.entries(config.contexts ?? {})) {
    if (!Object.hasOwn(servers, ctx.server)) {
      Logger.warn('Context references an unknown server', { context: name, server: ctx.server })
    }
  }
  if (config.current_context && !Object.hasOwn(config.contexts ?? {}, config.current_context)) {
    Logger.warn('Ignoring unknown current_context', { context: config.current_context })
    delete config.current_context
  }
}
