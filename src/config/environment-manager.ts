import os from 'node:os'
import path from 'node:path'
import { Logger, isLogLevel } from '../utils/logger.js'
import { isRecord } from '../utils/validation.js'

export interface CliArgs {
  configPath?: string
  // Nested overrides, e.g. { pool: { max_sessions: 3 } } from --pool.max_sessions=3
  overrides: Record<string, unknown>
}

type Env = Record<string, string | undefined>

export const CONFIG_ENV_VAR = 'MCP_PROXY_CONFIG'
export const CONFIG_FILE_NAMES = ['contexts.yaml', 'contexts.yml', 'contexts.json']

export class EnvironmentManager {
  /**
   * Candidate config files in lookup order: the working directory first, then
   * the per-user config directory.
   */
  static getSearchPaths(cwd = process.cwd(), homeDir = os.homedir()): string[] {
    const local = CONFIG_FILE_NAMES.map((f) => path.resolve(cwd, f))
    return [...local, path.join(homeDir, '.config', 'mcp-context-proxy', 'contexts.yaml')]
  }

  static getExplicitConfigPath(argv: string[] = process.argv.slice(2), env: Env = process.env): string | undefined {
    return EnvironmentManager.parseCliArgs(argv).configPath || env[CONFIG_ENV_VAR] || undefined
  }

  static parseCliArgs(argv: string[] = process.argv.slice(2)): CliArgs {
    const result: CliArgs = { overrides: {} }
    for (let i = 0; i < argv.length; i++) {
      const a = argv[i]
      if (a === '-c' || a === '--config' || a === '--config-path') {
        const next = argv[i + 1]
        if (next !== undefined && !next.startsWith('-')) {
          result.configPath = next
          i++
        }
        continue
      }
      if (a === '-v' || a === '--verbose') {
        setByPath(result.overrides, 'logging.level', 'debug')
        continue
      }
      if (!a.startsWith('--')) continue

      const eq = a.indexOf('=')
      let key = a.slice(2)
      let val: unknown = true
      if (eq > -1) {
        key = a.slice(2, eq)
        val = parseValue(a.slice(eq + 1))
      } else if (key === 'log-level' || key === 'transport' || key === 'port') {
        const next = argv[i + 1]
        if (next !== undefined && !next.startsWith('-')) {
          val = parseValue(next)
          i++
        }
      }

      switch (key) {
        case 'config':
        case 'config-path':
          result.configPath = String(val)
          break
        case 'log-level':
          setByPath(result.overrides, 'logging.level', String(val).toLowerCase())
          break
        case 'transport':
          setByPath(result.overrides, 'hosting.transport', val)
          break
        case 'port':
          setByPath(result.overrides, 'hosting.port', val)
          break
        case 'http':
          setByPath(result.overrides, 'hosting.transport', 'http')
          break
        default:
          // Dotted keys: --pool.max_sessions=3
          if (eq > -1) setByPath(result.overrides, key, val)
          else Logger.warn('Ignoring unknown flag', { flag: a })
      }
    }
    return result
  }

  static loadEnvOverrides(env: Env = process.env): Record<string, unknown> {
    const override: Record<string, unknown> = {}
    const level = env.MCP_PROXY_LOG_LEVEL?.toLowerCase()
    if (level) {
      if (isLogLevel(level)) setByPath(override, 'logging.level', level)
      else Logger.warn('Ignoring invalid MCP_PROXY_LOG_LEVEL', { value: level })
    }
    if (env.MCP_PROXY_MAX_SESSIONS) setByPath(override, 'pool.max_sessions', Number(env.MCP_PROXY_MAX_SESSIONS))
    if (env.MCP_PROXY_TRANSPORT) setByPath(override, 'hosting.transport', env.MCP_PROXY_TRANSPORT)
    if (env.MCP_PROXY_PORT) setByPath(override, 'hosting.port', Number(env.MCP_PROXY_PORT))
    if (env.MCP_PROXY_CURRENT_CONTEXT) override.current_context = env.MCP_PROXY_CURRENT_CONTEXT
    return override
  }
}

function parseValue(raw: string): unknown {
  try {
    return JSON.parse(raw)
  } catch {
    return raw
  }
}

function setByPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split('.')
  let cur = target
  for (const p of parts.slice(0, -1)) {
    const next = cur[p]
    if (isRecord(next)) {
      cur = next
    } else {
      const created: Record<string, unknown> = {}
      cur[p] = created
      cur = created
    }
  }
  cur[parts[parts.length - 1]] = value
}
