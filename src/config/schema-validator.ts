import type { ProxyConfig } from '../types/config.js'
import { ConfigError } from '../utils/errors.js'
import { parseDuration } from '../utils/time.js'

export type JSONSchema = {
  type?: string | string[]
  properties?: Record<string, JSONSchema>
  required?: string[]
  // A schema here applies to every key not listed in `properties`
  additionalProperties?: boolean | JSONSchema
  enum?: unknown[]
  items?: JSONSchema
  format?: 'integer' | 'duration'
  minimum?: number
  minLength?: number
  description?: string
}

export interface SchemaValidationError {
  path: string
  message: string
}

export class SchemaValidator {
  static validate(value: unknown, schema: JSONSchema = ProxyConfigSchema): { valid: boolean; errors: SchemaValidationError[] } {
    const errors: SchemaValidationError[] = []
    validateAgainst(value, schema, '', errors)
    return { valid: errors.length === 0, errors }
  }

  static assertValid(value: unknown, schema: JSONSchema = ProxyConfigSchema): asserts value is ProxyConfig {
    const { valid, errors } = this.validate(value, schema)
    if (!valid) {
      const msg = errors.map((e) => `${e.path || '<root>'}: ${e.message}`).join('\n')
      throw new ConfigError(`Configuration validation failed:\n${msg}`, errors)
    }
  }
}

function typeOf(val: unknown): string {
  if (val === null) return 'null'
  if (Array.isArray(val)) return 'array'
  return typeof val
}

function validateAgainst(value: unknown, schema: JSONSchema, path: string, errors: SchemaValidationError[]): void {
  if (schema.type) {
    const allowed = Array.isArray(schema.type) ? schema.type : [schema.type]
    const actual = typeOf(value)
    if (!allowed.includes(actual)) {
      errors.push({ path, message: `expected type ${allowed.join('|')}, got ${actual}` })
      return
    }
  }

  if (schema.enum && !schema.enum.includes(value)) {
    errors.push({ path, message: `must be one of ${schema.enum.join(', ')}` })
  }

  if (typeof value === 'number') {
    if (schema.format === 'integer' && !Number.isInteger(value)) errors.push({ path, message: 'must be an integer' })
    if (schema.minimum !== undefined && value < schema.minimum) {
      errors.push({ path, message: `must be >= ${schema.minimum}` })
    }
  }

  if (typeof value === 'string') {
    if (schema.minLength !== undefined && value.trim().length < schema.minLength) {
      errors.push({ path, message: `must have at least ${schema.minLength} character(s)` })
    }
    if (schema.format === 'duration' && !/^\d+$/.test(value.trim())) {
      try {
        parseDuration(value)
      } catch {
        errors.push({ path, message: 'must be a duration such as 500ms, 30s or 2m' })
      }
    }
  }

  if (value && typeof value === 'object' && !Array.isArray(value)) {
    const entries = Object.entries(value)
    const keys = new Set(entries.map(([k]) => k))
    for (const r of schema.required ?? []) {
      if (!keys.has(r)) errors.push({ path: join(path, r), message: 'is required' })
    }
    const properties = schema.properties ?? {}
    for (const [k, v] of entries) {
      const sub = properties[k]
      if (sub) {
        validateAgainst(v, sub, join(path, k), errors)
      } else if (schema.additionalProperties === false) {
        errors.push({ path: join(path, k), message: 'is not allowed' })
      } else if (typeof schema.additionalProperties === 'object') {
        validateAgainst(v, schema.additionalProperties, join(path, k), errors)
      }
    }
  }

  const items = schema.items
  if (items && Array.isArray(value)) {
    value.forEach((item, idx) => validateAgainst(item, items, join(path, String(idx)), errors))
  }
}

function join(base: string, key: string): string {
  return base ? `${base}.${key}` : key
}

const duration: JSONSchema = { type: ['number', 'string'], format: 'duration', minimum: 0 }
const stringMap: JSONSchema = { type: 'object', additionalProperties: { type: 'string' } }

export const ProxyConfigSchema: JSONSchema = {
  type: 'object',
  properties: {
    defaults: stringMap,
    servers: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['command'],
        properties: {
          command: { type: 'string', minLength: 1 },
          args: { type: 'array', items: { type: 'string' } },
        },
        additionalProperties: false,
      },
    },
    contexts: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['server'],
        properties: {
          server: { type: 'string', minLength: 1 },
          env: stringMap,
          description: { type: 'string' },
        },
        additionalProperties: false,
      },
    },
    current_context: { type: 'string' },
    pool: {
      type: 'object',
      properties: {
        max_sessions: { type: 'number', format: 'integer', minimum: 1 },
        list_timeout: duration,
        call_timeout: duration,
        spawn_timeout: duration,
        request_pacing: duration,
        grace_period: duration,
        kill_period: duration,
      },
      additionalProperties: false,
    },
    logging: {
      type: 'object',
      properties: {
        level: { type: 'string', enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] },
        json: { type: 'boolean' },
      },
      additionalProperties: false,
    },
    hosting: {
      type: 'object',
      properties: {
        transport: { type: 'string', enum: ['stdio', 'http'] },
        port: { type: 'number', format: 'integer', minimum: 0 },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: true,
}
