import '../setup/test-setup.js'
import test from 'node:test'
import assert from 'node:assert/strict'
import { SchemaValidator } from '../../src/config/schema-validator.js'
import { ConfigError } from '../../src/utils/errors.js'

test('SchemaValidator accepts minimal valid config', () => {
  const cfg = {
    servers: { fs: { command: 'mcp-fs', args: ['--root', '/tmp'] } },
    contexts: { work: { server: 'fs', env: { ROOT: '/srv' }, description: 'Work files' } },
    current_context: 'work',
    pool: { max_sessions: 3, list_timeout: '30s', call_timeout: 120000 },
    logging: { level: 'debug', json: true },
    hosting: { transport: 'http', port: 3000 },
    extra_section: { ignored: true },
  }
  assert.doesNotThrow(() => SchemaValidator.assertValid(cfg))
  assert.doesNotThrow(() => SchemaValidator.assertValid({}))
})

test('SchemaValidator reports every problem with its path', () => {
  const { valid, errors } = SchemaValidator.validate({
    servers: { fs: { args: 'x' } },
    contexts: { work: { server: '', env: { N: 1 }, color: 'red' } },
    pool: { max_sessions: 0, list_timeout: 'soon' },
    hosting: { transport: 'pigeon' },
  })
  assert.equal(valid, false)
  assert.deepEqual(errors, [
    { path: 'servers.fs.command', message: 'is required' },
    { path: 'servers.fs.args', message: 'expected type array, got string' },
    { path: 'contexts.work.server', message: 'must have at least 1 character(s)' },
    { path: 'contexts.work.env.N', message: 'expected type string, got number' },
    { path: 'contexts.work.color', message: 'is not allowed' },
    { path: 'pool.max_sessions', message: 'must be >= 1' },
    { path: 'pool.list_timeout', message: 'must be a duration such as 500ms, 30s or 2m' },
    { path: 'hosting.transport', message: 'must be one of stdio, http' },
  ])
})

test('SchemaValidator rejects invalid transport with ConfigError', () => {
  assert.throws(
    () => SchemaValidator.assertValid({ hosting: { transport: 'nope' } }),
    (err: unknown) => {
      assert.ok(err instanceof ConfigError)
      assert.equal(err.message, 'Configuration validation failed:\nhosting.transport: must be one of stdio, http')
      return true
    }
  )
})

test('SchemaValidator rejects non-object documents', () => {
  const { errors } = SchemaValidator.validate(null)
  assert.deepEqual(errors, [{ path: '', message: 'expected type object, got null' }])
  assert.throws(() => SchemaValidator.assertValid(['a']), /<root>: expected type object, got array/)
})
