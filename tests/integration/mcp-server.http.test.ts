import '../setup/test-setup.js'
import test from 'node:test'
import assert from 'node:assert/strict'
import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js'
import { DependencyContainer } from '../../src/server/dependency-container.js'
import { createHttpApp, createMcpServer } from '../../src/mcp-server.js'
import { FakeBackends } from '../utils/fake-transport.js'

const CONFIG = `
servers:
  fake:
    command: fake-server
contexts:
  alpha:
    server: fake
    description: Alpha account
    env:
      REGION: eu
  beta:
    server: fake
pool:
  max_sessions: 3
  list_timeout: 100ms
  request_pacing: 0
`

async function makeContainer(): Promise<{ container: DependencyContainer; backends: FakeBackends }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mcp-context-proxy-'))
  const file = path.join(dir, 'contexts.yaml')
  await fs.writeFile(file, CONFIG)
  const backends = new FakeBackends(() => ({
    tools: [{ name: 'foo', description: 'd' }],
    call: (_name, args) => ({ result: { content: [{ type: 'text', text: JSON.stringify(args) }] } }),
  }))
  const container = new DependencyContainer({
    config: { path: file, argv: [], env: {} },
    pool: { transportFactory: backends.factory, baseEnv: {} },
  })
  await container.initialize()
  return { container, backends }
}

function textOf(result: unknown): string {
  assert.ok(result && typeof result === 'object' && 'content' in result && Array.isArray(result.content))
  const first: unknown = result.content[0]
  assert.ok(first && typeof first === 'object' && 'text' in first && typeof first.text === 'string')
  return first.text
}

function isErrorResult(result: unknown): boolean {
  return !!result && typeof result === 'object' && 'isError' in result && result.isError === true
}

async function connect(container: DependencyContainer): Promise<Client> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
  await createMcpServer(container.facade).connect(serverTransport)
  const client = new Client({ name: 'test-client', version: '1.0.0' })
  await client.connect(clientTransport)
  return client
}

test('MCP server exposes the proxy tools', async () => {
  const { container } = await makeContainer()
  const client = await connect(container)
  try {
    const { tools } = await client.listTools()
    assert.deepEqual(tools.map((t) => t.name).sort(), [
      'get_current_context',
      'list_contexts',
      'list_proxied_tools',
      'proxy_tool',
      'switch_context',
    ])
  } finally {
    await client.close()
    await container.shutdown()
  }
})

test('MCP tools switch context and proxy calls', async () => {
  const { container, backends } = await makeContainer()
  const client = await connect(container)
  try {
    const none = await client.callTool({ name: 'get_current_context', arguments: {} })
    assert.deepEqual(JSON.parse(textOf(none)), { context: null, message: 'No context active' })

    const switched = await client.callTool({ name: 'switch_context', arguments: { context_name: 'alpha' } })
    assert.equal(isErrorResult(switched), false)
    assert.deepEqual(JSON.parse(textOf(switched)), {
      context: 'alpha',
      server: 'fake',
      description: 'Alpha account',
      env: { REGION: 'eu' },
      toolsAvailable: 1,
      tools: [{ name: 'foo', description: 'd' }],
    })

    const called = await client.callTool({ name: 'proxy_tool', arguments: { tool_name: 'foo', arguments: { x: 1 } } })
    assert.deepEqual(JSON.parse(textOf(called)), { content: [{ type: 'text', text: '{"x":1}' }] })

    const listed = await client.callTool({ name: 'list_proxied_tools', arguments: {} })
    assert.deepEqual(JSON.parse(textOf(listed)), [{ name: 'foo', description: 'd' }])
    assert.equal(backends.launches.length, 1)
  } finally {
    await client.close()
    await container.shutdown()
  }
})

test('MCP tools report errors as results', async () => {
  const { container, backends } = await makeContainer()
  const client = await connect(container)
  try {
    const noContext = await client.callTool({ name: 'proxy_tool', arguments: { tool_name: 'foo' } })
    assert.equal(isErrorResult(noContext), true)
    assert.deepEqual(JSON.parse(textOf(noContext)), {
      error: { code: 'NO_ACTIVE_CONTEXT', message: 'No active context. Use switch_context first.' },
    })

    const unknown = await client.callTool({ name: 'switch_context', arguments: { context_name: 'nope' } })
    assert.equal(isErrorResult(unknown), true)
    assert.deepEqual(JSON.parse(textOf(unknown)), {
      error: { code: 'UNKNOWN_CONTEXT', message: 'Unknown context: nope' },
    })
    assert.equal(backends.launches.length, 0)
  } finally {
    await client.close()
    await container.shutdown()
  }
})

test('HTTP app serves health and context listing', async () => {
  const { container } = await makeContainer()
  const server = createHttpApp(container).listen(0)
  try {
    await new Promise<void>((resolve) => server.once('listening', () => resolve()))
    const address = server.address()
    assert.ok(address && typeof address === 'object')
    const base = `http://127.0.0.1:${address.port}`

    const health = await fetch(`${base}/health`)
    assert.equal(health.status, 200)
    assert.deepEqual(await health.json(), { ok: true, currentContext: null, sessions: 0, maxSessions: 3 })

    const contexts = await fetch(`${base}/contexts`)
    const body: unknown = await contexts.json()
    assert.ok(body && typeof body === 'object' && 'contexts' in body && Array.isArray(body.contexts))
    assert.deepEqual(
      body.contexts.map((c: { name: string; command: string }) => [c.name, c.command]),
      [
        ['alpha', 'fake-server'],
        ['beta', 'fake-server'],
      ]
    )

    const get = await fetch(`${base}/mcp`)
    assert.equal(get.status, 405)
  } finally {
    server.closeAllConnections()
    await new Promise<void>((resolve) => server.close(() => resolve()))
    await container.shutdown()
  }
})
