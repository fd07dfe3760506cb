import '../setup/test-setup.js'
import test from 'node:test'
import assert from 'node:assert/strict'
import {
  PROTOCOL_VERSION,
  callToolRequest,
  handshake,
  initializedNotification,
  listToolsRequest,
  parseTools,
} from '../../src/modules/backend-protocol.js'

test('handshake carries the protocol version and client info', () => {
  assert.deepEqual(handshake(0, { name: 'client', version: '9.9.9' }), {
    jsonrpc: '2.0',
    id: 0,
    method: 'initialize',
    params: { protocolVersion: PROTOCOL_VERSION, capabilities: {}, clientInfo: { name: 'client', version: '9.9.9' } },
  })
  assert.equal(PROTOCOL_VERSION, '2025-06-18')
})

test('initialized notification has no id', () => {
  const n = initializedNotification()
  assert.deepEqual(n, { jsonrpc: '2.0', method: 'notifications/initialized' })
  assert.equal('id' in n, false)
})

test('tool requests', () => {
  assert.deepEqual(listToolsRequest(3), { jsonrpc: '2.0', id: 3, method: 'tools/list', params: {} })
  assert.deepEqual(callToolRequest(5, 'search', { q: 'x' }), {
    jsonrpc: '2.0',
    id: 5,
    method: 'tools/call',
    params: { name: 'search', arguments: { q: 'x' } },
  })
})

test('parseTools keeps named entries and skips malformed ones', () => {
  const tools = parseTools({
    tools: [
      { name: 'foo', description: 'd', inputSchema: { type: 'object' } },
      { name: 'bar', description: 42 },
      { description: 'no name' },
      'junk',
      null,
    ],
  })
  assert.deepEqual(tools, [
    { name: 'foo', description: 'd', inputSchema: { type: 'object' } },
    { name: 'bar' },
  ])
})

test('parseTools tolerates results without a tool array', () => {
  assert.deepEqual(parseTools(undefined), [])
  assert.deepEqual(parseTools({ tools: 'nope' }), [])
  assert.deepEqual(parseTools([]), [])
})
