import type { BackendTransport, LaunchSpec, ReceivedLine, TransportFactory } from '../../src/types/server.js'
import type { JsonObject } from '../../src/types/mcp.js'
import { SpawnError, WriteError } from '../../src/utils/errors.js'
import { atDeadline, remaining } from '../../src/utils/time.js'

// Messages to deliver in reply to one written document
export type Responder = (message: JsonObject) => JsonObject[]

let nextPid = 1000

/** In-process BackendTransport answering through a scripted responder. */
export class FakeTransport implements BackendTransport {
  readonly pid = nextPid++
  readonly sent: JsonObject[] = []
  alive = true
  closeCalls = 0
  private readonly inbox: JsonObject[] = []
  private readonly waiters: Array<(line: ReceivedLine) => void> = []

  constructor(private readonly respond: Responder = () => []) {}

  async send(document: JsonObject): Promise<void> {
    if (!this.alive) throw new WriteError('fake backend is not accepting input')
    this.sent.push(document)
    for (const reply of this.respond(document)) this.push(reply)
  }

  push(message: JsonObject): void {
    const waiter = this.waiters.shift()
    if (waiter) waiter({ kind: 'message', message, line: JSON.stringify(message) })
    else this.inbox.push(message)
  }

  receiveLine(deadline: number, signal?: AbortSignal): Promise<ReceivedLine> {
    const queued = this.inbox.shift()
    if (queued) return Promise.resolve({ kind: 'message', message: queued, line: JSON.stringify(queued) })
    if (!this.alive) return Promise.resolve({ kind: 'closed' })
    if (signal?.aborted || remaining(deadline) === 0) return Promise.resolve({ kind: 'timeout' })
    return new Promise((resolve) => {
      const finish = (line: ReceivedLine) => {
        cancelTimer()
        signal?.removeEventListener('abort', onAbort)
        const idx = this.waiters.indexOf(finish)
        if (idx !== -1) this.waiters.splice(idx, 1)
        resolve(line)
      }
      const onAbort = () => finish({ kind: 'timeout' })
      const cancelTimer = atDeadline(deadline, () => finish({ kind: 'timeout' }))
      signal?.addEventListener('abort', onAbort, { once: true })
      this.waiters.push(finish)
    })
  }

  async close(): Promise<void> {
    this.closeCalls++
    this.alive = false
    for (const waiter of this.waiters.splice(0)) waiter({ kind: 'closed' })
  }

  /** Methods of the written documents, in order. */
  methods(): string[] {
    return this.sent.map((d) => (typeof d.method === 'string' ? d.method : '?'))
  }

  count(method: string): number {
    return this.methods().filter((m) => m === method).length
  }
}

export interface FakeToolScript {
  tools?: JsonObject[]
  // tools/list answers with this error instead of the tools
  listError?: JsonObject
  // tools/call reply: either { result } or { error }
  call?: (name: string, args: unknown) => JsonObject
  // Never answer these methods
  silentOn?: string[]
}

/** Responder speaking just enough MCP for the pool: initialize, tools/list, tools/call. */
export function mcpResponder(script: FakeToolScript = {}): Responder {
  return (message) => {
    const id = message.id
    const method = message.method
    if (typeof id !== 'number' || typeof method !== 'string') return []
    if (script.silentOn?.includes(method)) return []
    const params = isObject(message.params) ? message.params : {}
    switch (method) {
      case 'initialize':
        return [{ jsonrpc: '2.0', id, result: { protocolVersion: params.protocolVersion, capabilities: {} } }]
      case 'tools/list':
        if (script.listError) return [{ jsonrpc: '2.0', id, error: script.listError }]
        return [{ jsonrpc: '2.0', id, result: { tools: script.tools ?? [] } }]
      case 'tools/call': {
        const name = typeof params.name === 'string' ? params.name : ''
        const reply = script.call ? script.call(name, params.arguments) : { result: { content: [] } }
        return [{ jsonrpc: '2.0', id, ...reply }]
      }
      default:
        return [{ jsonrpc: '2.0', id, error: { code: -32601, message: 'Method not found' } }]
    }
  }
}

export interface Launch {
  contextName: string
  launch: LaunchSpec
  transport: FakeTransport
}

/** Transport factory handing out FakeTransports and remembering every launch. */
export class FakeBackends {
  readonly launches: Launch[] = []
  readonly failing = new Set<string>()

  constructor(private readonly scriptFor: (contextName: string) => FakeToolScript = () => ({})) {}

  readonly factory: TransportFactory = async (contextName, launch) => {
    if (this.failing.has(contextName)) throw new SpawnError(launch.command, 'spawn ENOENT')
    const transport = new FakeTransport(mcpResponder(this.scriptFor(contextName)))
    this.launches.push({ contextName, launch, transport })
    return transport
  }

  transportsFor(contextName: string): FakeTransport[] {
    return this.launches.filter((l) => l.contextName === contextName).map((l) => l.transport)
  }

  latest(contextName: string): FakeTransport {
    const all = this.transportsFor(contextName)
    const last = all[all.length - 1]
    if (!last) throw new Error(`No launch for ${contextName}`)
    return last
  }
}

function isObject(value: unknown): value is JsonObject {
  return !!value && typeof value === 'object' && !Array.isArray(value)
}
