import type { BackendTransport } from '../types/server.js'
import type { JsonObject, JsonRpcMessage, JsonRpcResponse } from '../types/mcp.js'
import { Logger } from '../utils/logger.js'
import { sleep } from '../utils/time.js'

export interface RpcCorrelatorOptions {
  // Delay between consecutive writes of one exchange
  pacingMs?: number
}

export interface ExchangeResult {
  responses: Map<number, JsonRpcResponse>
  // False when the deadline passed or the stream closed first
  complete: boolean
  elapsedMs: number
}

export function isFailure(response: JsonRpcResponse): boolean {
  return response.error !== undefined && response.error !== null
}

export function isSuccess(response: JsonRpcResponse): boolean {
  return 'result' in response && !isFailure(response)
}

/**
 * Turns a batch of requests into a request/response exchange over a
 * transport. All requests are written up front, in order; responses are
 * matched by id in whatever order they arrive.
 */
export class RpcCorrelator {
  private readonly pacingMs: number

  constructor(options: RpcCorrelatorOptions = {}) {
    this.pacingMs = options.pacingMs ?? 10
  }

  async exchange(
    transport: BackendTransport,
    requests: JsonRpcMessage[],
    expectedResponseCount: number,
    timeoutMs: number,
    label = 'backend'
  ): Promise<ExchangeResult> {
    const started = Date.now()
    const deadline = started + timeoutMs
    const ids = new Set<number>()
    for (const r of requests) if ('id' in r) ids.add(r.id)

    const done = Logger.time('exchange', { contextName: label, methods: requests.map((r) => r.method) })
    const responses = new Map<number, JsonRpcResponse>()
    const controller = new AbortController()
    const reading = this.collect(transport, ids, expectedResponseCount, deadline, controller.signal, responses, label)

    try {
      await this.writeAll(transport, requests)
    } catch (err) {
      controller.abort()
      await reading
      throw err
    }
    await reading

    const complete = responses.size >= expectedResponseCount
    if (!complete) {
      Logger.warn('Exchange ended with missing responses', {
        contextName: label,
        expected: expectedResponseCount,
        received: responses.size,
        timeoutMs,
      })
    }
    done({ responses: responses.size, complete })
    return { responses, complete, elapsedMs: Date.now() - started }
  }

  private async writeAll(transport: BackendTransport, requests: JsonRpcMessage[]): Promise<void> {
    for (let i = 0; i < requests.length; i++) {
      if (i > 0 && this.pacingMs > 0) await sleep(this.pacingMs)
      await transport.send(requests[i])
    }
  }

  private async collect(
    transport: BackendTransport,
    ids: Set<number>,
    expected: number,
    deadline: number,
    signal: AbortSignal,
    into: Map<number, JsonRpcResponse>,
    label: string
  ): Promise<void> {
    while (into.size < expected) {
      const received = await transport.receiveLine(deadline, signal)
      if (received.kind === 'closed') {
        Logger.warn('Backend output closed during exchange', { contextName: label })
        return
      }
      if (received.kind === 'timeout') return

      const response = toResponse(received.message)
      if (!response) {
        Logger.debug('Skipping non-response message', { contextName: label, line: received.line })
        continue
      }
      if (!ids.has(response.id) || into.has(response.id)) {
        Logger.debug('Skipping response with unexpected id', { contextName: label, id: response.id })
        continue
      }
      into.set(response.id, response)
    }
  }
}

function toResponse(message: JsonObject): JsonRpcResponse | undefined {
  const id = message.id
  if (typeof id !== 'number' || !Number.isInteger(id)) return undefined
  if ('method' in message) return undefined
  if (!('result' in message) && !('error' in message)) return undefined
  const response: JsonRpcResponse = { id }
  if (typeof message.jsonrpc === 'string') response.jsonrpc = message.jsonrpc
  if ('result' in message) response.result = message.result
  if ('error' in message) response.error = message.error
  return response
}
