import { spawn, type ChildProcess } from 'node:child_process'
import { Logger, type ScopedLogger } from '../utils/logger.js'
import { SpawnError, WriteError } from '../utils/errors.js'
import { isRecord } from '../utils/validation.js'
import { atDeadline, remaining } from '../utils/time.js'
import type { BackendTransport, ReceivedLine } from '../types/server.js'
import type { JsonObject } from '../types/mcp.js'

export interface SessionTransportOptions {
  spawnTimeoutMs?: number
  // Name used in log lines, usually the context name
  label?: string
}

type Waiter = (line: ReceivedLine) => void

/**
 * Owns one backend subprocess and exchanges newline-delimited JSON with it.
 *
 * Lines on stdout that are not JSON objects are dropped; stderr is only ever
 * logged. Teardown escalates from end-of-input to SIGTERM to SIGKILL and is
 * bounded by `gracePeriodMs + 2 * killPeriodMs`.
 */
export class SessionTransport implements BackendTransport {
  private readonly inbox: Array<{ message: JsonObject; line: string }> = []
  private readonly waiters: Waiter[] = []
  private buffer = ''
  private exited = false
  private streamClosed = false
  private closing?: Promise<void>
  private readonly log: ScopedLogger

  private constructor(private readonly proc: ChildProcess, readonly command: string, label: string) {
    this.log = Logger.with({ contextName: label, pid: proc.pid })

    proc.stdout?.setEncoding('utf8')
    proc.stdout?.on('data', (chunk: string) => this.handleStdoutData(chunk))

    proc.stderr?.setEncoding('utf8')
    proc.stderr?.on('data', (chunk: string) => {
      const text = chunk.trim()
      if (text) this.log.warn('Backend stderr', { data: text })
    })

    proc.stdin?.on('error', (err) => {
      this.log.warn('Backend stdin error', { error: err })
    })

    proc.on('error', (err) => {
      this.log.error('Backend process error', { error: err })
    })

    proc.once('exit', (code, signal) => {
      this.exited = true
      this.log.info('Backend process exited', { code, signal })
    })

    proc.once('close', () => this.markClosed())
  }

  static open(
    command: string,
    args: string[],
    env: Record<string, string>,
    options: SessionTransportOptions = {}
  ): Promise<SessionTransport> {
    const timeoutMs = options.spawnTimeoutMs ?? 10_000
    const label = options.label ?? command
    Logger.info('Starting backend process', { contextName: label, command, args })

    return new Promise((resolve, reject) => {
      let proc: ChildProcess
      try {
        proc = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'], env })
      } catch (err) {
        reject(new SpawnError(command, err))
        return
      }

      const cleanup = () => {
        cancelTimer()
        proc.off('spawn', onSpawn)
        proc.off('error', onError)
      }
      const onSpawn = () => {
        cleanup()
        resolve(new SessionTransport(proc, command, label))
      }
      const onError = (err: Error) => {
        cleanup()
        reject(new SpawnError(command, err))
      }
      const cancelTimer = atDeadline(Date.now() + timeoutMs, () => {
        cleanup()
        proc.once('error', (err) => Logger.debug('Error from abandoned backend process', { command, error: err }))
        proc.kill('SIGKILL')
        reject(new SpawnError(command, `process did not start within ${timeoutMs}ms`))
      })

      proc.once('spawn', onSpawn)
      proc.once('error', onError)
    })
  }

  get pid(): number | undefined {
    return this.proc.pid
  }

  get alive(): boolean {
    return !this.exited && this.proc.exitCode === null && this.proc.signalCode === null
  }

  async send(document: JsonObject): Promise<void> {
    const stdin = this.proc.stdin
    if (!this.alive || !stdin || stdin.destroyed || stdin.writableEnded) {
      throw new WriteError(`Backend ${this.command} is not accepting input`)
    }
    const line = JSON.stringify(document) + '\n'
    await new Promise<void>((resolve, reject) => {
      stdin.write(line, (err) => {
        if (err) reject(new WriteError(`Failed to write to backend ${this.command}: ${err.message}`, err))
        else resolve()
      })
    })
  }

  receiveLine(deadline: number, signal?: AbortSignal): Promise<ReceivedLine> {
    const queued = this.inbox.shift()
    if (queued) return Promise.resolve({ kind: 'message', ...queued })
    if (this.streamClosed) return Promise.resolve({ kind: 'closed' })
    if (signal?.aborted || remaining(deadline) === 0) return Promise.resolve({ kind: 'timeout' })

    return new Promise((resolve) => {
      const finish: Waiter = (line) => {
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

  close(gracePeriodMs: number, killPeriodMs: number): Promise<void> {
    if (!this.closing) this.closing = this.terminate(gracePeriodMs, killPeriodMs)
    return this.closing
  }

  private async terminate(gracePeriodMs: number, killPeriodMs: number): Promise<void> {
    try {
      if (!this.alive) {
        this.log.debug('Backend already exited')
        return
      }

      this.proc.stdin?.end()
      if (await this.waitForExit(gracePeriodMs)) return

      this.log.warn('Backend ignored end of input; sending SIGTERM', { gracePeriodMs })
      this.proc.kill('SIGTERM')
      if (await this.waitForExit(killPeriodMs)) return

      this.log.warn('Backend ignored SIGTERM; sending SIGKILL', { killPeriodMs })
      this.proc.kill('SIGKILL')
      if (!(await this.waitForExit(killPeriodMs))) {
        this.log.error('Backend did not confirm exit after SIGKILL')
      }
    } finally {
      this.proc.stdout?.destroy()
      this.proc.stderr?.destroy()
      this.markClosed()
    }
  }

  private waitForExit(ms: number): Promise<boolean> {
    if (!this.alive) return Promise.resolve(true)
    return new Promise((resolve) => {
      const onExit = () => {
        cancelTimer()
        resolve(true)
      }
      const cancelTimer = atDeadline(Date.now() + ms, () => {
        this.proc.off('exit', onExit)
        resolve(!this.alive)
      })
      this.proc.once('exit', onExit)
    })
  }

  private handleStdoutData(chunk: string): void {
    this.buffer += chunk
    let idx = this.buffer.indexOf('\n')
    while (idx !== -1) {
      const raw = this.buffer.slice(0, idx)
      this.buffer = this.buffer.slice(idx + 1)
      this.acceptLine(raw)
      idx = this.buffer.indexOf('\n')
    }
  }

  private acceptLine(raw: string): void {
    const line = raw.trim()
    if (!line) return
    if (!line.startsWith('{')) {
      this.log.debug('Ignoring non-protocol output', { line })
      return
    }
    let parsed: unknown
    try {
      parsed = JSON.parse(line)
    } catch {
      this.log.debug('Ignoring undecodable line', { line })
      return
    }
    if (!isRecord(parsed)) {
      this.log.debug('Ignoring non-object line', { line })
      return
    }
    const waiter = this.waiters.shift()
    if (waiter) waiter({ kind: 'message', message: parsed, line })
    else this.inbox.push({ message: parsed, line })
  }

  private markClosed(): void {
    if (this.streamClosed) return
    if (this.buffer) {
      const rest = this.buffer
      this.buffer = ''
      this.acceptLine(rest)
    }
    this.streamClosed = true
    for (const waiter of this.waiters.splice(0)) waiter({ kind: 'closed' })
  }
}
