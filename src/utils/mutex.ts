/**
 * Promise-chain mutex. Waiters are served in arrival order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()
  private held = 0

  get locked(): boolean {
    return this.held > 0
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  acquire(): Promise<() => void> {
    this.held++
    let unlock: () => void = () => undefined
    const next = new Promise<void>((resolve) => {
      unlock = resolve
    })
    const previous = this.tail
    this.tail = previous.then(() => next)
    return previous.then(() => {
      let released = false
      return () => {
        if (released) return
        released = true
        this.held--
        unlock()
      }
    })
  }
}
