/**
 * Timing helpers and duration parsing.
 */

// setTimeout fires after 1ms for anything longer than this
export const MAX_TIMER_DELAY_MS = 2_147_483_647

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    atDeadline(Date.now() + ms, resolve)
  })
}

/** Milliseconds left until `deadline` (a `Date.now()` timestamp), never negative. */
export function remaining(deadline: number): number {
  return Math.max(0, deadline - Date.now())
}

/**
 * Runs `onExpire` once `deadline` has passed, re-arming the timer for
 * deadlines beyond `MAX_TIMER_DELAY_MS`. Returns a function that cancels it.
 */
export function atDeadline(deadline: number, onExpire: () => void): () => void {
  const arm = () => setTimeout(fire, Math.min(remaining(deadline), MAX_TIMER_DELAY_MS))
  const fire = () => {
    if (remaining(deadline) > 0) timer = arm()
    else onExpire()
  }
  let timer = arm()
  return () => clearTimeout(timer)
}

/** Parses durations like "500ms", "2s", "5m", "1h", "1d". */
export function parseDuration(input: string): number {
  const m = String(input).trim().match(/^(\d+(?:\.\d+)?)(ms|s|m|h|d)$/i)
  if (!m) throw new Error(`Invalid duration: ${input}`)
  const n = parseFloat(m[1])
  switch (m[2].toLowerCase()) {
    case 'ms':
      return n
    case 's':
      return n * 1000
    case 'm':
      return n * 60_000
    case 'h':
      return n * 3_600_000
    case 'd':
      return n * 86_400_000
    default:
      throw new Error('Invalid duration unit')
  }
}

/** Accepts a millisecond count or a duration string. */
export function toMilliseconds(value: number | string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  if (typeof value === 'number') return value
  const trimmed = value.trim()
  if (/^\d+$/.test(trimmed)) return Number(trimmed)
  return parseDuration(trimmed)
}
