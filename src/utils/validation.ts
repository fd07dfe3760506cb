/**
 * Type guards for values decoded from configuration files and backend output.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value)
}

/** Drops `__proto__`-style keys before a decoded object is merged into another. */
export function sanitizeObject(obj: Record<string, unknown>): Record<string, unknown> {
  const dangerous = ['__proto__', 'constructor', 'prototype']
  const out: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(obj)) {
    if (!dangerous.includes(k)) out[k] = v
  }
  return out
}
