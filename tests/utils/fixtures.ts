import { fileURLToPath } from 'node:url'

/** Path of the stdio backend script the integration tests launch with process.execPath. */
export const fakeBackendPath = fileURLToPath(new URL('../fixtures/fake-backend.mjs', import.meta.url))

export function fakeBackendArgs(...flags: string[]): string[] {
  return [fakeBackendPath, ...flags]
}

export function childEnv(extra: Record<string, string> = {}): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [k, v] of Object.entries(process.env)) if (v !== undefined) env[k] = v
  return { ...env, ...extra }
}
