import '../setup/test-setup.js'
import test from 'node:test'
import assert from 'node:assert/strict'
import { Mutex } from '../../src/utils/mutex.js'
import { sleep } from '../../src/utils/time.js'

test('Mutex serializes critical sections in arrival order', async () => {
  const mutex = new Mutex()
  const events: string[] = []
  const task = (name: string, ms: number) =>
    mutex.runExclusive(async () => {
      events.push(`${name}:start`)
      await sleep(ms)
      events.push(`${name}:end`)
      return name
    })

  const results = await Promise.all([task('a', 20), task('b', 5), task('c', 0)])
  assert.deepEqual(results, ['a', 'b', 'c'])
  assert.deepEqual(events, ['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end'])
  assert.equal(mutex.locked, false)
})

test('Mutex releases after a failing section', async () => {
  const mutex = new Mutex()
  await assert.rejects(
    mutex.runExclusive(() => {
      throw new Error('inside')
    }),
    /inside/
  )
  assert.equal(await mutex.runExclusive(() => 'next'), 'next')
})

test('Mutex release is idempotent', async () => {
  const mutex = new Mutex()
  const release = await mutex.acquire()
  assert.equal(mutex.locked, true)
  release()
  release()
  assert.equal(mutex.locked, false)
  const again = await mutex.acquire()
  again()
})
