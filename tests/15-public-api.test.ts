/**
 * Segment 15: Public API Tests
 *
 * createScriptgate wires every component from one configuration. The runner,
 * clock and running slot are replaced with in-process stand-ins.
 */

import { describe, it, expect } from 'vitest'
import { Mutex } from 'async-mutex'
import { createScriptgate, loadConfig, readCommand, writeCommand, shapes, createLogger } from '../src/index'
import { createFakeRunner, fail, ok } from './helpers/fake-runner'
import { createFakeEngine } from './helpers/fake-engine'
import { encodeDate, dateReadout } from '../src/date-codec'

const UNAVAILABLE = "execution error: Things3 got an error: Application isn't running. (-600)"

function quietLogger() {
  return createLogger({ verbosity: 'quiet', sink: () => undefined })
}

describe('createScriptgate', () => {
  it('builds a gateway that reads through the cache and writes through the queue', async () => {
    const runner = createFakeRunner(source => ok(source === 'count' ? '3' : ''))
    const gate = createScriptgate(loadConfig({ env: {} }), { runner, logger: quietLogger(), slot: new Mutex() })
    const count = readCommand({ kind: 'todos.count', source: 'count', shape: shapes.integer, cacheKey: 'todos:count' })

    expect(await gate.read(count)).toMatchObject({ success: true, value: 3, cached: false })
    expect(await gate.read(count)).toMatchObject({ success: true, value: 3, cached: true })

    await gate.write(writeCommand({ kind: 'todo.create', source: 'create', shape: shapes.none })).result
    expect(gate.cache.peek('todos:count')).toBeUndefined()
    expect(gate.status().queue.succeeded).toBe(1)
  })

  it('applies the configured retry settings to queued writes', async () => {
    const delays: number[] = []
    const runner = createFakeRunner(() => fail(UNAVAILABLE))
    const config = loadConfig({
      env: { SCRIPTGATE_QUEUE_MAX_ATTEMPTS: '4', SCRIPTGATE_RETRY_BASE_MS: '50', SCRIPTGATE_RETRY_MAX_MS: '150' },
    })
    const gate = createScriptgate(config, {
      runner,
      logger: quietLogger(),
      slot: new Mutex(),
      sleep: async ms => {
        delays.push(ms)
      },
    })

    const result = await gate.write(writeCommand({ kind: 'todo.create', source: 'create', shape: shapes.none })).result

    expect(result.success).toBe(false)
    expect(runner.calls).toHaveLength(4)
    expect(delays).toEqual([50, 100, 150])
  })

  it('refuses to queue once the configured depth is reached', async () => {
    const runner = createFakeRunner(() => new Promise(resolve => setTimeout(() => resolve(ok('')), 5)))
    const gate = createScriptgate(loadConfig({ env: { SCRIPTGATE_QUEUE_MAX_DEPTH: '1' } }), {
      runner,
      logger: quietLogger(),
      slot: new Mutex(),
    })
    const create = writeCommand({ kind: 'todo.create', source: 'create', shape: shapes.none })

    const accepted = gate.write(create)
    const refused = gate.write(create)

    expect((await refused.result).success).toBe(false)
    expect((await accepted.result).success).toBe(true)
  })

  it('normalizes dates with the configured order', () => {
    const gate = createScriptgate(loadConfig({ env: { SCRIPTGATE_DATE_ORDER: 'european' } }), {
      runner: createFakeRunner(),
      logger: quietLogger(),
      clock: () => new Date(2024, 0, 31),
    })
    expect(gate.normalizeDate('02/01/2024')).toEqual({ ok: true, value: { year: 2024, month: 1, day: 2 } })
    expect(gate.normalizeDate('02/01/2024', { order: 'us' })).toEqual({ ok: true, value: { year: 2024, month: 2, day: 1 } })
    expect(gate.normalizeDate('tomorrow')).toEqual({ ok: true, value: { year: 2024, month: 2, day: 1 } })
  })

  it('fails ambiguous dates closed without a configured order', () => {
    const gate = createScriptgate(loadConfig({ env: {} }), { runner: createFakeRunner(), logger: quietLogger() })
    expect(gate.normalizeDate('02/01/2024').ok).toBe(false)
  })

  it('sends a normalized date to the engine and reads it back', async () => {
    const engine = createFakeEngine()
    const gate = createScriptgate(loadConfig({ env: {} }), { runner: engine, logger: quietLogger() })

    const due = gate.normalizeDate('December 31, 2099')
    if (!due.ok) throw due.error
    const encoded = encodeDate(due.value)
    if (!encoded.ok) throw encoded.error

    const result = await gate.read(readCommand({
      kind: 'date.echo',
      source: `${encoded.value}\nreturn ${dateReadout('theDate')}`,
      shape: shapes.date,
    }))

    expect(result.success && result.value).toEqual({ year: 2099, month: 12, day: 31 })
    expect(engine.overflows).toEqual([])
  })
})
