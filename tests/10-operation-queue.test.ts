/**
 * Segment 10: Operation Queue Tests
 *
 * Single-flight execution of writes: ordering, retry while holding the
 * running slot, cancellation, saturation, cache invalidation and status.
 */

import { describe, it, expect } from 'vitest'
import { Mutex } from 'async-mutex'
import { createOperationQueue, type OperationQueueOptions } from '../src/operation-queue'
import { createScriptExecutor, type ExecutionResult, type ExecutorOptions } from '../src/executor'
import { createResultCache } from '../src/result-cache'
import { readCommand, writeCommand, shapes } from '../src/command'
import {
  ApplicationUnavailableError,
  InvalidCommandError,
  OperationCancelledError,
  QueueClosedError,
  QueueSaturationError,
  ReferenceNotFoundError,
  TimeoutError,
  UnknownScriptError,
} from '../src/errors'
import {
  createFakeRunner,
  deferred,
  fail,
  ok,
  until,
  HANG,
  type RunnerHandler,
} from './helpers/fake-runner'
import type { RawRun } from '../src/script-runner'

const UNAVAILABLE = "execution error: Things3 got an error: Application isn't running. (-600)"
const MISSING = 'execution error: Can’t get to do id "a1". (-1728)'

function write(kind: string, source = kind) {
  return writeCommand({ kind, source, shape: shapes.none })
}

function setup(
  handler: RunnerHandler = () => ok(''),
  options: Partial<OperationQueueOptions> = {},
  executorOptions: Partial<ExecutorOptions> = {}
) {
  const runner = createFakeRunner(handler)
  const executor = createScriptExecutor({
    runner,
    timeoutMs: 10_000,
    clock: () => 0,
    sleep: async () => undefined,
    ...executorOptions,
  })
  let t = 1_000
  const delays: number[] = []
  const queue = createOperationQueue({
    executor,
    slot: new Mutex(),
    now: () => t,
    sleep: async ms => {
      delays.push(ms)
    },
    maxAttempts: 3,
    retryBaseMs: 100,
    retryMaxMs: 1_000,
    ...options,
  })
  return {
    runner,
    executor,
    queue,
    delays,
    advance: (ms: number) => {
      t += ms
    },
  }
}

const pause = (ms: number) => new Promise(resolve => setTimeout(resolve, ms))

// ============================================================================
// 1. CONTRACT
// ============================================================================

describe('enqueue', () => {
  it('refuses read commands', () => {
    const { queue } = setup()
    const read = readCommand({ kind: 'todos.list', source: 'return 1', shape: shapes.text })
    expect(() => queue.enqueue(read)).toThrow(InvalidCommandError)
  })

  it('runs a write and resolves with its result', async () => {
    const { queue } = setup()
    const handle = queue.enqueue(write('todo.complete'))
    expect(await handle.result).toEqual({
      success: true,
      value: null,
      output: '',
      latencyMs: 0,
      attempts: 1,
      cached: false,
    })
    expect(handle.snapshot()).toMatchObject({ kind: 'todo.complete', state: 'succeeded', attempts: 1 })
  })

  it('executes each attempt with a single executor attempt', async () => {
    const { queue, runner } = setup(() => fail(UNAVAILABLE), { maxAttempts: 2 })
    await queue.enqueue(write('todo.complete')).result
    expect(runner.calls).toHaveLength(2)
  })
})

// ============================================================================
// 2. ORDERING AND SERIALIZATION
// ============================================================================

describe('Single flight', () => {
  it('never runs two writes at once', async () => {
    const slow = (): Promise<RawRun> => new Promise(resolve => setTimeout(() => resolve(ok('')), 3))
    const { queue, runner } = setup(slow)
    const handles = ['a', 'b', 'c', 'd', 'e'].map(name => queue.enqueue(write(`todo.${name}`)))

    const results = await Promise.all(handles.map(handle => handle.result))

    expect(results.every(result => result.success)).toBe(true)
    expect(runner.maxActive()).toBe(1)
    expect(runner.calls).toEqual(['todo.a', 'todo.b', 'todo.c', 'todo.d', 'todo.e'])
  })

  it('orders by priority, then by arrival', async () => {
    const gate = deferred<RawRun>()
    const { queue, runner } = setup(source => (source === 'first' ? gate.promise : ok('')))
    queue.enqueue(write('todo.first', 'first'))
    await until(() => runner.calls.length === 1)

    queue.enqueue(write('todo.low', 'low'), { priority: 'low' })
    queue.enqueue(write('todo.normal', 'normal'))
    queue.enqueue(write('todo.high', 'high'), { priority: 'high' })
    queue.enqueue(write('todo.normal2', 'normal2'), { priority: 'normal' })
    gate.resolve(ok(''))
    await queue.onIdle()

    expect(runner.calls).toEqual(['first', 'high', 'normal', 'normal2', 'low'])
  })

  it('shares the running slot between queues', async () => {
    const slow = (): Promise<RawRun> => new Promise(resolve => setTimeout(() => resolve(ok('')), 3))
    const runner = createFakeRunner(slow)
    const executor = createScriptExecutor({ runner, clock: () => 0 })
    const slot = new Mutex()
    const left = createOperationQueue({ executor, slot })
    const right = createOperationQueue({ executor, slot })

    const handles = [1, 2, 3].flatMap(n => [
      left.enqueue(write(`left.${n}`)),
      right.enqueue(write(`right.${n}`)),
    ])
    await Promise.all(handles.map(handle => handle.result))

    expect(runner.maxActive()).toBe(1)
    expect(runner.calls).toHaveLength(6)
  })

  it('uses the process-wide slot by default', async () => {
    const slow = (): Promise<RawRun> => new Promise(resolve => setTimeout(() => resolve(ok('')), 3))
    const runner = createFakeRunner(slow)
    const executor = createScriptExecutor({ runner, clock: () => 0 })
    const first = createOperationQueue({ executor })
    const second = createOperationQueue({ executor })

    await Promise.all([
      first.enqueue(write('todo.a')).result,
      second.enqueue(write('todo.b')).result,
      first.enqueue(write('todo.c')).result,
    ])

    expect(runner.maxActive()).toBe(1)
  })
})

// ============================================================================
// 3. FAILURE POLICY
// ============================================================================

describe('Failure policy', () => {
  it('retries transient failures with backoff', async () => {
    const { queue, runner, delays } = setup((_source, call) => (call < 3 ? fail(UNAVAILABLE) : ok('')))
    const handle = queue.enqueue(write('todo.complete'))
    const result = await handle.result
    expect(result.success && result.attempts).toBe(3)
    expect(runner.calls).toHaveLength(3)
    expect(delays).toEqual([100, 200])
  })

  it('reports terminal failure once the attempts are spent', async () => {
    const { queue, runner } = setup(() => fail(UNAVAILABLE))
    const handle = queue.enqueue(write('todo.complete'))
    const result = await handle.result
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ApplicationUnavailableError)
      expect(result.attempts).toBe(3)
    }
    expect(runner.calls).toHaveLength(3)
    expect(handle.snapshot().state).toBe('failed')
    expect(queue.status().failuresByKind['application-unavailable']).toBe(1)
  })

  it('fails a permanent error without retrying', async () => {
    const { queue, runner, delays } = setup(() => fail(MISSING))
    const result = await queue.enqueue(write('todo.complete')).result
    expect(!result.success && result.error).toBeInstanceOf(ReferenceNotFoundError)
    expect(runner.calls).toHaveLength(1)
    expect(delays).toEqual([])
  })

  it('retries timeouts of an idempotent write up to the bound', async () => {
    const { queue, runner } = setup(() => HANG, {}, { timeoutMs: 20 })
    const complete = writeCommand({ kind: 'todo.complete', source: 'complete', shape: shapes.none, idempotent: true })
    const result = await queue.enqueue(complete).result
    expect(!result.success && result.error).toBeInstanceOf(TimeoutError)
    expect(result.attempts).toBe(3)
    expect(runner.calls).toHaveLength(3)
    expect(runner.signals.every(signal => signal.aborted)).toBe(true)
  })

  it('does not re-send a timed-out write that is not idempotent', async () => {
    const { queue, runner, delays } = setup(() => HANG, {}, { timeoutMs: 10 })
    const handle = queue.enqueue(write('todo.create', 'create'))
    const result = await handle.result
    expect(!result.success && result.error).toBeInstanceOf(TimeoutError)
    expect(result.attempts).toBe(1)
    expect(runner.calls).toEqual(['create'])
    expect(delays).toEqual([])
    expect(handle.snapshot().state).toBe('failed')
  })

  it('still retries a write that is not idempotent when the application is unavailable', async () => {
    const { queue, runner, delays } = setup((_source, call) => (call < 3 ? fail(UNAVAILABLE) : ok('')))
    const result = await queue.enqueue(write('todo.create', 'create')).result
    expect(result.success && result.attempts).toBe(3)
    expect(runner.calls).toEqual(['create', 'create', 'create'])
    expect(delays).toEqual([100, 200])
  })

  it('holds the running slot while backing off', async () => {
    const resume = deferred<void>()
    const { queue, runner } = setup(
      (_source, call) => (call === 1 ? fail(UNAVAILABLE) : ok('')),
      { sleep: () => resume.promise }
    )
    const first = queue.enqueue(write('todo.first', 'first'))
    await until(() => first.snapshot().state === 'retrying')

    const second = queue.enqueue(write('todo.second', 'second'))
    await pause(10)
    expect(runner.calls).toEqual(['first'])
    expect(second.snapshot().state).toBe('pending')

    resume.resolve()
    await queue.onIdle()
    expect(runner.calls).toEqual(['first', 'first', 'second'])
    expect(first.snapshot().attempts).toBe(2)
  })

  it('turns an unexpected executor exception into a failed operation', async () => {
    const { executor } = setup()
    const queue = createOperationQueue({
      executor: {
        ...executor,
        executeRaw: () => Promise.reject(new Error('boom')),
      },
      slot: new Mutex(),
    })
    const handle = queue.enqueue(write('todo.complete'))
    const result = await handle.result
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error).toBeInstanceOf(UnknownScriptError)
      expect(result.error.message).toBe(`Operation ${handle.id} aborted: boom`)
    }
    expect(queue.status().depth).toBe(0)
  })
})

// ============================================================================
// 4. CANCELLATION AND SATURATION
// ============================================================================

describe('Cancellation', () => {
  it('withdraws a pending operation', async () => {
    const gate = deferred<RawRun>()
    const { queue, runner } = setup(source => (source === 'first' ? gate.promise : ok('')))
    const first = queue.enqueue(write('todo.first', 'first'))
    await until(() => runner.calls.length === 1)
    const second = queue.enqueue(write('todo.second', 'second'))

    expect(second.cancel()).toBe(true)
    expect(first.cancel()).toBe(false)
    gate.resolve(ok(''))
    await queue.onIdle()

    const result = await second.result
    expect(!result.success && result.error).toBeInstanceOf(OperationCancelledError)
    expect(second.snapshot().state).toBe('cancelled')
    expect(runner.calls).toEqual(['first'])
    expect(queue.status().cancelled).toBe(1)
    expect(second.cancel()).toBe(false)
  })
})

describe('Saturation', () => {
  it('fails enqueue immediately once the depth limit is reached', async () => {
    const gate = deferred<RawRun>()
    const { queue, runner } = setup(() => gate.promise, { maxDepth: 2 })
    queue.enqueue(write('todo.a'))
    queue.enqueue(write('todo.b'))
    const third = queue.enqueue(write('todo.c'))

    const result = await third.result
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error).toBeInstanceOf(QueueSaturationError)
      expect(result.error.message).toBe("Queue is saturated (2 of 2 operations); 'todo.c' was not accepted")
    }
    expect(queue.status().rejected).toBe(1)

    gate.resolve(ok(''))
    await queue.onIdle()
    expect(runner.calls).toEqual(['todo.a', 'todo.b'])
  })
})

describe('Shutdown', () => {
  it('cancels pending work, lets the running operation finish and refuses new work', async () => {
    const gate = deferred<RawRun>()
    const { queue, runner } = setup(source => (source === 'first' ? gate.promise : ok('')))
    const first = queue.enqueue(write('todo.first', 'first'))
    await until(() => runner.calls.length === 1)
    const second = queue.enqueue(write('todo.second', 'second'))

    let stopped = false
    const stopping = queue.shutdown().then(() => {
      stopped = true
    })

    const withdrawn = await second.result
    expect(withdrawn.success).toBe(false)
    if (!withdrawn.success) {
      expect(withdrawn.error).toBeInstanceOf(QueueClosedError)
      expect(withdrawn.error.message).toBe(`Operation ${second.id} (todo.second) was cancelled by queue shutdown`)
    }
    expect(second.snapshot().state).toBe('cancelled')
    expect(first.snapshot().state).toBe('running')
    await pause(5)
    expect(stopped).toBe(false)

    gate.resolve(ok(''))
    await stopping
    expect((await first.result).success).toBe(true)
    expect(runner.calls).toEqual(['first'])

    const late = await queue.enqueue(write('todo.third', 'third')).result
    expect(!late.success && late.error).toBeInstanceOf(QueueClosedError)
    expect(!late.success && late.error.message).toBe("Queue is shut down; 'todo.third' was not accepted")
    expect(runner.calls).toEqual(['first'])
    expect(queue.status()).toMatchObject({ succeeded: 1, cancelled: 1, rejected: 1, depth: 0 })
  })

  it('resolves at once when idle, and again when called twice', async () => {
    const { queue } = setup()
    await queue.shutdown()
    await queue.shutdown()
    expect(queue.status().depth).toBe(0)
  })
})

describe('listOperations', () => {
  it('lists the running operation, then pending ones in run order', async () => {
    const gate = deferred<RawRun>()
    const { queue, runner } = setup(source => (source === 'first' ? gate.promise : ok('')))
    const first = queue.enqueue(write('todo.first', 'first'))
    await until(() => runner.calls.length === 1)
    const low = queue.enqueue(write('todo.low', 'low'), { priority: 'low' })
    const normal = queue.enqueue(write('todo.normal', 'normal'))
    const high = queue.enqueue(write('todo.high', 'high'), { priority: 'high' })

    expect(queue.listOperations().map(op => [op.id, op.state])).toEqual([
      [first.id, 'running'],
      [high.id, 'pending'],
      [normal.id, 'pending'],
      [low.id, 'pending'],
    ])

    gate.resolve(ok(''))
    await queue.onIdle()
    expect(queue.listOperations()).toEqual([])
    expect(runner.calls).toEqual(['first', 'high', 'normal', 'low'])
  })
})

// ============================================================================
// 5. CACHE INVALIDATION
// ============================================================================

describe('Cache invalidation', () => {
  function stored(value: string): () => Promise<ExecutionResult<string>> {
    return async () => ({ success: true, value, output: value, latencyMs: 0, attempts: 1, cached: false })
  }

  it('invalidates affected keys before the caller resolves', async () => {
    const cache = createResultCache<ExecutionResult<string>>()
    await cache.getOrCompute('todos:inbox', 60_000, stored('Buy milk'))
    await cache.getOrCompute('tags:all', 60_000, stored('home'))
    const { queue } = setup(() => ok(''), { cache })

    const seen = await queue.enqueue(write('todo.rename')).result.then(() => cache.peek('todos:inbox'))

    expect(seen).toBeUndefined()
    expect(cache.peek('tags:all')).toBeDefined()
  })

  it('leaves the cache alone when the write fails', async () => {
    const cache = createResultCache<ExecutionResult<string>>()
    await cache.getOrCompute('todos:inbox', 60_000, stored('Buy milk'))
    const { queue } = setup(() => fail(MISSING), { cache })

    await queue.enqueue(write('todo.rename')).result

    expect(cache.peek('todos:inbox')).toBeDefined()
  })

  it('clears the cache for an unmapped write', async () => {
    const cache = createResultCache<ExecutionResult<string>>()
    await cache.getOrCompute('tags:all', 60_000, stored('home'))
    const { queue } = setup(() => ok(''), { cache })

    await queue.enqueue(write('heading.archive')).result

    expect(cache.size()).toBe(0)
  })
})

// ============================================================================
// 6. INTROSPECTION
// ============================================================================

describe('Status', () => {
  it('reports depth, the running operation and the oldest pending age', async () => {
    const gate = deferred<RawRun>()
    const { queue, runner, advance } = setup(() => gate.promise)
    const first = queue.enqueue(write('todo.a'))
    await until(() => runner.calls.length === 1)
    queue.enqueue(write('todo.b'))
    advance(500)

    expect(queue.status()).toEqual({
      depth: 2,
      pending: 1,
      running: first.id,
      oldestPendingAgeMs: 500,
      failuresByKind: {
        syntax: 0,
        'reference-not-found': 0,
        'permission-denied': 0,
        'application-unavailable': 0,
        timeout: 0,
        unknown: 0,
      },
      succeeded: 0,
      failed: 0,
      cancelled: 0,
      rejected: 0,
    })

    gate.resolve(ok(''))
    await queue.onIdle()
    expect(queue.status()).toMatchObject({ depth: 0, pending: 0, running: null, oldestPendingAgeMs: null, succeeded: 2 })
  })

  it('keeps finished operations for the retention window', async () => {
    const { queue, advance } = setup(() => ok(''), { retentionMs: 1_000 })
    const handle = queue.enqueue(write('todo.a'))
    await handle.result

    expect(queue.getOperation(handle.id)).toMatchObject({ id: handle.id, state: 'succeeded' })
    advance(999)
    expect(queue.getOperation(handle.id)).toBeDefined()
    advance(1)
    expect(queue.getOperation(handle.id)).toBeUndefined()
  })

  it('returns undefined for an unknown id', () => {
    const { queue } = setup()
    expect(queue.getOperation('nope')).toBeUndefined()
  })

  it('resolves onIdle immediately when nothing is queued', async () => {
    const { queue } = setup()
    await expect(queue.onIdle()).resolves.toBeUndefined()
  })
})
