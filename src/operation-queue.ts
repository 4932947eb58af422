/**
 * Operation Queue
 *
 * Serializes write commands against the application. Every queue instance
 * shares one running slot, so at most one mutation is in flight across the
 * process. Pending operations are ordered by priority, then by arrival.
 *
 * State machine:
 *   pending → running → succeeded
 *                     → retrying → running
 *                     → failed
 *   pending → cancelled
 *
 * Transient failures are retried with exponential backoff while the slot is
 * held; a timeout is retried only for idempotent commands. After a success
 * the result cache is invalidated before the caller's promise resolves.
 */

import { randomUUID } from 'node:crypto'
import { Mutex } from 'async-mutex'
import type { ScriptCommand } from './command'
import {
  type ErrorKind,
  type ScriptError,
  InvalidCommandError,
  OperationCancelledError,
  QueueClosedError,
  QueueSaturationError,
  UnknownScriptError,
} from './errors'
import { type ExecutionResult, type ScriptExecutor, backoffDelay, defaultSleep, isRetryable } from './executor'
import { type InvalidationRules, DEFAULT_INVALIDATION_RULES, invalidationPredicate, planInvalidation } from './invalidation'
import type { ResultCache } from './result-cache'
import { type Logger, silentLogger } from './logger'

// ============================================================================
// Types
// ============================================================================

export type Priority = 'high' | 'normal' | 'low'

const PRIORITY_RANK: Record<Priority, number> = { high: 0, normal: 1, low: 2 }

export type OperationState = 'pending' | 'running' | 'retrying' | 'succeeded' | 'failed' | 'cancelled'

export type QueueFailure = ScriptError | QueueSaturationError | QueueClosedError | OperationCancelledError

export type OperationResult<T> = ExecutionResult<T, QueueFailure>

export type OperationSnapshot = {
  readonly id: string
  readonly kind: string
  readonly priority: Priority
  readonly state: OperationState
  readonly attempts: number
  readonly enqueuedAt: number
  readonly startedAt?: number
  readonly finishedAt?: number
  readonly error?: QueueFailure
}

export type OperationHandle<T> = {
  readonly id: string
  /** Resolves with the terminal result; never rejects. */
  readonly result: Promise<OperationResult<T>>
  /** Withdraws the operation if it has not started. */
  cancel(): boolean
  snapshot(): OperationSnapshot
}

export type QueueStatus = {
  /** Pending plus running. */
  depth: number
  pending: number
  running: string | null
  oldestPendingAgeMs: number | null
  failuresByKind: Record<ErrorKind, number>
  succeeded: number
  failed: number
  cancelled: number
  rejected: number
}

export type EnqueueOptions = {
  priority?: Priority
}

export type OperationQueue = {
  enqueue<T>(command: ScriptCommand<T>, options?: EnqueueOptions): OperationHandle<T>
  cancel(id: string): boolean
  getOperation(id: string): OperationSnapshot | undefined
  /** Running operation first, then pending ones in the order they will run. */
  listOperations(): OperationSnapshot[]
  status(): QueueStatus
  /** Resolves once nothing is pending or running. */
  onIdle(): Promise<void>
  /**
   * Stops accepting work and cancels everything pending. Resolves once the
   * running operation, if any, has finished.
   */
  shutdown(): Promise<void>
}

/** The single-flight slot shared by every queue in the process. */
export type RunningSlot = Pick<Mutex, 'runExclusive' | 'isLocked'>

export const sharedRunningSlot: RunningSlot = new Mutex()

export type OperationQueueOptions = {
  executor: ScriptExecutor
  cache?: ResultCache<ExecutionResult<string>>
  rules?: InvalidationRules
  maxAttempts?: number
  /** 0 means unbounded. */
  maxDepth?: number
  retentionMs?: number
  retryBaseMs?: number
  retryMaxMs?: number
  logger?: Logger
  now?: () => number
  sleep?: (ms: number) => Promise<void>
  slot?: RunningSlot
}

type QueuedOperation = {
  id: string
  command: ScriptCommand<unknown>
  priority: Priority
  sequence: number
  state: OperationState
  attempts: number
  enqueuedAt: number
  startedAt?: number
  finishedAt?: number
  error?: QueueFailure
  attempt(): Promise<ExecutionResult<string>>
  /** Interprets the final raw result, resolves the caller, and returns what it resolved with. */
  finish(raw: ExecutionResult<string>): ExecutionResult<unknown>
  reject(error: QueueFailure): void
}

// ============================================================================
// Helpers
// ============================================================================

function emptyFailureCounts(): Record<ErrorKind, number> {
  return {
    syntax: 0,
    'reference-not-found': 0,
    'permission-denied': 0,
    'application-unavailable': 0,
    timeout: 0,
    unknown: 0,
  }
}

function toSnapshot(op: QueuedOperation): OperationSnapshot {
  return Object.freeze({
    id: op.id,
    kind: op.command.kind,
    priority: op.priority,
    state: op.state,
    attempts: op.attempts,
    enqueuedAt: op.enqueuedAt,
    ...(op.startedAt !== undefined ? { startedAt: op.startedAt } : {}),
    ...(op.finishedAt !== undefined ? { finishedAt: op.finishedAt } : {}),
    ...(op.error ? { error: op.error } : {}),
  })
}

function isBefore(a: QueuedOperation, b: QueuedOperation): boolean {
  const rank = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority]
  return rank !== 0 ? rank < 0 : a.sequence < b.sequence
}

// ============================================================================
// Queue
// ============================================================================

export function createOperationQueue(options: OperationQueueOptions): OperationQueue {
  const { executor, cache } = options
  const rules = options.rules ?? DEFAULT_INVALIDATION_RULES
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3)
  const maxDepth = options.maxDepth ?? 0
  const retentionMs = options.retentionMs ?? 60_000
  const retryBaseMs = options.retryBaseMs ?? 1_000
  const retryMaxMs = options.retryMaxMs ?? 15_000
  const logger = options.logger ?? silentLogger
  const now = options.now ?? Date.now
  const sleep = options.sleep ?? defaultSleep
  const slot = options.slot ?? sharedRunningSlot

  const pending: QueuedOperation[] = []
  const finished = new Map<string, QueuedOperation>()
  let running: QueuedOperation | undefined
  let sequence = 0
  let closed = false
  let idleWaiters: Array<() => void> = []

  const failuresByKind = emptyFailureCounts()
  let succeeded = 0
  let failed = 0
  let cancelled = 0
  let rejected = 0

  function prune(): void {
    const at = now()
    for (const [id, op] of finished) {
      if (op.finishedAt !== undefined && at - op.finishedAt >= retentionMs) finished.delete(id)
    }
  }

  function depth(): number {
    return pending.length + (running ? 1 : 0)
  }

  function notifyIdle(): void {
    if (depth() > 0) return
    const waiters = idleWaiters
    idleWaiters = []
    for (const resolve of waiters) resolve()
  }

  function retire(op: QueuedOperation, state: 'succeeded' | 'failed' | 'cancelled', error?: QueueFailure): void {
    op.state = state
    op.finishedAt = now()
    if (error) op.error = error
    if (running === op) running = undefined
    finished.set(op.id, op)
    prune()
  }

  function takeNext(): QueuedOperation | undefined {
    let best = 0
    for (let i = 1; i < pending.length; i++) {
      const candidate = pending[i]
      const current = pending[best]
      if (candidate && current && isBefore(candidate, current)) best = i
    }
    return pending.splice(best, 1)[0]
  }

  function invalidateAfter(op: QueuedOperation): void {
    if (!cache) return
    const plan = planInvalidation(op.command, rules)
    const evicted = cache.invalidate(invalidationPredicate(plan))
    if (plan.scope === 'all') {
      logger.debug(`${op.command.kind} cleared the cache (${plan.reason})`, { evicted })
    } else {
      logger.debug(`${op.command.kind} invalidated cache`, { evicted, patterns: plan.patterns })
    }
  }

  function complete(op: QueuedOperation, result: ExecutionResult<unknown>): void {
    if (result.success) {
      succeeded++
      retire(op, 'succeeded')
      logger.debug(`operation ${op.id} (${op.command.kind}) succeeded`, { attempts: op.attempts })
    } else {
      failed++
      failuresByKind[result.error.kind]++
      retire(op, 'failed', result.error)
      logger.warn(`operation ${op.id} (${op.command.kind}) failed: ${result.error.message}`, {
        kind: result.error.kind,
        attempts: op.attempts,
      })
    }
  }

  async function drive(op: QueuedOperation): Promise<void> {
    for (;;) {
      op.attempts++
      const raw = await op.attempt()
      if (raw.success) {
        invalidateAfter(op)
        complete(op, op.finish(raw))
        return
      }
      if (!isRetryable(op.command, raw.error) || op.attempts >= maxAttempts) {
        complete(op, op.finish(raw))
        return
      }
      const delayMs = backoffDelay(op.attempts, retryBaseMs, retryMaxMs)
      op.state = 'retrying'
      logger.info(`operation ${op.id} (${op.command.kind}) hit ${raw.error.kind}, retrying in ${delayMs}ms`, {
        attempt: op.attempts,
        maxAttempts,
      })
      await sleep(delayMs)
      op.state = 'running'
    }
  }

  async function runNext(): Promise<void> {
    const op = takeNext()
    if (!op) return
    running = op
    op.state = 'running'
    op.startedAt = now()
    logger.debug(`operation ${op.id} (${op.command.kind}) started`, { pending: pending.length })
    try {
      await drive(op)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      const failure = new UnknownScriptError(`Operation ${op.id} aborted: ${message}`)
      failed++
      failuresByKind.unknown++
      retire(op, 'failed', failure)
      op.reject(failure)
      logger.error(`operation ${op.id} (${op.command.kind}) aborted: ${message}`)
    } finally {
      running = undefined
      notifyIdle()
    }
  }

  function schedule(): void {
    if (slot.isLocked()) logger.debug('running slot busy; operation waits', { depth: depth() })
    slot.runExclusive(runNext).catch((error: unknown) => {
      logger.error(`queue worker crashed: ${error instanceof Error ? error.message : String(error)}`)
    })
  }

  function enqueue<T>(command: ScriptCommand<T>, enqueueOptions: EnqueueOptions = {}): OperationHandle<T> {
    if (command.access !== 'write') {
      throw new InvalidCommandError(`Read command '${command.kind}' cannot be queued; reads run directly`)
    }

    let settle: (result: OperationResult<T>) => void = () => undefined
    const result = new Promise<OperationResult<T>>(resolve => {
      settle = resolve
    })

    const enqueuedAt = now()
    const op: QueuedOperation = {
      id: randomUUID(),
      command,
      priority: enqueueOptions.priority ?? 'normal',
      sequence: sequence++,
      state: 'pending',
      attempts: 0,
      enqueuedAt,
      attempt: () => executor.executeRaw(command, { maxAttempts: 1 }),
      finish: raw => {
        const latencyMs = now() - (op.startedAt ?? enqueuedAt)
        const interpreted = executor.interpret(command, { ...raw, attempts: op.attempts, latencyMs })
        settle(interpreted)
        return interpreted
      },
      reject: error => {
        settle({
          success: false,
          error,
          output: '',
          latencyMs: now() - enqueuedAt,
          attempts: op.attempts,
        })
      },
    }

    const handle: OperationHandle<T> = {
      id: op.id,
      result,
      cancel: () => cancel(op.id),
      snapshot: () => toSnapshot(op),
    }

    if (closed) {
      const error = new QueueClosedError(`Queue is shut down; '${command.kind}' was not accepted`)
      rejected++
      retire(op, 'failed', error)
      op.reject(error)
      logger.warn(error.message)
      return handle
    }

    const currentDepth = depth()
    if (maxDepth > 0 && currentDepth >= maxDepth) {
      const error = new QueueSaturationError(
        `Queue is saturated (${currentDepth} of ${maxDepth} operations); '${command.kind}' was not accepted`,
        currentDepth
      )
      rejected++
      retire(op, 'failed', error)
      op.reject(error)
      logger.warn(error.message)
      return handle
    }

    pending.push(op)
    logger.debug(`operation ${op.id} (${command.kind}) queued`, { priority: op.priority, depth: depth() })
    schedule()
    return handle
  }

  function withdraw(op: QueuedOperation, error: OperationCancelledError | QueueClosedError): void {
    cancelled++
    retire(op, 'cancelled', error)
    op.reject(error)
    logger.info(error.message)
  }

  function cancel(id: string): boolean {
    const index = pending.findIndex(op => op.id === id)
    const op = pending[index]
    if (!op) return false
    pending.splice(index, 1)
    withdraw(op, new OperationCancelledError(`Operation ${id} (${op.command.kind}) was cancelled before it started`))
    notifyIdle()
    return true
  }

  function shutdown(): Promise<void> {
    if (!closed) {
      closed = true
      const withdrawn = pending.splice(0, pending.length)
      for (const op of withdrawn) {
        withdraw(op, new QueueClosedError(`Operation ${op.id} (${op.command.kind}) was cancelled by queue shutdown`))
      }
      logger.info('queue shut down', { cancelled: withdrawn.length, running: running?.id ?? null })
      notifyIdle()
    }
    return onIdle()
  }

  function listOperations(): OperationSnapshot[] {
    const ordered = [...pending].sort((a, b) => (isBefore(a, b) ? -1 : 1))
    return [...(running ? [running] : []), ...ordered].map(toSnapshot)
  }

  function getOperation(id: string): OperationSnapshot | undefined {
    prune()
    if (running?.id === id) return toSnapshot(running)
    const op = pending.find(candidate => candidate.id === id) ?? finished.get(id)
    return op ? toSnapshot(op) : undefined
  }

  function status(): QueueStatus {
    prune()
    const at = now()
    const oldest = pending.reduce<number | null>(
      (min, op) => (min === null || op.enqueuedAt < min ? op.enqueuedAt : min),
      null
    )
    return {
      depth: depth(),
      pending: pending.length,
      running: running?.id ?? null,
      oldestPendingAgeMs: oldest === null ? null : at - oldest,
      failuresByKind: { ...failuresByKind },
      succeeded,
      failed,
      cancelled,
      rejected,
    }
  }

  function onIdle(): Promise<void> {
    if (depth() === 0) return Promise.resolve()
    return new Promise(resolve => {
      idleWaiters.push(resolve)
    })
  }

  return { enqueue, cancel, getOperation, listOperations, status, onIdle, shutdown }
}
