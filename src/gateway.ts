/**
 * Command Gateway
 *
 * The single entry point callers use. Reads go straight to the executor,
 * through the result cache when the command is cacheable; writes go through
 * the operation queue. A read never waits on queued writes.
 */

import { type ScriptCommand, isCacheable } from './command'
import { InvalidCommandError } from './errors'
import type { ExecutionResult, ScriptExecutor } from './executor'
import type {
  EnqueueOptions,
  OperationHandle,
  OperationQueue,
  OperationResult,
  QueueStatus,
} from './operation-queue'
import type { CacheStats, ResultCache } from './result-cache'
import { type Logger, silentLogger } from './logger'

export type GatewayStatus = {
  queue: QueueStatus
  cache: CacheStats
}

export type ScriptGateway = {
  /** Routes by access: reads run directly, writes are queued and awaited. */
  run<T>(command: ScriptCommand<T>, options?: EnqueueOptions): Promise<OperationResult<T>>
  read<T>(command: ScriptCommand<T>): Promise<ExecutionResult<T>>
  write<T>(command: ScriptCommand<T>, options?: EnqueueOptions): OperationHandle<T>
  invalidate(target: readonly string[] | ((key: string) => boolean)): number
  isApplicationRunning(application: string): Promise<boolean>
  status(): GatewayStatus
}

export type GatewayOptions = {
  executor: ScriptExecutor
  queue: OperationQueue
  cache: ResultCache<ExecutionResult<string>>
  cacheEnabled?: boolean
  defaultTtlMs?: number
  logger?: Logger
}

export function createScriptGateway(options: GatewayOptions): ScriptGateway {
  const { executor, queue, cache } = options
  const cacheEnabled = options.cacheEnabled ?? true
  const defaultTtlMs = options.defaultTtlMs ?? 30_000
  const logger = options.logger ?? silentLogger

  async function read<T>(command: ScriptCommand<T>): Promise<ExecutionResult<T>> {
    if (command.access !== 'read') {
      throw new InvalidCommandError(`Write command '${command.kind}' must go through the queue`)
    }

    const key = command.cacheKey
    if (!cacheEnabled || key === undefined || !isCacheable(command)) {
      return executor.execute(command)
    }

    const lookup = await cache.getOrCompute(
      key,
      command.cacheTtlMs ?? defaultTtlMs,
      () => executor.executeRaw(command),
      { shouldStore: raw => raw.success && command.shape.parse(raw.output).ok }
    )
    if (lookup.hit) logger.debug(`${command.kind} served from cache`, { key })
    const raw = lookup.value
    return executor.interpret(command, lookup.hit && raw.success ? { ...raw, cached: true } : raw)
  }

  function write<T>(command: ScriptCommand<T>, enqueueOptions?: EnqueueOptions): OperationHandle<T> {
    return queue.enqueue(command, enqueueOptions)
  }

  async function run<T>(command: ScriptCommand<T>, runOptions?: EnqueueOptions): Promise<OperationResult<T>> {
    if (command.access === 'read') return read(command)
    return write(command, runOptions).result
  }

  return {
    run,
    read,
    write,
    invalidate: target => cache.invalidate(target),
    isApplicationRunning: application => executor.isApplicationRunning(application),
    status: () => ({ queue: queue.status(), cache: cache.stats() }),
  }
}
