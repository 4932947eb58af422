/**
 * Public API Module
 *
 * Wires runner, executor, cache, queue and gateway from one configuration.
 */

import type { Result } from './result'
import type { CalendarDate } from './calendar-date'
import type { InvalidDateError } from './errors'
import { type ScriptgateConfig, loadConfig } from './config'
import { type DateInput, type NormalizeOptions, normalizeDate } from './date-normalizer'
import { type ExecutionResult, type ScriptExecutor, createScriptExecutor } from './executor'
import { type ScriptGateway, createScriptGateway } from './gateway'
import { type Logger, createLogger } from './logger'
import { type OperationQueue, type RunningSlot, createOperationQueue } from './operation-queue'
import { type ResultCache, createResultCache } from './result-cache'
import type { InvalidationRules } from './invalidation'
import { type ScriptRunner, createOsascriptRunner } from './script-runner'

// ============================================================================
// Types
// ============================================================================

export type ScriptgateOverrides = {
  runner?: ScriptRunner
  logger?: Logger
  rules?: InvalidationRules
  sleep?: (ms: number) => Promise<void>
  /** Wall-clock milliseconds for cache ages and queue timestamps. */
  now?: () => number
  /** Calendar clock for `today` and friends. */
  clock?: () => Date
  slot?: RunningSlot
}

export type Scriptgate = ScriptGateway & {
  readonly config: ScriptgateConfig
  readonly executor: ScriptExecutor
  readonly queue: OperationQueue
  readonly cache: ResultCache<ExecutionResult<string>>
  readonly logger: Logger
  /** Normalizes a date with the configured order hint unless one is given. */
  normalizeDate(input: DateInput | null | undefined, options?: NormalizeOptions): Result<CalendarDate, InvalidDateError>
}

// ============================================================================
// Implementation
// ============================================================================

export function createScriptgate(
  config: ScriptgateConfig = loadConfig(),
  overrides: ScriptgateOverrides = {}
): Scriptgate {
  const logger = overrides.logger ?? createLogger({ verbosity: config.verbosity, scope: 'scriptgate' })
  const runner = overrides.runner ?? createOsascriptRunner({ binary: config.engine.binary })

  const executor = createScriptExecutor({
    runner,
    timeoutMs: config.engine.timeoutMs,
    maxAttempts: config.engine.maxAttempts,
    retryBaseMs: config.engine.retryBaseMs,
    retryMaxMs: config.engine.retryMaxMs,
    logger: logger.child('executor'),
    ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
  })

  const cache = createResultCache<ExecutionResult<string>>({
    logger: logger.child('cache'),
    ...(overrides.now ? { now: overrides.now } : {}),
  })

  const queue = createOperationQueue({
    executor,
    cache,
    maxAttempts: config.queue.maxAttempts,
    maxDepth: config.queue.maxDepth,
    retentionMs: config.queue.retentionMs,
    retryBaseMs: config.engine.retryBaseMs,
    retryMaxMs: config.engine.retryMaxMs,
    logger: logger.child('queue'),
    ...(overrides.rules ? { rules: overrides.rules } : {}),
    ...(overrides.now ? { now: overrides.now } : {}),
    ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
    ...(overrides.slot ? { slot: overrides.slot } : {}),
  })

  const gateway = createScriptGateway({
    executor,
    queue,
    cache,
    cacheEnabled: config.cache.enabled,
    defaultTtlMs: config.cache.defaultTtlMs,
    logger: logger.child('gateway'),
  })

  logger.debug('scriptgate ready', {
    binary: config.engine.binary,
    cache: config.cache.enabled,
    dateOrder: config.dates.order ?? 'strict',
  })

  return {
    ...gateway,
    config,
    executor,
    queue,
    cache,
    logger,
    normalizeDate: (input, options = {}) =>
      normalizeDate(input, {
        ...(config.dates.order ? { order: config.dates.order } : {}),
        ...(overrides.clock ? { now: overrides.clock } : {}),
        ...options,
      }),
  }
}
