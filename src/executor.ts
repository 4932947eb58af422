/**
 * Script Executor
 *
 * Runs one command against the engine with a hard deadline, classifies
 * failures, and retries transient ones with exponential backoff. Expected
 * engine failures come back as failure results; nothing here throws for them.
 */

import type { ScriptCommand } from './command'
import { readCommand, shapes } from './command'
import { type ScriptError, TimeoutError, UnknownScriptError } from './errors'
import { classifyError } from './error-classifier'
import type { ScriptRunner, RawRun } from './script-runner'
import { APPLICATION_ERROR_PREFIX, quoteText } from './script-text'
import { type Logger, silentLogger } from './logger'

// ============================================================================
// Types
// ============================================================================

export type ExecutionSuccess<T> = {
  success: true
  value: T
  output: string
  latencyMs: number
  attempts: number
  cached: boolean
}

export type ExecutionFailure<E = ScriptError> = {
  success: false
  error: E
  output: string
  latencyMs: number
  attempts: number
}

export type ExecutionResult<T, E = ScriptError> = ExecutionSuccess<T> | ExecutionFailure<E>

export type ExecuteOptions = {
  timeoutMs?: number
  maxAttempts?: number
}

export type ExecutorOptions = {
  runner: ScriptRunner
  timeoutMs?: number
  maxAttempts?: number
  retryBaseMs?: number
  retryMaxMs?: number
  logger?: Logger
  sleep?: (ms: number) => Promise<void>
  /** Monotonic milliseconds, for latency. */
  clock?: () => number
}

export type ScriptExecutor = {
  /** Runs the command and returns its trimmed stdout without shape parsing. */
  executeRaw<T>(command: ScriptCommand<T>, options?: ExecuteOptions): Promise<ExecutionResult<string>>
  execute<T>(command: ScriptCommand<T>, options?: ExecuteOptions): Promise<ExecutionResult<T>>
  /** Applies the command's result shape to a raw result. */
  interpret<T>(command: ScriptCommand<T>, raw: ExecutionResult<string>): ExecutionResult<T>
  isApplicationRunning(application: string): Promise<boolean>
}

type AttemptOutcome =
  | { ok: true; output: string }
  | { ok: false; error: ScriptError; output: string }

// ============================================================================
// Helpers
// ============================================================================

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => {
    setTimeout(resolve, ms)
  })

export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * 2 ** (attempt - 1), maxMs)
}

/**
 * A timed-out command may already have reached the application, so only an
 * idempotent command is re-sent after a timeout.
 */
export function isRetryable<T>(command: ScriptCommand<T>, error: ScriptError): boolean {
  if (!error.transient) return false
  return error.kind !== 'timeout' || command.idempotent
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// ============================================================================
// Executor
// ============================================================================

export function createScriptExecutor(options: ExecutorOptions): ScriptExecutor {
  const { runner } = options
  const defaultTimeoutMs = options.timeoutMs ?? 30_000
  const defaultMaxAttempts = options.maxAttempts ?? 3
  const retryBaseMs = options.retryBaseMs ?? 1_000
  const retryMaxMs = options.retryMaxMs ?? 15_000
  const logger = options.logger ?? silentLogger
  const sleep = options.sleep ?? defaultSleep
  const clock = options.clock ?? (() => performance.now())

  function judge(raw: RawRun): AttemptOutcome {
    if (raw.exitCode !== 0) {
      return { ok: false, error: classifyError(raw.stderr || raw.stdout), output: raw.stderr }
    }
    if (raw.stdout.startsWith(APPLICATION_ERROR_PREFIX)) {
      return {
        ok: false,
        error: classifyError(raw.stdout.slice(APPLICATION_ERROR_PREFIX.length)),
        output: raw.stdout,
      }
    }
    return { ok: true, output: raw.stdout }
  }

  async function attemptOnce(source: string, timeoutMs: number): Promise<AttemptOutcome> {
    const controller = new AbortController()
    let timer: ReturnType<typeof setTimeout> | undefined
    const deadline = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => {
        controller.abort()
        resolve('timeout')
      }, timeoutMs)
    })
    const timedOut = (): AttemptOutcome => ({
      ok: false,
      error: new TimeoutError(`Engine call exceeded ${timeoutMs}ms and was aborted`, timeoutMs),
      output: '',
    })

    try {
      const run = runner.run(source, { signal: controller.signal }).then(
        raw => ({ raw }),
        (thrown: unknown) => ({ thrown })
      )
      const outcome = await Promise.race([run, deadline])
      if (outcome === 'timeout') return timedOut()
      if ('thrown' in outcome) {
        if (controller.signal.aborted) return timedOut()
        return {
          ok: false,
          error: new UnknownScriptError(`Engine process failed: ${errorMessage(outcome.thrown)}`),
          output: '',
        }
      }
      return judge(outcome.raw)
    } finally {
      clearTimeout(timer)
    }
  }

  async function executeRaw<T>(
    command: ScriptCommand<T>,
    callOptions: ExecuteOptions = {}
  ): Promise<ExecutionResult<string>> {
    const timeoutMs = callOptions.timeoutMs ?? command.timeoutMs ?? defaultTimeoutMs
    const maxAttempts = Math.max(1, callOptions.maxAttempts ?? defaultMaxAttempts)
    const started = clock()

    for (let attempt = 1; ; attempt += 1) {
      const outcome = await attemptOnce(command.source, timeoutMs)
      const latencyMs = clock() - started

      if (outcome.ok) {
        logger.debug(`${command.kind} succeeded`, { attempt, latencyMs })
        return { success: true, value: outcome.output, output: outcome.output, latencyMs, attempts: attempt, cached: false }
      }

      const { error } = outcome
      if (!isRetryable(command, error) || attempt >= maxAttempts) {
        logger.warn(`${command.kind} failed: ${error.message}`, { kind: error.kind, attempt, latencyMs })
        return { success: false, error, output: outcome.output, latencyMs, attempts: attempt }
      }

      const delayMs = backoffDelay(attempt, retryBaseMs, retryMaxMs)
      logger.info(`${command.kind} hit ${error.kind}, retrying in ${delayMs}ms`, { attempt, maxAttempts })
      await sleep(delayMs)
    }
  }

  function interpret<T>(command: ScriptCommand<T>, raw: ExecutionResult<string>): ExecutionResult<T> {
    if (!raw.success) return raw
    const parsed = command.shape.parse(raw.output)
    if (parsed.ok) return { ...raw, value: parsed.value }
    return {
      success: false,
      error: new UnknownScriptError(`Unexpected ${command.shape.name} output from ${command.kind}: ${parsed.error}`),
      output: raw.output,
      latencyMs: raw.latencyMs,
      attempts: raw.attempts,
    }
  }

  async function execute<T>(command: ScriptCommand<T>, callOptions?: ExecuteOptions): Promise<ExecutionResult<T>> {
    return interpret(command, await executeRaw(command, callOptions))
  }

  async function isApplicationRunning(application: string): Promise<boolean> {
    const probe = readCommand({
      kind: 'application.running',
      source: `return application ${quoteText(application)} is running`,
      shape: shapes.boolean,
    })
    const result = await execute(probe, { maxAttempts: 1 })
    return result.success && result.value
  }

  return { executeRaw, execute, interpret, isApplicationRunning }
}
