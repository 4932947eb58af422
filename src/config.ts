/**
 * Configuration
 *
 * Environment-driven settings with clamped numeric values. An optional dotenv
 * file supplies defaults; variables already present in the environment win.
 */

import { readFileSync } from 'node:fs'
import { parse } from 'dotenv'
import { InvalidConfigError } from './errors'
import type { DateOrder } from './date-normalizer'
import { type Verbosity, VERBOSITIES } from './logger'

export type ScriptgateConfig = {
  engine: {
    binary: string
    timeoutMs: number
    maxAttempts: number
    retryBaseMs: number
    retryMaxMs: number
  }
  cache: {
    enabled: boolean
    defaultTtlMs: number
  }
  queue: {
    maxAttempts: number
    /** 0 means unbounded. */
    maxDepth: number
    retentionMs: number
  }
  dates: {
    /** Order applied to ambiguous slash dates; undefined fails them closed. */
    order?: DateOrder
  }
  verbosity: Verbosity
}

export const DEFAULT_CONFIG: ScriptgateConfig = {
  engine: {
    binary: 'osascript',
    timeoutMs: 30_000,
    maxAttempts: 3,
    retryBaseMs: 1_000,
    retryMaxMs: 15_000,
  },
  cache: {
    enabled: true,
    defaultTtlMs: 30_000,
  },
  queue: {
    maxAttempts: 3,
    maxDepth: 0,
    retentionMs: 60_000,
  },
  dates: {},
  verbosity: 'normal',
}

type Env = Record<string, string | undefined>

export type LoadConfigOptions = {
  env?: Env
  envFile?: string
}

// ============================================================================
// Value Readers
// ============================================================================

function readNumber(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key]?.trim()
  if (raw === undefined || raw === '') return fallback
  const parsed = Number(raw)
  return Math.max(min, Math.min(max, Number.isFinite(parsed) ? Math.round(parsed) : fallback))
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase()
  if (raw === undefined || raw === '') return fallback
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true
  if (['0', 'false', 'no', 'off'].includes(raw)) return false
  throw new InvalidConfigError(`${key} must be a boolean, got '${env[key]}'`)
}

function readChoice<T extends string>(env: Env, key: string, choices: readonly T[]): T | undefined {
  const raw = env[key]?.trim().toLowerCase()
  if (raw === undefined || raw === '') return undefined
  const match = choices.find(choice => choice === raw)
  if (match === undefined) {
    throw new InvalidConfigError(`${key} must be one of ${choices.join(', ')}, got '${env[key]}'`)
  }
  return match
}

// ============================================================================
// Loading
// ============================================================================

export function loadConfig(options: LoadConfigOptions = {}): ScriptgateConfig {
  const fileValues = options.envFile ? parse(readFileSync(options.envFile)) : {}
  const env: Env = { ...fileValues, ...(options.env ?? process.env) }
  const defaults = DEFAULT_CONFIG

  const order = readChoice(env, 'SCRIPTGATE_DATE_ORDER', ['strict', 'us', 'european'] as const)
  const retryBaseMs = readNumber(env, 'SCRIPTGATE_RETRY_BASE_MS', defaults.engine.retryBaseMs, 10, 10_000)

  return {
    engine: {
      binary: env.SCRIPTGATE_ENGINE_BINARY?.trim() || defaults.engine.binary,
      timeoutMs: readNumber(env, 'SCRIPTGATE_TIMEOUT_MS', defaults.engine.timeoutMs, 1_000, 300_000),
      maxAttempts: readNumber(env, 'SCRIPTGATE_MAX_ATTEMPTS', defaults.engine.maxAttempts, 1, 10),
      retryBaseMs,
      retryMaxMs: Math.max(
        retryBaseMs,
        readNumber(env, 'SCRIPTGATE_RETRY_MAX_MS', defaults.engine.retryMaxMs, 100, 60_000)
      ),
    },
    cache: {
      enabled: readBoolean(env, 'SCRIPTGATE_CACHE_ENABLED', defaults.cache.enabled),
      defaultTtlMs: readNumber(env, 'SCRIPTGATE_CACHE_TTL_MS', defaults.cache.defaultTtlMs, 100, 3_600_000),
    },
    queue: {
      maxAttempts: readNumber(env, 'SCRIPTGATE_QUEUE_MAX_ATTEMPTS', defaults.queue.maxAttempts, 1, 10),
      maxDepth: readNumber(env, 'SCRIPTGATE_QUEUE_MAX_DEPTH', defaults.queue.maxDepth, 0, 10_000),
      retentionMs: readNumber(env, 'SCRIPTGATE_QUEUE_RETENTION_MS', defaults.queue.retentionMs, 0, 3_600_000),
    },
    dates: order === undefined || order === 'strict' ? {} : { order },
    verbosity: readChoice(env, 'SCRIPTGATE_LOG_VERBOSITY', VERBOSITIES) ?? defaults.verbosity,
  }
}
