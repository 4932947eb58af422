/**
 * Result Cache
 *
 * Time-bounded memo of read results keyed by command cache key. Entries are
 * swept lazily: an entry whose age has reached its ttl is dropped on the next
 * lookup and never served. Concurrent misses on one key share a computation.
 */

import { type Logger, silentLogger } from './logger'

// ============================================================================
// Types
// ============================================================================

export type CacheEntry<V> = {
  readonly key: string
  readonly value: V
  readonly insertedAt: number
  readonly ttlMs: number
}

export type CacheLookup<V> = {
  value: V
  /** True when no computation was started for this call. */
  hit: boolean
}

export type ComputeOptions<V> = {
  /** Decides whether a computed value is kept; defaults to always. */
  shouldStore?: (value: V) => boolean
}

export type CacheStats = {
  hits: number
  misses: number
  evictions: number
  size: number
}

export type InvalidationTarget = readonly string[] | ((key: string) => boolean)

export type ResultCache<V> = {
  getOrCompute(
    key: string,
    ttlMs: number,
    compute: () => Promise<V>,
    options?: ComputeOptions<V>
  ): Promise<CacheLookup<V>>
  peek(key: string): V | undefined
  invalidate(target: InvalidationTarget): number
  clear(): number
  size(): number
  stats(): CacheStats
}

export type ResultCacheOptions = {
  now?: () => number
  logger?: Logger
}

type InFlight<V> = {
  promise: Promise<V>
  /** Set when an invalidation lands while the computation runs. */
  stale: boolean
}

// ============================================================================
// Cache
// ============================================================================

export function createResultCache<V>(options: ResultCacheOptions = {}): ResultCache<V> {
  const now = options.now ?? Date.now
  const logger = options.logger ?? silentLogger
  const entries = new Map<string, CacheEntry<V>>()
  const inFlight = new Map<string, InFlight<V>>()
  let hits = 0
  let misses = 0
  let evictions = 0

  function isExpired(entry: CacheEntry<V>, at: number): boolean {
    return at - entry.insertedAt >= entry.ttlMs
  }

  function live(key: string): CacheEntry<V> | undefined {
    const entry = entries.get(key)
    if (!entry) return undefined
    if (isExpired(entry, now())) {
      entries.delete(key)
      evictions++
      return undefined
    }
    return entry
  }

  function sweep(): void {
    const at = now()
    for (const [key, entry] of entries) {
      if (isExpired(entry, at)) {
        entries.delete(key)
        evictions++
      }
    }
  }

  async function compute(
    key: string,
    ttlMs: number,
    run: () => Promise<V>,
    shouldStore: (value: V) => boolean
  ): Promise<V> {
    const flight: InFlight<V> = { promise: run(), stale: false }
    inFlight.set(key, flight)
    try {
      const value = await flight.promise
      if (!flight.stale && ttlMs > 0 && shouldStore(value)) {
        entries.set(key, Object.freeze({ key, value, insertedAt: now(), ttlMs }))
      }
      return value
    } finally {
      if (inFlight.get(key) === flight) inFlight.delete(key)
    }
  }

  async function getOrCompute(
    key: string,
    ttlMs: number,
    run: () => Promise<V>,
    computeOptions: ComputeOptions<V> = {}
  ): Promise<CacheLookup<V>> {
    const entry = live(key)
    if (entry) {
      hits++
      return { value: entry.value, hit: true }
    }

    const pending = inFlight.get(key)
    if (pending) {
      hits++
      return { value: await pending.promise, hit: true }
    }

    misses++
    const value = await compute(key, ttlMs, run, computeOptions.shouldStore ?? (() => true))
    return { value, hit: false }
  }

  function invalidate(target: InvalidationTarget): number {
    const matches = typeof target === 'function' ? target : (key: string) => target.includes(key)
    let count = 0
    for (const key of [...entries.keys()]) {
      if (matches(key)) {
        entries.delete(key)
        count++
      }
    }
    for (const [key, flight] of inFlight) {
      if (matches(key)) {
        flight.stale = true
        inFlight.delete(key)
      }
    }
    evictions += count
    if (count > 0) logger.debug(`invalidated ${count} cache entr${count === 1 ? 'y' : 'ies'}`)
    return count
  }

  function clear(): number {
    const count = entries.size
    entries.clear()
    for (const flight of inFlight.values()) flight.stale = true
    inFlight.clear()
    evictions += count
    return count
  }

  function size(): number {
    sweep()
    return entries.size
  }

  return {
    getOrCompute,
    peek: key => live(key)?.value,
    invalidate,
    clear,
    size,
    stats: () => {
      const current = size()
      return { hits, misses, evictions, size: current }
    },
  }
}
