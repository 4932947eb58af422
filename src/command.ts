/**
 * Script Command
 *
 * The unit handed to the executor: source text plus everything the routing
 * layers need to know about it (read or write, cacheability, what it
 * invalidates). Commands are built per call and never mutated.
 */

import { type Result, Ok, Err } from './result'
import { InvalidCommandError } from './errors'
import type { CalendarDate } from './calendar-date'
import { decodeDate, decodeOptionalDate } from './date-codec'

// ============================================================================
// Result Shapes
// ============================================================================

export type ResultShape<T> = {
  readonly name: string
  parse(output: string): Result<T, string>
}

const MISSING_VALUE = 'missing value'

function splitList(output: string): string[] {
  const parts: string[] = []
  let current = ''
  let inQuotes = false
  let depth = 0
  for (const char of output) {
    if (char === '"') inQuotes = !inQuotes
    else if (!inQuotes && char === '{') depth++
    else if (!inQuotes && char === '}') depth--
    if (char === ',' && !inQuotes && depth === 0) {
      parts.push(current.trim())
      current = ''
    } else {
      current += char
    }
  }
  if (current.trim() !== '') parts.push(current.trim())
  return parts.map(part => (part.startsWith('"') && part.endsWith('"') ? part.slice(1, -1) : part))
}

export const shapes = {
  none: {
    name: 'none',
    parse: () => Ok(null),
  } satisfies ResultShape<null>,

  text: {
    name: 'text',
    parse: (output: string) => Ok(output),
  } satisfies ResultShape<string>,

  optionalText: {
    name: 'optionalText',
    parse: (output: string) => Ok(output === MISSING_VALUE || output === '' ? null : output),
  } satisfies ResultShape<string | null>,

  integer: {
    name: 'integer',
    parse: (output: string): Result<number, string> => {
      const trimmed = output.trim()
      return /^-?\d+$/.test(trimmed) ? Ok(parseInt(trimmed, 10)) : Err(`expected an integer, got '${trimmed}'`)
    },
  } satisfies ResultShape<number>,

  boolean: {
    name: 'boolean',
    parse: (output: string): Result<boolean, string> => {
      const trimmed = output.trim()
      if (trimmed === 'true') return Ok(true)
      if (trimmed === 'false') return Ok(false)
      return Err(`expected true or false, got '${trimmed}'`)
    },
  } satisfies ResultShape<boolean>,

  list: {
    name: 'list',
    parse: (output: string) => Ok(output.trim() === '' ? [] : splitList(output)),
  } satisfies ResultShape<string[]>,

  date: {
    name: 'date',
    parse: (output: string): Result<CalendarDate, string> => {
      const decoded = decodeDate(output)
      return decoded.ok ? decoded : Err(decoded.error.message)
    },
  } satisfies ResultShape<CalendarDate>,

  optionalDate: {
    name: 'optionalDate',
    parse: (output: string): Result<CalendarDate | null, string> => {
      const decoded = decodeOptionalDate(output)
      return decoded.ok ? decoded : Err(decoded.error.message)
    },
  } satisfies ResultShape<CalendarDate | null>,
}

// ============================================================================
// Commands
// ============================================================================

export type CommandAccess = 'read' | 'write'

export type ScriptCommand<T> = {
  /** Dotted operation name, e.g. `todo.rename` or `projects.list`. */
  readonly kind: string
  readonly source: string
  readonly shape: ResultShape<T>
  readonly access: CommandAccess
  /** Safe to run twice with the same effect; only then is a timed-out run re-sent. */
  readonly idempotent: boolean
  /** A read that changes application state (e.g. reveals a window); never cached. */
  readonly sideEffects: boolean
  readonly cacheKey?: string
  readonly cacheTtlMs?: number
  /** Parent collection a write touches, e.g. `project:abc`. */
  readonly scope?: string
  /** Extra cache keys or prefixes a write makes stale. */
  readonly invalidates?: readonly string[]
  readonly timeoutMs?: number
}

export type ReadCommandInput<T> = {
  kind: string
  source: string
  shape: ResultShape<T>
  cacheKey?: string
  cacheTtlMs?: number
  sideEffects?: boolean
  timeoutMs?: number
}

export type WriteCommandInput<T> = {
  kind: string
  source: string
  shape: ResultShape<T>
  idempotent?: boolean
  scope?: string
  invalidates?: readonly string[]
  timeoutMs?: number
}

function assertSource(kind: string, source: string): void {
  if (kind.trim() === '') throw new InvalidCommandError('Command kind is required')
  if (source.trim() === '') throw new InvalidCommandError(`Command '${kind}' has empty source`)
}

export function readCommand<T>(input: ReadCommandInput<T>): ScriptCommand<T> {
  assertSource(input.kind, input.source)
  const command: ScriptCommand<T> = {
    ...input,
    access: 'read',
    idempotent: true,
    sideEffects: input.sideEffects ?? false,
  }
  return Object.freeze(command)
}

export function writeCommand<T>(input: WriteCommandInput<T>): ScriptCommand<T> {
  assertSource(input.kind, input.source)
  const command: ScriptCommand<T> = {
    ...input,
    access: 'write',
    idempotent: input.idempotent ?? false,
    sideEffects: true,
    ...(input.invalidates ? { invalidates: Object.freeze([...input.invalidates]) } : {}),
  }
  return Object.freeze(command)
}

/** Cacheable when it is a side-effect-free read with a key. */
export function isCacheable<T>(command: ScriptCommand<T>): boolean {
  return command.access === 'read' && !command.sideEffects && command.cacheKey !== undefined
}
