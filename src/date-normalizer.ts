/**
 * Calendar Date Normalizer
 *
 * Turns the date shapes callers actually send (ISO, US, European, keywords,
 * relative offsets, month names) into a CalendarDate. Never throws: every
 * rejection is an InvalidDateError in the returned Result.
 */

import { type Result, Err } from './result'
import { InvalidDateError } from './errors'
import {
  type CalendarDate,
  makeCalendarDate, validateCalendarDate, calendarDateFromClock, addDays,
} from './calendar-date'

// ============================================================================
// Types
// ============================================================================

/** Field order for slash-separated numeric dates. */
export type DateOrder = 'us' | 'european'

export type NormalizeOptions = {
  /** Resolves slash dates whose day and month could be swapped. */
  order?: DateOrder
  /** Clock used for keywords, offsets and year-less month names. */
  now?: () => Date
}

export type DateInput = string | CalendarDate

// ============================================================================
// Lookup Tables
// ============================================================================

const EMPTY_MARKERS = new Set(['', 'none', 'null', 'missing value'])

const KEYWORD_OFFSETS = new Map<string, number>([
  ['today', 0],
  ['tomorrow', 1],
  ['yesterday', -1],
])

const MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
]

function monthFromName(name: string): number | undefined {
  if (name === 'sept') return 9
  const index = MONTH_NAMES.findIndex(full => full === name || (name.length === 3 && full.startsWith(name)))
  return index === -1 ? undefined : index + 1
}

// ============================================================================
// Patterns
// ============================================================================

const ISO_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[t ](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/
const SLASH_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/
const DOT_PATTERN = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/
const RELATIVE_PATTERN = /^([+-])?\s*(\d{1,5})\s*(d|days?|w|weeks?)$/
const MONTH_FIRST_PATTERN = /^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?(?:,?\s+(\d{4}))?$/
const DAY_FIRST_PATTERN = /^(\d{1,2})(?:st|nd|rd|th)?\s+([a-z]+)\.?,?(?:\s+(\d{4}))?$/

function int(text: string | undefined): number {
  return text === undefined ? 0 : parseInt(text, 10)
}

// ============================================================================
// Normalization
// ============================================================================

export function normalizeDate(
  input: DateInput | null | undefined,
  options: NormalizeOptions = {}
): Result<CalendarDate, InvalidDateError> {
  if (input == null) return Err(new InvalidDateError('No date given'))
  if (typeof input !== 'string') return validateCalendarDate(input)

  const text = input.trim().toLowerCase().replace(/\s+/g, ' ')
  if (EMPTY_MARKERS.has(text)) return Err(new InvalidDateError(`No date given: '${input}'`))

  const now = options.now ?? (() => new Date())

  const keywordOffset = KEYWORD_OFFSETS.get(text)
  if (keywordOffset !== undefined) {
    return addDays(calendarDateFromClock(now()), keywordOffset)
  }

  const relative = RELATIVE_PATTERN.exec(text)
  if (relative) {
    const magnitude = int(relative[2]) * (relative[3]?.startsWith('w') ? 7 : 1)
    return addDays(calendarDateFromClock(now()), relative[1] === '-' ? -magnitude : magnitude)
  }

  const iso = ISO_PATTERN.exec(text)
  if (iso) {
    const time = iso[4] === undefined
      ? undefined
      : { hour: int(iso[4]), minute: int(iso[5]), second: int(iso[6]) }
    return withInputContext(makeCalendarDate(int(iso[1]), int(iso[2]), int(iso[3]), time), input)
  }

  const slash = SLASH_PATTERN.exec(text)
  if (slash) return resolveSlashDate(int(slash[1]), int(slash[2]), int(slash[3]), input, options.order)

  const dot = DOT_PATTERN.exec(text)
  if (dot) return withInputContext(makeCalendarDate(int(dot[3]), int(dot[2]), int(dot[1])), input)

  const monthFirst = MONTH_FIRST_PATTERN.exec(text)
  if (monthFirst) return fromMonthName(monthFirst[1], int(monthFirst[2]), monthFirst[3], input, now)

  const dayFirst = DAY_FIRST_PATTERN.exec(text)
  if (dayFirst) return fromMonthName(dayFirst[2], int(dayFirst[1]), dayFirst[3], input, now)

  return Err(new InvalidDateError(`Unrecognized date format: '${input}'`))
}

function resolveSlashDate(
  first: number,
  second: number,
  year: number,
  input: string,
  order: DateOrder | undefined
): Result<CalendarDate, InvalidDateError> {
  if (order === 'us') return withInputContext(makeCalendarDate(year, first, second), input)
  if (order === 'european') return withInputContext(makeCalendarDate(year, second, first), input)

  if (first === second || (first <= 12 && second > 12)) {
    return withInputContext(makeCalendarDate(year, first, second), input)
  }
  if (first > 12 && second <= 12) {
    return withInputContext(makeCalendarDate(year, second, first), input)
  }
  if (first >= 1 && second >= 1 && first <= 12 && second <= 12) {
    return Err(new InvalidDateError(
      `Ambiguous date '${input}': could be month/day or day/month; pass an explicit order`
    ))
  }
  return Err(new InvalidDateError(`Invalid date: '${input}'`))
}

function fromMonthName(
  name: string | undefined,
  day: number,
  yearText: string | undefined,
  input: string,
  now: () => Date
): Result<CalendarDate, InvalidDateError> {
  const month = name === undefined ? undefined : monthFromName(name)
  if (month === undefined) return Err(new InvalidDateError(`Unknown month name in '${input}'`))
  const year = yearText === undefined ? now().getFullYear() : int(yearText)
  return withInputContext(makeCalendarDate(year, month, day), input)
}

function withInputContext(
  result: Result<CalendarDate, InvalidDateError>,
  input: string
): Result<CalendarDate, InvalidDateError> {
  if (result.ok) return result
  return Err(new InvalidDateError(`${result.error.message} (input '${input}')`))
}

/** True when the string would be rejected only for lack of an order hint. */
export function isAmbiguousDate(input: string): boolean {
  const slash = SLASH_PATTERN.exec(input.trim())
  if (!slash) return false
  const first = int(slash[1])
  const second = int(slash[2])
  return first !== second && first >= 1 && second >= 1 && first <= 12 && second <= 12
}
