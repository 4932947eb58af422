/**
 * Locale-Independent Date Codec
 *
 * Dates cross the engine boundary as numbers and symbolic constants only;
 * formatted date strings are never sent and never read back.
 *
 * Encoding resets the time and sets the day to 1 before year and month are
 * assigned, sets the month through its named constant, and writes the real
 * day last. No intermediate value ever holds a day past the end of its month.
 */

import { type Result, Ok, Err } from './result'
import { InvalidDateError } from './errors'
import {
  type CalendarDate,
  validateCalendarDate, makeCalendarDate, secondsSinceMidnight, timeFromSeconds,
} from './calendar-date'
import { assertIdentifier } from './script-text'

export const MONTH_CONSTANTS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const

export type MonthConstant = (typeof MONTH_CONSTANTS)[number]

export function monthConstant(month: number): MonthConstant | undefined {
  return MONTH_CONSTANTS[month - 1]
}

/** Field separator used by dateReadout and decodeDate. */
export const READOUT_SEPARATOR = '|'

const MISSING_VALUE = 'missing value'
const READOUT_PATTERN = /^(\d{1,4})\|(\d{1,2})\|(\d{1,2})\|(\d{1,5})$/

// ============================================================================
// Encoding
// ============================================================================

/**
 * Statements that leave `variable` holding `date`. Throws InvalidCommandError
 * only for a malformed variable name.
 */
export function encodeDate(date: CalendarDate, variable = 'theDate'): Result<string, InvalidDateError> {
  const name = assertIdentifier(variable)
  const valid = validateCalendarDate(date)
  if (!valid.ok) return valid

  const { year, month, day, time } = valid.value
  const constant = monthConstant(month)
  if (constant === undefined) return Err(new InvalidDateError(`Invalid month ${month}`))

  const lines = [
    `set ${name} to current date`,
    `set time of ${name} to 0`,
    `set day of ${name} to 1`,
    `set year of ${name} to ${year}`,
    `set month of ${name} to ${constant}`,
    `set day of ${name} to ${day}`,
  ]
  if (time && secondsSinceMidnight(time) > 0) {
    lines.push(`set time of ${name} to ${secondsSinceMidnight(time)}`)
  }
  return Ok(lines.join('\n'))
}

/**
 * Expression that renders a date value as `year|month|day|seconds` from the
 * engine's numeric fields.
 */
export function dateReadout(expression: string): string {
  const target = `(${expression})`
  const sep = ` & "${READOUT_SEPARATOR}" & `
  return [
    `((year of ${target}) as text)`,
    `((month of ${target} as integer) as text)`,
    `((day of ${target}) as text)`,
    `((time of ${target}) as text)`,
  ].join(sep)
}

// ============================================================================
// Decoding
// ============================================================================

export function decodeDate(output: string): Result<CalendarDate, InvalidDateError> {
  const match = READOUT_PATTERN.exec(output.trim())
  if (!match) return Err(new InvalidDateError(`Unexpected date readout: '${output.trim()}'`))

  const [, year, month, day, seconds] = match
  const secs = parseInt(seconds ?? '0', 10)
  if (secs >= 86400) return Err(new InvalidDateError(`Time of day out of range: ${secs}s`))

  return makeCalendarDate(
    parseInt(year ?? '', 10),
    parseInt(month ?? '', 10),
    parseInt(day ?? '', 10),
    secs === 0 ? undefined : timeFromSeconds(secs)
  )
}

/** Like decodeDate, but the engine's `missing value` decodes to null. */
export function decodeOptionalDate(output: string): Result<CalendarDate | null, InvalidDateError> {
  const trimmed = output.trim()
  if (trimmed === '' || trimmed === MISSING_VALUE) return Ok(null)
  return decodeDate(trimmed)
}
