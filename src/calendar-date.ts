/**
 * Calendar Date
 *
 * Immutable, locale-independent date value and the pure calendar rules it
 * depends on. Uses Julian Day Numbers for day arithmetic so that month
 * lengths never need special-casing.
 */

import { type Result, Ok, Err } from './result'
import { InvalidDateError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type TimeOfDay = {
  readonly hour: number
  readonly minute: number
  readonly second: number
}

export type CalendarDate = {
  readonly year: number
  readonly month: number
  readonly day: number
  /** Never midnight: 00:00:00 and no time of day are the same value. */
  readonly time?: TimeOfDay
}

/** Years the engine's date arithmetic is known to handle. */
export const SUPPORTED_YEARS = { min: 1900, max: 2100 } as const

// ============================================================================
// Calendar Rules
// ============================================================================

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 0
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

// ============================================================================
// Construction
// ============================================================================

export function makeCalendarDate(
  year: number,
  month: number,
  day: number,
  time?: TimeOfDay
): Result<CalendarDate, InvalidDateError> {
  if (![year, month, day].every(Number.isInteger)) {
    return Err(new InvalidDateError(`Date components must be integers: ${year}-${month}-${day}`))
  }
  if (year < SUPPORTED_YEARS.min || year > SUPPORTED_YEARS.max) {
    return Err(new InvalidDateError(
      `Year ${year} is outside the supported range ${SUPPORTED_YEARS.min}-${SUPPORTED_YEARS.max}`
    ))
  }
  if (month < 1 || month > 12) {
    return Err(new InvalidDateError(`Invalid month ${month}`))
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    return Err(new InvalidDateError(`Invalid day ${day} for ${year}-${pad2(month)}`))
  }
  if (time) {
    const { hour, minute, second } = time
    if (![hour, minute, second].every(Number.isInteger) ||
        hour < 0 || hour > 23 || minute < 0 || minute > 59 || second < 0 || second > 59) {
      return Err(new InvalidDateError(`Invalid time of day ${hour}:${minute}:${second}`))
    }
    if (hour === 0 && minute === 0 && second === 0) return Ok(Object.freeze({ year, month, day }))
    return Ok(Object.freeze({ year, month, day, time: Object.freeze({ hour, minute, second }) }))
  }
  return Ok(Object.freeze({ year, month, day }))
}

/** Re-validates an existing value; used where dates cross a trust boundary. */
export function validateCalendarDate(date: CalendarDate): Result<CalendarDate, InvalidDateError> {
  return makeCalendarDate(date.year, date.month, date.day, date.time)
}

export function withoutTime(date: CalendarDate): CalendarDate {
  return Object.freeze({ year: date.year, month: date.month, day: date.day })
}

/** Local calendar day of a JS Date, at midnight. */
export function calendarDateFromClock(now: Date): CalendarDate {
  return Object.freeze({ year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() })
}

// ============================================================================
// Time of Day
// ============================================================================

export function secondsSinceMidnight(time: TimeOfDay): number {
  return time.hour * 3600 + time.minute * 60 + time.second
}

export function timeFromSeconds(seconds: number): TimeOfDay {
  return Object.freeze({
    hour: Math.floor(seconds / 3600),
    minute: Math.floor((seconds % 3600) / 60),
    second: seconds % 60,
  })
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

/** Shifts by whole days. Fails when the result leaves the supported years. */
export function addDays(date: CalendarDate, n: number): Result<CalendarDate, InvalidDateError> {
  const { year, month, day } = jdnToDate(dateToJDN(date.year, date.month, date.day) + n)
  return makeCalendarDate(year, month, day, date.time)
}

export function daysBetween(a: CalendarDate, b: CalendarDate): number {
  return dateToJDN(b.year, b.month, b.day) - dateToJDN(a.year, a.month, a.day)
}

// ============================================================================
// Comparison & Formatting
// ============================================================================

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  const days = daysBetween(b, a)
  if (days !== 0) return days < 0 ? -1 : 1
  const sa = a.time ? secondsSinceMidnight(a.time) : 0
  const sb = b.time ? secondsSinceMidnight(b.time) : 0
  if (sa === sb) return 0
  return sa < sb ? -1 : 1
}

export function calendarDatesEqual(a: CalendarDate, b: CalendarDate): boolean {
  return compareCalendarDates(a, b) === 0
}

/** YYYY-MM-DD, or YYYY-MM-DDTHH:MM:SS when a time of day is present. */
export function formatCalendarDate(date: CalendarDate): string {
  const base = `${date.year}-${pad2(date.month)}-${pad2(date.day)}`
  if (!date.time) return base
  return `${base}T${pad2(date.time.hour)}:${pad2(date.time.minute)}:${pad2(date.time.second)}`
}
