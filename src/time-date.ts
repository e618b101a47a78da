/**
 * Time & Date Utilities
 *
 * Pure functions for date/time parsing, arithmetic, and timezone conversion.
 * Uses Julian Day Number for all date arithmetic to avoid month-length edge cases.
 * Timezone support goes through Intl.DateTimeFormat; no tz database is bundled.
 */

import { type Result, Ok, Err } from './result'
import { ParseError } from './errors'

export { ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol

/** Calendar date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** Wall-clock time string: HH:MM */
export type LocalTime = string & { readonly [__localTime]: true }

/** 0 = Monday … 6 = Sunday */
export type WeekdayIndex = 0 | 1 | 2 | 3 | 4 | 5 | 6

export const WEEKDAY_NAMES = [
  'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday',
] as const

export type WeekdayName = (typeof WEEKDAY_NAMES)[number]

export const ALL_WEEKDAYS: readonly WeekdayIndex[] = [0, 1, 2, 3, 4, 5, 6]

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_DAYS = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_DAYS[month] ?? 0
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
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

function jdnOf(date: LocalDate): number {
  return dateToJDN(yearOf(date), monthOf(date), dayOf(date))
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1], 10)
  const month = parseInt(match[2], 10)
  const day = parseInt(match[3], 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(str as LocalDate)
}

/** Accepts `H:MM` or `HH:MM`; normalizes to `HH:MM`. */
export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{1,2}):(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = parseInt(match[1], 10)
  const minute = parseInt(match[2], 10)

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))

  return Ok(makeTime(hour, minute))
}

// ============================================================================
// Construction & Components
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}` as LocalTime
}

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const { year, month, day } = jdnToDate(jdnOf(date) + n)
  return makeDate(year, month, day)
}

/** Signed number of days from `a` to `b`. */
export function daysBetween(a: LocalDate, b: LocalDate): number {
  return jdnOf(b) - jdnOf(a)
}

export function compareDates(a: LocalDate, b: LocalDate): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

// ============================================================================
// Time-of-day Arithmetic
// ============================================================================

export function minutesOfDay(time: LocalTime): number {
  return hourOf(time) * 60 + minuteOf(time)
}

/** Build a time from minutes past midnight, wrapping into a single day. */
export function timeFromMinutes(minutes: number): LocalTime {
  const wrapped = ((Math.round(minutes) % 1440) + 1440) % 1440
  return makeTime(Math.floor(wrapped / 60), wrapped % 60)
}

export function addMinutesToTime(time: LocalTime, n: number): LocalTime {
  return timeFromMinutes(minutesOfDay(time) + n)
}

// ============================================================================
// Day-of-Week
// ============================================================================

export function weekdayIndex(date: LocalDate): WeekdayIndex {
  // JDN 0 is a Monday, so JDN mod 7 is already Monday-based
  const idx = ((jdnOf(date) % 7) + 7) % 7
  return ALL_WEEKDAYS[idx] ?? 0
}

export function weekdayName(index: WeekdayIndex): WeekdayName {
  return WEEKDAY_NAMES[index]
}

export function isWeekend(index: WeekdayIndex): boolean {
  return index >= 5
}

// ============================================================================
// Timezone Conversion
// ============================================================================

const formatterCache = new Map<string, Intl.DateTimeFormat>()

function formatterFor(tz: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(tz)
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: tz,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hour12: false,
    })
    formatterCache.set(tz, formatter)
  }
  return formatter
}

export function isValidTimezone(tz: string): boolean {
  if (tz.length === 0) return false
  try {
    formatterFor(tz)
    return true
  } catch (e) {
    if (e instanceof RangeError) return false
    throw e
  }
}

type WallClock = { year: number; month: number; day: number; hour: number; minute: number; second: number }

function wallClockAt(utcMs: number, tz: string): WallClock {
  const parts = formatterFor(tz).formatToParts(new Date(utcMs))
  const get = (type: string) => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  let hour = get('hour')
  if (hour === 24) hour = 0
  return { year: get('year'), month: get('month'), day: get('day'), hour, minute: get('minute'), second: get('second') }
}

/** UTC offset in minutes for timezone `tz` at the given UTC epoch ms. */
export function utcOffsetAtMs(utcMs: number, tz: string): number {
  const w = wallClockAt(utcMs, tz)
  const localMs = Date.UTC(w.year, w.month - 1, w.day, w.hour, w.minute, w.second)
  return Math.round((localMs - Math.floor(utcMs / 1000) * 1000) / 60000)
}

/** Calendar date of `instant` as seen in `tz`. */
export function localDateOf(instant: Date, tz: string): LocalDate {
  const w = wallClockAt(instant.getTime(), tz)
  return makeDate(w.year, w.month, w.day)
}

/** Wall-clock time (minute precision) of `instant` as seen in `tz`. */
export function localTimeOf(instant: Date, tz: string): LocalTime {
  const w = wallClockAt(instant.getTime(), tz)
  return makeTime(w.hour, w.minute)
}

function wallMs(date: LocalDate, time: LocalTime): number {
  return Date.UTC(yearOf(date), monthOf(date) - 1, dayOf(date), hourOf(time), minuteOf(time), 0)
}

function seasonalOffsets(year: number, tz: string): { std: number; dst: number } {
  const jan = utcOffsetAtMs(Date.UTC(year, 0, 15, 12, 0, 0), tz)
  const jul = utcOffsetAtMs(Date.UTC(year, 6, 15, 12, 0, 0), tz)
  return { std: Math.min(jan, jul), dst: Math.max(jan, jul) }
}

/**
 * Classify a wall-clock time against the zone's DST rules.
 * `gap` = skipped by a spring-forward, `overlap` = repeated by a fall-back.
 */
export function isDSTAt(date: LocalDate, time: LocalTime, tz: string): boolean | 'gap' | 'overlap' {
  if (tz === 'UTC') return false

  const localMs = wallMs(date, time)
  const { std, dst } = seasonalOffsets(yearOf(date), tz)
  if (std === dst) return false

  const utcViaStd = localMs - std * 60000
  const utcViaDst = localMs - dst * 60000

  const stdMapsBack = utcViaStd + utcOffsetAtMs(utcViaStd, tz) * 60000 === localMs
  const dstMapsBack = utcViaDst + utcOffsetAtMs(utcViaDst, tz) * 60000 === localMs

  if (stdMapsBack && dstMapsBack) return 'overlap'
  if (!stdMapsBack && !dstMapsBack) return 'gap'
  return dstMapsBack
}

/**
 * Convert a wall-clock date and time in `tz` to an absolute instant.
 *
 * Times inside a spring-forward gap resolve to the first instant after the
 * transition. Times repeated by a fall-back resolve to the standard-time
 * (later) instant.
 */
export function zonedToInstant(date: LocalDate, time: LocalTime, tz: string): Date {
  const localMs = wallMs(date, time)
  if (tz === 'UTC') return new Date(localMs)

  const { std, dst } = seasonalOffsets(yearOf(date), tz)
  if (std === dst) {
    // Fixed-offset zone this year; ask the zone directly in case the
    // offset changed outside the Jan/Jul sample points
    const guess = localMs - std * 60000
    return new Date(localMs - utcOffsetAtMs(guess, tz) * 60000)
  }

  const status = isDSTAt(date, time, tz)

  if (status === 'gap') {
    // Transitions are minute-aligned
    const before = localMs - dst * 60000
    const after = localMs - std * 60000
    const lo = Math.min(before, after)
    const hi = Math.max(before, after)
    const startOffset = utcOffsetAtMs(lo, tz)
    for (let ms = lo; ms <= hi; ms += 60000) {
      if (utcOffsetAtMs(ms, tz) !== startOffset) return new Date(ms)
    }
    return new Date(hi)
  }

  if (status === 'overlap') return new Date(localMs - std * 60000)
  if (status === true) return new Date(localMs - dst * 60000)
  return new Date(localMs - std * 60000)
}

/** Difference `b − a` in minutes. */
export function minutesBetweenInstants(a: Date, b: Date): number {
  return (b.getTime() - a.getTime()) / 60000
}
