/**
 * Time & Date Utilities
 *
 * Pure functions for parsing, constructing and doing arithmetic on wall-clock
 * values, plus conversion between absolute instants and the wall clock of an
 * IANA timezone. Calendar arithmetic goes through the Julian Day Number;
 * timezone support comes from Intl.DateTimeFormat.
 */

import { type Result, Ok, Err } from './result'
import { ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol
declare const __instant: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** Naive wall-clock datetime string: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

/** Absolute point in time, as epoch milliseconds */
export type Instant = number & { readonly [__instant]: true }

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

export const MINUTE_MS = 60_000
export const HOUR_MINUTES = 60
export const DAY_MINUTES = 24 * 60

// ============================================================================
// Helpers
// ============================================================================

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

function daysInMonth(year: number, month: number): number {
  const days = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  if (month === 2 && isLeapYear(year)) return 29
  return days[month] ?? 0
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  return String(n).padStart(4, '0')
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

export function dateToJDN(year: number, month: number, day: number): number {
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

export function jdnToDate(jdn: number): LocalDate {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor((146097 * b) / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor((1461 * d) / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return makeDate(year, month, day)
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = Number(match[1])
  const minute = Number(match[2])
  const second = match[3] ? Number(match[3]) : 0

  if (hour > 23) return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59) return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59) return Err(new ParseError(`Invalid second in time: '${str}'`))

  return Ok(makeTime(hour, minute, second))
}

export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const tIdx = str.indexOf('T')
  if (tIdx === -1) return Err(new ParseError(`Invalid datetime format (missing T): '${str}'`))

  const dateResult = parseDate(str.substring(0, tIdx))
  if (!dateResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  const timeResult = parseTime(str.substring(tIdx + 1))
  if (!timeResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  return Ok(makeDateTime(dateResult.value, timeResult.value))
}

/** Parses an ISO 8601 timestamp carrying an explicit offset or `Z`. */
export function parseInstant(str: string): Result<Instant, ParseError> {
  if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/.test(str)) {
    return Err(new ParseError(`Invalid instant (offset required): '${str}'`))
  }
  const ms = Date.parse(str)
  if (Number.isNaN(ms)) return Err(new ParseError(`Invalid instant: '${str}'`))
  return Ok(instant(ms))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

export function instant(ms: number): Instant {
  return ms as Instant
}

// ============================================================================
// Component Extraction
// ============================================================================

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

export function secondOf(time: LocalTime): number {
  return parseInt(time.substring(6, 8), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.substring(11) as LocalTime
}

/** Minutes after midnight of a wall-clock time, seconds included as a fraction. */
export function minutesOfDay(time: LocalTime): number {
  return hourOf(time) * HOUR_MINUTES + minuteOf(time) + secondOf(time) / 60
}

// ============================================================================
// Wall-Clock Arithmetic
//
// Naive datetimes are mapped onto a UTC millisecond axis purely as a
// calendar device; no timezone is involved.
// ============================================================================

function dtToMs(dt: LocalDateTime): number {
  const d = dateOf(dt)
  const t = timeOf(dt)
  return Date.UTC(yearOf(d), monthOf(d) - 1, dayOf(d), hourOf(t), minuteOf(t), secondOf(t))
}

function msToDt(ms: number): LocalDateTime {
  const d = new Date(ms)
  return makeDateTime(
    makeDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate()),
    makeTime(d.getUTCHours(), d.getUTCMinutes(), d.getUTCSeconds())
  )
}

export function addDays(date: LocalDate, n: number): LocalDate {
  return jdnToDate(dateToJDN(yearOf(date), monthOf(date), dayOf(date)) + n)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  return dateToJDN(yearOf(b), monthOf(b), dayOf(b)) - dateToJDN(yearOf(a), monthOf(a), dayOf(a))
}

export function addMinutes(dt: LocalDateTime, n: number): LocalDateTime {
  return msToDt(dtToMs(dt) + n * MINUTE_MS)
}

/** Wall-clock minutes from `a` to `b` (negative when `b` is earlier). */
export function minutesBetween(a: LocalDateTime, b: LocalDateTime): number {
  return (dtToMs(b) - dtToMs(a)) / MINUTE_MS
}

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

// ============================================================================
// Day-of-Week
// ============================================================================

const WEEKDAYS: Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

export function dayOfWeek(date: LocalDate): Weekday {
  // JDN mod 7 = 0 is a Monday
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  return indexToWeekday(((jdn % 7) + 7) % 7)
}

export function weekdayToIndex(w: Weekday): number {
  return WEEKDAYS.indexOf(w)
}

export function indexToWeekday(i: number): Weekday {
  return WEEKDAYS[((i % 7) + 7) % 7] ?? 'mon'
}

// ============================================================================
// Timezone Conversion
// ============================================================================

const formatters = new Map<string, Intl.DateTimeFormat>()

function formatterFor(tz: string): Intl.DateTimeFormat {
  let formatter = formatters.get(tz)
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
    formatters.set(tz, formatter)
  }
  return formatter
}

export function isValidTimezone(tz: string): boolean {
  try {
    formatterFor(tz)
    return true
  } catch {
    return false
  }
}

/** Given a UTC epoch in ms, return the UTC offset in minutes for timezone tz */
function utcOffsetAtMs(utcMs: number, tz: string): number {
  const parts = formatterFor(tz).formatToParts(new Date(utcMs))
  const get = (type: string) => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  let h = get('hour')
  if (h === 24) h = 0
  const localMs = Date.UTC(get('year'), get('month') - 1, get('day'), h, get('minute'), get('second'))
  // Formatter output has whole-second precision
  const flooredUtc = Math.floor(utcMs / 1000) * 1000
  return (localMs - flooredUtc) / MINUTE_MS
}

function standardAndDaylightOffsets(year: number, tz: string): { std: number; dst: number } {
  const janOffset = utcOffsetAtMs(Date.UTC(year, 0, 15, 12, 0, 0), tz)
  const julOffset = utcOffsetAtMs(Date.UTC(year, 6, 15, 12, 0, 0), tz)
  return { std: Math.min(janOffset, julOffset), dst: Math.max(janOffset, julOffset) }
}

/** Wall-clock reading of an instant in `tz`. */
export function toLocal(at: Instant, tz: string): LocalDateTime {
  return msToDt(at + utcOffsetAtMs(at, tz) * MINUTE_MS)
}

/**
 * The instant at which the wall clock of `tz` reads `local`.
 *
 * Times skipped by a spring-forward transition resolve to the first instant
 * after the transition; times repeated by a fall-back transition resolve to
 * standard time.
 */
export function fromLocal(local: LocalDateTime, tz: string): Instant {
  const localMs = dtToMs(local)
  if (tz === 'UTC') return instant(localMs)

  const { std, dst } = standardAndDaylightOffsets(yearOf(dateOf(local)), tz)
  if (std === dst) return instant(localMs - std * MINUTE_MS)

  const status = isDSTAt(local, tz)

  if (status === 'gap') {
    // DST transitions are always minute-aligned
    const viaDst = localMs - dst * MINUTE_MS
    const viaStd = localMs - std * MINUTE_MS
    for (let ms = viaDst; ms <= viaStd; ms += MINUTE_MS) {
      if (utcOffsetAtMs(ms, tz) !== std) {
        return instant(ms)
      }
    }
    return instant(viaStd)
  }

  if (status === true) return instant(localMs - dst * MINUTE_MS)
  return instant(localMs - std * MINUTE_MS)
}

export function isDSTAt(dt: LocalDateTime, tz: string): boolean | 'gap' | 'overlap' {
  if (tz === 'UTC') return false

  const localMs = dtToMs(dt)
  const { std, dst } = standardAndDaylightOffsets(yearOf(dateOf(dt)), tz)
  if (std === dst) return false

  // Try both possible offsets to map local → UTC, then check round-trip
  const viaStd = localMs - std * MINUTE_MS
  const viaDst = localMs - dst * MINUTE_MS
  const stdMapsBack = viaStd + utcOffsetAtMs(viaStd, tz) * MINUTE_MS === localMs
  const dstMapsBack = viaDst + utcOffsetAtMs(viaDst, tz) * MINUTE_MS === localMs

  if (stdMapsBack && dstMapsBack) return 'overlap'
  if (!stdMapsBack && !dstMapsBack) return 'gap'
  return dstMapsBack
}

// ============================================================================
// Instant Arithmetic
// ============================================================================

export function plusMinutes(at: Instant, minutes: number): Instant {
  return instant(at + minutes * MINUTE_MS)
}

export function minutesFrom(a: Instant, b: Instant): number {
  return (b - a) / MINUTE_MS
}

export function formatInstant(at: Instant): string {
  return new Date(at).toISOString()
}
