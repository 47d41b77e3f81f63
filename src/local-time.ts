/**
 * Naive Local Time
 *
 * The schedule is laid out in station wall-clock time, so most arithmetic
 * happens on "naive local" values: an instant converted into the station
 * timezone with the zone then discarded. These helpers move between the two
 * representations and do date arithmetic that keeps wall-clock times stable
 * across DST transitions.
 */

import type { Instant, LocalDate, LocalDateTime, LocalTime } from './time-date'
import {
  toLocal, fromLocal, addMinutes, minutesBetween, addDays, daysBetween,
  makeDate, makeDateTime, makeTime, dateOf, timeOf, hourOf,
  minutesOfDay, dayOfWeek, weekdayToIndex, yearOf, HOUR_MINUTES,
} from './time-date'

// ============================================================================
// Conversion
// ============================================================================

/** Naive local datetime of an instant. */
export function nld(at: Instant, tz: string): LocalDateTime {
  return toLocal(at, tz)
}

/** Inverse of {@link nld}. */
export function unNld(local: LocalDateTime, tz: string): Instant {
  return fromLocal(local, tz)
}

/**
 * Local-time difference `nld(a) - nld(b)` in minutes.
 *
 * Differs from the absolute difference when a DST transition lies between
 * the two instants.
 */
export function nldiff(a: Instant, b: Instant, tz: string): number {
  return minutesBetween(nld(b, tz), nld(a, tz))
}

/**
 * Adds `minutes` of wall-clock time to an instant.
 *
 * Noon plus one day is noon on the next day, even when the clocks change
 * overnight.
 */
export function dstAdd(at: Instant, minutes: number, tz: string): Instant {
  return unNld(addMinutes(nld(at, tz), minutes), tz)
}

// ============================================================================
// Time of Day
// ============================================================================

/** Minutes after local midnight at which `at` falls. */
export function localTimeOfDay(at: Instant, tz: string): number {
  return minutesOfDay(timeOf(nld(at, tz)))
}

export function localMidnight(local: LocalDateTime): LocalDateTime {
  return makeDateTime(dateOf(local), makeTime(0, 0, 0))
}

/** Whole local hours strictly between two naive datetimes. */
export function hourBoundariesBetween(a: LocalDateTime, b: LocalDateTime): LocalDateTime[] {
  const result: LocalDateTime[] = []
  const topOfHour = makeDateTime(dateOf(a), makeTime(hourOf(timeOf(a)), 0, 0))
  for (let next = addMinutes(topOfHour, HOUR_MINUTES); next < b; next = addMinutes(next, HOUR_MINUTES)) {
    result.push(next)
  }
  return result
}

/** The instant at which programming nominally starts on a local date. */
export function dayStartOn(date: LocalDate, dayStart: LocalTime, tz: string): Instant {
  return unNld(makeDateTime(date, dayStart), tz)
}

// ============================================================================
// Weeks
// ============================================================================

export type IsoWeekDate = {
  year: number
  week: number
  /** 1 = Monday … 7 = Sunday */
  day: number
}

export function toMonday(date: LocalDate): LocalDate {
  return addDays(date, -weekdayToIndex(dayOfWeek(date)))
}

export function isoWeekStart(year: number, week: number): LocalDate {
  // 4 January always falls in week 1
  const firstMonday = toMonday(makeDate(year, 1, 4))
  return addDays(firstMonday, (week - 1) * 7)
}

export function isoWeekDay(year: number, week: number, day: number): LocalDate {
  return addDays(isoWeekStart(year, week), day - 1)
}

export function isoWeekOf(date: LocalDate): IsoWeekDate {
  const dayIndex = weekdayToIndex(dayOfWeek(date))
  const thursday = addDays(date, 3 - dayIndex)
  const year = yearOf(thursday)
  const week = Math.floor(daysBetween(makeDate(year, 1, 1), thursday) / 7) + 1
  return { year, week, day: dayIndex + 1 }
}

export type Navigation = {
  prev: IsoWeekDate
  current: IsoWeekDate
  next: IsoWeekDate
}

/** ISO week-dates one step either side of `date`, for paging through schedules. */
export function navigation(date: LocalDate, stepDays: number): Navigation {
  return {
    prev: isoWeekOf(addDays(date, -stepDays)),
    current: isoWeekOf(date),
    next: isoWeekOf(addDays(date, stepDays)),
  }
}
