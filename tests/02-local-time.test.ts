/**
 * Segment 02: Naive Local Time Tests
 *
 * Conversion between instants and station wall-clock time, and the
 * wall-clock arithmetic that keeps schedules stable across DST changes.
 */

import { describe, it, expect } from 'vitest'
import {
  nld, unNld, nldiff, dstAdd, localTimeOfDay, localMidnight, hourBoundariesBetween,
  dayStartOn, toMonday, isoWeekStart, isoWeekDay, isoWeekOf, navigation,
} from '../src/local-time'
import { instant, makeDate, makeTime, parseDateTime, type LocalDateTime } from '../src/time-date'

const TZ = 'Europe/London'

function dt(str: string): LocalDateTime {
  const parsed = parseDateTime(str)
  if (!parsed.ok) throw parsed.error
  return parsed.value
}

function utc(iso: string) {
  return instant(Date.parse(iso))
}

// ============================================================================
// Conversion
// ============================================================================

describe('nld / unNld', () => {
  it('strips the zone from a summer instant', () => {
    expect(nld(utc('2011-07-04T09:00:00Z'), TZ)).toBe('2011-07-04T10:00:00')
  })

  it('is inverted by unNld', () => {
    const at = utc('2011-11-07T09:00:00Z')
    expect(unNld(nld(at, TZ), TZ)).toBe(at)
  })
})

describe('nldiff', () => {
  it('equals the absolute difference when no transition intervenes', () => {
    expect(nldiff(utc('2011-11-08T09:00:00Z'), utc('2011-11-07T09:00:00Z'), TZ)).toBe(1440)
  })

  it('loses the repeated hour across fall-back', () => {
    // Oct 29 12:00Z is 13:00 BST; Oct 31 12:00Z is 12:00 GMT
    expect(nldiff(utc('2011-10-31T12:00:00Z'), utc('2011-10-29T12:00:00Z'), TZ)).toBe(47 * 60)
  })

  it('is negative when the first instant is earlier', () => {
    expect(nldiff(utc('2011-11-07T07:00:00Z'), utc('2011-11-07T09:00:00Z'), TZ)).toBe(-120)
  })
})

// ============================================================================
// dstAdd
// ============================================================================

describe('dstAdd', () => {
  it('keeps the wall-clock time across spring-forward', () => {
    // 12:00 GMT plus seven days is 12:00 BST, one absolute hour earlier
    const start = utc('2012-03-20T12:00:00Z')
    const result = dstAdd(start, 7 * 24 * 60, TZ)
    expect(result).toBe(utc('2012-03-27T11:00:00Z'))
    expect(nld(result, TZ)).toBe('2012-03-27T12:00:00')
  })

  it('keeps the wall-clock time across fall-back', () => {
    const start = utc('2011-10-29T11:00:00Z')
    const result = dstAdd(start, 24 * 60, TZ)
    expect(result).toBe(utc('2011-10-30T12:00:00Z'))
    expect(nld(result, TZ)).toBe('2011-10-30T12:00:00')
  })

  it('matches plain addition when no transition intervenes', () => {
    expect(dstAdd(utc('2011-11-07T07:00:00Z'), 120, TZ)).toBe(utc('2011-11-07T09:00:00Z'))
  })

  it('moves backwards for negative amounts', () => {
    expect(dstAdd(utc('2012-03-27T11:00:00Z'), -7 * 24 * 60, TZ)).toBe(utc('2012-03-20T12:00:00Z'))
  })
})

// ============================================================================
// Time of Day
// ============================================================================

describe('time of day', () => {
  it('measures local minutes after midnight', () => {
    expect(localTimeOfDay(utc('2011-07-04T09:00:00Z'), TZ)).toBe(600)
    expect(localTimeOfDay(utc('2011-11-07T00:30:00Z'), TZ)).toBe(30)
  })

  it('finds local midnight', () => {
    expect(localMidnight(dt('2011-11-07T09:30'))).toBe('2011-11-07T00:00:00')
  })

  it('lists whole hours strictly inside a span', () => {
    expect(hourBoundariesBetween(dt('2011-11-07T09:00'), dt('2011-11-07T11:00'))).toEqual([
      '2011-11-07T10:00:00',
    ])
    expect(hourBoundariesBetween(dt('2011-11-07T09:30'), dt('2011-11-07T12:00'))).toEqual([
      '2011-11-07T10:00:00',
      '2011-11-07T11:00:00',
    ])
  })

  it('lists no hours inside a span shorter than an hour', () => {
    expect(hourBoundariesBetween(dt('2011-11-07T09:00'), dt('2011-11-07T09:45'))).toEqual([])
  })

  it('places the start of the broadcast day in local time', () => {
    expect(dayStartOn(makeDate(2011, 11, 7), makeTime(7, 0), TZ)).toBe(utc('2011-11-07T07:00:00Z'))
    expect(dayStartOn(makeDate(2011, 7, 4), makeTime(7, 0), TZ)).toBe(utc('2011-07-04T06:00:00Z'))
  })
})

// ============================================================================
// ISO Weeks
// ============================================================================

describe('ISO weeks', () => {
  it('finds the Monday of a week', () => {
    expect(toMonday(makeDate(2011, 11, 10))).toBe('2011-11-07')
    expect(toMonday(makeDate(2011, 11, 13))).toBe('2011-11-07')
    expect(toMonday(makeDate(2011, 11, 7))).toBe('2011-11-07')
  })

  it('converts an ISO week to its Monday', () => {
    expect(isoWeekStart(2011, 45)).toBe('2011-11-07')
    expect(isoWeekStart(2011, 1)).toBe('2011-01-03')
  })

  it('converts an ISO week day to a date', () => {
    expect(isoWeekDay(2011, 45, 3)).toBe('2011-11-09')
  })

  it('computes the ISO week-date of a date', () => {
    expect(isoWeekOf(makeDate(2011, 11, 7))).toEqual({ year: 2011, week: 45, day: 1 })
  })

  it('assigns early January to the previous ISO year where due', () => {
    expect(isoWeekOf(makeDate(2012, 1, 1))).toEqual({ year: 2011, week: 52, day: 7 })
  })

  it('builds navigation one week either side', () => {
    expect(navigation(makeDate(2011, 11, 7), 7)).toEqual({
      prev: { year: 2011, week: 44, day: 1 },
      current: { year: 2011, week: 45, day: 1 },
      next: { year: 2011, week: 46, day: 1 },
    })
  })
})
