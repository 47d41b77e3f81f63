/**
 * Week Tabulator
 *
 * Lays a week of filled programming out as a grid: one column per day, one
 * row per distinct local time at which something starts or ends. Shows on
 * at the same clock time on different days share a row; a slot covering
 * several rows occupies one cell with a row span.
 *
 * The pipeline is split days → partition rows → populate grid, each step a
 * pure function returning fresh structures.
 */

import type { ScheduleSlot } from './domain-types'
import { slotEnd } from './domain-types'
import type { Instant, LocalDateTime } from './time-date'
import { DAY_MINUTES, addMinutes, minutesBetween } from './time-date'
import type { SlotRange } from './range'
import { nld, nldiff, hourBoundariesBetween } from './local-time'
import { ScheduleInconsistencyError, ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type WeekTableCell<S extends ScheduleSlot = ScheduleSlot> = {
  readonly slot: S
  readonly rowSpan: number
}

export type WeekTableRow<S extends ScheduleSlot = ScheduleSlot> = {
  /** Local time of the row on the first day */
  readonly time: LocalDateTime
  /** Minutes after the start of each day */
  readonly offset: number
  /** One per day; null where a cell above spans over, or nothing starts */
  readonly cells: ReadonlyArray<WeekTableCell<S> | null>
}

export type WeekTable<S extends ScheduleSlot = ScheduleSlot> = {
  readonly start: LocalDateTime
  readonly rows: ReadonlyArray<WeekTableRow<S>>
}

export const WEEK_DAYS = 7

// ============================================================================
// Step A: Day Splitting
// ============================================================================

/**
 * Splits one filled run of slots into `days` day lists, each day starting
 * at the local time of `start`.
 *
 * A slot crossing midnight of the schedule day is the same slot object at
 * the end of one list and the head of the next, not a copy. Slots starting
 * after the last day are left out.
 */
export function splitDays<S extends ScheduleSlot>(
  slots: readonly S[],
  start: Instant,
  tz: string,
  days: number = WEEK_DAYS
): S[][] {
  const done: S[][] = []
  let current: S[] = []
  let dayEnd = addMinutes(nld(start, tz), DAY_MINUTES)

  const rotate = () => {
    const last = current[current.length - 1]
    if (!last) {
      throw new ScheduleInconsistencyError(
        `Day ending ${dayEnd} has no slots; filler should cover every day`
      )
    }
    done.push(current)
    current = nld(slotEnd(last), tz) > dayEnd ? [last] : []
    dayEnd = addMinutes(dayEnd, DAY_MINUTES)
  }

  for (const slot of slots) {
    const localStart = nld(slot.start, tz)
    // A slot may start several days on
    while (dayEnd <= localStart && done.length < days - 1) rotate()
    if (dayEnd <= localStart) break
    current.push(slot)
  }
  while (done.length < days - 1) rotate()
  if (current.length === 0) {
    throw new ScheduleInconsistencyError(`Day ending ${dayEnd} has no slots; filler should cover every day`)
  }
  done.push(current)
  return done
}

// ============================================================================
// Step B: Row Partitioning
// ============================================================================

/**
 * Sorted row offsets (minutes after each day's start) shared by all days.
 *
 * Non-collapsible slots contribute their start, every whole local hour
 * inside them and their end. Collapsible slots contribute only their end,
 * so long stretches of them fold into few rows. Offset 0 is always there.
 */
export function partitionRows(
  dayLists: ReadonlyArray<readonly ScheduleSlot[]>,
  start: Instant,
  tz: string
): number[] {
  const nlstart = nld(start, tz)
  const offsets = new Set<number>([0])

  dayLists.forEach((slots, i) => {
    const dayStart = addMinutes(nlstart, i * DAY_MINUTES)
    const add = (local: LocalDateTime) => {
      const offset = minutesBetween(dayStart, local)
      if (offset >= 0 && offset < DAY_MINUTES) offsets.add(offset)
    }

    for (const slot of slots) {
      const localStart = nld(slot.start, tz)
      const localEnd = nld(slotEnd(slot), tz)
      add(localEnd)
      if (slot.showType.isCollapsible) continue
      add(localStart)
      hourBoundariesBetween(localStart, localEnd).forEach(add)
    }
  })

  return [...offsets].sort((a, b) => a - b)
}

// ============================================================================
// Step C: Population
// ============================================================================

/** Fills a grid of `offsets.length` rows by `dayLists.length` columns. */
export function populate<S extends ScheduleSlot>(
  dayLists: ReadonlyArray<readonly S[]>,
  offsets: readonly number[],
  start: Instant,
  tz: string
): WeekTableRow<S>[] {
  const nlstart = nld(start, tz)
  const grid: Array<Array<WeekTableCell<S> | null>> = offsets.map(() => dayLists.map(() => null))

  dayLists.forEach((slots, day) => {
    const dayStart = addMinutes(nlstart, day * DAY_MINUTES)
    let row = 0

    for (const slot of slots) {
      const endOffset = minutesBetween(dayStart, nld(slotEnd(slot), tz))

      let span = 0
      while (row + span < offsets.length && (offsets[row + span] ?? Infinity) < endOffset) span++
      if (span === 0) continue

      const boundary = offsets[row + span]
      // Past the final row is fine: the slot runs into the next day
      if (boundary !== undefined && boundary !== endOffset) {
        throw new ScheduleInconsistencyError(
          `Partitioning unsound: slot '${slot.id}' ends between rows on day ${day + 1}`
        )
      }

      const cells = grid[row]
      if (cells) cells[day] = { slot, rowSpan: span }
      row += span
    }
  })

  return offsets.map((offset, i) => ({
    time: addMinutes(nlstart, offset),
    offset,
    cells: grid[i] ?? [],
  }))
}

// ============================================================================
// Tabulation
// ============================================================================

/** Tabulates one filled run of slots covering a week from `start`. */
export function tabulate<S extends ScheduleSlot>(slots: readonly S[], start: Instant, tz: string): WeekTable<S> {
  const dayLists = splitDays(slots, start, tz)
  const offsets = partitionRows(dayLists, start, tz)
  return { start: nld(start, tz), rows: populate(dayLists, offsets, start, tz) }
}

/**
 * Tabulates seven separately queried days. Each range must cover one local
 * day with filler and without exclusions, or the grid would have holes.
 */
export function tabulateDays(ranges: readonly SlotRange[], tz: string): WeekTable {
  if (ranges.length !== WEEK_DAYS) {
    throw new ValidationError(`Week table needs ${WEEK_DAYS} day ranges, got ${ranges.length}`)
  }
  for (const range of ranges) {
    const { options } = range
    if (options.withFiller === false) {
      throw new ValidationError('Week table days must include filler')
    }
    if (nldiff(range.end, range.start, tz) !== DAY_MINUTES) {
      throw new ValidationError('Week table days must span one day each')
    }
    if (options.excludeStraddlingStart || options.excludeStraddlingEnd || options.excludeSubsuming) {
      throw new ValidationError('Week table days must include slots crossing their bounds')
    }
    if (options.limit !== undefined) {
      throw new ValidationError('Week table days must not be limited')
    }
  }

  const [first] = ranges
  if (!first) throw new ValidationError('Week table needs day ranges')
  const dayLists = ranges.map((range) => range.slots)
  const offsets = partitionRows(dayLists, first.start, tz)
  return { start: nld(first.start, tz), rows: populate(dayLists, offsets, first.start, tz) }
}
