/**
 * Range Query
 *
 * Pulls contiguous chunks of programming out of the timeslot store: every
 * slot intersecting a time range, optionally filtered and then filled.
 */

import type { Adapter } from './adapter'
import type { ScheduleSlot } from './domain-types'
import { slotEnd } from './domain-types'
import type { Instant } from './time-date'
import { DAY_MINUTES, plusMinutes } from './time-date'
import type { Logger } from './logger'
import type { FillerDeps, FillerShowSource } from './filler'
import { fill } from './filler'
import { dstAdd } from './local-time'
import { InvalidRangeError, ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type RangeDeps = {
  adapter: Adapter
  timezone: string
  fillerShow: FillerShowSource
  logger?: Logger
}

export type RangeOptions = {
  /** Drop slots that start before the range and end inside it */
  excludeStraddlingStart?: boolean
  /** Drop slots that start inside the range and end after it */
  excludeStraddlingEnd?: boolean
  /** Drop slots that start before the range and end after it */
  excludeSubsuming?: boolean
  includePrivate?: boolean
  /** Default true */
  withFiller?: boolean
  /** Applied before and after filling */
  limit?: number
}

export type SlotRange = {
  start: Instant
  end: Instant
  options: RangeOptions
  slots: ScheduleSlot[]
}

export type WeekOptions = RangeOptions & {
  /** Seven one-day ranges instead of one seven-day range */
  splitDays?: boolean
  /** Advance each day boundary in wall-clock time */
  dstCompensate?: boolean
}

export type ComingUpOptions = {
  /** Default 10 */
  quantity?: number
  /** Default true; filler counts towards `quantity` */
  withFiller?: boolean
  includePrivate?: boolean
}

export type OnAir = {
  onAir: ScheduleSlot | null
  upNext: ScheduleSlot | null
}

const DEFAULT_COMING_UP = 10

// ============================================================================
// Helpers
// ============================================================================

function fillerDeps(deps: RangeDeps, includePrivate: boolean | undefined): FillerDeps {
  return {
    adapter: deps.adapter,
    fillerShow: deps.fillerShow,
    query: { includePrivate },
    logger: deps.logger,
  }
}

function requirePositive(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`'${name}' must be a positive integer, got ${value}`)
  }
}

function trimTo<T>(limit: number | undefined, list: T[]): T[] {
  return limit === undefined ? list : list.slice(0, limit)
}

function excluded(slot: ScheduleSlot, start: Instant, end: Instant, options: RangeOptions): boolean {
  const before = slot.start < start
  const after = slotEnd(slot) > end
  if (before && after) return options.excludeSubsuming === true
  if (before) return options.excludeStraddlingStart === true
  if (after) return options.excludeStraddlingEnd === true
  return false
}

// ============================================================================
// Range Queries
// ============================================================================

/** Every slot intersecting `[start, end)`, ordered by start. */
export async function between(
  deps: RangeDeps,
  start: Instant,
  end: Instant,
  options: RangeOptions = {}
): Promise<SlotRange> {
  if (start > end) {
    throw new InvalidRangeError('Start time is after end time.')
  }
  if (options.limit !== undefined) requirePositive('limit', options.limit)

  const found = await deps.adapter.getSlotsInRange(start, end, { includePrivate: options.includePrivate })
  const kept = trimTo(options.limit, found.filter((slot) => !excluded(slot, start, end, options)))
  const slots = await fillRange(deps, kept, start, end, options)

  return { start, end, options, slots }
}

/** Fills queried slots as `options` ask, trimming to the limit again afterwards. */
export async function fillRange(
  deps: RangeDeps,
  slots: ScheduleSlot[],
  start: Instant,
  end: Instant,
  options: RangeOptions
): Promise<ScheduleSlot[]> {
  if (options.withFiller === false) return slots
  const filled = await fill(fillerDeps(deps, options.includePrivate), slots, start, end)
  return trimTo(options.limit, filled)
}

/** `minutes` of wall-clock time from `start`. */
export function within(
  deps: RangeDeps,
  start: Instant,
  minutes: number,
  options: RangeOptions = {}
): Promise<SlotRange> {
  return between(deps, start, dstAdd(start, minutes, deps.timezone), options)
}

export function day(deps: RangeDeps, start: Instant, options: RangeOptions = {}): Promise<SlotRange> {
  return within(deps, start, DAY_MINUTES, options)
}

/**
 * A week from `start`: one range, or seven one-day ranges when `splitDays`
 * is set. With `dstCompensate` each day starts at the same local time as
 * the first.
 */
export async function week(deps: RangeDeps, start: Instant, options: WeekOptions = {}): Promise<SlotRange[]> {
  const { splitDays, dstCompensate, ...rangeOptions } = options
  const advance = (minutes: number) =>
    dstCompensate ? dstAdd(start, minutes, deps.timezone) : plusMinutes(start, minutes)

  if (!splitDays) {
    return [await between(deps, start, advance(7 * DAY_MINUTES), rangeOptions)]
  }

  const days: SlotRange[] = []
  for (let i = 0; i < 7; i++) {
    days.push(await between(deps, advance(i * DAY_MINUTES), advance((i + 1) * DAY_MINUTES), rangeOptions))
  }
  return days
}

// ============================================================================
// Upcoming Lists
// ============================================================================

/**
 * The slot on air at `at` followed by the next ones, at most `quantity` in
 * all. May come up short when the schedule runs out.
 */
export async function comingUp(
  deps: RangeDeps,
  at: Instant,
  options: ComingUpOptions = {}
): Promise<ScheduleSlot[]> {
  const quantity = options.quantity ?? DEFAULT_COMING_UP
  requirePositive('quantity', quantity)

  const unfilled = await deps.adapter.getSlotsFrom(at, { limit: quantity, includePrivate: options.includePrivate })
  if (options.withFiller === false) return unfilled

  const last = unfilled[unfilled.length - 1]
  const end = last ? slotEnd(last) : at
  const filled = await fill(fillerDeps(deps, options.includePrivate), unfilled, at, end)
  // Filling may have added slots
  return filled.slice(0, quantity)
}

export async function onAir(deps: RangeDeps, at: Instant): Promise<OnAir> {
  const [current, next] = await comingUp(deps, at, { quantity: 2 })
  return { onAir: current ?? null, upNext: next ?? null }
}
