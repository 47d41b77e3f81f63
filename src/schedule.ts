/**
 * Schedule
 *
 * A lazy handle on a stretch of the schedule. Nothing is queried until
 * `data` is first read; the result is then kept for the life of the handle.
 * Paging (`previous`, `next`) and `replace` hand out new handles that share
 * the builder but not the computed data.
 */

import type { BlockedSlot, Term } from './domain-types'
import type { Instant } from './time-date'
import type { BlockId } from './types'
import type { RangeDeps, RangeOptions } from './range'
import { between, fillRange } from './range'
import type { WeekTable } from './week-table'
import { tabulate } from './week-table'
import { dstAdd } from './local-time'
import { resolveTerm } from './term-resolver'
import { annotate } from './block-classifier'

// ============================================================================
// Types
// ============================================================================

export type ScheduleBuilder<T> = (schedule: Schedule<T>) => Promise<T>

export type ScheduleFields<T> = {
  start: Instant
  /** Length in wall-clock minutes */
  range: number
  timezone: string
  builder: ScheduleBuilder<T>
}

export type Schedule<T> = Readonly<ScheduleFields<T>> & {
  readonly end: Instant
  /** Built on first read, then memoized */
  readonly data: Promise<T>
  previous(): Schedule<T>
  next(): Schedule<T>
  replace(overrides: Partial<ScheduleFields<T>>): Schedule<T>
}

/** What a schedule holds when there is no programming to list. */
export type ScheduleAbsence =
  | { kind: 'holiday'; previous: Term }
  | { kind: 'no-term-data' }
  | { kind: 'empty'; term: Term }

export type ScheduleData =
  | { kind: 'slots'; term: Term; slots: BlockedSlot[] }
  | ScheduleAbsence

export type WeekTableData =
  | { kind: 'table'; term: Term; table: WeekTable<BlockedSlot> }
  | ScheduleAbsence

export type BuilderDeps = RangeDeps & {
  defaultBlockId: BlockId
}

// ============================================================================
// Schedule Handle
// ============================================================================

export function createSchedule<T>(fields: ScheduleFields<T>): Schedule<T> {
  let data: Promise<T> | null = null

  const schedule: Schedule<T> = {
    ...fields,
    end: dstAdd(fields.start, fields.range, fields.timezone),
    get data() {
      if (data === null) data = fields.builder(schedule)
      return data
    },
    previous: () => createSchedule({ ...fields, start: dstAdd(fields.start, -fields.range, fields.timezone) }),
    next: () => createSchedule({ ...fields, start: dstAdd(fields.start, fields.range, fields.timezone) }),
    replace: (overrides) => createSchedule({ ...fields, ...overrides }),
  }
  return schedule
}

// ============================================================================
// Builders
// ============================================================================

type Window = {
  start: Instant
  end: Instant
}

async function buildRange(deps: BuilderDeps, options: RangeOptions, window: Window): Promise<ScheduleData> {
  const { start, end } = window
  const resolution = await resolveTerm(deps.adapter, start)
  if (resolution.kind !== 'term') return resolution
  const { term } = resolution

  const unfilled = await between(deps, start, end, { ...options, withFiller: false })
  if (unfilled.slots.length === 0) return { kind: 'empty', term }

  const filled = await fillRange(deps, unfilled.slots, start, end, options)
  const slots = await annotate(deps.adapter, filled, {
    timezone: deps.timezone,
    defaultBlockId: deps.defaultBlockId,
  })
  return { kind: 'slots', term, slots }
}

/**
 * Standard builder: the term-checked, filled and block-annotated slots of
 * the schedule's range. Public slots only unless `options` say otherwise.
 */
export function rangeBuilder(deps: BuilderDeps, options: RangeOptions = {}): ScheduleBuilder<ScheduleData> {
  return (schedule) => buildRange(deps, options, schedule)
}

/**
 * Week-table builder: tabulates what the standard builder produces, and
 * passes the absence outcomes straight through.
 */
export function weekTableBuilder(deps: BuilderDeps, options: RangeOptions = {}): ScheduleBuilder<WeekTableData> {
  // The grid needs every slot, filled
  const rangeOptions: RangeOptions = { ...options, withFiller: true, limit: undefined }

  return async (schedule) => {
    const data = await buildRange(deps, rangeOptions, schedule)
    if (data.kind !== 'slots') return data
    return { kind: 'table', term: data.term, table: tabulate(data.slots, schedule.start, deps.timezone) }
  }
}
