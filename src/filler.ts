/**
 * Filler Engine
 *
 * Filler slots are synthetic timeslots, bound to a synthetic season of the
 * designated filler show, that pad out gaps between real programming. After
 * filling, every slot list handed to the layers above is contiguous from the
 * requested start to the requested end.
 *
 * The filler show is the one show whose show type carries the configured
 * filler type name. Filler slots are never persisted.
 */

import type { Adapter, SlotQuery } from './adapter'
import type { ScheduleSlot, Show, ShowType, Season } from './domain-types'
import { slotEnd } from './domain-types'
import type { Instant } from './time-date'
import { formatInstant, minutesFrom } from './time-date'
import type { TtlCache } from './ttl-cache'
import type { Logger } from './logger'
import { seasonId, timeslotId } from './types'
import { termOnOrBefore } from './term-resolver'
import {
  InvalidRangeError, ValidationError, ScheduleInconsistencyError, noTermWhileFilling,
} from './errors'

// ============================================================================
// Types
// ============================================================================

export type FillerShow = {
  show: Show
  showType: ShowType
}

export type FillerShowSource = () => Promise<FillerShow>

export type FillerDeps = {
  adapter: Adapter
  fillerShow: FillerShowSource
  /** Visibility used when looking for real slots next to a gap */
  query?: SlotQuery
  logger?: Logger
}

export type FillerSpan = {
  end?: Instant
  durationMinutes?: number
}

export const DEFAULT_FILLER_SHOW_TYPE = 'filler'
export const FILLER_SHOW_CACHE_MS = 24 * 60 * 60 * 1000
const FILLER_CACHE_KEY = 'filler-show'

// ============================================================================
// Filler Show
// ============================================================================

export async function loadFillerShow(adapter: Adapter, typeName: string): Promise<FillerShow> {
  const showType = await adapter.getShowTypeByName(typeName)
  if (!showType) {
    throw new ScheduleInconsistencyError(`No show type named '${typeName}' exists for filler slots`)
  }
  const shows = await adapter.getShowsByType(showType.id)
  const show = shows[0]
  if (!show || shows.length > 1) {
    throw new ScheduleInconsistencyError(
      `Expected exactly one show of type '${showType.name}', found ${shows.length}`
    )
  }
  return { show, showType }
}

/** Read-through source of the filler show, backed by `cache`. */
export function createFillerShowSource(deps: {
  adapter: Adapter
  cache: TtlCache<FillerShow>
  typeName?: string
}): FillerShowSource {
  const typeName = deps.typeName ?? DEFAULT_FILLER_SHOW_TYPE
  return () => deps.cache.getOrLoad(FILLER_CACHE_KEY, () => loadFillerShow(deps.adapter, typeName))
}

// ============================================================================
// Filler Slots
// ============================================================================

export function isFillerId(id: string): boolean {
  return id.startsWith('filler:')
}

/**
 * Creates a filler slot starting at `start` and lasting until `span.end` or
 * for `span.durationMinutes`. Exactly one of the two must be given.
 */
export async function fillerSlot(deps: FillerDeps, start: Instant, span: FillerSpan): Promise<ScheduleSlot> {
  let duration: number
  if (span.durationMinutes === undefined) {
    if (span.end === undefined) {
      throw new ValidationError('Specify end or duration.')
    }
    duration = minutesFrom(start, span.end)
  } else if (span.end !== undefined) {
    throw new ValidationError('Do not specify both end and duration.')
  } else {
    duration = span.durationMinutes
  }
  if (duration < 0) {
    throw new InvalidRangeError(`Filler slot at ${formatInstant(start)} would end before it starts`)
  }

  const term = await termOnOrBefore(deps.adapter, start)
  if (!term) throw noTermWhileFilling(formatInstant(start))

  const { show, showType } = await deps.fillerShow()
  const season: Season = {
    id: seasonId(`filler:${term.id}`),
    showId: show.id,
    termId: term.id,
    submittedAt: term.start,
  }

  return {
    id: timeslotId(`filler:${start}:${duration}`),
    start,
    durationMinutes: duration,
    season,
    show,
    showType,
    isFiller: true,
  }
}

// ============================================================================
// Neighbour Lookups
// ============================================================================

/** End of the last real slot to finish by `at`, or `at` itself. */
export async function endBefore(deps: FillerDeps, at: Instant): Promise<Instant> {
  const slot = await deps.adapter.getLatestSlotEndingBy(at, deps.query)
  return slot ? slotEnd(slot) : at
}

/** Start of the first real slot to begin at or after `at`, or `at` itself. */
export async function startAfter(deps: FillerDeps, at: Instant): Promise<Instant> {
  const slot = await deps.adapter.getEarliestSlotStartingFrom(at, deps.query)
  return slot ? slot.start : at
}

// ============================================================================
// Filling Algorithm
// ============================================================================

/**
 * Fills every gap in `slots` (ordered by start) so the result runs without
 * gaps from at or before `start` to at or after `end`. Input slots are kept
 * by identity and in order. Filler at either end stretches to the nearest
 * real programming outside the range.
 */
export async function fill<S extends ScheduleSlot>(
  deps: FillerDeps,
  slots: readonly S[],
  start: Instant,
  end: Instant
): Promise<Array<S | ScheduleSlot>> {
  if (start > end) {
    throw new InvalidRangeError('Start time is after end time.')
  }

  const between = (from: Instant, to: Instant) => fillerSlot(deps, from, { end: to })

  const first = slots[0]
  if (!first) {
    const only = await between(await endBefore(deps, start), await startAfter(deps, end))
    deps.logger?.debug({ start: formatInstant(start), end: formatInstant(end) }, 'Filled empty range')
    return [only]
  }

  const filled: Array<S | ScheduleSlot> = []
  if (first.start > start) {
    filled.push(await between(await endBefore(deps, start), first.start))
  }

  // Compare each slot with the one placed before it; a gap gets a filler
  for (const slot of slots) {
    const previous = filled[filled.length - 1]
    if (previous && slotEnd(previous) < slot.start) {
      filled.push(await between(slotEnd(previous), slot.start))
    }
    filled.push(slot)
  }

  const last = filled[filled.length - 1]
  if (last && slotEnd(last) < end) {
    filled.push(await between(slotEnd(last), await startAfter(deps, end)))
  }

  deps.logger?.debug(
    { start: formatInstant(start), end: formatInstant(end), fillers: filled.length - slots.length },
    'Filled range'
  )
  return filled
}
