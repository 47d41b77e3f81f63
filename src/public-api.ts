/**
 * Public API Module
 *
 * Consumer-facing interface that ties all components together.
 * Handles configuration, validation, caching and logging.
 */

import type { Instant, LocalDate, LocalTime } from './time-date'
import { DAY_MINUTES, formatInstant, isValidTimezone, parseTime } from './time-date'
import type { Adapter } from './adapter'
import type { Block, ScheduleSlot, Season, Timeslot } from './domain-types'
import type { BlockId, ShowId } from './types'
import type { Logger } from './logger'
import { createLogger } from './logger'
import type { Clock } from './ttl-cache'
import { createTtlCache, systemClock } from './ttl-cache'
import type { FillerShow } from './filler'
import { createFillerShowSource, DEFAULT_FILLER_SHOW_TYPE, FILLER_SHOW_CACHE_MS } from './filler'
import type { ComingUpOptions, OnAir, RangeOptions } from './range'
import { comingUp as _comingUp, onAir as _onAir } from './range'
import type { BuilderDeps, Schedule, ScheduleBuilder, ScheduleData, WeekTableData } from './schedule'
import { createSchedule, rangeBuilder, weekTableBuilder } from './schedule'
import type { TermResolution } from './term-resolver'
import { resolveTerm } from './term-resolver'
import { showBlock } from './block-classifier'
import {
  seasonNumber as _seasonNumber, timeslotNumber as _timeslotNumber,
  seasonByNumber as _seasonByNumber, timeslotByNumber as _timeslotByNumber,
} from './numbering'
import { dayStartOn, isoWeekStart, toMonday } from './local-time'
import { ScheduleInconsistencyError, ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type SchedulerConfig = {
  adapter: Adapter
  /** IANA zone of the station, e.g. 'Europe/London' */
  timezone: string
  /** Block for slots no rule claims */
  defaultBlockId: BlockId
  /** Local time the broadcast day starts, 'HH:MM[:SS]' (default '07:00') */
  dayStart?: string
  /** Show type name of the filler show, any case (default 'filler') */
  fillerShowType?: string
  /** How long the filler show lookup is kept (default one day) */
  fillerShowTtlMs?: number
  logger?: Logger
  clock?: Clock
}

export type Scheduler = {
  readonly timezone: string
  readonly dayStart: LocalTime
  /** The broadcast day starting on `date` */
  day(date: LocalDate, options?: RangeOptions): Schedule<ScheduleData>
  /** The broadcast week containing `date`, from its Monday */
  week(date: LocalDate, options?: RangeOptions): Schedule<ScheduleData>
  weekOf(year: number, isoWeek: number, options?: RangeOptions): Schedule<ScheduleData>
  weekTable(date: LocalDate, options?: RangeOptions): Schedule<WeekTableData>
  comingUp(quantity?: number, at?: Instant, options?: Omit<ComingUpOptions, 'quantity'>): Promise<ScheduleSlot[]>
  onAir(at?: Instant): Promise<OnAir>
  termAt(at: Instant): Promise<TermResolution>
  blockOfShow(showId: ShowId): Promise<Block | null>
  seasonNumber(season: Season): Promise<number>
  timeslotNumber(timeslot: Timeslot): Promise<number>
  /** Show database lookups, 1-based; null for unlisted shows or out of range */
  seasonByNumber(showId: ShowId, n: number): Promise<Season | null>
  timeslotByNumber(showId: ShowId, seasonN: number, timeslotN: number): Promise<Timeslot | null>
  clearCaches(): void
}

export const DEFAULT_DAY_START = '07:00'

// ============================================================================
// Factory
// ============================================================================

export function createScheduler(config: SchedulerConfig): Scheduler {
  if (!config.adapter || typeof config.adapter !== 'object') {
    throw new ValidationError('Adapter is required')
  }
  if (!isValidTimezone(config.timezone)) {
    throw new ValidationError(`Invalid timezone: ${config.timezone}`)
  }
  if (!config.defaultBlockId) {
    throw new ValidationError('Default block is required')
  }
  const parsedDayStart = parseTime(config.dayStart ?? DEFAULT_DAY_START)
  if (!parsedDayStart.ok) {
    throw new ValidationError(`Invalid day start: ${parsedDayStart.error.message}`)
  }
  const fillerShowType = config.fillerShowType ?? DEFAULT_FILLER_SHOW_TYPE
  if (fillerShowType.trim() === '') {
    throw new ValidationError('Filler show type must not be empty')
  }
  const ttlMs = config.fillerShowTtlMs ?? FILLER_SHOW_CACHE_MS
  if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
    throw new ValidationError(`Filler show cache TTL must be positive, got ${ttlMs}`)
  }

  const { adapter, timezone } = config
  const dayStart = parsedDayStart.value
  const clock = config.clock ?? systemClock
  const logger = config.logger ?? createLogger('station-schedule')

  const fillerCache = createTtlCache<FillerShow>({ ttlMs, clock })
  const deps: BuilderDeps = {
    adapter,
    timezone,
    defaultBlockId: config.defaultBlockId,
    fillerShow: createFillerShowSource({ adapter, cache: fillerCache, typeName: fillerShowType }),
    logger,
  }

  // ========== Logging ==========

  async function reportingInconsistency<T>(context: Record<string, unknown>, run: () => Promise<T>): Promise<T> {
    try {
      return await run()
    } catch (e) {
      if (e instanceof ScheduleInconsistencyError) {
        logger.error({ err: e, ...context }, 'Schedule inconsistency')
      }
      throw e
    }
  }

  function logged<T extends { kind: string }>(builder: ScheduleBuilder<T>): ScheduleBuilder<T> {
    return (schedule) => {
      const range = { start: formatInstant(schedule.start), end: formatInstant(schedule.end) }
      return reportingInconsistency(range, async () => {
        const data = await builder(schedule)
        logger.debug({ ...range, kind: data.kind }, 'Built schedule')
        return data
      })
    }
  }

  // ========== Schedules ==========

  function scheduleFrom<T extends { kind: string }>(
    date: LocalDate,
    days: number,
    builder: ScheduleBuilder<T>
  ): Schedule<T> {
    return createSchedule({
      start: dayStartOn(date, dayStart, timezone),
      range: days * DAY_MINUTES,
      timezone,
      builder: logged(builder),
    })
  }

  function week(date: LocalDate, options?: RangeOptions): Schedule<ScheduleData> {
    return scheduleFrom(toMonday(date), 7, rangeBuilder(deps, options))
  }

  return {
    timezone,
    dayStart,

    day(date, options) {
      return scheduleFrom(date, 1, rangeBuilder(deps, options))
    },

    week,

    weekOf(year, isoWeek, options) {
      if (!Number.isInteger(isoWeek) || isoWeek < 1 || isoWeek > 53) {
        throw new ValidationError(`ISO week must be between 1 and 53, got ${isoWeek}`)
      }
      return week(isoWeekStart(year, isoWeek), options)
    },

    weekTable(date, options) {
      return scheduleFrom(toMonday(date), 7, weekTableBuilder(deps, options))
    },

    comingUp(quantity, at, options) {
      const from = at ?? clock()
      return reportingInconsistency({ at: formatInstant(from) }, () =>
        _comingUp(deps, from, { ...options, quantity })
      )
    },

    onAir(at) {
      const from = at ?? clock()
      return reportingInconsistency({ at: formatInstant(from) }, () => _onAir(deps, from))
    },

    termAt(at) {
      return resolveTerm(adapter, at)
    },

    blockOfShow(showId) {
      return showBlock(adapter, showId)
    },

    seasonNumber(season) {
      return _seasonNumber(adapter, season)
    },

    timeslotNumber(timeslot) {
      return _timeslotNumber(adapter, timeslot)
    },

    seasonByNumber(showId, n) {
      return _seasonByNumber(adapter, showId, n)
    },

    timeslotByNumber(showId, seasonN, timeslotN) {
      return _timeslotByNumber(adapter, showId, seasonN, timeslotN)
    },

    clearCaches() {
      fillerCache.clear()
    },
  }
}
