/**
 * station-schedule
 *
 * Public API exports
 */

// Error system (canonical source: base class, codes, all error classes)
export {
  ScheduleError, ScheduleErrorCode, errorCategory,
  DuplicateKeyError, NotFoundError, ForeignKeyError, InvalidDataError,
  ValidationError, InvalidRangeError, ParseError, ScheduleInconsistencyError,
} from './errors'
export type { ErrorCategory, ScheduleErrorCode as ScheduleErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date (canonical source: branded types + utilities)
export type { LocalDate, LocalTime, LocalDateTime, Instant, Weekday } from './time-date'
export {
  DAY_MINUTES,
  parseDate, parseTime, parseDateTime, parseInstant,
  makeDate, makeTime, makeDateTime, instant,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf, timeOf, minutesOfDay,
  addDays, daysBetween, addMinutes, minutesBetween, compareDateTimes,
  dayOfWeek, weekdayToIndex, indexToWeekday,
  isValidTimezone, toLocal, fromLocal, isDSTAt,
  plusMinutes, minutesFrom, formatInstant,
} from './time-date'

// Naive local time
export type { IsoWeekDate, Navigation } from './local-time'
export {
  nld, unNld, nldiff, dstAdd, localTimeOfDay, localMidnight, hourBoundariesBetween,
  dayStartOn, toMonday, isoWeekStart, isoWeekDay, isoWeekOf, navigation,
} from './local-time'

// Branded ID types
export type {
  TermId, ShowTypeId, ShowId, SeasonId, TimeslotId, BlockId, RuleId,
} from './types'
export { termId, showTypeId, showId, seasonId, timeslotId, blockId, ruleId } from './types'

// Domain entities
export type {
  Term, ShowType, Show, Season, Timeslot, Block, BlockShowRule, BlockRangeRule,
  BlockRules, ScheduleSlot, BlockedSlot,
} from './domain-types'
export { slotEnd, isPublicSlot } from './domain-types'

// Adapter (persistence interface + in-memory mock)
export type { Adapter, SlotQuery, UpcomingQuery } from './adapter'
export { createMockAdapter } from './adapter'

// SQLite adapter
export type { SqliteAdapter } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Terms
export type { TermResolution } from './term-resolver'
export { termContaining, termBefore, resolveTerm, termOnOrBefore, academicYear, termLabel } from './term-resolver'

// Blocks
export type { Classifier, ClassifierContext } from './block-classifier'
export {
  rangeRuleMatches, showRuleClassifier, rangeRuleClassifier, defaultClassifier, CLASSIFIERS,
  prepareClassifiers, classify, annotateWith, annotate, showBlock,
} from './block-classifier'

// Filler
export type { FillerDeps, FillerShow, FillerShowSource, FillerSpan } from './filler'
export {
  fill, fillerSlot, endBefore, startAfter, isFillerId,
  loadFillerShow, createFillerShowSource,
} from './filler'

// Caching
export type { Clock, TtlCache } from './ttl-cache'
export { createTtlCache, systemClock } from './ttl-cache'

// Range queries
export type { RangeDeps, RangeOptions, SlotRange, WeekOptions, ComingUpOptions, OnAir } from './range'
export { between, within, day, week, fillRange, comingUp, onAir } from './range'

// Schedules
export type {
  Schedule, ScheduleBuilder, ScheduleFields, ScheduleAbsence, ScheduleData, WeekTableData, BuilderDeps,
} from './schedule'
export { createSchedule, rangeBuilder, weekTableBuilder } from './schedule'

// Week table
export type { WeekTable, WeekTableRow, WeekTableCell } from './week-table'
export { splitDays, partitionRows, populate, tabulate, tabulateDays } from './week-table'

// Numbering
export { seasonNumber, timeslotNumber, seasonByNumber, timeslotByNumber } from './numbering'

// Logging
export type { Logger } from './logger'
export { createLogger } from './logger'

// High-level API (ties every module together behind one configured object)
export type { Scheduler, SchedulerConfig } from './public-api'
export { createScheduler } from './public-api'
