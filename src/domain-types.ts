/**
 * Canonical Domain Types
 *
 * Single source of truth for the schedule entities. Adapters store and return
 * the flat record types; the compilation pipeline works on ScheduleSlot, a
 * timeslot joined with the season, show and show type it belongs to.
 */

import type { Instant } from './time-date'
import { plusMinutes } from './time-date'
import type {
  TermId, ShowTypeId, ShowId, SeasonId, TimeslotId, BlockId, RuleId,
} from './types'

// ============================================================================
// Stored Entities
// ============================================================================

export type Term = {
  id: TermId
  start: Instant
  end: Instant
  /** Autumn, Spring, Summer … */
  name: string
}

export type ShowType = {
  id: ShowTypeId
  name: string
  isPublic: boolean
  hasListing: boolean
  canBeMessaged: boolean
  /** Collapsible slots do not force a row boundary in the week table */
  isCollapsible: boolean
}

export type Show = {
  id: ShowId
  showTypeId: ShowTypeId
  title: string
  createdAt: Instant
}

export type Season = {
  id: SeasonId
  showId: ShowId
  termId: TermId
  submittedAt: Instant
}

export type Timeslot = {
  id: TimeslotId
  seasonId: SeasonId
  start: Instant
  durationMinutes: number
}

export type Block = {
  id: BlockId
  tag: string
  name: string
  /** Lower numbers take precedence */
  priority: number
  isListable: boolean
}

export type BlockShowRule = {
  id: RuleId
  blockId: BlockId
  showId: ShowId
}

export type BlockRangeRule = {
  id: RuleId
  blockId: BlockId
  /** Minutes after local midnight */
  startOffset: number
  /** Minutes after local midnight; at or before startOffset means the range wraps */
  endOffset: number
}

export type BlockRules = {
  blocks: Block[]
  showRules: BlockShowRule[]
  rangeRules: BlockRangeRule[]
}

// ============================================================================
// Pipeline Entities
// ============================================================================

/** A timeslot with its season, show and show type resolved. */
export type ScheduleSlot = {
  id: TimeslotId
  start: Instant
  durationMinutes: number
  season: Season
  show: Show
  showType: ShowType
  isFiller: boolean
}

/** A schedule slot annotated with its programming block. */
export type BlockedSlot = ScheduleSlot & { block: Block }

export function slotEnd(slot: { start: Instant; durationMinutes: number }): Instant {
  return plusMinutes(slot.start, slot.durationMinutes)
}

export function isPublicSlot(slot: ScheduleSlot): boolean {
  return slot.showType.isPublic
}
