/**
 * Adapter
 *
 * Domain-oriented persistence interface + in-memory mock implementation.
 * All methods are async so that synchronous (better-sqlite3) and networked
 * stores can sit behind the same interface.
 */

import type { Instant } from './time-date'
import type {
  Term, ShowType, Show, Season, Timeslot, Block, BlockShowRule, BlockRangeRule,
  BlockRules, ScheduleSlot,
} from './domain-types'
import { isPublicSlot, slotEnd } from './domain-types'
import type { TermId, ShowTypeId, ShowId, SeasonId, TimeslotId, BlockId } from './types'
import { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError } from './errors'

export type { Instant } from './time-date'

// ============================================================================
// Query Types
// ============================================================================

export type SlotQuery = {
  /** Include slots whose show type is not public (demos, recordings …) */
  includePrivate?: boolean
}

export type UpcomingQuery = SlotQuery & {
  limit: number
}

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  transaction<T>(fn: () => Promise<T>): Promise<T>

  // Term
  createTerm(term: Term): Promise<void>
  getTerm(id: TermId): Promise<Term | null>
  getAllTerms(): Promise<Term[]>
  /** Term with start <= at < end */
  findTermContaining(at: Instant): Promise<Term | null>
  /** Latest-starting term with end <= at */
  findTermBefore(at: Instant): Promise<Term | null>
  deleteTerm(id: TermId): Promise<void>

  // Show Type
  createShowType(showType: ShowType): Promise<void>
  getShowType(id: ShowTypeId): Promise<ShowType | null>
  /** Case-insensitive name match */
  getShowTypeByName(name: string): Promise<ShowType | null>

  // Show
  createShow(show: Show): Promise<void>
  getShow(id: ShowId): Promise<Show | null>
  getShowsByType(showTypeId: ShowTypeId): Promise<Show[]>

  // Season
  createSeason(season: Season): Promise<void>
  getSeason(id: SeasonId): Promise<Season | null>
  /** In insertion order */
  getSeasonsByShow(showId: ShowId): Promise<Season[]>

  // Timeslot
  createTimeslot(timeslot: Timeslot): Promise<void>
  getTimeslot(id: TimeslotId): Promise<Timeslot | null>
  /** Ordered by start time */
  getTimeslotsBySeason(seasonId: SeasonId): Promise<Timeslot[]>
  deleteTimeslot(id: TimeslotId): Promise<void>

  // Schedule queries (joined, ordered by start time)
  /** Slots with start < end and start + duration > start of range */
  getSlotsInRange(start: Instant, end: Instant, query?: SlotQuery): Promise<ScheduleSlot[]>
  /** Slots still running at or starting after `at` */
  getSlotsFrom(at: Instant, query: UpcomingQuery): Promise<ScheduleSlot[]>
  /** Latest-starting slot that has ended by `at` */
  getLatestSlotEndingBy(at: Instant, query?: SlotQuery): Promise<ScheduleSlot | null>
  /** Earliest slot starting at or after `at` */
  getEarliestSlotStartingFrom(at: Instant, query?: SlotQuery): Promise<ScheduleSlot | null>

  // Block
  createBlock(block: Block): Promise<void>
  getBlock(id: BlockId): Promise<Block | null>
  /** Ordered by priority */
  getAllBlocks(): Promise<Block[]>
  createBlockShowRule(rule: BlockShowRule): Promise<void>
  getBlockShowRulesByShow(showId: ShowId): Promise<BlockShowRule[]>
  createBlockRangeRule(rule: BlockRangeRule): Promise<void>
  /** Every block and rule, fetched in one go */
  getBlockRules(): Promise<BlockRules>

  // Lifecycle (persistent adapters only)
  close?(): Promise<void>
}

// ============================================================================
// Shared Validation
// ============================================================================

export function validateTerm(term: Term): void {
  if (!(term.start < term.end)) {
    throw new InvalidDataError(`Term '${term.id}' must start before it ends`)
  }
}

export function validateTimeslot(timeslot: Timeslot): void {
  if (!Number.isFinite(timeslot.durationMinutes) || timeslot.durationMinutes < 0) {
    throw new InvalidDataError(`Timeslot '${timeslot.id}' has a negative duration`)
  }
}

export function validateRangeRule(rule: BlockRangeRule): void {
  const inDay = (n: number) => Number.isInteger(n) && n >= 0 && n <= 24 * 60
  if (!inDay(rule.startOffset) || !inDay(rule.endOffset)) {
    throw new InvalidDataError(`Range rule '${rule.id}' offsets must lie within one day`)
  }
}

export function byStart<T extends { start: Instant }>(a: T, b: T): number {
  return a.start - b.start
}

// ============================================================================
// Mock Adapter
// ============================================================================

export function createMockAdapter(): Adapter {
  // ---- State ----
  const state = {
    terms: new Map<string, Term>(),
    showTypes: new Map<string, ShowType>(),
    shows: new Map<string, Show>(),
    seasons: new Map<string, Season>(),
    timeslots: new Map<string, Timeslot>(),
    blocks: new Map<string, Block>(),
    showRules: new Map<string, BlockShowRule>(),
    rangeRules: new Map<string, BlockRangeRule>(),
  }

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: typeof state | null = null

  function restoreState(snap: typeof state) {
    Object.assign(state, snap)
  }

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function insert<T extends { id: string }>(map: Map<string, T>, entity: T, label: string) {
    if (map.has(entity.id)) {
      throw new DuplicateKeyError(`${label} '${entity.id}' already exists`)
    }
    map.set(entity.id, clone(entity))
  }

  function requireRef(map: Map<string, unknown>, id: string, label: string) {
    if (!map.has(id)) {
      throw new ForeignKeyError(`${label} '${id}' does not exist`)
    }
  }

  function join(timeslot: Timeslot): ScheduleSlot {
    const season = state.seasons.get(timeslot.seasonId)
    const show = season ? state.shows.get(season.showId) : undefined
    const showType = show ? state.showTypes.get(show.showTypeId) : undefined
    if (!season || !show || !showType) {
      throw new NotFoundError(`Timeslot '${timeslot.id}' has a dangling season or show`)
    }
    return {
      id: timeslot.id,
      start: timeslot.start,
      durationMinutes: timeslot.durationMinutes,
      season: clone(season),
      show: clone(show),
      showType: clone(showType),
      isFiller: false,
    }
  }

  function joinedSlots(query: SlotQuery | undefined, predicate: (t: Timeslot) => boolean): ScheduleSlot[] {
    return [...state.timeslots.values()]
      .filter(predicate)
      .map(join)
      .filter((slot) => query?.includePrivate || isPublicSlot(slot))
      .sort(byStart)
  }

  // ---- Adapter implementation ----
  const adapter: Adapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      const isOutermost = txDepth === 0
      if (isOutermost) {
        snapshot = clone(state)
      }
      txDepth++
      try {
        const result = await fn()
        txDepth--
        if (txDepth === 0) snapshot = null
        return result
      } catch (e) {
        txDepth--
        if (txDepth === 0 && snapshot) {
          restoreState(snapshot)
          snapshot = null
        }
        throw e
      }
    },

    // ================================================================
    // Term
    // ================================================================
    async createTerm(term) {
      validateTerm(term)
      insert(state.terms, term, 'Term')
    },

    async getTerm(id) {
      const t = state.terms.get(id)
      return t ? clone(t) : null
    },

    async getAllTerms() {
      return [...state.terms.values()].sort(byStart).map(clone)
    },

    async findTermContaining(at) {
      const matches = [...state.terms.values()]
        .filter((t) => t.start <= at && at < t.end)
        .sort(byStart)
      const latest = matches[matches.length - 1]
      return latest ? clone(latest) : null
    },

    async findTermBefore(at) {
      const matches = [...state.terms.values()]
        .filter((t) => t.start <= at && t.end <= at)
        .sort(byStart)
      const latest = matches[matches.length - 1]
      return latest ? clone(latest) : null
    },

    async deleteTerm(id) {
      for (const s of state.seasons.values()) {
        if (s.termId === id) {
          throw new ForeignKeyError(`Cannot delete term '${id}': has seasons`)
        }
      }
      state.terms.delete(id)
    },

    // ================================================================
    // Show Type
    // ================================================================
    async createShowType(showType) {
      insert(state.showTypes, showType, 'Show type')
    },

    async getShowType(id) {
      const t = state.showTypes.get(id)
      return t ? clone(t) : null
    },

    async getShowTypeByName(name) {
      const wanted = name.toLowerCase()
      const t = [...state.showTypes.values()].find((st) => st.name.toLowerCase() === wanted)
      return t ? clone(t) : null
    },

    // ================================================================
    // Show
    // ================================================================
    async createShow(show) {
      requireRef(state.showTypes, show.showTypeId, 'Show type')
      insert(state.shows, show, 'Show')
    },

    async getShow(id) {
      const s = state.shows.get(id)
      return s ? clone(s) : null
    },

    async getShowsByType(showTypeId) {
      return [...state.shows.values()].filter((s) => s.showTypeId === showTypeId).map(clone)
    },

    // ================================================================
    // Season
    // ================================================================
    async createSeason(season) {
      requireRef(state.shows, season.showId, 'Show')
      requireRef(state.terms, season.termId, 'Term')
      insert(state.seasons, season, 'Season')
    },

    async getSeason(id) {
      const s = state.seasons.get(id)
      return s ? clone(s) : null
    },

    async getSeasonsByShow(showId) {
      return [...state.seasons.values()].filter((s) => s.showId === showId).map(clone)
    },

    // ================================================================
    // Timeslot
    // ================================================================
    async createTimeslot(timeslot) {
      validateTimeslot(timeslot)
      requireRef(state.seasons, timeslot.seasonId, 'Season')
      insert(state.timeslots, timeslot, 'Timeslot')
    },

    async getTimeslot(id) {
      const t = state.timeslots.get(id)
      return t ? clone(t) : null
    },

    async getTimeslotsBySeason(seasonId) {
      return [...state.timeslots.values()]
        .filter((t) => t.seasonId === seasonId)
        .sort(byStart)
        .map(clone)
    },

    async deleteTimeslot(id) {
      state.timeslots.delete(id)
    },

    // ================================================================
    // Schedule Queries
    // ================================================================
    async getSlotsInRange(start, end, query) {
      return joinedSlots(query, (t) => t.start < end && slotEnd(t) > start)
    },

    async getSlotsFrom(at, query) {
      return joinedSlots(query, (t) => slotEnd(t) > at).slice(0, query.limit)
    },

    async getLatestSlotEndingBy(at, query) {
      const slots = joinedSlots(query, (t) => slotEnd(t) <= at)
      return slots[slots.length - 1] ?? null
    },

    async getEarliestSlotStartingFrom(at, query) {
      return joinedSlots(query, (t) => t.start >= at)[0] ?? null
    },

    // ================================================================
    // Block
    // ================================================================
    async createBlock(block) {
      insert(state.blocks, block, 'Block')
    },

    async getBlock(id) {
      const b = state.blocks.get(id)
      return b ? clone(b) : null
    },

    async getAllBlocks() {
      return [...state.blocks.values()].sort((a, b) => a.priority - b.priority).map(clone)
    },

    async createBlockShowRule(rule) {
      requireRef(state.blocks, rule.blockId, 'Block')
      requireRef(state.shows, rule.showId, 'Show')
      insert(state.showRules, rule, 'Block show rule')
    },

    async getBlockShowRulesByShow(showId) {
      return [...state.showRules.values()].filter((r) => r.showId === showId).map(clone)
    },

    async createBlockRangeRule(rule) {
      validateRangeRule(rule)
      requireRef(state.blocks, rule.blockId, 'Block')
      insert(state.rangeRules, rule, 'Block range rule')
    },

    async getBlockRules() {
      return {
        blocks: await adapter.getAllBlocks(),
        showRules: [...state.showRules.values()].map(clone),
        rangeRules: [...state.rangeRules.values()]
          .sort((a, b) => a.startOffset - b.startOffset)
          .map(clone),
      }
    },
  }

  return adapter
}
