/**
 * SQLite Adapter
 *
 * Production implementation of the schedule adapter using better-sqlite3.
 * Instants are stored as epoch milliseconds, durations as minutes, flags as
 * 0/1 integers. Schedule queries join timeslots to their season, show and
 * show type in one statement.
 */
import Database from 'better-sqlite3'
import type { Adapter, SlotQuery } from './adapter'
import { validateRangeRule, validateTerm, validateTimeslot } from './adapter'
import type {
  Term, ShowType, Show, Season, Timeslot, Block, BlockShowRule, BlockRangeRule, ScheduleSlot,
} from './domain-types'
import { instant } from './time-date'
import { blockId, ruleId, seasonId, showId, showTypeId, termId, timeslotId } from './types'
import { DuplicateKeyError, ForeignKeyError, InvalidDataError } from './errors'

export type SqliteAdapter = Adapter & {
  listTables(): Promise<string[]>
  inTransaction(): Promise<boolean>
}

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS term (
    id TEXT PRIMARY KEY,
    start_time INTEGER NOT NULL,
    end_time INTEGER NOT NULL,
    name TEXT NOT NULL,
    CHECK (start_time < end_time)
  );
  CREATE INDEX IF NOT EXISTS idx_term_start ON term(start_time);

  CREATE TABLE IF NOT EXISTS show_type (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    is_public INTEGER NOT NULL DEFAULT 1,
    has_listing INTEGER NOT NULL DEFAULT 1,
    can_be_messaged INTEGER NOT NULL DEFAULT 0,
    is_collapsible INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS show (
    id TEXT PRIMARY KEY,
    show_type_id TEXT NOT NULL REFERENCES show_type(id) ON DELETE RESTRICT,
    title TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_show_type ON show(show_type_id);

  CREATE TABLE IF NOT EXISTS season (
    id TEXT PRIMARY KEY,
    show_id TEXT NOT NULL REFERENCES show(id) ON DELETE CASCADE,
    term_id TEXT NOT NULL REFERENCES term(id) ON DELETE RESTRICT,
    submitted_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_season_show ON season(show_id);

  CREATE TABLE IF NOT EXISTS timeslot (
    id TEXT PRIMARY KEY,
    season_id TEXT NOT NULL REFERENCES season(id) ON DELETE CASCADE,
    start_time INTEGER NOT NULL,
    duration_minutes INTEGER NOT NULL,
    CHECK (duration_minutes >= 0)
  );
  CREATE INDEX IF NOT EXISTS idx_timeslot_season ON timeslot(season_id);
  CREATE INDEX IF NOT EXISTS idx_timeslot_start ON timeslot(start_time);

  CREATE TABLE IF NOT EXISTS block (
    id TEXT PRIMARY KEY,
    tag TEXT NOT NULL,
    name TEXT NOT NULL,
    priority INTEGER NOT NULL,
    is_listable INTEGER NOT NULL DEFAULT 1
  );

  CREATE TABLE IF NOT EXISTS block_show_rule (
    id TEXT PRIMARY KEY,
    block_id TEXT NOT NULL REFERENCES block(id) ON DELETE CASCADE,
    show_id TEXT NOT NULL REFERENCES show(id) ON DELETE CASCADE
  );
  CREATE INDEX IF NOT EXISTS idx_block_show_rule_show ON block_show_rule(show_id);

  CREATE TABLE IF NOT EXISTS block_range_rule (
    id TEXT PRIMARY KEY,
    block_id TEXT NOT NULL REFERENCES block(id) ON DELETE CASCADE,
    start_offset INTEGER NOT NULL,
    end_offset INTEGER NOT NULL,
    CHECK (start_offset BETWEEN 0 AND 1440 AND end_offset BETWEEN 0 AND 1440)
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/FOREIGN KEY constraint/i.test(msg)) throw new ForeignKeyError(msg)
  if (/CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type TermRow = {
  id: string
  start_time: number
  end_time: number
  name: string
}

type ShowTypeRow = {
  id: string
  name: string
  is_public: number
  has_listing: number
  can_be_messaged: number
  is_collapsible: number
}

type ShowRow = {
  id: string
  show_type_id: string
  title: string
  created_at: number
}

type SeasonRow = {
  id: string
  show_id: string
  term_id: string
  submitted_at: number
}

type TimeslotRow = {
  id: string
  season_id: string
  start_time: number
  duration_minutes: number
}

type BlockRow = {
  id: string
  tag: string
  name: string
  priority: number
  is_listable: number
}

type BlockShowRuleRow = {
  id: string
  block_id: string
  show_id: string
}

type BlockRangeRuleRow = {
  id: string
  block_id: string
  start_offset: number
  end_offset: number
}

/** One row of the joined schedule query */
type SlotRow = TimeslotRow & {
  show_id: string
  term_id: string
  submitted_at: number
  show_type_id: string
  title: string
  created_at: number
  type_name: string
  is_public: number
  has_listing: number
  can_be_messaged: number
  is_collapsible: number
}

// ============================================================================
// Row → Domain Mappers
// ============================================================================

function toTerm(row: TermRow): Term {
  return { id: termId(row.id), start: instant(row.start_time), end: instant(row.end_time), name: row.name }
}

function toShowType(row: ShowTypeRow): ShowType {
  return {
    id: showTypeId(row.id),
    name: row.name,
    isPublic: row.is_public === 1,
    hasListing: row.has_listing === 1,
    canBeMessaged: row.can_be_messaged === 1,
    isCollapsible: row.is_collapsible === 1,
  }
}

function toShow(row: ShowRow): Show {
  return {
    id: showId(row.id),
    showTypeId: showTypeId(row.show_type_id),
    title: row.title,
    createdAt: instant(row.created_at),
  }
}

function toSeason(row: SeasonRow): Season {
  return {
    id: seasonId(row.id),
    showId: showId(row.show_id),
    termId: termId(row.term_id),
    submittedAt: instant(row.submitted_at),
  }
}

function toTimeslot(row: TimeslotRow): Timeslot {
  return {
    id: timeslotId(row.id),
    seasonId: seasonId(row.season_id),
    start: instant(row.start_time),
    durationMinutes: row.duration_minutes,
  }
}

function toBlock(row: BlockRow): Block {
  return {
    id: blockId(row.id),
    tag: row.tag,
    name: row.name,
    priority: row.priority,
    isListable: row.is_listable === 1,
  }
}

function toShowRule(row: BlockShowRuleRow): BlockShowRule {
  return { id: ruleId(row.id), blockId: blockId(row.block_id), showId: showId(row.show_id) }
}

function toRangeRule(row: BlockRangeRuleRow): BlockRangeRule {
  return {
    id: ruleId(row.id),
    blockId: blockId(row.block_id),
    startOffset: row.start_offset,
    endOffset: row.end_offset,
  }
}

function toSlot(row: SlotRow): ScheduleSlot {
  return {
    id: timeslotId(row.id),
    start: instant(row.start_time),
    durationMinutes: row.duration_minutes,
    season: toSeason({ id: row.season_id, show_id: row.show_id, term_id: row.term_id, submitted_at: row.submitted_at }),
    show: toShow({ id: row.show_id, show_type_id: row.show_type_id, title: row.title, created_at: row.created_at }),
    showType: toShowType({
      id: row.show_type_id,
      name: row.type_name,
      is_public: row.is_public,
      has_listing: row.has_listing,
      can_be_messaged: row.can_be_messaged,
      is_collapsible: row.is_collapsible,
    }),
    isFiller: false,
  }
}

// ============================================================================
// Joined Schedule Query
// ============================================================================

const SLOT_SELECT = `
  SELECT t.id, t.season_id, t.start_time, t.duration_minutes,
         se.show_id, se.term_id, se.submitted_at,
         sh.show_type_id, sh.title, sh.created_at,
         st.name AS type_name, st.is_public, st.has_listing, st.can_be_messaged, st.is_collapsible
  FROM timeslot t
  JOIN season se ON se.id = t.season_id
  JOIN show sh ON sh.id = se.show_id
  JOIN show_type st ON st.id = sh.show_type_id
  WHERE (@includePrivate = 1 OR st.is_public = 1)
`

const SLOT_END = '(t.start_time + t.duration_minutes * 60000)'

function visibility(query: SlotQuery | undefined): { includePrivate: number } {
  return { includePrivate: query?.includePrivate ? 1 : 0 }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteAdapter> {
  const db = new Database(path)
  db.exec('PRAGMA foreign_keys = ON')
  db.exec(SCHEMA_SQL)

  let _inTx = false

  function slots(where: string, order: string, params: Record<string, number>): ScheduleSlot[] {
    const rows = db.prepare(`${SLOT_SELECT} AND ${where} ORDER BY ${order}`).all(params) as SlotRow[]
    return rows.map(toSlot)
  }

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      _inTx = true
      db.exec('BEGIN IMMEDIATE')
      try {
        const result = await fn()
        db.exec('COMMIT')
        return result
      } catch (e) {
        db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    // ================================================================
    // Term
    // ================================================================
    async createTerm(term) {
      validateTerm(term)
      safe(() =>
        db.prepare('INSERT INTO term (id, start_time, end_time, name) VALUES (?, ?, ?, ?)').run(
          term.id, term.start, term.end, term.name,
        ),
      )
    },

    async getTerm(id) {
      const row = db.prepare('SELECT * FROM term WHERE id = ?').get(id) as TermRow | undefined
      return row ? toTerm(row) : null
    },

    async getAllTerms() {
      const rows = db.prepare('SELECT * FROM term ORDER BY start_time, rowid').all() as TermRow[]
      return rows.map(toTerm)
    },

    async findTermContaining(at) {
      const row = db.prepare(
        'SELECT * FROM term WHERE start_time <= ? AND ? < end_time ORDER BY start_time DESC, rowid DESC LIMIT 1',
      ).get(at, at) as TermRow | undefined
      return row ? toTerm(row) : null
    },

    async findTermBefore(at) {
      const row = db.prepare(
        'SELECT * FROM term WHERE start_time <= ? AND end_time <= ? ORDER BY start_time DESC, rowid DESC LIMIT 1',
      ).get(at, at) as TermRow | undefined
      return row ? toTerm(row) : null
    },

    async deleteTerm(id) {
      safe(() => db.prepare('DELETE FROM term WHERE id = ?').run(id))
    },

    // ================================================================
    // Show Type
    // ================================================================
    async createShowType(showType) {
      safe(() =>
        db.prepare(
          'INSERT INTO show_type (id, name, is_public, has_listing, can_be_messaged, is_collapsible) VALUES (?, ?, ?, ?, ?, ?)',
        ).run(
          showType.id,
          showType.name,
          showType.isPublic ? 1 : 0,
          showType.hasListing ? 1 : 0,
          showType.canBeMessaged ? 1 : 0,
          showType.isCollapsible ? 1 : 0,
        ),
      )
    },

    async getShowType(id) {
      const row = db.prepare('SELECT * FROM show_type WHERE id = ?').get(id) as ShowTypeRow | undefined
      return row ? toShowType(row) : null
    },

    async getShowTypeByName(name) {
      const row = db.prepare(
        'SELECT * FROM show_type WHERE name = ? COLLATE NOCASE ORDER BY rowid LIMIT 1',
      ).get(name) as ShowTypeRow | undefined
      return row ? toShowType(row) : null
    },

    // ================================================================
    // Show
    // ================================================================
    async createShow(show) {
      safe(() =>
        db.prepare('INSERT INTO show (id, show_type_id, title, created_at) VALUES (?, ?, ?, ?)').run(
          show.id, show.showTypeId, show.title, show.createdAt,
        ),
      )
    },

    async getShow(id) {
      const row = db.prepare('SELECT * FROM show WHERE id = ?').get(id) as ShowRow | undefined
      return row ? toShow(row) : null
    },

    async getShowsByType(typeId) {
      const rows = db.prepare('SELECT * FROM show WHERE show_type_id = ? ORDER BY rowid').all(typeId) as ShowRow[]
      return rows.map(toShow)
    },

    // ================================================================
    // Season
    // ================================================================
    async createSeason(season) {
      safe(() =>
        db.prepare('INSERT INTO season (id, show_id, term_id, submitted_at) VALUES (?, ?, ?, ?)').run(
          season.id, season.showId, season.termId, season.submittedAt,
        ),
      )
    },

    async getSeason(id) {
      const row = db.prepare('SELECT * FROM season WHERE id = ?').get(id) as SeasonRow | undefined
      return row ? toSeason(row) : null
    },

    async getSeasonsByShow(id) {
      const rows = db.prepare('SELECT * FROM season WHERE show_id = ? ORDER BY rowid').all(id) as SeasonRow[]
      return rows.map(toSeason)
    },

    // ================================================================
    // Timeslot
    // ================================================================
    async createTimeslot(timeslot) {
      validateTimeslot(timeslot)
      safe(() =>
        db.prepare('INSERT INTO timeslot (id, season_id, start_time, duration_minutes) VALUES (?, ?, ?, ?)').run(
          timeslot.id, timeslot.seasonId, timeslot.start, timeslot.durationMinutes,
        ),
      )
    },

    async getTimeslot(id) {
      const row = db.prepare('SELECT * FROM timeslot WHERE id = ?').get(id) as TimeslotRow | undefined
      return row ? toTimeslot(row) : null
    },

    async getTimeslotsBySeason(id) {
      const rows = db.prepare(
        'SELECT * FROM timeslot WHERE season_id = ? ORDER BY start_time, rowid',
      ).all(id) as TimeslotRow[]
      return rows.map(toTimeslot)
    },

    async deleteTimeslot(id) {
      db.prepare('DELETE FROM timeslot WHERE id = ?').run(id)
    },

    // ================================================================
    // Schedule Queries
    // ================================================================
    async getSlotsInRange(start, end, query) {
      return slots(`t.start_time < @end AND ${SLOT_END} > @start`, 't.start_time, t.rowid', {
        ...visibility(query), start, end,
      })
    },

    async getSlotsFrom(at, query) {
      return slots(`${SLOT_END} > @at`, 't.start_time, t.rowid LIMIT @limit', {
        ...visibility(query), at, limit: query.limit,
      })
    },

    async getLatestSlotEndingBy(at, query) {
      const found = slots(`${SLOT_END} <= @at`, 't.start_time DESC, t.rowid DESC LIMIT 1', { ...visibility(query), at })
      return found[0] ?? null
    },

    async getEarliestSlotStartingFrom(at, query) {
      const found = slots('t.start_time >= @at', 't.start_time, t.rowid LIMIT 1', { ...visibility(query), at })
      return found[0] ?? null
    },

    // ================================================================
    // Block
    // ================================================================
    async createBlock(block) {
      safe(() =>
        db.prepare('INSERT INTO block (id, tag, name, priority, is_listable) VALUES (?, ?, ?, ?, ?)').run(
          block.id, block.tag, block.name, block.priority, block.isListable ? 1 : 0,
        ),
      )
    },

    async getBlock(id) {
      const row = db.prepare('SELECT * FROM block WHERE id = ?').get(id) as BlockRow | undefined
      return row ? toBlock(row) : null
    },

    async getAllBlocks() {
      const rows = db.prepare('SELECT * FROM block ORDER BY priority, rowid').all() as BlockRow[]
      return rows.map(toBlock)
    },

    async createBlockShowRule(rule) {
      safe(() =>
        db.prepare('INSERT INTO block_show_rule (id, block_id, show_id) VALUES (?, ?, ?)').run(
          rule.id, rule.blockId, rule.showId,
        ),
      )
    },

    async getBlockShowRulesByShow(id) {
      const rows = db.prepare(
        'SELECT * FROM block_show_rule WHERE show_id = ? ORDER BY rowid',
      ).all(id) as BlockShowRuleRow[]
      return rows.map(toShowRule)
    },

    async createBlockRangeRule(rule) {
      validateRangeRule(rule)
      safe(() =>
        db.prepare('INSERT INTO block_range_rule (id, block_id, start_offset, end_offset) VALUES (?, ?, ?, ?)').run(
          rule.id, rule.blockId, rule.startOffset, rule.endOffset,
        ),
      )
    },

    async getBlockRules() {
      const showRules = db.prepare('SELECT * FROM block_show_rule ORDER BY rowid').all() as BlockShowRuleRow[]
      const rangeRules = db.prepare(
        'SELECT * FROM block_range_rule ORDER BY start_offset, rowid',
      ).all() as BlockRangeRuleRow[]
      return {
        blocks: await adapter.getAllBlocks(),
        showRules: showRules.map(toShowRule),
        rangeRules: rangeRules.map(toRangeRule),
      }
    },

    // ================================================================
    // Lifecycle
    // ================================================================
    async close() {
      db.close()
    },

    // ================================================================
    // SQLite Extras
    // ================================================================
    async listTables() {
      const rows = db.prepare(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).all() as { name: string }[]
      return rows.map((r) => r.name)
    },

    async inTransaction() {
      return _inTx
    },
  }

  return adapter
}
