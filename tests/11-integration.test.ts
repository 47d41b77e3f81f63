/**
 * Segment 11: Integration Tests
 *
 * A small station run end to end through the scheduler: a term of weekly
 * programming, block rules, holidays, week tables and paging.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import type { Adapter } from '../src/adapter'
import { createScheduler, type Scheduler } from '../src/public-api'
import { createSqliteAdapter } from '../src/sqlite-adapter'
import { makeDate } from '../src/time-date'
import { slotEnd } from '../src/domain-types'
import { ruleId } from '../src/types'
import { seedStation, addSlot, addMondayMusic, local, ids, silentLogger, TZ } from './helpers/fixtures'
import { assertContiguous, assertCovers } from './helpers/schedule-invariants'

async function station(adapter: Adapter): Promise<Scheduler> {
  await seedStation(adapter)
  await addMondayMusic(adapter)
  await adapter.createBlockShowRule({ id: ruleId('mm-flagship'), blockId: ids.flagshipBlock, showId: ids.mondayMusic })
  await adapter.createBlockRangeRule({ id: ruleId('overnight'), blockId: ids.overnightBlock, startOffset: 23 * 60, endOffset: 7 * 60 })
  return createScheduler({ adapter, timezone: TZ, defaultBlockId: ids.regularBlock, logger: silentLogger })
}

describe('Segment 11: Integration', () => {
  let scheduler: Scheduler

  beforeEach(async () => {
    const adapter = await createSqliteAdapter(':memory:')
    scheduler = await station(adapter)
  })

  it('lists a week of Monday Music with filler around it', async () => {
    const schedule = scheduler.week(makeDate(2011, 11, 9))
    const data = await schedule.data
    expect(data.kind).toBe('slots')
    if (data.kind !== 'slots') return

    expect(data.slots.map((s) => [s.isFiller, s.block.tag])).toEqual([
      [true, 'regular'],
      [false, 'flagship'],
      [true, 'regular'],
    ])
    assertContiguous(data.slots)
    assertCovers(data.slots, schedule.start, schedule.end)
  })

  it('puts filler starting overnight in the overnight block', async () => {
    const adapter = await createSqliteAdapter(':memory:')
    const withNight = await station(adapter)
    await addSlot(adapter, 'late', ids.mondayMusicAutumn, local('2011-11-08T22:00'), 60)
    const data = await withNight.day(makeDate(2011, 11, 8)).data
    expect(data.kind === 'slots' && data.slots.map((s) => [s.id, s.block.tag])).toEqual([
      [`filler:${local('2011-11-07T11:00')}:${35 * 60}`, 'regular'],
      ['late', 'flagship'],
      [`filler:${local('2011-11-08T23:00')}:${5 * 1440 + 10 * 60}`, 'overnight'],
    ])
  })

  it('tabulates the week', async () => {
    const data = await scheduler.weekTable(makeDate(2011, 11, 7)).data
    expect(data.kind).toBe('table')
    if (data.kind !== 'table') return

    const { rows } = data.table
    expect(rows.map((r) => r.time)).toEqual([
      '2011-11-07T07:00:00', '2011-11-07T09:00:00', '2011-11-07T10:00:00', '2011-11-07T11:00:00',
    ])
    expect(rows.map((r) => r.cells[0]?.rowSpan ?? null)).toEqual([1, 2, null, 1])
    expect(rows[1]?.cells[0]?.slot.show.title).toBe('Monday Music')
    expect(rows[1]?.cells[0]?.slot.block.tag).toBe('flagship')
    expect(rows.map((r) => r.cells[6]?.rowSpan ?? null)).toEqual([4, null, null, null])
  })

  it('pages to the following week', async () => {
    const data = await scheduler.week(makeDate(2011, 11, 7)).next().data
    expect(data.kind === 'slots' && data.slots.filter((s) => !s.isFiller).map((s) => s.id)).toEqual(['mm-2011-11-14'])
  })

  it('reports the Christmas holiday', async () => {
    const data = await scheduler.day(makeDate(2011, 12, 25)).data
    expect(data.kind).toBe('holiday')
    if (data.kind === 'holiday') expect(data.previous.id).toBe(ids.autumn)
  })

  it('reports an empty week in the spring term', async () => {
    const data = await scheduler.weekTable(makeDate(2012, 1, 16)).data
    expect(data.kind).toBe('empty')
    if (data.kind === 'empty') expect(data.term.id).toBe(ids.spring)
  })

  it('reports no term data before the first term', async () => {
    expect(await scheduler.week(makeDate(2011, 8, 1)).data).toEqual({ kind: 'no-term-data' })
  })

  it('numbers seasons and episodes', async () => {
    const data = await scheduler.day(makeDate(2011, 11, 7)).data
    const show = data.kind === 'slots' ? data.slots.find((s) => !s.isFiller) : undefined
    if (!show) throw new Error('expected Monday Music')
    expect(await scheduler.seasonNumber(show.season)).toBe(1)
    expect(await scheduler.timeslotNumber({
      id: show.id, seasonId: show.season.id, start: show.start, durationMinutes: show.durationMinutes,
    })).toBe(10)
    expect(slotEnd(show)).toBe(local('2011-11-07T11:00'))
    expect((await scheduler.timeslotByNumber(ids.mondayMusic, 1, 10))?.start).toBe(show.start)
  })
})
