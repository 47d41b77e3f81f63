/**
 * Property tests for the week tabulator.
 *
 * Random, possibly overlapping programming over an ordinary week and the
 * two weeks with clock changes. Every filled week tabulates, each day
 * column is covered by cells that never overlap, and filling the week
 * again changes nothing.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { stackedLayoutGen, placeStacked, type StackedSlot } from '../generators/schedule'
import { fill } from '../../../src/filler'
import { createScheduler } from '../../../src/public-api'
import { makeDate, plusMinutes } from '../../../src/time-date'
import type { WeekTableRow } from '../../../src/week-table'
import { seedStation, addSlot, builderDeps, local, ids, silentLogger, TZ } from '../../helpers/fixtures'

const WEEKS = [
  { label: 'an ordinary week', monday: [2011, 11, 7] },
  { label: 'the week the clocks go back', monday: [2011, 10, 24] },
  { label: 'the week the clocks go forward', monday: [2012, 3, 19] },
] as const

async function stationWeek(monday: readonly [number, number, number], layout: readonly StackedSlot[]) {
  const [year, month, day] = monday
  const date = makeDate(year, month, day)
  const adapter = await seedStation()
  const origin = local(`${date}T07:00`)
  let n = 0
  for (const { offset, durationMinutes } of placeStacked(layout)) {
    await addSlot(adapter, `ts-${n++}`, ids.mondayMusicAutumn, plusMinutes(origin, offset), durationMinutes)
  }
  const scheduler = createScheduler({ adapter, timezone: TZ, defaultBlockId: ids.regularBlock, logger: silentLogger })
  return { adapter, scheduler, date }
}

/** Walks one day column; returns the number of rows its cells cover. */
function coveredRows(rows: ReadonlyArray<WeekTableRow>, day: number): number {
  let coveredUntil = 0
  rows.forEach((row, i) => {
    const cell = row.cells[day]
    if (!cell) {
      expect(i).toBeLessThan(coveredUntil)
      return
    }
    expect(i).toBeGreaterThanOrEqual(coveredUntil)
    expect(cell.rowSpan).toBeGreaterThan(0)
    coveredUntil = i + cell.rowSpan
  })
  return coveredUntil
}

describe('Week table properties', () => {
  for (const { label, monday } of WEEKS) {
    describe(label, () => {
      it('tabulates with non-overlapping cells covering every day', async () => {
        await fc.assert(
          fc.asyncProperty(stackedLayoutGen(1), async (layout) => {
            const { scheduler, date } = await stationWeek(monday, layout)
            const data = await scheduler.weekTable(date).data
            expect(data.kind).toBe('table')
            if (data.kind !== 'table') return

            const { rows } = data.table
            expect(rows[0]?.offset).toBe(0)
            for (let day = 0; day < 7; day++) {
              expect(coveredRows(rows, day)).toBe(rows.length)
            }
          })
        )
      })

      it('filling the week again changes nothing', async () => {
        await fc.assert(
          fc.asyncProperty(stackedLayoutGen(1), async (layout) => {
            const { adapter, scheduler, date } = await stationWeek(monday, layout)
            const schedule = scheduler.week(date)
            const data = await schedule.data
            expect(data.kind).toBe('slots')
            if (data.kind !== 'slots') return

            const refilled = await fill(builderDeps(adapter), data.slots, schedule.start, schedule.end)
            const shape = (s: { id: string; start: number; durationMinutes: number }) => [s.id, s.start, s.durationMinutes]
            expect(refilled.map(shape)).toEqual(data.slots.map(shape))
          })
        )
      })
    })
  }
})
