/**
 * Property tests for the filler engine.
 *
 * For any layout of real programming, a filled range:
 * - runs without gaps or overlaps
 * - reaches from at or before its start to at or after its end
 * - keeps every real slot, by identity and in order
 * - fills to the same list when filled again
 *
 * Overlapping programming gives up contiguity but keeps the rest.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import {
  layoutGen, placeLayout, stackedLayoutGen, placeStacked, type PlannedSlot,
} from '../generators/schedule'
import { fill, type FillerDeps } from '../../../src/filler'
import { plusMinutes } from '../../../src/time-date'
import { seedStation, addSlot, builderDeps, local, ids } from '../../helpers/fixtures'
import { assertContiguous, assertCovers } from '../../helpers/schedule-invariants'

// Autumn term, clear of clock changes
const ORIGIN = local('2011-11-07T00:00')
const RANGE_START = local('2011-11-07T07:00')
const RANGE_END = local('2011-11-09T07:00')

type Placement = { offset: number; durationMinutes: number }

async function filledLayout(layout: readonly PlannedSlot[]) {
  return filledPlacements(placeLayout(layout))
}

async function filledPlacements(placements: readonly Placement[]) {
  const adapter = await seedStation()
  let n = 0
  for (const { offset, durationMinutes } of placements) {
    await addSlot(adapter, `ts-${n++}`, ids.mondayMusicAutumn, plusMinutes(ORIGIN, offset), durationMinutes)
  }
  const deps: FillerDeps = builderDeps(adapter)
  const real = await adapter.getSlotsInRange(RANGE_START, RANGE_END)
  const filled = await fill(deps, real, RANGE_START, RANGE_END)
  return { deps, real, filled }
}

describe('Filler properties', () => {
  it('filled ranges are contiguous and cover the range', async () => {
    await fc.assert(
      fc.asyncProperty(layoutGen(), async (layout) => {
        const { filled } = await filledLayout(layout)
        assertContiguous(filled)
        assertCovers(filled, RANGE_START, RANGE_END)
      })
    )
  })

  it('real slots survive filling in order', async () => {
    await fc.assert(
      fc.asyncProperty(layoutGen(), async (layout) => {
        const { real, filled } = await filledLayout(layout)
        expect(filled.filter((s) => !s.isFiller)).toEqual(real)
        for (const slot of real) expect(filled).toContain(slot)
      })
    )
  })

  it('filling is idempotent', async () => {
    await fc.assert(
      fc.asyncProperty(layoutGen(), async (layout) => {
        const { deps, filled } = await filledLayout(layout)
        expect(await fill(deps, filled, RANGE_START, RANGE_END)).toEqual(filled)
      })
    )
  })

  it('filler never has a negative duration', async () => {
    await fc.assert(
      fc.asyncProperty(layoutGen(), async (layout) => {
        const { filled } = await filledLayout(layout)
        for (const slot of filled) expect(slot.durationMinutes).toBeGreaterThanOrEqual(0)
      })
    )
  })

  describe('with overlapping programming', () => {
    it('covers the range and keeps every real slot in order', async () => {
      await fc.assert(
        fc.asyncProperty(stackedLayoutGen(), async (layout) => {
          const { real, filled } = await filledPlacements(placeStacked(layout))
          assertCovers(filled, RANGE_START, RANGE_END)
          expect(filled.filter((s) => !s.isFiller)).toEqual(real)
        })
      )
    })

    it('filling is idempotent', async () => {
      await fc.assert(
        fc.asyncProperty(stackedLayoutGen(), async (layout) => {
          const { deps, filled } = await filledPlacements(placeStacked(layout))
          expect(await fill(deps, filled, RANGE_START, RANGE_END)).toEqual(filled)
        })
      )
    })
  })
})
