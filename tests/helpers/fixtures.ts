/**
 * Shared station fixtures: a small but complete set of show types, shows,
 * terms and blocks for tests that need real data behind the adapter.
 */
import pino from 'pino'
import type { Adapter } from '../../src/adapter'
import { createMockAdapter } from '../../src/adapter'
import type { Instant } from '../../src/time-date'
import { parseDateTime, fromLocal } from '../../src/time-date'
import { createFillerShowSource, FILLER_SHOW_CACHE_MS, type FillerShow } from '../../src/filler'
import { createTtlCache } from '../../src/ttl-cache'
import type { BuilderDeps } from '../../src/schedule'
import {
  blockId, seasonId, showId, showTypeId, termId, timeslotId,
  type SeasonId,
} from '../../src/types'

export const TZ = 'Europe/London'

export const silentLogger = pino({ level: 'silent' })

/** Station wall-clock time, 'YYYY-MM-DDTHH:MM[:SS]' */
export function local(dt: string): Instant {
  const parsed = parseDateTime(dt)
  if (!parsed.ok) throw parsed.error
  return fromLocal(parsed.value, TZ)
}

export const ids = {
  fillerType: showTypeId('st-filler'),
  regularType: showTypeId('st-regular'),
  demoType: showTypeId('st-demo'),
  jukebox: showId('show-jukebox'),
  mondayMusic: showId('show-monday-music'),
  demoShow: showId('show-demo'),
  autumn: termId('term-autumn-2011'),
  spring: termId('term-spring-2012'),
  mondayMusicAutumn: seasonId('season-monday-music-autumn'),
  demoAutumn: seasonId('season-demo-autumn'),
  regularBlock: blockId('block-regular'),
  flagshipBlock: blockId('block-flagship'),
  overnightBlock: blockId('block-overnight'),
}

/**
 * Seeds show types (collapsible filler, regular, private demo), the
 * Jukebox filler show, Monday Music, a demo show, the Autumn 2011 and
 * Spring 2012 terms, one season each for Monday Music and the demo show,
 * and three blocks. No timeslots.
 */
export async function seedStation(adapter: Adapter = createMockAdapter()): Promise<Adapter> {
  await adapter.createShowType({
    id: ids.fillerType, name: 'Filler',
    isPublic: true, hasListing: false, canBeMessaged: false, isCollapsible: true,
  })
  await adapter.createShowType({
    id: ids.regularType, name: 'Regular',
    isPublic: true, hasListing: true, canBeMessaged: true, isCollapsible: false,
  })
  await adapter.createShowType({
    id: ids.demoType, name: 'Demo',
    isPublic: false, hasListing: false, canBeMessaged: false, isCollapsible: false,
  })

  const created = local('2011-08-01T12:00')
  await adapter.createShow({ id: ids.jukebox, showTypeId: ids.fillerType, title: 'Jukebox', createdAt: created })
  await adapter.createShow({ id: ids.mondayMusic, showTypeId: ids.regularType, title: 'Monday Music', createdAt: created })
  await adapter.createShow({ id: ids.demoShow, showTypeId: ids.demoType, title: 'Demo Session', createdAt: created })

  await adapter.createTerm({
    id: ids.autumn, start: local('2011-09-01T00:00'), end: local('2011-12-16T00:00'), name: 'Autumn',
  })
  await adapter.createTerm({
    id: ids.spring, start: local('2012-01-09T00:00'), end: local('2012-03-23T00:00'), name: 'Spring',
  })

  await adapter.createSeason({
    id: ids.mondayMusicAutumn, showId: ids.mondayMusic, termId: ids.autumn, submittedAt: created,
  })
  await adapter.createSeason({
    id: ids.demoAutumn, showId: ids.demoShow, termId: ids.autumn, submittedAt: created,
  })

  await adapter.createBlock({ id: ids.regularBlock, tag: 'regular', name: 'Regular', priority: 100, isListable: false })
  await adapter.createBlock({ id: ids.flagshipBlock, tag: 'flagship', name: 'Flagship', priority: 1, isListable: true })
  await adapter.createBlock({ id: ids.overnightBlock, tag: 'overnight', name: 'Overnight', priority: 50, isListable: true })

  return adapter
}

export async function addSlot(
  adapter: Adapter,
  id: string,
  season: SeasonId,
  start: Instant,
  durationMinutes: number
): Promise<void> {
  await adapter.createTimeslot({ id: timeslotId(id), seasonId: season, start, durationMinutes })
}

/** Monday Music, every Monday of Autumn 2011 from 09:00 to 11:00 local. */
export async function addMondayMusic(adapter: Adapter): Promise<void> {
  const mondays = [
    '2011-09-05', '2011-09-12', '2011-09-19', '2011-09-26',
    '2011-10-03', '2011-10-10', '2011-10-17', '2011-10-24', '2011-10-31',
    '2011-11-07', '2011-11-14', '2011-11-21', '2011-11-28',
    '2011-12-05', '2011-12-12',
  ]
  for (const date of mondays) {
    await addSlot(adapter, `mm-${date}`, ids.mondayMusicAutumn, local(`${date}T09:00`), 120)
  }
}

export function builderDeps(adapter: Adapter): BuilderDeps {
  return {
    adapter,
    timezone: TZ,
    defaultBlockId: ids.regularBlock,
    fillerShow: createFillerShowSource({
      adapter,
      cache: createTtlCache<FillerShow>({ ttlMs: FILLER_SHOW_CACHE_MS }),
    }),
    logger: silentLogger,
  }
}
