/**
 * Season and timeslot numbering, as shown in listings ("Season 3, Episode 5").
 */

import type { Adapter } from './adapter'
import type { Season, Timeslot } from './domain-types'
import { NotFoundError } from './errors'
import type { ShowId } from './types'

/** 1-based position of `season` among its show's seasons, in the order they were added. */
export async function seasonNumber(adapter: Adapter, season: Season): Promise<number> {
  const seasons = await adapter.getSeasonsByShow(season.showId)
  const index = seasons.findIndex((s) => s.id === season.id)
  if (index < 0) {
    throw new NotFoundError(`Season '${season.id}' is not listed under show '${season.showId}'`)
  }
  return index + 1
}

/** 1-based position of `timeslot` within its season, by start time. */
export async function timeslotNumber(adapter: Adapter, timeslot: Timeslot): Promise<number> {
  const timeslots = await adapter.getTimeslotsBySeason(timeslot.seasonId)
  const index = timeslots.findIndex((t) => t.id === timeslot.id)
  if (index < 0) {
    throw new NotFoundError(`Timeslot '${timeslot.id}' is not listed under season '${timeslot.seasonId}'`)
  }
  return index + 1
}

// ============================================================================
// Show Database Lookups
// ============================================================================

/**
 * The `n`th season (1-based) of a show listed in the show database, or null
 * when the show is unknown, its type has no listing, or `n` is out of range.
 */
export async function seasonByNumber(adapter: Adapter, showId: ShowId, n: number): Promise<Season | null> {
  const show = await adapter.getShow(showId)
  if (!show) return null
  const showType = await adapter.getShowType(show.showTypeId)
  if (!showType?.hasListing) return null
  const seasons = await adapter.getSeasonsByShow(showId)
  return nth(seasons, n)
}

/** The `timeslotN`th timeslot (1-based, by start) of the show's `seasonN`th season. */
export async function timeslotByNumber(
  adapter: Adapter,
  showId: ShowId,
  seasonN: number,
  timeslotN: number
): Promise<Timeslot | null> {
  const season = await seasonByNumber(adapter, showId, seasonN)
  if (!season) return null
  return nth(await adapter.getTimeslotsBySeason(season.id), timeslotN)
}

function nth<T>(list: T[], n: number): T | null {
  if (!Number.isInteger(n) || n < 1) return null
  return list[n - 1] ?? null
}
