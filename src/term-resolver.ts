/**
 * Term Resolver
 *
 * Finds the academic term enclosing a point in time. When there is none the
 * result says why: a holiday (some earlier term exists) or a lack of term
 * data altogether. Neither case is an error.
 */

import type { Adapter } from './adapter'
import type { Term } from './domain-types'
import type { Instant } from './time-date'
import { toLocal, dateOf, yearOf, monthOf } from './time-date'

export type TermResolution =
  | { kind: 'term'; term: Term }
  | { kind: 'holiday'; previous: Term }
  | { kind: 'no-term-data' }

export function termContaining(adapter: Adapter, at: Instant): Promise<Term | null> {
  return adapter.findTermContaining(at)
}

export function termBefore(adapter: Adapter, at: Instant): Promise<Term | null> {
  return adapter.findTermBefore(at)
}

export async function resolveTerm(adapter: Adapter, at: Instant): Promise<TermResolution> {
  const term = await termContaining(adapter, at)
  if (term) return { kind: 'term', term }

  const previous = await termBefore(adapter, at)
  return previous ? { kind: 'holiday', previous } : { kind: 'no-term-data' }
}

/** Term in effect at `at`, falling back to the most recent one before it. */
export async function termOnOrBefore(adapter: Adapter, at: Instant): Promise<Term | null> {
  return (await termContaining(adapter, at)) ?? (await termBefore(adapter, at))
}

/**
 * Academic year in which a term falls.
 *
 * Terms starting before September belong to the academic year that began the
 * previous calendar year.
 */
export function academicYear(term: Term, tz: string): number {
  const startDate = dateOf(toLocal(term.start, tz))
  const year = yearOf(startDate)
  return monthOf(startDate) >= 9 ? year : year - 1
}

/** e.g. "Autumn Term 2011/12" */
export function termLabel(term: Term, tz: string): string {
  const year = academicYear(term, tz)
  const next = String((year + 1) % 100).padStart(2, '0')
  return `${term.name} Term ${year}/${next}`
}
