/**
 * TTL Cache
 *
 * Small read-through cache with an explicit time-to-live and an injectable
 * clock, used for lookups that change only on administrative edits (the
 * filler show).
 */

import type { Instant } from './time-date'
import { instant } from './time-date'

export type Clock = () => Instant

export const systemClock: Clock = () => instant(Date.now())

type Entry<T> = {
  value: T
  expiresAt: number
}

export type TtlCache<T> = {
  get(key: string): T | undefined
  set(key: string, value: T): void
  /** Returns the cached value, or loads, stores and returns a fresh one. */
  getOrLoad(key: string, load: () => Promise<T>): Promise<T>
  delete(key: string): void
  clear(): void
}

export function createTtlCache<T>(options: { ttlMs: number; clock?: Clock }): TtlCache<T> {
  const { ttlMs } = options
  const clock = options.clock ?? systemClock
  const entries = new Map<string, Entry<T>>()
  const pending = new Map<string, Promise<T>>()

  function get(key: string): T | undefined {
    const entry = entries.get(key)
    if (!entry) return undefined
    if (clock() >= entry.expiresAt) {
      entries.delete(key)
      return undefined
    }
    return entry.value
  }

  function set(key: string, value: T): void {
    entries.set(key, { value, expiresAt: clock() + ttlMs })
  }

  async function getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
    const cached = get(key)
    if (cached !== undefined) return cached

    // Concurrent misses share one load
    const inFlight = pending.get(key)
    if (inFlight) return inFlight

    const loading = load()
      .then((value) => {
        set(key, value)
        return value
      })
      .finally(() => pending.delete(key))
    pending.set(key, loading)
    return loading
  }

  return {
    get,
    set,
    getOrLoad,
    delete: (key) => {
      entries.delete(key)
    },
    clear: () => {
      entries.clear()
    },
  }
}
