/**
 * Shared Types
 *
 * Branded ID types used across modules, plus re-exports of the temporal
 * branded types from time-date.
 */

export type { LocalDate, LocalTime, LocalDateTime, Instant, Weekday } from './time-date'

// ============================================================================
// Branded ID Types
// ============================================================================

declare const __termId: unique symbol
declare const __showTypeId: unique symbol
declare const __showId: unique symbol
declare const __seasonId: unique symbol
declare const __timeslotId: unique symbol
declare const __blockId: unique symbol
declare const __ruleId: unique symbol

export type TermId = string & { readonly [__termId]: true }
export type ShowTypeId = string & { readonly [__showTypeId]: true }
export type ShowId = string & { readonly [__showId]: true }
export type SeasonId = string & { readonly [__seasonId]: true }
export type TimeslotId = string & { readonly [__timeslotId]: true }
export type BlockId = string & { readonly [__blockId]: true }
export type RuleId = string & { readonly [__ruleId]: true }

export const termId = (id: string) => id as TermId
export const showTypeId = (id: string) => id as ShowTypeId
export const showId = (id: string) => id as ShowId
export const seasonId = (id: string) => id as SeasonId
export const timeslotId = (id: string) => id as TimeslotId
export const blockId = (id: string) => id as BlockId
export const ruleId = (id: string) => id as RuleId
