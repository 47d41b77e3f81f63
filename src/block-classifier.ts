/**
 * Block Classifier
 *
 * Assigns each schedule slot the programming block it is shown under.
 * Classification runs an ordered chain of classifiers and takes the first
 * match: a rule pinning the slot's show to a block, then a daily local-time
 * range rule, then the configured default block.
 *
 * Whole slot lists are annotated at once so the block tables are fetched a
 * single time per pass.
 */

import type { Adapter } from './adapter'
import type { Block, BlockRules, BlockRangeRule, BlockedSlot, ScheduleSlot } from './domain-types'
import type { BlockId, ShowId } from './types'
import { localTimeOfDay } from './local-time'
import { DAY_MINUTES } from './time-date'
import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Classifier = (slot: ScheduleSlot) => BlockId | null

export type ClassifierContext = {
  timezone: string
  defaultBlockId: BlockId
}

type ClassifierFactory = (rules: BlockRules, ctx: ClassifierContext) => Classifier

export type AnnotateOptions = ClassifierContext

// ============================================================================
// Helpers
// ============================================================================

function priorityIndex(blocks: Block[]): Map<BlockId, number> {
  return new Map(blocks.map((b) => [b.id, b.priority]))
}

/** Range end as minutes after the start's midnight; wrapped ranges run into the next day. */
function normalizedEnd(rule: BlockRangeRule): number {
  return rule.endOffset <= rule.startOffset ? rule.endOffset + DAY_MINUTES : rule.endOffset
}

export function rangeRuleMatches(rule: BlockRangeRule, timeOfDay: number): boolean {
  const end = normalizedEnd(rule)
  // Projecting a day forward catches ranges that began before midnight
  return [timeOfDay, timeOfDay + DAY_MINUTES].some((t) => rule.startOffset <= t && t < end)
}

// ============================================================================
// Classifiers
// ============================================================================

export const showRuleClassifier: ClassifierFactory = (rules) => {
  const priorities = priorityIndex(rules.blocks)
  const byShow = new Map<ShowId, BlockId>()
  for (const rule of rules.showRules) {
    const current = byShow.get(rule.showId)
    const priority = priorities.get(rule.blockId) ?? Infinity
    if (current === undefined || priority < (priorities.get(current) ?? Infinity)) {
      byShow.set(rule.showId, rule.blockId)
    }
  }
  return (slot) => byShow.get(slot.show.id) ?? null
}

export const rangeRuleClassifier: ClassifierFactory = (rules, ctx) => {
  const priorities = priorityIndex(rules.blocks)
  const ordered = [...rules.rangeRules].sort((a, b) => a.startOffset - b.startOffset)
  return (slot) => {
    const timeOfDay = localTimeOfDay(slot.start, ctx.timezone)
    let best: BlockRangeRule | null = null
    for (const rule of ordered) {
      if (!rangeRuleMatches(rule, timeOfDay)) continue
      const priority = priorities.get(rule.blockId) ?? Infinity
      if (!best || priority < (priorities.get(best.blockId) ?? Infinity)) {
        best = rule
      }
    }
    return best ? best.blockId : null
  }
}

export const defaultClassifier: ClassifierFactory = (_rules, ctx) => () => ctx.defaultBlockId

/** Evaluated in order until one yields a block. */
export const CLASSIFIERS: readonly ClassifierFactory[] = [
  showRuleClassifier,
  rangeRuleClassifier,
  defaultClassifier,
]

export function prepareClassifiers(rules: BlockRules, ctx: ClassifierContext): Classifier[] {
  return CLASSIFIERS.map((factory) => factory(rules, ctx))
}

export function classify(slot: ScheduleSlot, classifiers: Classifier[]): BlockId | null {
  for (const classifier of classifiers) {
    const match = classifier(slot)
    if (match !== null) return match
  }
  return null
}

// ============================================================================
// Annotation
// ============================================================================

/**
 * Pure annotation over pre-loaded rules. A slot appearing more than once in
 * the input maps to the same annotated object each time.
 */
export function annotateWith<S extends ScheduleSlot>(
  slots: readonly S[],
  rules: BlockRules,
  ctx: ClassifierContext
): Array<S & { block: Block }> {
  const blocks = new Map(rules.blocks.map((b) => [b.id, b]))
  if (!blocks.has(ctx.defaultBlockId)) {
    throw new ValidationError(`Default block '${ctx.defaultBlockId}' does not exist`)
  }

  const classifiers = prepareClassifiers(rules, ctx)
  const seen = new Map<S, S & { block: Block }>()

  return slots.map((slot) => {
    const existing = seen.get(slot)
    if (existing) return existing

    const match = classify(slot, classifiers)
    const block = (match !== null ? blocks.get(match) : undefined) ?? blocks.get(ctx.defaultBlockId)
    if (!block) {
      throw new ValidationError(`Default block '${ctx.defaultBlockId}' does not exist`)
    }
    const annotated = { ...slot, block }
    seen.set(slot, annotated)
    return annotated
  })
}

export async function annotate(
  adapter: Adapter,
  slots: readonly ScheduleSlot[],
  options: AnnotateOptions
): Promise<BlockedSlot[]> {
  const rules = await adapter.getBlockRules()
  return annotateWith(slots, rules, options)
}

/** The block a show is pinned to by a show rule, if any. */
export async function showBlock(adapter: Adapter, showId: ShowId): Promise<Block | null> {
  const rules = await adapter.getBlockShowRulesByShow(showId)
  let best: Block | null = null
  for (const rule of rules) {
    const block = await adapter.getBlock(rule.blockId)
    if (block && (!best || block.priority < best.priority)) best = block
  }
  return best
}
