/**
 * Messages cluster into a few size classes (control messages, entity
 * updates, bulk state dumps). Each tier reserves enough for its whole class
 * on the first growth so a message is built with one or two allocations.
 */
export type GrowthTier = Readonly<{
  /** Applies when the target size is below this many bytes. */
  below: number

  /** Capacity to reserve for targets in this tier. Must be >= `below`. */
  reserve: number
}>

export type GrowthPolicy = Readonly<{
  tiers: readonly GrowthTier[]
  fallbackReserve: number
  maxSize: number
}>

export const DEFAULT_GROWTH_TIERS: readonly GrowthTier[] = [
  { below: 100, reserve: 300 },
  { below: 750, reserve: 2500 },
  { below: 6000, reserve: 10_000 },
]

export const DEFAULT_FALLBACK_RESERVE = 400_000

/**
 * Capacity to allocate so that `target` bytes fit.
 *
 * The tier is keyed on the target size, not on the increment. Targets past
 * the fallback reserve double the current capacity. Never returns less than
 * `target` or more than `maxSize` (unless `target` itself is larger).
 */
export function nextCapacity(policy: GrowthPolicy, capacity: number, target: number): number {
  const tier = policy.tiers.find((t) => target < t.below)
  const reserve = tier?.reserve ?? policy.fallbackReserve
  const grown = target < reserve ? reserve : Math.max(target, capacity * 2)

  return Math.max(target, Math.min(grown, policy.maxSize))
}
