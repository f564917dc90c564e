import { z } from "zod"
import { InvalidOptionsError } from "./errors"
import { DEFAULT_FALLBACK_RESERVE, DEFAULT_GROWTH_TIERS, type GrowthTier } from "./growth-policy"

/** Hard ceiling on a single buffer. Anything larger is runaway accumulation. */
export const MAX_BUFFER_SIZE = 100_000_000

const byteCount = z.number().int().nonnegative()

const growthTierSchema = z
  .object({
    below: byteCount.positive(),
    reserve: byteCount.positive(),
  })
  .refine((tier) => tier.reserve >= tier.below, {
    message: "reserve must be at least below",
    path: ["reserve"],
  })

export const byteBufferOptionsSchema = z
  .object({
    /** Bytes allocated up front. */
    initialCapacity: byteCount.default(0),

    /** Appends that would reach this size are rejected. */
    maxSize: byteCount.positive().max(MAX_BUFFER_SIZE).default(MAX_BUFFER_SIZE),

    /** Byte order of multi-byte primitives. Both peers must agree. */
    littleEndian: z.boolean().default(true),

    growthTiers: z
      .array(growthTierSchema)
      .refine((tiers) => tiers.every((t, i) => i === 0 || (tiers[i - 1]?.below ?? 0) < t.below), {
        message: "growth tiers must be sorted by ascending below",
      })
      .default(() => DEFAULT_GROWTH_TIERS.map((tier) => ({ ...tier }))),

    /** Reserve used once the target size is past every tier. */
    fallbackReserve: byteCount.positive().default(DEFAULT_FALLBACK_RESERVE),
  })
  .refine((opts) => opts.initialCapacity <= opts.maxSize, {
    message: "initialCapacity must not exceed maxSize",
    path: ["initialCapacity"],
  })

export type ByteBufferOptionsInput = z.input<typeof byteBufferOptionsSchema>

/** Resolved options. Frozen, so one object can back every buffer. */
export type ByteBufferOptions = Readonly<
  Omit<z.output<typeof byteBufferOptionsSchema>, "growthTiers"> & {
    growthTiers: readonly GrowthTier[]
  }
>

function freezeOptions(opts: z.output<typeof byteBufferOptionsSchema>): ByteBufferOptions {
  return Object.freeze({
    ...opts,
    growthTiers: Object.freeze(opts.growthTiers.map((tier) => Object.freeze({ ...tier }))),
  })
}

export const DEFAULT_BYTE_BUFFER_OPTIONS: ByteBufferOptions = freezeOptions(
  byteBufferOptionsSchema.parse({}),
)

/**
 * Validates buffer options and fills in defaults.
 *
 * Empty input returns the shared defaults without running the schema; most
 * buffers are built that way, one per message.
 *
 * @throws InvalidOptionsError when the input fails validation
 */
export function parseByteBufferOptions(input?: ByteBufferOptionsInput): ByteBufferOptions {
  if (input === undefined || Object.keys(input).length === 0) {
    return DEFAULT_BYTE_BUFFER_OPTIONS
  }

  const result = byteBufferOptionsSchema.safeParse(input)

  if (!result.success) {
    throw InvalidOptionsError.fromZodError(result.error)
  }

  return freezeOptions(result.data)
}
