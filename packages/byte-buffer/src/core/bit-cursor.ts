export const BYTE_BITS = 8

/** Widest field `writeBits` / `putBits` / `readBigBits` accept. */
export const MAX_BIT_FIELD = 64

/** Widest field `readBits` returns as a plain number. */
export const MAX_NUMBER_BIT_FIELD = 32

/**
 * Sub-byte cursor over the byte currently being packed or unpacked.
 *
 * Writer: `bitPos` counts down from 8 as bits are packed into `value`.
 * Reader: `bitPos` counts up from 0 as bits are taken from `value`.
 * In both, `bitPos === 8` means no partial byte is in flight.
 */
export type BitCursor = {
  bitPos: number
  value: number
}

export function createBitCursor(): BitCursor {
  return { bitPos: BYTE_BITS, value: 0 }
}

export function resetBitCursor(cursor: BitCursor): void {
  cursor.bitPos = BYTE_BITS
  cursor.value = 0
}

export function isByteAligned(cursor: BitCursor): boolean {
  return cursor.bitPos === BYTE_BITS
}

export function isBitCount(bitCount: number, max: number): boolean {
  return Number.isInteger(bitCount) && bitCount >= 1 && bitCount <= max
}

/** The low `bitCount` bits of `value`, two's complement for negatives. */
export function toBitField(value: number | bigint, bitCount: number): bigint {
  return BigInt.asUintN(bitCount, BigInt(value))
}

/** Bit `index` of `field`, counted from the least significant bit. */
export function bitAt(field: bigint, index: number): boolean {
  return ((field >> BigInt(index)) & 1n) === 1n
}
