import type { DecodeError, DecodeResult } from "../ports/decode-result"
import type { ByteBuffer } from "./byte-buffer"
import { InvalidValueError, PositionError } from "./errors"

export function isDecodeError(err: unknown): err is DecodeError {
  return err instanceof PositionError || err instanceof InvalidValueError
}

/**
 * Runs `decode` against `buffer` and returns a tagged result instead of
 * throwing for truncated or malformed input.
 *
 * Only decode errors are captured. Assertion failures and anything else
 * thrown by `decode` propagate.
 *
 * @example
 * ```ts
 * const result = tryDecode(buffer, (b) => ({
 *   node: b.read("uint32"),
 *   name: b.readCString(),
 * }))
 *
 * if (!result.success) {
 *   logger.warn("dropping malformed message", { err: result.error })
 *   return
 * }
 * ```
 */
export function tryDecode<T>(
  buffer: ByteBuffer,
  decode: (buffer: ByteBuffer) => T,
): DecodeResult<T> {
  try {
    return { success: true, value: decode(buffer) }
  } catch (err) {
    if (isDecodeError(err)) {
      return { success: false, error: err }
    }
    throw err
  }
}
