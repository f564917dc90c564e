import type { InvalidValueError, PositionError } from "../core/errors"

/** Recoverable decode failures: truncated input or a malformed value. */
export type DecodeError = PositionError | InvalidValueError

export type SuccessfulDecodeResult<T> = {
  success: true
  value: T
}

export type FailedDecodeResult = {
  success: false
  error: DecodeError
}

export type DecodeResult<T> = SuccessfulDecodeResult<T> | FailedDecodeResult
