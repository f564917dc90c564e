export {
  createLoggerTraceSink,
  LoggerTraceSink,
} from "./adapters/logger-trace-sink"
export { BYTE_BITS, MAX_BIT_FIELD, MAX_NUMBER_BIT_FIELD } from "./core/bit-cursor"
export { ByteBuffer, type ByteBufferDeps } from "./core/byte-buffer"
export { formatByteList, formatHex, formatText } from "./core/dump"
export {
  assertBuffer,
  BufferAssertionError,
  InvalidOptionsError,
  InvalidValueError,
  type InvalidValueType,
  type OptionsIssue,
  PositionError,
} from "./core/errors"
export {
  DEFAULT_FALLBACK_RESERVE,
  DEFAULT_GROWTH_TIERS,
  type GrowthPolicy,
  type GrowthTier,
  nextCapacity,
} from "./core/growth-policy"
export {
  type ByteBufferOptions,
  type ByteBufferOptionsInput,
  byteBufferOptionsSchema,
  DEFAULT_BYTE_BUFFER_OPTIONS,
  MAX_BUFFER_SIZE,
  parseByteBufferOptions,
} from "./core/options"
export { PRIMITIVES } from "./core/primitives"
export { isDecodeError, tryDecode } from "./core/try-decode"
export type {
  DecodeError,
  DecodeResult,
  FailedDecodeResult,
  SuccessfulDecodeResult,
} from "./ports/decode-result"
export type {
  BigIntegerKind,
  FloatKind,
  IntegerKind,
  PrimitiveCodec,
  PrimitiveCodecs,
  PrimitiveKind,
  PrimitiveTypes,
  PrimitiveValue,
} from "./ports/primitive"
export type { StorageDump, TraceSink } from "./ports/trace-sink"
