export type IntegerKind = "int8" | "uint8" | "int16" | "uint16" | "int32" | "uint32"

/** 64-bit integers travel as `bigint`; `number` cannot hold them exactly. */
export type BigIntegerKind = "int64" | "uint64"

export type FloatKind = "float" | "double"

/** Decoded JavaScript type of every primitive kind. */
export type PrimitiveTypes = {
  int8: number
  uint8: number
  int16: number
  uint16: number
  int32: number
  uint32: number
  int64: bigint
  uint64: bigint
  float: number
  double: number
}

export type PrimitiveKind = keyof PrimitiveTypes

export type PrimitiveValue<K extends PrimitiveKind> = PrimitiveTypes[K]

/**
 * Fixed-width encoding of one primitive kind over a DataView.
 */
export type PrimitiveCodec<K extends PrimitiveKind> = Readonly<{
  /** Encoded size in bytes */
  width: number

  /** Decoded values must be finite (float and double). */
  finite: boolean

  /** Whether `value` is representable in this kind without truncation. */
  accepts(value: PrimitiveValue<K>): boolean

  read(view: DataView, offset: number, littleEndian: boolean): PrimitiveValue<K>

  write(view: DataView, offset: number, value: PrimitiveValue<K>, littleEndian: boolean): void
}>

export type PrimitiveCodecs = { readonly [K in PrimitiveKind]: PrimitiveCodec<K> }
