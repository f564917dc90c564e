import type {
  FloatKind,
  IntegerKind,
  PrimitiveCodec,
  PrimitiveCodecs,
} from "../ports/primitive"

function integer(
  width: number,
  min: number,
  max: number,
  read: (view: DataView, offset: number, littleEndian: boolean) => number,
  write: (view: DataView, offset: number, value: number, littleEndian: boolean) => void,
): PrimitiveCodec<IntegerKind> {
  return {
    width,
    finite: false,
    accepts: (value) => Number.isInteger(value) && value >= min && value <= max,
    read,
    write,
  }
}

function float(
  width: number,
  round: (value: number) => number,
  read: (view: DataView, offset: number, littleEndian: boolean) => number,
  write: (view: DataView, offset: number, value: number, littleEndian: boolean) => void,
): PrimitiveCodec<FloatKind> {
  return {
    width,
    finite: true,
    accepts: (value) => Number.isFinite(round(value)),
    read,
    write,
  }
}

/**
 * Encoders for every fixed-width kind the wire format carries.
 * Byte order is chosen per call; both peers must agree on it.
 */
export const PRIMITIVES: PrimitiveCodecs = {
  int8: integer(
    1,
    -0x80,
    0x7f,
    (dv, o) => dv.getInt8(o),
    (dv, o, v) => dv.setInt8(o, v),
  ),
  uint8: integer(
    1,
    0,
    0xff,
    (dv, o) => dv.getUint8(o),
    (dv, o, v) => dv.setUint8(o, v),
  ),
  int16: integer(
    2,
    -0x8000,
    0x7fff,
    (dv, o, le) => dv.getInt16(o, le),
    (dv, o, v, le) => dv.setInt16(o, v, le),
  ),
  uint16: integer(
    2,
    0,
    0xffff,
    (dv, o, le) => dv.getUint16(o, le),
    (dv, o, v, le) => dv.setUint16(o, v, le),
  ),
  int32: integer(
    4,
    -0x80000000,
    0x7fffffff,
    (dv, o, le) => dv.getInt32(o, le),
    (dv, o, v, le) => dv.setInt32(o, v, le),
  ),
  uint32: integer(
    4,
    0,
    0xffffffff,
    (dv, o, le) => dv.getUint32(o, le),
    (dv, o, v, le) => dv.setUint32(o, v, le),
  ),
  int64: {
    width: 8,
    finite: false,
    accepts: (value) => BigInt.asIntN(64, value) === value,
    read: (dv, o, le) => dv.getBigInt64(o, le),
    write: (dv, o, v, le) => dv.setBigInt64(o, v, le),
  },
  uint64: {
    width: 8,
    finite: false,
    accepts: (value) => BigInt.asUintN(64, value) === value,
    read: (dv, o, le) => dv.getBigUint64(o, le),
    write: (dv, o, v, le) => dv.setBigUint64(o, v, le),
  },
  float: float(
    4,
    Math.fround,
    (dv, o, le) => dv.getFloat32(o, le),
    (dv, o, v, le) => dv.setFloat32(o, v, le),
  ),
  double: float(
    8,
    (v) => v,
    (dv, o, le) => dv.getFloat64(o, le),
    (dv, o, v, le) => dv.setFloat64(o, v, le),
  ),
}
