import { isUtf8 } from "node:buffer"
import type { DecodeResult } from "../ports/decode-result"
import type { PrimitiveCodec, PrimitiveKind, PrimitiveValue } from "../ports/primitive"
import type { TraceSink } from "../ports/trace-sink"
import {
  BYTE_BITS,
  bitAt,
  createBitCursor,
  isBitCount,
  isByteAligned,
  MAX_BIT_FIELD,
  MAX_NUMBER_BIT_FIELD,
  resetBitCursor,
  toBitField,
} from "./bit-cursor"
import { formatByteList, formatHex, formatText } from "./dump"
import { assertBuffer, InvalidValueError, PositionError } from "./errors"
import { nextCapacity } from "./growth-policy"
import {
  type ByteBufferOptions,
  type ByteBufferOptionsInput,
  parseByteBufferOptions,
} from "./options"
import { PRIMITIVES } from "./primitives"
import { tryDecode } from "./try-decode"

const utf8Encoder = new TextEncoder()
const lossyDecoder = new TextDecoder("utf-8", { ignoreBOM: true })

export type ByteBufferDeps = {
  /** Receives storage dumps. Without one, dump methods do nothing. */
  trace?: TraceSink
}

/**
 * Growable byte store for one protocol message.
 *
 * ── Cursors ──────────────────────────────────────────────────────────────────
 *
 * `writePos` is where the next append lands; `readPos` is where the next
 * sequential read starts. Reads never move past `size` and raise
 * PositionError instead.
 *
 * ── Bit packing ──────────────────────────────────────────────────────────────
 *
 * Sub-byte fields are packed MSB-first through `writeBit` / `writeBits` and
 * unpacked through `readBit` / `readBits`. Every byte-level write flushes
 * the pending partial byte first, and every byte-level read discards a
 * partially consumed one, so byte and bit fields can be interleaved freely.
 *
 * ── Views ────────────────────────────────────────────────────────────────────
 *
 * `contents()` and the `*View` readers return subarrays of the current
 * allocation. Growth reallocates; do not hold a view across a write.
 *
 * Not synchronized. One producer fills a buffer, then at most one consumer
 * reads it.
 */
export class ByteBuffer {
  private storage: Uint8Array
  private view: DataView
  private length = 0
  private rpos = 0
  private wpos = 0

  private readonly bitWrite = createBitCursor()
  private readonly bitRead = createBitCursor()

  private readonly options: ByteBufferOptions
  private readonly traceSink: TraceSink | undefined

  constructor(options?: ByteBufferOptionsInput, deps: ByteBufferDeps = {}) {
    this.options = parseByteBufferOptions(options)
    this.storage = new Uint8Array(this.options.initialCapacity)
    this.view = new DataView(this.storage.buffer)
    this.traceSink = deps.trace
  }

  /** A buffer holding a copy of `bytes`, positioned for reading from 0. */
  static from(
    bytes: Uint8Array,
    options?: ByteBufferOptionsInput,
    deps?: ByteBufferDeps,
  ): ByteBuffer {
    const buffer = new ByteBuffer(options, deps)
    buffer.writeBytes(bytes)
    return buffer
  }

  // ── Size & cursors ────────────────────────────────────────────────────────

  /** Logical number of bytes held. */
  get size(): number {
    return this.length
  }

  /** Bytes currently allocated. Never decreases. */
  get capacity(): number {
    return this.storage.length
  }

  get isEmpty(): boolean {
    return this.length === 0
  }

  get littleEndian(): boolean {
    return this.options.littleEndian
  }

  get readPos(): number {
    return this.rpos
  }

  /** Repositions the read cursor and drops any partially read bit field. */
  set readPos(position: number) {
    assertBuffer(
      Number.isInteger(position) && position >= 0,
      `Invalid read position ${position}`,
      { position, size: this.length },
    )
    resetBitCursor(this.bitRead)
    this.rpos = position
  }

  get writePos(): number {
    return this.wpos
  }

  set writePos(position: number) {
    assertBuffer(
      Number.isInteger(position) && position >= 0 && position < this.options.maxSize,
      `Invalid write position ${position}`,
      { position, size: this.length },
    )
    this.wpos = position
  }

  /** Absolute bit offset of the next packed bit, pending bits included. */
  get bitWritePos(): number {
    return this.wpos * BYTE_BITS + (BYTE_BITS - this.bitWrite.bitPos)
  }

  /** Absolute bit offset of the next unpacked bit. */
  get bitReadPos(): number {
    if (isByteAligned(this.bitRead)) return this.rpos * BYTE_BITS
    return (this.rpos - 1) * BYTE_BITS + this.bitRead.bitPos
  }

  // ── Storage ───────────────────────────────────────────────────────────────

  /**
   * Appends the first `count` bytes of `bytes` at the write cursor.
   * Pending bits are flushed first.
   */
  append(bytes: Uint8Array, count: number = bytes.length): void {
    assertBuffer(
      Number.isInteger(count) && count > 0,
      `Attempted to put a zero-sized value in byte buffer (pos: ${this.wpos} size: ${this.length})`,
      { position: this.wpos, size: this.length, valueSize: count },
    )
    assertBuffer(
      count <= bytes.length,
      `Attempted to put ${count} bytes from a ${bytes.length}-byte source`,
      { position: this.wpos, size: this.length, valueSize: count },
    )

    const offset = this.claim(count)
    this.storage.set(count === bytes.length ? bytes : bytes.subarray(0, count), offset)
  }

  /** Appends raw bytes. An empty array appends nothing. */
  writeBytes(bytes: Uint8Array): void {
    if (bytes.length > 0) this.append(bytes)
  }

  /** Allocates at least `capacity` bytes without changing the size. */
  reserve(capacity: number): void {
    assertBuffer(
      Number.isInteger(capacity) && capacity >= 0 && capacity <= this.options.maxSize,
      `Attempted to reserve ${capacity} bytes (max: ${this.options.maxSize})`,
      { capacity },
    )
    if (capacity > this.storage.length) this.reallocate(capacity)
  }

  /**
   * Sets the logical size, zero-filling any growth. The read cursor returns
   * to 0 and the write cursor moves to the new end.
   */
  resize(newSize: number): void {
    assertBuffer(
      Number.isInteger(newSize) && newSize >= 0 && newSize < this.options.maxSize,
      `Attempted to resize byte buffer to ${newSize} bytes (max: ${this.options.maxSize})`,
      { size: this.length, newSize },
    )

    if (this.storage.length < newSize) this.grow(newSize)
    if (newSize > this.length) this.storage.fill(0, this.length, newSize)

    this.length = newSize
    this.rpos = 0
    this.wpos = newSize
    resetBitCursor(this.bitRead)
    resetBitCursor(this.bitWrite)
  }

  /** Empties the buffer. The allocation is kept for reuse. */
  clear(): void {
    this.length = 0
    this.rpos = 0
    this.wpos = 0
    resetBitCursor(this.bitRead)
    resetBitCursor(this.bitWrite)
  }

  /** View of the written bytes. Invalidated by growth. */
  contents(): Uint8Array {
    return this.storage.subarray(0, this.length)
  }

  /** Owned copy of the written bytes. */
  toUint8Array(): Uint8Array {
    return this.storage.slice(0, this.length)
  }

  // ── Typed primitives ──────────────────────────────────────────────────────

  write<K extends PrimitiveKind>(kind: K, value: PrimitiveValue<K>): void {
    const codec: PrimitiveCodec<K> = PRIMITIVES[kind]
    assertBuffer(codec.accepts(value), `Value ${String(value)} does not fit ${kind}`, {
      kind,
      value: String(value),
    })

    const offset = this.claim(codec.width)
    codec.write(this.view, offset, value, this.options.littleEndian)
  }

  /**
   * Reads one primitive at the read cursor.
   *
   * @throws PositionError when fewer than the kind's width remain
   * @throws InvalidValueError when a float or double decodes to NaN or ±Infinity
   */
  read<K extends PrimitiveKind>(kind: K): PrimitiveValue<K> {
    this.resetBitPos()
    return this.readNext(kind)
  }

  /** `read` with failures returned instead of thrown. */
  tryRead<K extends PrimitiveKind>(kind: K): DecodeResult<PrimitiveValue<K>> {
    return tryDecode(this, (buffer) => buffer.read(kind))
  }

  /** Reads one primitive at an absolute position. No cursor moves. */
  readAt<K extends PrimitiveKind>(position: number, kind: K): PrimitiveValue<K> {
    const codec: PrimitiveCodec<K> = PRIMITIVES[kind]
    assertBuffer(Number.isInteger(position), `Invalid read position ${position}`, { position })
    if (position < 0 || position + codec.width > this.length) {
      throw new PositionError(position, this.length, codec.width)
    }

    const value = codec.read(this.view, position, this.options.littleEndian)
    if (codec.finite && !Number.isFinite(value)) {
      throw new InvalidValueError(kind === "float" ? "float" : "double", String(value))
    }
    return value
  }

  /** Overwrites an already written primitive. No cursor moves. */
  put<K extends PrimitiveKind>(position: number, kind: K, value: PrimitiveValue<K>): void {
    const codec: PrimitiveCodec<K> = PRIMITIVES[kind]
    assertBuffer(codec.accepts(value), `Value ${String(value)} does not fit ${kind}`, {
      kind,
      value: String(value),
    })
    this.assertPatchRange(position, codec.width)

    codec.write(this.view, position, value, this.options.littleEndian)
  }

  /** Copy of the next `count` bytes. */
  readBytes(count: number): Uint8Array {
    this.resetBitPos()
    this.ensureReadable(count)

    const bytes = this.storage.slice(this.rpos, this.rpos + count)
    this.rpos += count
    return bytes
  }

  skip(count: number): void {
    this.resetBitPos()
    this.ensureReadable(count)
    this.rpos += count
  }

  /** Marks everything written as consumed. */
  readFinish(): void {
    this.resetBitPos()
    this.rpos = this.wpos
  }

  // ── Random-access patch ───────────────────────────────────────────────────

  /**
   * Overwrites `[position, position + count)` with the first `count` bytes
   * of `bytes`. The range must already be written. No cursor moves.
   */
  patchBytes(position: number, bytes: Uint8Array, count: number = bytes.length): void {
    assertBuffer(
      Number.isInteger(count) && count > 0 && count <= bytes.length,
      `Attempted to put ${count} bytes from a ${bytes.length}-byte source`,
      { position, size: this.length, valueSize: count },
    )
    this.assertPatchRange(position, count)

    this.storage.set(bytes.subarray(0, count), position)
  }

  // ── Strings ───────────────────────────────────────────────────────────────

  /** UTF-8 bytes of `text` followed by a zero byte. */
  writeCString(text: string): void {
    this.writeBytes(utf8Encoder.encode(text))
    this.write("uint8", 0)
  }

  /** UTF-8 bytes of `text`, no terminator. The length travels elsewhere. */
  writeString(text: string): void {
    this.writeBytes(utf8Encoder.encode(text))
  }

  /**
   * Reads up to the next zero byte and consumes the terminator.
   *
   * @throws PositionError at `size` when no terminator remains
   * @throws InvalidValueError when validation is on and the text is not UTF-8
   */
  readCString(requireValidUtf8: boolean = true): string {
    return lossyDecoder.decode(this.readCStringView(requireValidUtf8))
  }

  /** `readCString` returning the raw bytes before the terminator. */
  readCStringView(requireValidUtf8: boolean = true): Uint8Array {
    this.resetBitPos()
    if (this.rpos >= this.length) {
      throw new PositionError(this.rpos, this.length, 1)
    }

    const remaining = this.storage.subarray(this.rpos, this.length)
    const end = remaining.indexOf(0)
    if (end === -1) {
      throw new PositionError(this.length, this.length, 1)
    }

    const value = remaining.subarray(0, end)
    this.rpos += end + 1
    if (requireValidUtf8) validateUtf8(value)
    return value
  }

  /**
   * Reads exactly `length` bytes as text.
   *
   * @throws PositionError when fewer than `length` bytes remain
   * @throws InvalidValueError when validation is on and the text is not UTF-8
   */
  readString(length: number, requireValidUtf8: boolean = true): string {
    return lossyDecoder.decode(this.readStringView(length, requireValidUtf8))
  }

  /** `readString` returning the raw bytes. */
  readStringView(length: number, requireValidUtf8: boolean = true): Uint8Array {
    this.resetBitPos()
    this.ensureReadable(length)
    if (length === 0) return new Uint8Array(0)

    const value = this.storage.subarray(this.rpos, this.rpos + length)
    this.rpos += length
    if (requireValidUtf8) validateUtf8(value)
    return value
  }

  // ── Bit packing ───────────────────────────────────────────────────────────

  writeBit(bit: boolean): boolean {
    this.bitWrite.bitPos -= 1
    if (bit) this.bitWrite.value |= 1 << this.bitWrite.bitPos

    if (this.bitWrite.bitPos === 0) {
      const value = this.bitWrite.value
      resetBitCursor(this.bitWrite)
      this.write("uint8", value)
    }

    return bit
  }

  /** Packs the low `bitCount` bits of `value`, most significant first. */
  writeBits(value: number | bigint, bitCount: number): void {
    this.assertBitField(value, bitCount)

    const field = toBitField(value, bitCount)
    for (let i = bitCount - 1; i >= 0; i -= 1) {
      this.writeBit(bitAt(field, i))
    }
  }

  /**
   * Overwrites bits `[bitPosition, bitPosition + bitCount)` of the written
   * bytes with the low `bitCount` bits of `value`, MSB-first. Used to
   * back-patch a field reserved earlier at `bitWritePos`; the bytes holding
   * it must already be flushed.
   */
  putBits(bitPosition: number, value: number | bigint, bitCount: number): void {
    this.assertBitField(value, bitCount)
    assertBuffer(
      Number.isInteger(bitPosition) &&
        bitPosition >= 0 &&
        bitPosition + bitCount <= this.length * BYTE_BITS,
      `Attempted to put ${bitCount} bits in byte buffer (bitpos: ${bitPosition} size: ${this.length})`,
      { bitPosition, bitCount, size: this.length },
    )

    const field = toBitField(value, bitCount)
    for (let i = 0; i < bitCount; i += 1) {
      const position = bitPosition + i
      const index = Math.floor(position / BYTE_BITS)
      const mask = 1 << (BYTE_BITS - 1 - (position % BYTE_BITS))
      const current = this.storage[index] ?? 0

      this.storage[index] = bitAt(field, bitCount - i - 1) ? current | mask : current & ~mask
    }
  }

  /** Appends the pending partial byte, if any. Unused low bits are zero. */
  flushBits(): void {
    if (isByteAligned(this.bitWrite)) return

    const value = this.bitWrite.value
    resetBitCursor(this.bitWrite)
    this.write("uint8", value)
  }

  hasUnfinishedBitPack(): boolean {
    return !isByteAligned(this.bitWrite)
  }

  /** @throws PositionError when a new byte is needed and none remains */
  readBit(): boolean {
    if (isByteAligned(this.bitRead)) {
      this.bitRead.value = this.readNext("uint8")
      this.bitRead.bitPos = 0
    }

    const bit = (this.bitRead.value >> (BYTE_BITS - 1 - this.bitRead.bitPos)) & 1
    this.bitRead.bitPos += 1
    return bit === 1
  }

  /** Unpacks an unsigned field of up to 32 bits. */
  readBits(bitCount: number): number {
    assertBuffer(
      isBitCount(bitCount, MAX_NUMBER_BIT_FIELD),
      `Attempted to read ${bitCount} bits into a number`,
      { bitCount },
    )

    let value = 0
    for (let i = 0; i < bitCount; i += 1) {
      value = value * 2 + (this.readBit() ? 1 : 0)
    }
    return value
  }

  /** Unpacks an unsigned field of up to 64 bits. */
  readBigBits(bitCount: number): bigint {
    assertBuffer(
      isBitCount(bitCount, MAX_BIT_FIELD),
      `Attempted to read ${bitCount} bits into a bigint`,
      { bitCount },
    )

    let value = 0n
    for (let i = 0; i < bitCount; i += 1) {
      value = (value << 1n) | (this.readBit() ? 1n : 0n)
    }
    return value
  }

  /** Drops the partially read byte; the next bit read starts a fresh byte. */
  resetBitPos(): void {
    resetBitCursor(this.bitRead)
  }

  // ── Diagnostics ───────────────────────────────────────────────────────────

  /** Traces the storage as a decimal byte list. */
  printStorage(): void {
    this.emitDump(formatByteList)
  }

  /** Traces the storage as printable text. */
  textLike(): void {
    this.emitDump(formatText)
  }

  /** Traces the storage as grouped hex rows. */
  hexLike(): void {
    this.emitDump(formatHex)
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private emitDump(format: (bytes: Uint8Array) => string): void {
    const sink = this.traceSink
    if (!sink?.isTraceEnabled()) return

    sink.trace("byte buffer storage", { size: this.length, dump: format(this.contents()) })
  }

  /**
   * Makes room for `count` bytes at the write cursor and advances it.
   * Returns the offset the caller must fill.
   */
  private claim(count: number): number {
    this.flushBits()

    const offset = this.wpos
    const target = offset + count
    assertBuffer(
      this.length + count < this.options.maxSize && target < this.options.maxSize,
      `Attempted to grow byte buffer past ${this.options.maxSize} bytes (pos: ${offset} size: ${this.length})`,
      { position: offset, size: this.length, valueSize: count },
    )

    if (this.storage.length < target) this.grow(target)
    if (offset > this.length) this.storage.fill(0, this.length, offset)
    if (target > this.length) this.length = target

    this.wpos = target
    return offset
  }

  private grow(target: number): void {
    this.reallocate(
      nextCapacity(
        {
          tiers: this.options.growthTiers,
          fallbackReserve: this.options.fallbackReserve,
          maxSize: this.options.maxSize,
        },
        this.storage.length,
        target,
      ),
    )
  }

  private reallocate(capacity: number): void {
    const next = new Uint8Array(capacity)
    next.set(this.storage.subarray(0, this.length))
    this.storage = next
    this.view = new DataView(next.buffer)
  }

  private readNext<K extends PrimitiveKind>(kind: K): PrimitiveValue<K> {
    const value = this.readAt(this.rpos, kind)
    this.rpos += PRIMITIVES[kind].width
    return value
  }

  private ensureReadable(count: number): void {
    assertBuffer(Number.isInteger(count) && count >= 0, `Invalid byte count ${count}`, {
      count,
    })
    if (this.rpos + count > this.length) {
      throw new PositionError(this.rpos, this.length, count)
    }
  }

  private assertPatchRange(position: number, count: number): void {
    assertBuffer(
      Number.isInteger(position) && position >= 0 && position + count <= this.length,
      `Attempted to put value with size: ${count} in byte buffer (pos: ${position} size: ${this.length})`,
      { position, size: this.length, valueSize: count },
    )
  }

  private assertBitField(value: number | bigint, bitCount: number): void {
    assertBuffer(isBitCount(bitCount, MAX_BIT_FIELD), `Attempted to put ${bitCount} bits`, {
      bitCount,
    })
    assertBuffer(
      typeof value === "bigint" || Number.isInteger(value),
      `Bit field value ${String(value)} is not an integer`,
      { value: String(value) },
    )
  }
}

function validateUtf8(bytes: Uint8Array): void {
  if (!isUtf8(bytes)) {
    throw new InvalidValueError("string", lossyDecoder.decode(bytes))
  }
}
