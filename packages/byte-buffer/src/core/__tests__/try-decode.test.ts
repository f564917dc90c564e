import { ByteBuffer } from "../byte-buffer"
import { BufferAssertionError, InvalidValueError, PositionError } from "../errors"
import { isDecodeError, tryDecode } from "../try-decode"

function nodeStatus(buffer: ByteBuffer) {
  return {
    guid: buffer.read("uint64"),
    status: buffer.read("uint8"),
    name: buffer.readCString(),
  }
}

describe("tryDecode", () => {
  it("returns the decoded value", () => {
    const buffer = new ByteBuffer()
    buffer.write("uint64", 42n)
    buffer.write("uint8", 2)
    buffer.writeCString("gate")

    expect(tryDecode(buffer, nodeStatus)).toEqual({
      success: true,
      value: { guid: 42n, status: 2, name: "gate" },
    })
  })

  it("returns a PositionError for a truncated message", () => {
    const buffer = new ByteBuffer()
    buffer.write("uint64", 42n)

    const result = tryDecode(buffer, nodeStatus)

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error).toBeInstanceOf(PositionError)
      expect(result.error).toMatchObject({ position: 8, size: 8, valueSize: 1 })
    }
  })

  it("returns an InvalidValueError for a malformed value", () => {
    const buffer = ByteBuffer.from(Uint8Array.of(0x00, 0x00, 0xc0, 0x7f))

    const result = tryDecode(buffer, (b) => b.read("float"))

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error).toBeInstanceOf(InvalidValueError)
    }
  })

  it("rethrows assertion failures", () => {
    const buffer = new ByteBuffer()

    expect(() => tryDecode(buffer, (b) => b.append(new Uint8Array(0)))).toThrow(
      BufferAssertionError,
    )
  })

  it("rethrows unrelated errors", () => {
    expect(() =>
      tryDecode(new ByteBuffer(), () => {
        throw new Error("boom")
      }),
    ).toThrow("boom")
  })
})

describe("isDecodeError", () => {
  it("recognises only decode errors", () => {
    expect(isDecodeError(new PositionError(0, 0, 1))).toBe(true)
    expect(isDecodeError(new InvalidValueError("string", "x"))).toBe(true)
    expect(isDecodeError(new BufferAssertionError("bad"))).toBe(false)
    expect(isDecodeError(new Error("x"))).toBe(false)
    expect(isDecodeError("x")).toBe(false)
  })
})
