import { formatByteList, formatHex, formatText } from "../dump"

const sequence = (count: number) => Uint8Array.from({ length: count }, (_, i) => i)

describe("formatByteList", () => {
  it("suffixes every byte with a separator", () => {
    expect(formatByteList(Uint8Array.of(0, 17, 255))).toBe("0 - 17 - 255 - ")
  })

  it("is empty for no bytes", () => {
    expect(formatByteList(new Uint8Array(0))).toBe("")
  })
})

describe("formatHex", () => {
  it("splits a row into two groups of eight", () => {
    expect(formatHex(sequence(16))).toBe("00 01 02 03 04 05 06 07 | 08 09 0a 0b 0c 0d 0e 0f")
  })

  it("starts a new line every sixteen bytes", () => {
    expect(formatHex(sequence(18))).toBe(
      "00 01 02 03 04 05 06 07 | 08 09 0a 0b 0c 0d 0e 0f\n10 11",
    )
  })

  it("omits the separator for a short row", () => {
    expect(formatHex(Uint8Array.of(0xab, 0xcd))).toBe("ab cd")
  })

  it("is empty for no bytes", () => {
    expect(formatHex(new Uint8Array(0))).toBe("")
  })
})

describe("formatText", () => {
  it("keeps printable ASCII and masks the rest", () => {
    expect(formatText(Uint8Array.of(0x41, 0x00, 0x7f, 0x20, 0x7e, 0xe9))).toBe("A.. ~.")
  })
})
