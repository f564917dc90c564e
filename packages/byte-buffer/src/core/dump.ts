const HEX_ROW = 16
const HEX_GROUP = 8

function toHex(byte: number): string {
  return byte.toString(16).padStart(2, "0")
}

/** `"1 - 2 - 255 - "`: every byte in decimal followed by `" - "`. */
export function formatByteList(bytes: Uint8Array): string {
  let out = ""
  for (const byte of bytes) out += `${byte} - `
  return out
}

/**
 * Sixteen bytes per line in two-digit hex, the two halves of a line
 * separated by `" | "`.
 */
export function formatHex(bytes: Uint8Array): string {
  const rows: string[] = []

  for (let i = 0; i < bytes.length; i += HEX_ROW) {
    const row = bytes.subarray(i, i + HEX_ROW)
    const halves = [row.subarray(0, HEX_GROUP), row.subarray(HEX_GROUP)]
      .filter((half) => half.length > 0)
      .map((half) => Array.from(half, toHex).join(" "))

    rows.push(halves.join(" | "))
  }

  return rows.join("\n")
}

/** Printable ASCII as-is, anything else as `"."`. */
export function formatText(bytes: Uint8Array): string {
  let out = ""
  for (const byte of bytes) {
    out += byte >= 0x20 && byte < 0x7f ? String.fromCharCode(byte) : "."
  }
  return out
}
