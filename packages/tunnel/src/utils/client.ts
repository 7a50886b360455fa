export function generateConnectionId(): string {
  return "conn_" + Date.now().toString() + Math.random().toString(36).slice(2, 11)
}

/**
 * Select the bytes a `write(byte)` or `write(buffer, offset, length)` call
 * refers to.
 */
export function toChunk(
  data: number | Uint8Array,
  offset = 0,
  length?: number,
): Uint8Array {
  if (typeof data === "number") {
    return Uint8Array.of(data & 0xff)
  }
  const end = length === undefined ? data.length : offset + length
  if (offset < 0 || end < offset || end > data.length) {
    throw new RangeError(
      `write out of bounds: offset=${offset} length=${length} size=${data.length}`,
    )
  }
  return data.subarray(offset, end)
}

/**
 * Host as it appears in a URL authority; IPv6 literals get brackets.
 */
export function formatHost(host: string): string {
  return host.includes(":") && !host.startsWith("[") ? `[${host}]` : host
}
