import type { Writable } from "node:stream"

export function isTextData(data: Uint8Array): boolean {
  // Simple heuristic to detect if data is likely text
  // Check for null bytes and high-bit characters
  for (let i = 0; i < Math.min(data.length, 1024); i++) {
    const byte = data[i]
    if (byte === 0 || (byte > 127 && byte < 160)) {
      return false
    }
  }
  return true
}

/**
 * One-line rendering of a chunk for traffic traces.
 */
export function describeBytes(data: Uint8Array, limit = 64): string {
  const size = `${data.length} byte(s)`
  if (data.length === 0) return size
  const head = Buffer.from(data.subarray(0, limit))
  const more = data.length > limit ? "..." : ""
  if (isTextData(head)) {
    return `${size} ${JSON.stringify(head.toString("latin1") + more)}`
  }
  return `${size} <${head.toString("hex")}${more}>`
}

export function writeAsync(stream: Writable, data: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(data, (error) => (error ? reject(error) : resolve()))
  })
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
