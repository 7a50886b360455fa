import type { ByteReader } from "./reader.js"

const CONTENT_LENGTH_KEY = "content-length:"

/**
 * Header block of an HTTP-wrapped message on the relay-to-target leg.
 * Only Content-length is interpreted; when the header repeats, the last
 * value seen wins. `contentLength` is NaN for an unparseable value.
 */
export type HeaderBlock = {
  startLine: string
  contentLength: number | undefined
}

/**
 * Wrap a message body as the minimal HTTP/1.0 POST sent to a relay target.
 */
export function encodeRelayRequest(body: Uint8Array): Buffer {
  return Buffer.concat([
    Buffer.from(
      `POST / HTTP/1.0\r\nContent-length: ${body.length}\r\n\r\n`,
      "latin1",
    ),
    body,
  ])
}

/**
 * Wrap a message body as the reply an HTTP-aware target sends back.
 */
export function encodeRelayResponse(body: Uint8Array): Buffer {
  return Buffer.concat([
    Buffer.from(
      `HTTP/1.0 200 OK\r\nContent-length: ${body.length}\r\n\r\n`,
      "latin1",
    ),
    body,
  ])
}

/**
 * Return the value of a `Content-length:` header line, NaN if the value is
 * not an integer, or undefined if the line is some other header.
 */
export function parseContentLength(line: string): number | undefined {
  if (!line.toLowerCase().startsWith(CONTENT_LENGTH_KEY)) return undefined
  const value = line.slice(CONTENT_LENGTH_KEY.length).trim()
  return /^[+-]?\d+$/.test(value) ? Number(value) : NaN
}

/**
 * Read lines up to and including the blank line that ends a header block.
 * Resolves to null if the stream ends first.
 */
export async function readHeaderBlock(
  reader: ByteReader,
): Promise<HeaderBlock | null> {
  let startLine: string | undefined
  let contentLength: number | undefined

  for (;;) {
    const line = await reader.readLine()
    if (line === null) return null
    if (line.length === 0) break

    const value = parseContentLength(line)
    if (value !== undefined) contentLength = value
    if (startLine === undefined) startLine = line
  }

  return { startLine: startLine ?? "", contentLength }
}

export function isValidContentLength(
  length: number | undefined,
): length is number {
  return length !== undefined && Number.isSafeInteger(length) && length >= 0
}
