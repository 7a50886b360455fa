/**
 * Base class for failures that the relay renders as an HTTP error page.
 */
export abstract class TunnelError extends Error {
  abstract readonly status: 400 | 500

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Thrown when a problem is detected in the client's request: a malformed
 * command, a forbidden port, or a truncated body.
 */
export class ClientError extends TunnelError {
  readonly status = 400
}

/**
 * Thrown when the relay fails while talking to the relay target.
 */
export class ServerError extends TunnelError {
  readonly status = 500
}

/**
 * Raised by ByteReader when a stream ends before the requested bytes arrive.
 */
export class EndOfStreamError extends Error {
  constructor(
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(`unexpected end of stream (expected ${expected}, got ${received})`)
    this.name = "EndOfStreamError"
  }
}

/**
 * A tunnelled HTTP call came back with something other than 200 OK.
 */
export class HttpTunnelError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly body: string,
  ) {
    super(`HTTP tunnel request to ${url} failed with status ${status}`)
    this.name = "HttpTunnelError"
  }
}
