import createDebug from "debug"

import { HttpTunnelError } from "./errors.js"
import { SendOutputStream, type SendSocketOwner } from "./SendOutputStream.js"
import type { InputStream, TransportOutput, TunnelSocket } from "./types.js"

const debug = createDebug("rpc-tunnel:HttpSendSocket")

/**
 * Body of one outbound message. It is sent as a single POST once the
 * caller starts reading the reply, so the request carries an exact
 * Content-Length.
 */
class PendingRequest implements TransportOutput {
  private chunks: Buffer[] = []

  write(chunk: Uint8Array): void {
    // Copy: callers may reuse their buffer after write returns
    this.chunks.push(Buffer.from(chunk))
  }

  async flush(): Promise<void> {}

  get body(): Buffer {
    return Buffer.concat(this.chunks)
  }
}

class SendInputStream implements InputStream {
  constructor(private readonly owner: HttpSendSocket) {}

  async read(): Promise<Buffer | null> {
    if (this.owner.hasPendingRequest) {
      await this.owner.readNotify()
    }
    return this.owner.takeResponse()
  }
}

/**
 * Client socket that carries each RPC call as one HTTP POST: the message
 * written to `output` becomes the request body, and the response body is
 * what `input` yields. `url` is either an HTTP-aware RPC server
 * (`http://host:port/`) or a relay (`http://relay/path?forward=port`).
 */
export class HttpSendSocket implements TunnelSocket, SendSocketOwner {
  readonly output: SendOutputStream
  readonly input: InputStream

  private pending: PendingRequest | null = null
  private response: Buffer | null = null
  private closed = false

  constructor(
    readonly host: string,
    readonly port: number,
    readonly url: URL,
  ) {
    this.output = new SendOutputStream(this)
    this.input = new SendInputStream(this)
  }

  get transport(): TransportOutput | null {
    return this.pending
  }

  get hasPendingRequest(): boolean {
    return this.pending !== null
  }

  writeNotify(): TransportOutput {
    if (this.closed) {
      throw new Error(`socket to ${this.url} is closed`)
    }
    if (this.pending !== null) {
      debug("discarding unsent request")
    }
    // Unread bytes of the previous reply belong to a finished call
    this.response = null
    this.pending = new PendingRequest()
    return this.pending
  }

  /**
   * The caller has finished writing its message: send it and make the
   * reply readable.
   */
  async readNotify(): Promise<void> {
    const pending = this.pending
    this.output.deactivate()
    if (pending === null) return
    this.pending = null

    const body = pending.body
    debug(`POST ${this.url} (${body.length} byte(s))`)
    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/octet-stream" },
      body,
    })
    const data = Buffer.from(await res.arrayBuffer())
    if (res.status !== 200) {
      throw new HttpTunnelError(
        res.status,
        this.url.toString(),
        data.toString("utf8"),
      )
    }
    debug(`reply from ${this.url} (${data.length} byte(s))`)

    if (!this.closed) this.response = data
  }

  takeResponse(): Buffer | null {
    const response = this.response
    this.response = null
    return response !== null && response.length > 0 ? response : null
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.pending = null
    this.response = null
    this.output.deactivate()
    debug(`closed socket to ${this.url}`)
  }
}
