import type { Socket } from "node:net"
import createDebug from "debug"

import { EndOfStreamError } from "./errors.js"
import {
  encodeRelayResponse,
  isValidContentLength,
  readHeaderBlock,
} from "./framing.js"
import type { ByteReader } from "./reader.js"
import type { InputStream, OutputStream, TunnelSocket } from "./types.js"
import { toChunk } from "./utils/client.js"
import { writeAsync } from "./utils.js"

const debug = createDebug("rpc-tunnel:HttpReceiveSocket")

class ReplyOutput implements OutputStream {
  constructor(private readonly owner: HttpReceiveSocket) {}

  write(byte: number): void
  write(buffer: Uint8Array, offset?: number, length?: number): void
  write(data: number | Uint8Array, offset?: number, length?: number): void {
    const chunk = toChunk(data, offset, length)
    if (chunk.length === 0) return
    this.owner.appendReply(chunk)
  }

  // The reply goes out in one piece when the socket closes
  async flush(): Promise<void> {}

  close(): Promise<void> {
    return this.owner.close()
  }
}

/**
 * Server-side view of a connection that arrived HTTP-wrapped, either
 * straight from an HTTP-to-port client or through the relay. The input
 * yields the POST body, and everything written to the output is sent
 * back as a single HTTP/1.0 200 reply when the socket is closed.
 */
export class HttpReceiveSocket implements TunnelSocket {
  readonly output: OutputStream
  readonly input: InputStream

  private reply: Buffer[] = []
  private request: Buffer | null
  private closed = false

  private constructor(
    readonly host: string,
    readonly port: number,
    private readonly socket: Socket,
    body: Buffer,
  ) {
    this.request = body
    this.input = {
      read: async () => {
        const request = this.request
        this.request = null
        return request !== null && request.length > 0 ? request : null
      },
    }
    this.output = new ReplyOutput(this)
  }

  /**
   * Consume the request head and body from `reader`.
   */
  static async accept(
    socket: Socket,
    reader: ByteReader,
  ): Promise<HttpReceiveSocket> {
    const head = await readHeaderBlock(reader)
    if (head === null) {
      throw new EndOfStreamError(1, 0)
    }
    const length = head.contentLength ?? 0
    if (!isValidContentLength(length)) {
      throw new Error(`invalid Content-length in request: ${length}`)
    }
    const body = await reader.readFully(length)
    debug(`${head.startLine} (${body.length} byte(s))`)

    return new HttpReceiveSocket(
      socket.remoteAddress ?? "",
      socket.remotePort ?? 0,
      socket,
      body,
    )
  }

  appendReply(chunk: Uint8Array): void {
    if (this.closed) {
      throw new Error("reply already sent")
    }
    this.reply.push(Buffer.from(chunk))
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    const body = Buffer.concat(this.reply)
    this.reply = []
    try {
      if (!this.socket.destroyed) {
        await writeAsync(this.socket, encodeRelayResponse(body))
        debug(`replied with ${body.length} byte(s)`)
      }
    } finally {
      this.socket.end()
    }
  }
}
