import type { Duplex } from "node:stream"
import { once } from "node:events"

import { ByteReader } from "./reader.js"
import type { InputStream, OutputStream, TunnelSocket } from "./types.js"
import { toChunk } from "./utils/client.js"

class StreamOutput implements OutputStream {
  constructor(
    private readonly stream: Duplex,
    private readonly onClose: () => Promise<void>,
  ) {}

  write(byte: number): void
  write(buffer: Uint8Array, offset?: number, length?: number): void
  write(data: number | Uint8Array, offset?: number, length?: number): void {
    const chunk = toChunk(data, offset, length)
    if (chunk.length === 0) return
    this.stream.write(chunk)
  }

  async flush(): Promise<void> {
    if (this.stream.writableNeedDrain) {
      await once(this.stream, "drain")
    }
  }

  async close(): Promise<void> {
    await this.flush()
    await this.onClose()
  }
}

/**
 * TunnelSocket over any Node duplex stream: a TCP socket, or the stream
 * `ws` builds around a WebSocket.
 */
export class StreamSocket implements TunnelSocket {
  readonly output: OutputStream
  readonly input: InputStream
  private readonly reader: ByteReader
  private closed = false

  constructor(
    readonly host: string,
    readonly port: number,
    private readonly stream: Duplex,
    reader?: ByteReader,
  ) {
    this.reader = reader ?? new ByteReader(stream)
    this.input = { read: () => this.reader.read() }
    this.output = new StreamOutput(stream, () => this.close())
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    if (!this.stream.destroyed) {
      // Let queued writes go out before tearing the stream down
      await new Promise<void>((resolve) => {
        this.stream.once("close", resolve)
        this.stream.end(() => resolve())
      })
    }
    this.stream.destroy()
  }
}
