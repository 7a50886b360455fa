import createDebug from "debug"

import type { OutputStream, TransportOutput } from "./types.js"
import { toChunk } from "./utils/client.js"

const debug = createDebug("rpc-tunnel:SendOutputStream")

/**
 * `armed`: no transport bound, the next write starts a new message.
 * `bound`: writes go to the owner's current transport.
 */
export type SendOutputState = "armed" | "bound"

/**
 * The session a SendOutputStream writes through. The owner holds the
 * transport; the stream only decides when a new one is needed.
 */
export interface SendSocketOwner {
  /** Start a new outbound message and return its transport. */
  writeNotify(): TransportOutput
  /** Transport of the message being written, if any. */
  readonly transport: TransportOutput | null
  /** Release the session and everything it holds. */
  close(): Promise<void>
}

/**
 * Output stream that tells its owner when a new message begins.
 *
 * RPC runtimes write one message per call with no framing of their own.
 * After the owner has sent a message it calls `deactivate()`; the next
 * write is then the first byte of the next call, and the stream asks the
 * owner for a fresh transport before passing it on.
 */
export class SendOutputStream implements OutputStream {
  private _state: SendOutputState = "armed"

  constructor(private readonly owner: SendSocketOwner) {}

  get state(): SendOutputState {
    return this._state
  }

  /**
   * Stop writing to the current transport. Nothing is closed: the owner
   * may still be reading the reply from it.
   */
  deactivate(): void {
    this._state = "armed"
  }

  write(byte: number): void
  write(buffer: Uint8Array, offset?: number, length?: number): void
  write(data: number | Uint8Array, offset?: number, length?: number): void {
    const chunk = toChunk(data, offset, length)
    if (chunk.length === 0) return

    const transport = this.acquire()
    debug(`write ${chunk.length} byte(s)`)
    transport.write(chunk)
  }

  async flush(): Promise<void> {
    if (this._state === "armed") return
    await this.owner.transport?.flush()
  }

  async close(): Promise<void> {
    await this.flush()
    await this.owner.close()
  }

  private acquire(): TransportOutput {
    const current = this.owner.transport
    if (this._state === "bound" && current !== null) return current

    const transport = this.owner.writeNotify()
    this._state = "bound"
    return transport
  }
}
