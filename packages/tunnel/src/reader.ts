import type { Readable } from "node:stream"

import { EndOfStreamError } from "./errors.js"

const CR = 0x0d
const LF = 0x0a

// Pause the source once this much unread data is buffered
const HIGH_WATER_MARK = 64 * 1024

/**
 * Promise-based reader over a Node stream, with exact-length and
 * line-oriented reads. The reader attaches to the stream immediately,
 * so construct it before any data can arrive.
 *
 * Once the stream has ended, reads that cannot be satisfied from the
 * buffer reject with `EndOfStreamError`, or with the stream's own error
 * if it failed.
 */
export class ByteReader {
  private chunks: Buffer[] = []
  private buffered = 0
  private ended = false
  private paused = false
  private failure: Error | null = null
  private waiters: Array<() => void> = []

  constructor(private readonly stream: Readable) {
    stream.on("data", (chunk: Buffer | string) => {
      const buf =
        typeof chunk === "string" ? Buffer.from(chunk, "latin1") : chunk
      if (buf.length === 0) return
      this.chunks.push(buf)
      this.buffered += buf.length
      if (this.buffered >= HIGH_WATER_MARK && !this.paused) {
        this.paused = true
        stream.pause()
      }
      this.wake()
    })
    stream.on("end", () => this.finish())
    stream.on("close", () => this.finish())
    stream.on("error", (error: Error) => {
      this.failure = error
      this.finish()
    })
  }

  /**
   * Read exactly `length` bytes.
   */
  async readFully(length: number): Promise<Buffer> {
    await this.fill(length)
    if (this.buffered < length) {
      throw this.failure ?? new EndOfStreamError(length, this.buffered)
    }
    return this.take(length)
  }

  /**
   * Read a line terminated by `\n`, `\r\n` or a lone `\r`, without the
   * terminator. Bytes are decoded as latin1. Resolves to null at end of
   * stream when no bytes were read.
   */
  async readLine(): Promise<string | null> {
    for (;;) {
      const index = this.indexOfTerminator()
      if (index !== -1) {
        const line = this.take(index).toString("latin1")
        const terminator = this.take(1)[0]
        if (terminator === CR) {
          await this.fill(1)
          if (this.buffered > 0 && this.chunks[0][0] === LF) this.take(1)
        }
        return line
      }
      if (this.ended) {
        if (this.failure) throw this.failure
        if (this.buffered === 0) return null
        return this.take(this.buffered).toString("latin1")
      }
      await this.wait()
    }
  }

  /**
   * Resolve to whatever is buffered as soon as at least one byte is
   * available, or null at end of stream.
   */
  async read(): Promise<Buffer | null> {
    await this.fill(1)
    if (this.buffered === 0) {
      if (this.failure) throw this.failure
      return null
    }
    return this.take(this.buffered)
  }

  /**
   * Look at up to `length` bytes without consuming them. Returns fewer
   * bytes only if the stream ends first.
   */
  async peek(length: number): Promise<Buffer> {
    await this.fill(length)
    const size = Math.min(length, this.buffered)
    const out = Buffer.alloc(size)
    let copied = 0
    for (const chunk of this.chunks) {
      if (copied === size) break
      copied += chunk.copy(out, copied, 0, Math.min(chunk.length, size - copied))
    }
    return out
  }

  private async fill(length: number): Promise<void> {
    while (this.buffered < length && !this.ended) {
      await this.wait()
    }
  }

  private indexOfTerminator(): number {
    let offset = 0
    for (const chunk of this.chunks) {
      for (let i = 0; i < chunk.length; i++) {
        if (chunk[i] === LF || chunk[i] === CR) return offset + i
      }
      offset += chunk.length
    }
    return -1
  }

  private take(length: number): Buffer {
    const out = Buffer.allocUnsafe(length)
    let copied = 0
    while (copied < length) {
      const head = this.chunks[0]
      const n = Math.min(head.length, length - copied)
      head.copy(out, copied, 0, n)
      copied += n
      if (n === head.length) {
        this.chunks.shift()
      } else {
        this.chunks[0] = head.subarray(n)
      }
    }
    this.buffered -= length
    if (this.paused && this.buffered < HIGH_WATER_MARK) {
      this.paused = false
      this.stream.resume()
    }
    return out
  }

  private wait(): Promise<void> {
    // A reader waiting for more data always needs the source flowing
    if (this.paused) {
      this.paused = false
      this.stream.resume()
    }
    return new Promise((resolve) => this.waiters.push(resolve))
  }

  private wake(): void {
    const waiters = this.waiters
    this.waiters = []
    for (const resolve of waiters) resolve()
  }

  private finish(): void {
    this.ended = true
    this.wake()
  }
}
