import test from "ava"

import {
  SendOutputStream,
  type SendSocketOwner,
  type TransportOutput,
} from "rpc-http-tunnel"

class RecordingTransport implements TransportOutput {
  readonly bytes: number[] = []

  constructor(
    readonly id: number,
    private readonly events: string[],
  ) {}

  write(chunk: Uint8Array): void {
    this.bytes.push(...chunk)
    this.events.push(`write#${this.id} ${chunk.length}`)
  }

  async flush(): Promise<void> {
    this.events.push(`flush#${this.id}`)
  }
}

class FakeOwner implements SendSocketOwner {
  readonly events: string[] = []
  readonly transports: RecordingTransport[] = []
  transport: RecordingTransport | null = null
  failWith: Error | null = null

  get acquisitions(): number {
    return this.transports.length
  }

  writeNotify(): TransportOutput {
    if (this.failWith) throw this.failWith
    const transport = new RecordingTransport(
      this.transports.length + 1,
      this.events,
    )
    this.transports.push(transport)
    this.transport = transport
    this.events.push(`acquire#${transport.id}`)
    return transport
  }

  async close(): Promise<void> {
    this.events.push("close")
  }
}

test("a new stream starts armed", (t) => {
  const stream = new SendOutputStream(new FakeOwner())
  t.is(stream.state, "armed")
})

test("zero-length writes never start a message", (t) => {
  const owner = new FakeOwner()
  const stream = new SendOutputStream(owner)
  stream.write(new Uint8Array(0))
  stream.write(Uint8Array.of(1, 2, 3), 1, 0)
  t.is(owner.acquisitions, 0)
  t.is(stream.state, "armed")
})

test("the first write of a message acquires exactly one transport", (t) => {
  const owner = new FakeOwner()
  const stream = new SendOutputStream(owner)
  stream.write(0x41)
  stream.write(Buffer.from("BCD"))
  stream.write(Uint8Array.of(9, 8, 7, 6), 1, 2)
  t.is(owner.acquisitions, 1)
  t.is(stream.state, "bound")
  t.deepEqual(owner.transports[0].bytes, [0x41, 0x42, 0x43, 0x44, 8, 7])
})

test("write(byte) keeps the low eight bits", (t) => {
  const owner = new FakeOwner()
  const stream = new SendOutputStream(owner)
  stream.write(0x1ff)
  t.deepEqual(owner.transports[0].bytes, [0xff])
})

test("each deactivate starts a fresh message on the next write", (t) => {
  const owner = new FakeOwner()
  const stream = new SendOutputStream(owner)

  stream.write(Buffer.from("call-1"))
  stream.deactivate()
  t.is(stream.state, "armed")
  stream.deactivate()

  stream.write(Buffer.from("call-2"))
  stream.write(Buffer.from("-more"))
  stream.deactivate()
  stream.write(1)

  t.is(owner.acquisitions, 3)
  t.is(Buffer.from(owner.transports[1].bytes).toString(), "call-2-more")
})

test("deactivate closes nothing", (t) => {
  const owner = new FakeOwner()
  const stream = new SendOutputStream(owner)
  stream.write(1)
  stream.deactivate()
  t.deepEqual(owner.events, ["acquire#1", "write#1 1"])
})

test("flush while armed does nothing", async (t) => {
  const owner = new FakeOwner()
  const stream = new SendOutputStream(owner)
  await stream.flush()
  stream.write(1)
  stream.deactivate()
  await stream.flush()
  t.deepEqual(owner.events, ["acquire#1", "write#1 1"])
})

test("flush while bound reaches the current transport", async (t) => {
  const owner = new FakeOwner()
  const stream = new SendOutputStream(owner)
  stream.write(1)
  await stream.flush()
  t.deepEqual(owner.events, ["acquire#1", "write#1 1", "flush#1"])
})

test("close flushes before releasing the owner", async (t) => {
  const owner = new FakeOwner()
  const stream = new SendOutputStream(owner)
  stream.write(Buffer.from("xy"))
  await stream.close()
  t.deepEqual(owner.events, ["acquire#1", "write#1 2", "flush#1", "close"])
})

test("close flushes even when nothing was written", async (t) => {
  const owner = new FakeOwner()
  const stream = new SendOutputStream(owner)
  const calls: string[] = []
  const flush = stream.flush.bind(stream)
  stream.flush = async () => {
    calls.push("flush")
    await flush()
  }
  await stream.close()
  t.deepEqual(calls, ["flush"])
  t.deepEqual(owner.events, ["close"])
})

test("out-of-range writes throw before acquiring a transport", (t) => {
  const owner = new FakeOwner()
  const stream = new SendOutputStream(owner)
  t.throws(() => stream.write(Uint8Array.of(1, 2), 1, 5), {
    instanceOf: RangeError,
  })
  t.is(owner.acquisitions, 0)
})

test("a failed acquisition leaves the stream armed", (t) => {
  const owner = new FakeOwner()
  owner.failWith = new Error("no route to relay")
  const stream = new SendOutputStream(owner)
  t.throws(() => stream.write(1), { message: "no route to relay" })
  t.is(stream.state, "armed")

  owner.failWith = null
  stream.write(1)
  t.is(owner.acquisitions, 1)
})
