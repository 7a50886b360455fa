import test from "ava"
import { PassThrough } from "node:stream"

import {
  ByteReader,
  EndOfStreamError,
  encodeRelayRequest,
  encodeRelayResponse,
  parseContentLength,
  readHeaderBlock,
} from "rpc-http-tunnel"

function feed(...chunks: string[]): PassThrough {
  const stream = new PassThrough()
  for (const chunk of chunks) stream.write(Buffer.from(chunk, "latin1"))
  stream.end()
  return stream
}

test("readLine accepts LF, CRLF and lone CR terminators", async (t) => {
  const reader = new ByteReader(feed("one\r\ntwo\nthree\rfour"))
  t.is(await reader.readLine(), "one")
  t.is(await reader.readLine(), "two")
  t.is(await reader.readLine(), "three")
  t.is(await reader.readLine(), "four")
  t.is(await reader.readLine(), null)
})

test("readLine joins a CRLF split across chunks", async (t) => {
  const reader = new ByteReader(feed("head\r", "\nbody"))
  t.is(await reader.readLine(), "head")
  t.is(await reader.readLine(), "body")
})

test("readLine returns an empty string for a blank line", async (t) => {
  const reader = new ByteReader(feed("\r\n\r\n"))
  t.is(await reader.readLine(), "")
  t.is(await reader.readLine(), "")
  t.is(await reader.readLine(), null)
})

test("readFully reads across chunk boundaries", async (t) => {
  const reader = new ByteReader(feed("ab", "cde", "f"))
  t.is((await reader.readFully(4)).toString(), "abcd")
  t.is((await reader.readFully(2)).toString(), "ef")
  t.is(await reader.read(), null)
})

test("readFully fails when the stream ends early", async (t) => {
  const reader = new ByteReader(feed("abc"))
  const error = await t.throwsAsync(reader.readFully(5), {
    instanceOf: EndOfStreamError,
  })
  t.is(error?.expected, 5)
  t.is(error?.received, 3)
})

test("readFully surfaces the stream's own error", async (t) => {
  const stream = new PassThrough()
  const reader = new ByteReader(stream)
  stream.write(Buffer.from("ab"))
  stream.destroy(new Error("reset by peer"))
  await t.throwsAsync(reader.readFully(4), { message: "reset by peer" })
})

test("peek does not consume", async (t) => {
  const reader = new ByteReader(feed("PO", "ST / HTTP/1.0"))
  t.is((await reader.peek(4)).toString(), "POST")
  t.is((await reader.readFully(6)).toString(), "POST /")
})

test("peek returns fewer bytes at end of stream", async (t) => {
  const reader = new ByteReader(feed("ab"))
  t.is((await reader.peek(4)).toString(), "ab")
  t.is((await reader.read())?.toString(), "ab")
})

test("read drains what is buffered and then signals EOF", async (t) => {
  const reader = new ByteReader(feed("abc"))
  t.is((await reader.read())?.toString(), "abc")
  t.is(await reader.read(), null)
})

test("the reader pauses a fast source and resumes it as data is read", async (t) => {
  const stream = new PassThrough()
  const reader = new ByteReader(stream)
  const block = Buffer.alloc(48 * 1024, 0x61)
  stream.write(block)
  stream.write(block)
  stream.write(block)
  stream.end()
  const all = await reader.readFully(3 * block.length)
  t.is(all.length, 3 * block.length)
  t.is(await reader.read(), null)
})

test("encodeRelayRequest frames a minimal HTTP/1.0 POST", (t) => {
  t.is(
    encodeRelayRequest(Buffer.from("hello")).toString("latin1"),
    "POST / HTTP/1.0\r\nContent-length: 5\r\n\r\nhello",
  )
  t.is(
    encodeRelayRequest(new Uint8Array(0)).toString("latin1"),
    "POST / HTTP/1.0\r\nContent-length: 0\r\n\r\n",
  )
})

test("encodeRelayResponse frames a 200 reply", (t) => {
  t.is(
    encodeRelayResponse(Buffer.from("ok")).toString("latin1"),
    "HTTP/1.0 200 OK\r\nContent-length: 2\r\n\r\nok",
  )
})

test("parseContentLength matches the header name case-insensitively", (t) => {
  t.is(parseContentLength("Content-length: 12"), 12)
  t.is(parseContentLength("CONTENT-LENGTH:7"), 7)
  t.is(parseContentLength("content-length:   3  "), 3)
  t.true(Number.isNaN(parseContentLength("Content-length: ten")))
  t.true(Number.isNaN(parseContentLength("Content-length:")))
  t.is(parseContentLength("Content-Type: text/html"), undefined)
  t.is(parseContentLength("HTTP/1.0 200 OK"), undefined)
})

test("readHeaderBlock keeps the last Content-length", async (t) => {
  const reader = new ByteReader(
    feed(
      "HTTP/1.0 200 OK\r\nContent-length: 2\r\nServer: x\r\nContent-length: 4\r\n\r\nabcd",
    ),
  )
  const head = await readHeaderBlock(reader)
  t.deepEqual(head, {
    startLine: "HTTP/1.0 200 OK",
    contentLength: 4,
  })
  t.is((await reader.readFully(4)).toString(), "abcd")
})

test("readHeaderBlock leaves contentLength undefined when absent", async (t) => {
  const head = await readHeaderBlock(
    new ByteReader(feed("HTTP/1.0 200 OK\r\n\r\n")),
  )
  t.is(head?.contentLength, undefined)
})

test("readHeaderBlock returns null if the stream ends before the blank line", async (t) => {
  const head = await readHeaderBlock(
    new ByteReader(feed("HTTP/1.0 200 OK\r\nContent-length: 5\r\n")),
  )
  t.is(head, null)
})
