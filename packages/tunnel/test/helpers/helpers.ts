import net from "node:net"
import express from "express"

import {
  ByteReader,
  RelayServer,
  encodeRelayResponse,
  readHeaderBlock,
  type RelayConfig,
} from "rpc-http-tunnel"

export type Target = {
  port: number
  connections: number
  /** Connections not yet closed. */
  open(): number
  close(): Promise<void>
}

/**
 * In-process TCP server standing in for an RPC server behind the relay.
 */
export async function startTarget(
  handler: (socket: net.Socket) => void | Promise<void>,
): Promise<Target> {
  const sockets = new Set<net.Socket>()
  const server = net.createServer((socket) => {
    target.connections += 1
    sockets.add(socket)
    socket.on("close", () => sockets.delete(socket))
    // The relay tears connections down on its own schedule
    socket.on("error", () => {})
    Promise.resolve(handler(socket)).catch(() => socket.destroy())
  })

  const target: Target = {
    port: 0,
    connections: 0,
    open: () => sockets.size,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) socket.destroy()
        server.close(() => resolve())
      }),
  }

  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve())
  })
  const address = server.address()
  target.port =
    address !== null && typeof address === "object" ? address.port : 0
  return target
}

async function readRelayedCall(socket: net.Socket): Promise<Buffer> {
  const reader = new ByteReader(socket)
  const head = await readHeaderBlock(reader)
  return reader.readFully(head?.contentLength ?? 0)
}

/**
 * Target that answers every HTTP-wrapped call with its own body.
 */
export function startFramedEcho(): Promise<Target> {
  return startTarget(async (socket) => {
    const body = await readRelayedCall(socket)
    socket.end(encodeRelayResponse(body))
  })
}

/**
 * Target that reads the relayed call, then writes `reply` verbatim and
 * closes.
 */
export function startScriptedTarget(reply: string): Promise<Target> {
  return startTarget(async (socket) => {
    await readRelayedCall(socket)
    socket.end(Buffer.from(reply, "latin1"))
  })
}

/**
 * Target that reads the relayed call and never answers.
 */
export function startSilentTarget(): Promise<Target> {
  return startTarget(async (socket) => {
    await readRelayedCall(socket)
  })
}

/**
 * Target that records the raw bytes of the first call it receives.
 */
export async function startRecordingTarget() {
  let resolveCapture: (bytes: Buffer) => void = () => {}
  const captured = new Promise<Buffer>((resolve) => {
    resolveCapture = resolve
  })
  const target = await startTarget(async (socket) => {
    const raw: Buffer[] = []
    socket.on("data", (chunk: Buffer) => raw.push(chunk))
    await readRelayedCall(socket)
    resolveCapture(Buffer.concat(raw))
    socket.end(encodeRelayResponse(Buffer.from("ok")))
  })
  return { target, captured }
}

/** A port nothing is listening on. */
export async function closedPort(): Promise<number> {
  const target = await startTarget(() => {})
  await target.close()
  return target.port
}

export async function startRelay(config: RelayConfig = {}) {
  const relay = RelayServer.initialize(express(), {
    remoteHost: "127.0.0.1",
    ...config,
  })
  const address = await relay.listen(0, "127.0.0.1")
  const origin = `http://127.0.0.1:${address.port}`
  return { relay, origin }
}

export type TunnelReply = {
  status: number
  contentType: string | null
  contentLength: string | null
  body: Buffer
}

export async function postTunnel(
  url: string,
  body?: Uint8Array,
): Promise<TunnelReply> {
  const res = await fetch(url, { method: "POST", body })
  return {
    status: res.status,
    contentType: res.headers.get("content-type"),
    contentLength: res.headers.get("content-length"),
    body: Buffer.from(await res.arrayBuffer()),
  }
}

/** Poll `condition` until it holds or `ms` have passed. */
export async function eventually(
  condition: () => boolean,
  ms = 2000,
): Promise<boolean> {
  const deadline = Date.now() + ms
  while (!condition()) {
    if (Date.now() > deadline) return false
    await new Promise((resolve) => setTimeout(resolve, 10))
  }
  return true
}

export function withTimeout<T>(p: Promise<T>, ms: number, label: string) {
  let to: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<never>((_, reject) => {
    to = setTimeout(() => reject(new Error(`${label} timed out`)), ms)
  })
  return Promise.race([p, timeout]).finally(() => clearTimeout(to))
}
