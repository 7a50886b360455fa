import net from "node:net"
import { EventEmitter, once } from "node:events"
import createDebug from "debug"

import { requireTimeout } from "./config.js"
import { HttpReceiveSocket } from "./HttpReceiveSocket.js"
import { ByteReader } from "./reader.js"
import { StreamSocket } from "./StreamSocket.js"
import type {
  SocketFactory,
  TunnelServerSocket,
  TunnelSocket,
} from "./types.js"
import { errorMessage } from "./utils.js"

const debug = createDebug("rpc-tunnel:DirectSocketFactory")

const HTTP_POST = "POST"

/**
 * TCP server socket that also accepts HTTP-wrapped calls. The first four
 * bytes of every connection are inspected: a connection opening with
 * "POST" is surfaced as an HttpReceiveSocket, anything else as a plain
 * stream socket. The RPC protocol must therefore have the client speak
 * first.
 */
class DirectServerSocket extends EventEmitter implements TunnelServerSocket {
  private readonly connections = new Set<net.Socket>()

  constructor(private readonly server: net.Server) {
    super()
    server.on("connection", (socket: net.Socket) => {
      this.connections.add(socket)
      socket.on("close", () => this.connections.delete(socket))
      socket.setNoDelay(true)

      this.accept(socket).then(
        (tunnelSocket) => this.emit("connection", tunnelSocket),
        (error: unknown) => {
          console.error(
            `Dropping connection from ${socket.remoteAddress}: ${errorMessage(error)}`,
          )
          socket.destroy()
        },
      )
    })
    server.on("error", (error: Error) => {
      if (this.listenerCount("error") > 0) {
        this.emit("error", error)
      } else {
        console.error("Server socket error:", error)
      }
    })
  }

  get port(): number {
    const address = this.server.address()
    return address !== null && typeof address === "object" ? address.port : 0
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()))
      for (const socket of this.connections) socket.destroy()
    })
  }

  private async accept(socket: net.Socket): Promise<TunnelSocket> {
    const reader = new ByteReader(socket)
    const magic = await reader.peek(HTTP_POST.length)
    if (magic.toString("latin1") === HTTP_POST) {
      debug(`HTTP-wrapped connection from ${socket.remoteAddress}`)
      return HttpReceiveSocket.accept(socket, reader)
    }
    return new StreamSocket(
      socket.remoteAddress ?? "",
      socket.remotePort ?? 0,
      socket,
      reader,
    )
  }
}

export type DirectSocketOptions = {
  /**
   * Give up on a connect that has not completed within this many ms. A
   * firewall that drops SYNs otherwise stalls the caller until the OS
   * gives up.
   */
  connectTimeout?: number
}

/**
 * Plain TCP connections.
 */
export class DirectSocketFactory implements SocketFactory {
  readonly connectTimeout: number | undefined

  constructor(options: DirectSocketOptions = {}) {
    this.connectTimeout =
      options.connectTimeout === undefined
        ? undefined
        : requireTimeout("connectTimeout", options.connectTimeout)
  }

  async createSocket(host: string, port: number): Promise<TunnelSocket> {
    const socket = this.connect(host, port)
    socket.setNoDelay(true)
    // Attach before connecting so early data is not missed
    const reader = new ByteReader(socket)
    try {
      const timeout = this.connectTimeout
      if (timeout !== undefined) {
        socket.setTimeout(timeout, () => {
          socket.destroy(
            new Error(`connect to ${host}:${port} timed out after ${timeout} ms`),
          )
        })
      }
      await once(socket, "connect")
      // The deadline covers the handshake only
      socket.setTimeout(0)
    } catch (e) {
      socket.destroy()
      throw e
    }
    debug(`connected to ${host}:${port}`)
    return new StreamSocket(host, port, socket, reader)
  }

  protected connect(host: string, port: number): net.Socket {
    return net.connect({ host, port })
  }

  async createServerSocket(port: number): Promise<TunnelServerSocket> {
    const server = net.createServer()
    const serverSocket = new DirectServerSocket(server)
    await listen(server, port)
    debug(`listening on port ${serverSocket.port}`)
    return serverSocket
  }
}

export function listen(
  server: net.Server,
  port: number,
  host?: string,
): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject)
    server.listen(port, host, () => {
      server.off("error", reject)
      resolve()
    })
  })
}
