import { EventEmitter, once } from "node:events"
import { WebSocket, WebSocketServer, createWebSocketStream } from "ws"
import createDebug from "debug"

import { StreamSocket } from "./StreamSocket.js"
import type {
  SocketFactory,
  TunnelServerSocket,
  TunnelSocket,
} from "./types.js"
import { formatHost } from "./utils/client.js"

const debug = createDebug("rpc-tunnel:WebSocketSocketFactory")

export type WebSocketSocketFactoryOptions = {
  /** Request path of the WebSocket endpoint. */
  path?: string
  /** Use wss:// for client sockets. */
  secure?: boolean
}

class WebSocketServerSocket
  extends EventEmitter
  implements TunnelServerSocket
{
  constructor(private readonly wss: WebSocketServer) {
    super()
    wss.on("connection", (ws, req) => {
      debug(`connection from ${req.socket.remoteAddress}`)
      const socket = new StreamSocket(
        req.socket.remoteAddress ?? "",
        req.socket.remotePort ?? 0,
        createWebSocketStream(ws),
      )
      this.emit("connection", socket)
    })
    wss.on("error", (error: Error) => {
      if (this.listenerCount("error") > 0) {
        this.emit("error", error)
      } else {
        console.error("WebSocket server error:", error)
      }
    })
  }

  get port(): number {
    const address = this.wss.address()
    return typeof address === "object" ? address.port : 0
  }

  close(): Promise<void> {
    for (const ws of this.wss.clients) {
      ws.terminate()
    }
    return new Promise((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()))
    })
  }
}

/**
 * Carries the RPC byte stream in binary WebSocket messages, for networks
 * where only HTTP(S) upgrades get through.
 */
export class WebSocketSocketFactory implements SocketFactory {
  private readonly path: string

  constructor(private readonly options: WebSocketSocketFactoryOptions = {}) {
    this.path = options.path ?? "/"
  }

  async createSocket(host: string, port: number): Promise<TunnelSocket> {
    const scheme = this.options.secure ? "wss" : "ws"
    const ws = new WebSocket(
      `${scheme}://${formatHost(host)}:${port}${this.path}`,
    )
    // Rejects on "error"; ws closes the socket itself in that case
    await once(ws, "open")
    debug(`connected to ${ws.url}`)
    return new StreamSocket(host, port, createWebSocketStream(ws))
  }

  async createServerSocket(port: number): Promise<TunnelServerSocket> {
    const wss = new WebSocketServer({ port, path: this.options.path })
    await once(wss, "listening")
    const serverSocket = new WebSocketServerSocket(wss)
    debug(`listening on port ${serverSocket.port}`)
    return serverSocket
  }
}
