import http from "node:http"
import type { AddressInfo } from "node:net"
import express, { type Express } from "express"
import createDebug from "debug"

import {
  CommandDispatcher,
  GethostnameCommand,
  HostnameCommand,
  PingCommand,
  type CommandHandler,
} from "./commands.js"
import { DEFAULT_RELAY_PATH, type RelayConfig } from "./config.js"
import { ForwardCommand } from "./forward.js"
import { returnClientError } from "./utils/server.js"

const debug = createDebug("rpc-tunnel:RelayServer")

/**
 * HTTP side of the tunnel. Tunnel clients POST to the relay route with a
 * query string of the form `<command>=<param>`; the `forward` command
 * relays the request body to an RPC server on this machine (or on
 * `config.remoteHost`) and returns its reply as the response body.
 *
 * ```
 * const relay = RelayServer.initialize(express(), { path: "/rpc-tunnel" })
 * relay.server.listen(8080)
 * ```
 *
 * The relay reads request bodies itself, so mount it before any body
 * parsing middleware on a shared app.
 */
export class RelayServer {
  static readonly info = "RPC call forwarding relay"

  public readonly server: http.Server
  public readonly dispatcher: CommandDispatcher
  public readonly path: string

  private constructor(
    public readonly app: Express,
    config: RelayConfig,
  ) {
    this.path = config.path ?? DEFAULT_RELAY_PATH
    this.dispatcher = new CommandDispatcher(RelayServer.commands(config))

    app.post(this.path, (req, res, next) => {
      this.dispatcher.dispatch(req, res).catch(next)
    })
    app.get(this.path, (_req, res) => {
      returnClientError(
        res,
        "GET Operation not supported: Can only forward POST requests.",
      )
    })
    app.put(this.path, (_req, res) => {
      returnClientError(
        res,
        "PUT Operation not supported: Can only forward POST requests.",
      )
    })

    this.server = http.createServer(app)
    debug(
      `relay mounted on ${this.path}, commands: ${this.dispatcher.commandNames.join(", ")}`,
    )
  }

  static initialize(app?: Express, config?: RelayConfig): RelayServer {
    return new RelayServer(app ?? express(), config ?? {})
  }

  /** The built-in command set. */
  static commands(config: RelayConfig): CommandHandler[] {
    return [
      new ForwardCommand(config),
      new GethostnameCommand(),
      new PingCommand(),
      new HostnameCommand(),
    ]
  }

  listen(port: number, host?: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject)
      this.server.listen(port, host, () => {
        this.server.off("error", reject)
        const address = this.server.address()
        if (address === null || typeof address === "string") {
          reject(new Error(`unexpected server address: ${address}`))
          return
        }
        debug(`listening on ${address.address}:${address.port}`)
        resolve(address)
      })
    })
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()))
      this.server.closeAllConnections()
    })
  }
}
