import createDebug from "debug"

import { DEFAULT_CONNECT_TIMEOUT } from "./config.js"
import { DirectSocketFactory } from "./DirectSocketFactory.js"
import {
  HttpToPortSocketFactory,
  HttpToRelaySocketFactory,
  type HttpToRelayOptions,
} from "./HttpSocketFactory.js"
import type {
  ClientSocketFactory,
  ServerSocketFactory,
  SocketFactory,
  TunnelServerSocket,
  TunnelSocket,
} from "./types.js"
import { errorMessage } from "./utils.js"

const debug = createDebug("rpc-tunnel:FallbackSocketFactory")

/**
 * Tries a fixed list of client factories in order and returns the first
 * socket that connects. HTTP factories connect lazily (the first request
 * goes out on the first read), so they always "succeed" and should come
 * last.
 */
export class FallbackSocketFactory implements SocketFactory {
  readonly factories: readonly ClientSocketFactory[]

  constructor(
    factories: readonly ClientSocketFactory[],
    private readonly server: ServerSocketFactory = new DirectSocketFactory(),
  ) {
    if (factories.length === 0) {
      throw new Error("FallbackSocketFactory needs at least one factory")
    }
    this.factories = Object.freeze([...factories])
  }

  /**
   * Direct TCP, then HTTP to the server's port, then HTTP through a relay.
   * The TCP attempt gives up after `DEFAULT_CONNECT_TIMEOUT` ms.
   */
  static standard(relay?: HttpToRelayOptions): FallbackSocketFactory {
    return new FallbackSocketFactory([
      new DirectSocketFactory({ connectTimeout: DEFAULT_CONNECT_TIMEOUT }),
      new HttpToPortSocketFactory(),
      new HttpToRelaySocketFactory(relay),
    ])
  }

  async createSocket(host: string, port: number): Promise<TunnelSocket> {
    const errors: unknown[] = []
    for (const [index, factory] of this.factories.entries()) {
      try {
        return await factory.createSocket(host, port)
      } catch (e) {
        debug(
          `${factory.constructor.name} (#${index}) failed for ${host}:${port}: ${errorMessage(e)}`,
        )
        errors.push(e)
      }
    }
    throw new AggregateError(errors, `unable to connect to ${host}:${port}`)
  }

  createServerSocket(port: number): Promise<TunnelServerSocket> {
    return this.server.createServerSocket(port)
  }
}
