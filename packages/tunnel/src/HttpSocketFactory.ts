import { HttpSendSocket } from "./HttpSendSocket.js"
import type { ClientSocketFactory, TunnelSocket } from "./types.js"
import { formatHost } from "./utils/client.js"

export const DEFAULT_RELAY_URL_PATH = "/rpc-tunnel"

/**
 * Sends each call as an HTTP POST straight to the RPC server's own port.
 * Useful when a proxy lets HTTP through but not raw TCP; the server must
 * accept HTTP-wrapped connections (see DirectSocketFactory).
 */
export class HttpToPortSocketFactory implements ClientSocketFactory {
  async createSocket(host: string, port: number): Promise<TunnelSocket> {
    const url = new URL(`http://${formatHost(host)}:${port}/`)
    return new HttpSendSocket(host, port, url)
  }
}

export type HttpToRelayOptions = {
  /**
   * Relay endpoint, e.g. `http://gateway.example:8080/rpc-tunnel`.
   * Defaults to port 80 of the RPC server's host.
   */
  relayUrl?: string
}

/**
 * Sends each call as an HTTP POST to a relay, which forwards it to the
 * RPC server's port on its own machine.
 */
export class HttpToRelaySocketFactory implements ClientSocketFactory {
  constructor(private readonly options: HttpToRelayOptions = {}) {}

  async createSocket(host: string, port: number): Promise<TunnelSocket> {
    const url = new URL(
      this.options.relayUrl ??
        `http://${formatHost(host)}:80${DEFAULT_RELAY_URL_PATH}`,
    )
    url.search = `forward=${port}`
    return new HttpSendSocket(host, port, url)
  }
}
