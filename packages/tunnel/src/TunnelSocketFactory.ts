import { DebugSocketFactory } from "./DebugSocketFactory.js"
import { DirectSocketFactory } from "./DirectSocketFactory.js"
import type {
  ClientSocketFactory,
  ServerSocketFactory,
  SocketFactory,
  TunnelServerSocket,
  TunnelSocket,
} from "./types.js"

/**
 * Socket factory composed from a client side and a server side, chosen
 * when the factory is built. Nothing is probed at connect time: to fall
 * back between transports, configure a FallbackSocketFactory as the
 * client side.
 *
 * ```
 * const factory = TunnelSocketFactory.builder()
 *   .clientSocketFactory(new HttpToRelaySocketFactory({ relayUrl }))
 *   .debug(true)
 *   .build()
 * ```
 */
export class TunnelSocketFactory implements SocketFactory {
  constructor(
    readonly client: ClientSocketFactory,
    readonly server: ServerSocketFactory,
  ) {}

  static builder(): TunnelSocketFactoryBuilder {
    return new TunnelSocketFactoryBuilder()
  }

  createSocket(host: string, port: number): Promise<TunnelSocket> {
    return this.client.createSocket(host, port)
  }

  createServerSocket(port: number): Promise<TunnelServerSocket> {
    return this.server.createServerSocket(port)
  }
}

export class TunnelSocketFactoryBuilder {
  private client: ClientSocketFactory | undefined
  private server: ServerSocketFactory | undefined
  private tracing = false

  clientSocketFactory(client: ClientSocketFactory): this {
    if (this.client !== undefined) {
      throw new Error("Client socket factory already set!")
    }
    this.client = client
    return this
  }

  serverSocketFactory(server: ServerSocketFactory): this {
    if (this.server !== undefined) {
      throw new Error("Server socket factory already set!")
    }
    this.server = server
    return this
  }

  /**
   * Trace traffic on default sockets and on the server override.
   */
  debug(value: boolean): this {
    this.tracing = value
    return this
  }

  build(): TunnelSocketFactory {
    const fallback: SocketFactory = this.tracing
      ? new DebugSocketFactory()
      : new DirectSocketFactory()
    const server =
      this.server !== undefined && this.tracing
        ? new DebugSocketFactory({ server: this.server })
        : this.server

    return new TunnelSocketFactory(
      this.client ?? fallback,
      server ?? fallback,
    )
  }
}
