import { EventEmitter } from "node:events"
import createDebug from "debug"

import { DirectSocketFactory } from "./DirectSocketFactory.js"
import type {
  ClientSocketFactory,
  InputStream,
  OutputStream,
  ServerSocketFactory,
  SocketFactory,
  TunnelServerSocket,
  TunnelSocket,
} from "./types.js"
import { generateConnectionId, toChunk } from "./utils/client.js"
import { describeBytes } from "./utils.js"

const trace = createDebug("rpc-tunnel:trace")

export type TraceLogger = (line: string) => void

export type DebugSocketFactoryOptions = {
  client?: ClientSocketFactory
  server?: ServerSocketFactory
  /** Where trace lines go. Defaults to the `rpc-tunnel:trace` debug namespace. */
  log?: TraceLogger
}

class TracingOutput implements OutputStream {
  constructor(
    private readonly inner: OutputStream,
    private readonly prefix: string,
    private readonly log: TraceLogger,
  ) {}

  write(byte: number): void
  write(buffer: Uint8Array, offset?: number, length?: number): void
  write(data: number | Uint8Array, offset?: number, length?: number): void {
    const chunk = toChunk(data, offset, length)
    this.log(`${this.prefix} write ${describeBytes(chunk)}`)
    this.inner.write(chunk)
  }

  async flush(): Promise<void> {
    this.log(`${this.prefix} flush`)
    await this.inner.flush()
  }

  async close(): Promise<void> {
    this.log(`${this.prefix} close output`)
    await this.inner.close()
  }
}

class TracingSocket implements TunnelSocket {
  readonly output: OutputStream
  readonly input: InputStream
  private readonly prefix: string

  constructor(
    private readonly inner: TunnelSocket,
    private readonly log: TraceLogger,
  ) {
    this.prefix = `[${generateConnectionId()} ${inner.host}:${inner.port}]`
    this.output = new TracingOutput(inner.output, this.prefix, log)
    this.input = {
      read: async () => {
        const chunk = await inner.input.read()
        log(`${this.prefix} read ${chunk ? describeBytes(chunk) : "EOF"}`)
        return chunk
      },
    }
  }

  get host(): string {
    return this.inner.host
  }

  get port(): number {
    return this.inner.port
  }

  async close(): Promise<void> {
    this.log(`${this.prefix} close`)
    await this.inner.close()
  }
}

class TracingServerSocket extends EventEmitter implements TunnelServerSocket {
  constructor(
    private readonly inner: TunnelServerSocket,
    log: TraceLogger,
  ) {
    super()
    inner.on("connection", (socket) => {
      const traced = new TracingSocket(socket, log)
      log(`accepted ${socket.host}:${socket.port} on port ${inner.port}`)
      this.emit("connection", traced)
    })
    inner.on("error", (error) => {
      log(`server socket error on port ${inner.port}: ${error.message}`)
      if (this.listenerCount("error") > 0) this.emit("error", error)
    })
  }

  get port(): number {
    return this.inner.port
  }

  close(): Promise<void> {
    return this.inner.close()
  }
}

/**
 * Wraps other socket factories and traces every socket they produce:
 * opens, reads, writes and closes.
 */
export class DebugSocketFactory implements SocketFactory {
  private readonly client: ClientSocketFactory
  private readonly server: ServerSocketFactory
  private readonly log: TraceLogger

  constructor(options: DebugSocketFactoryOptions = {}) {
    const direct = new DirectSocketFactory()
    this.client = options.client ?? direct
    this.server = options.server ?? direct
    this.log = options.log ?? ((line) => trace(line))
  }

  async createSocket(host: string, port: number): Promise<TunnelSocket> {
    this.log(`connecting to ${host}:${port}`)
    try {
      const socket = await this.client.createSocket(host, port)
      return new TracingSocket(socket, this.log)
    } catch (e) {
      this.log(`connect to ${host}:${port} failed: ${String(e)}`)
      throw e
    }
  }

  async createServerSocket(port: number): Promise<TunnelServerSocket> {
    const serverSocket = await this.server.createServerSocket(port)
    this.log(`listening on port ${serverSocket.port}`)
    return new TracingServerSocket(serverSocket, this.log)
  }
}
