/**
 * Byte sink handed to RPC runtimes. Mirrors the shape of a blocking
 * output stream: writes are buffered synchronously, flush and close
 * settle once the bytes are on their way.
 */
export interface OutputStream {
  write(byte: number): void
  write(buffer: Uint8Array, offset?: number, length?: number): void
  flush(): Promise<void>
  close(): Promise<void>
}

export interface InputStream {
  /** Next available bytes, or null at end of stream. */
  read(): Promise<Buffer | null>
}

/**
 * A connection as seen by the RPC runtime, whatever carries it underneath:
 * a TCP socket, a sequence of HTTP POSTs, or a WebSocket.
 */
export interface TunnelSocket {
  readonly host: string
  readonly port: number
  readonly output: OutputStream
  readonly input: InputStream
  close(): Promise<void>
}

export interface TunnelServerSocket {
  readonly port: number
  on(event: "connection", listener: (socket: TunnelSocket) => void): this
  on(event: "error", listener: (error: Error) => void): this
  close(): Promise<void>
}

export interface ClientSocketFactory {
  createSocket(host: string, port: number): Promise<TunnelSocket>
}

export interface ServerSocketFactory {
  createServerSocket(port: number): Promise<TunnelServerSocket>
}

export type SocketFactory = ClientSocketFactory & ServerSocketFactory

/**
 * Output side of the transport carrying one outbound message.
 */
export interface TransportOutput {
  write(chunk: Uint8Array): void
  flush(): Promise<void>
}
