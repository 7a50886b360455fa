import express from "express"

import {
  RelayServer,
  TunnelSocketFactory,
  type ClientSocketFactory,
  type RelayLaunchConfig,
  type ServerSocketFactory,
  type TunnelServerSocket,
  type TunnelSocket,
} from "rpc-http-tunnel"

export async function startRelay(
  config: RelayLaunchConfig,
): Promise<RelayServer> {
  const relay = RelayServer.initialize(express(), config)
  const address = await relay.listen(config.port, config.host)
  console.log(
    `[rpc-tunnel-demo] ${RelayServer.info} on http://${address.address}:${address.port}${relay.path}`,
  )
  if (config.remoteHost) {
    console.log(`[rpc-tunnel-demo] Forwarding to ${config.remoteHost}`)
  }
  return relay
}

async function echo(socket: TunnelSocket): Promise<void> {
  for (
    let chunk = await socket.input.read();
    chunk !== null;
    chunk = await socket.input.read()
  ) {
    socket.output.write(chunk)
    await socket.output.flush()
  }
  await socket.output.close()
}

/**
 * Sample RPC server: every connection gets its bytes back. Reachable
 * directly, HTTP-wrapped on the same port, or through a relay.
 */
export async function startEchoServer(
  port: number,
  factory: ServerSocketFactory = TunnelSocketFactory.builder().build(),
): Promise<TunnelServerSocket> {
  const serverSocket = await factory.createServerSocket(port)
  serverSocket.on("connection", (socket) => {
    console.log(
      `[rpc-tunnel-demo] Echo connection from ${socket.host}:${socket.port}`,
    )
    echo(socket).catch((error: unknown) => {
      console.error("[rpc-tunnel-demo] Echo connection failed:", error)
    })
  })
  serverSocket.on("error", (error) => {
    console.error("[rpc-tunnel-demo] Echo server error:", error)
  })
  console.log(
    `[rpc-tunnel-demo] Echo server listening on port ${serverSocket.port}`,
  )
  return serverSocket
}

/**
 * Make one call to an echo server and return what came back.
 */
export async function callEcho(
  factory: ClientSocketFactory,
  host: string,
  port: number,
  message: string,
): Promise<string> {
  const request = Buffer.from(message)
  const socket = await factory.createSocket(host, port)
  try {
    socket.output.write(request)
    await socket.output.flush()

    const chunks: Buffer[] = []
    let received = 0
    while (received < request.length) {
      const chunk = await socket.input.read()
      if (chunk === null) break
      chunks.push(chunk)
      received += chunk.length
    }
    return Buffer.concat(chunks).toString()
  } finally {
    await socket.close()
  }
}
