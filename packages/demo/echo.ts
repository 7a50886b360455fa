import { TunnelSocketFactory } from "rpc-http-tunnel"

import { startEchoServer } from "./src/launch.js"

const PORT = Number(process.env.ECHO_PORT || 4000)

const factory = TunnelSocketFactory.builder()
  .debug(process.env.RPC_TUNNEL_DEBUG === "1")
  .build()

await startEchoServer(PORT, factory)
