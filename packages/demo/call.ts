import {
  FallbackSocketFactory,
  HttpToRelaySocketFactory,
  type ClientSocketFactory,
} from "rpc-http-tunnel"

import { callEcho } from "./src/launch.js"

const host = process.env.ECHO_HOST || "127.0.0.1"
const port = Number(process.env.ECHO_PORT || 4000)
const relayUrl = process.env.RPC_TUNNEL_RELAY_URL
const message = process.argv.slice(2).join(" ") || "hello through the tunnel"

// With a relay URL, go through the relay only; otherwise try everything
const factory: ClientSocketFactory = relayUrl
  ? new HttpToRelaySocketFactory({ relayUrl })
  : FallbackSocketFactory.standard()

const reply = await callEcho(factory, host, port, message)
console.log(`[rpc-tunnel-demo] ${host}:${port} replied: ${reply}`)
