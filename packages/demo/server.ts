import { loadRelayConfig } from "rpc-http-tunnel"

import { startRelay } from "./src/launch.js"

const config = loadRelayConfig()
const relay = await startRelay(config)

process.on("SIGINT", () => {
  relay.close().then(
    () => process.exit(0),
    (error: unknown) => {
      console.error("[rpc-tunnel-demo] Error closing relay:", error)
      process.exit(1)
    },
  )
})
