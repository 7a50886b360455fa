import test from "ava"

import {
  DirectSocketFactory,
  FallbackSocketFactory,
  HttpToPortSocketFactory,
  HttpToRelaySocketFactory,
} from "rpc-http-tunnel"

import { callEcho, startEchoServer, startRelay } from "../src/launch.js"

test.serial("the echo server answers over every transport", async (t) => {
  const echoServer = await startEchoServer(0)
  const relay = await startRelay({
    port: 0,
    host: "127.0.0.1",
    remoteHost: "127.0.0.1",
    path: "/rpc-tunnel",
  })
  const address = relay.server.address()
  const relayPort =
    address !== null && typeof address === "object" ? address.port : 0
  try {
    const port = echoServer.port
    t.is(
      await callEcho(new DirectSocketFactory(), "127.0.0.1", port, "direct"),
      "direct",
    )
    t.is(
      await callEcho(new HttpToPortSocketFactory(), "127.0.0.1", port, "port"),
      "port",
    )
    const viaRelay = new HttpToRelaySocketFactory({
      relayUrl: `http://127.0.0.1:${relayPort}/rpc-tunnel`,
    })
    t.is(await callEcho(viaRelay, "127.0.0.1", port, "relayed"), "relayed")
  } finally {
    await relay.close()
    await echoServer.close()
  }
})

test.serial("the standard fallback reaches the echo server directly", async (t) => {
  const echoServer = await startEchoServer(0)
  try {
    const reply = await callEcho(
      FallbackSocketFactory.standard(),
      "127.0.0.1",
      echoServer.port,
      "fallback",
    )
    t.is(reply, "fallback")
  } finally {
    await echoServer.close()
  }
})
