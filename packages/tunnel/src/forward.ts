import type { IncomingMessage } from "node:http"
import net from "node:net"
import { once } from "node:events"
import type { Request, Response } from "express"
import createDebug from "debug"

import type { CommandHandler } from "./commands.js"
import {
  DEFAULT_LOCAL_HOST,
  DEFAULT_RELAY_TIMEOUT,
  requireTimeout,
  type RelayConfig,
} from "./config.js"
import {
  ClientError,
  EndOfStreamError,
  ServerError,
  TunnelError,
} from "./errors.js"
import {
  encodeRelayRequest,
  isValidContentLength,
  readHeaderBlock,
} from "./framing.js"
import { ByteReader } from "./reader.js"
import { sendOctetStream } from "./utils/server.js"
import { errorMessage, writeAsync } from "./utils.js"

const debug = createDebug("rpc-tunnel:ForwardCommand")

/**
 * Validate the port parameter of a forward request. Ports below 1024 are
 * refused so the relay cannot be used to reach privileged services.
 */
export function parsePort(param: string): number {
  if (!/^[+-]?\d+$/.test(param)) {
    throw new ClientError(`invalid port number: ${param}`)
  }
  const port = Number(param)
  if (port <= 0 || port > 0xffff) {
    throw new ClientError(`invalid port: ${port}`)
  }
  if (port < 1024) {
    throw new ClientError(`permission denied for port: ${port}`)
  }
  return port
}

/**
 * Read the request body in full. Resolves to null when the request
 * declares no Content-Length or a zero one.
 */
export async function readRequestBody(
  req: IncomingMessage,
): Promise<Buffer | null> {
  const header = req.headers["content-length"]
  const length = header === undefined ? 0 : Number(header)
  if (!Number.isSafeInteger(length) || length <= 0) return null

  const reader = new ByteReader(req)
  try {
    return await reader.readFully(length)
  } catch (e) {
    if (e instanceof EndOfStreamError) {
      throw new ClientError("unexpected EOF reading request body", {
        cause: e,
      })
    }
    throw new ClientError("error reading request body", { cause: e })
  }
}

/**
 * Forwards the body of a tunnel request to an RPC server listening on the
 * port named by the request parameter, and returns the server's reply as
 * the response body. One TCP connection per request.
 */
export class ForwardCommand implements CommandHandler {
  readonly name = "forward"
  private readonly remoteHost: string
  private readonly relayTimeout: number

  constructor(config: RelayConfig = {}) {
    this.remoteHost = config.remoteHost ?? DEFAULT_LOCAL_HOST
    this.relayTimeout = requireTimeout(
      "relayTimeout",
      config.relayTimeout ?? DEFAULT_RELAY_TIMEOUT,
    )
  }

  async execute(req: Request, res: Response, param: string): Promise<void> {
    const port = parsePort(param)

    const body = await readRequestBody(req)
    if (body === null) {
      debug(`forward to port ${port}: empty request, nothing to send`)
      sendOctetStream(res, Buffer.alloc(0))
      return
    }

    const reply = await this.relay(this.remoteHost, port, body)
    sendOctetStream(res, reply)
  }

  /**
   * Send `body` to host:port wrapped in an HTTP/1.0 POST and read back the
   * body of the target's reply.
   */
  async relay(host: string, port: number, body: Buffer): Promise<Buffer> {
    debug(`relaying ${body.length} byte(s) to ${host}:${port}`)

    const socket = net.connect({ host, port })
    const reader = new ByteReader(socket)

    try {
      socket.setTimeout(this.relayTimeout, () => {
        socket.destroy(
          new Error(`no response from ${host}:${port} in ${this.relayTimeout} ms`),
        )
      })
      await once(socket, "connect")
      await writeAsync(socket, encodeRelayRequest(body))

      const head = await readHeaderBlock(reader)
      if (head === null) {
        throw new ServerError("unexpected EOF reading server response")
      }
      if (!isValidContentLength(head.contentLength)) {
        throw new ServerError(
          "missing or invalid content length in server response",
        )
      }

      try {
        const reply = await reader.readFully(head.contentLength)
        debug(`received ${reply.length} byte(s) from ${host}:${port}`)
        return reply
      } catch (e) {
        if (e instanceof EndOfStreamError) {
          throw new ServerError("unexpected EOF reading server response", {
            cause: e,
          })
        }
        throw e
      }
    } catch (e) {
      if (e instanceof TunnelError) throw e
      throw new ServerError(
        `error reading/writing to server: [${errorMessage(e)}]`,
        { cause: e },
      )
    } finally {
      socket.destroy()
    }
  }
}
