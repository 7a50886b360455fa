import os from "node:os"
import type { Request, Response } from "express"
import createDebug from "debug"

import { ClientError, ServerError } from "./errors.js"
import {
  escapeHtml,
  getQueryString,
  getServerAddress,
  returnClientError,
  returnServerError,
  sendHtml,
  sendOctetStream,
} from "./utils/server.js"
import { errorMessage } from "./utils.js"

const debug = createDebug("rpc-tunnel:CommandDispatcher")

/**
 * A command the relay answers, selected by the `<name>=<param>` query
 * string of a tunnel request.
 */
export interface CommandHandler {
  readonly name: string
  execute(req: Request, res: Response, param: string): Promise<void> | void
}

export type ParsedCommand = {
  command: string
  param: string
}

/**
 * Split a query string at its first "=". Without one, the whole string is
 * the command and the parameter is empty.
 */
export function parseCommand(query: string): ParsedCommand {
  const delim = query.indexOf("=")
  if (delim === -1) return { command: query, param: "" }
  return { command: query.slice(0, delim), param: query.slice(delim + 1) }
}

/**
 * Routes tunnel requests to command handlers and turns their failures into
 * error pages. The command table is fixed at construction.
 */
export class CommandDispatcher {
  private readonly commands: ReadonlyMap<string, CommandHandler>

  constructor(handlers: readonly CommandHandler[]) {
    const table = new Map<string, CommandHandler>()
    for (const handler of handlers) {
      if (table.has(handler.name)) {
        throw new Error(`Duplicate command: ${handler.name}`)
      }
      table.set(handler.name, handler)
    }
    this.commands = table
  }

  get commandNames(): string[] {
    return Array.from(this.commands.keys())
  }

  /**
   * Execute the command named in the request's query string. Never
   * rejects: every failure becomes a 400 or 500 response.
   */
  async dispatch(req: Request, res: Response): Promise<void> {
    try {
      const { command, param } = parseCommand(getQueryString(req))
      debug(`command: ${command} param: ${param}`)

      const handler = this.commands.get(command)
      if (!handler) {
        returnClientError(res, `invalid command: ${command}`)
        return
      }

      try {
        await handler.execute(req, res, param)
      } catch (e) {
        if (e instanceof ClientError) {
          returnClientError(res, `client error: ${e.message}`)
        } else if (e instanceof ServerError) {
          returnServerError(res, `internal server error: ${e.message}`)
        } else {
          throw e
        }
        debug(e)
      }
    } catch (e) {
      returnServerError(res, `internal error: ${errorMessage(e)}`)
      console.error("Unhandled error in tunnel command:", e)
    }
  }
}

/**
 * Responds with the host name the client used to reach the relay.
 */
export class GethostnameCommand implements CommandHandler {
  readonly name = "gethostname"

  execute(req: Request, res: Response): void {
    const { name } = getServerAddress(req)
    sendOctetStream(res, Buffer.from(name, "utf8"))
  }
}

/**
 * Empty 200 response so clients can check the relay is reachable.
 */
export class PingCommand implements CommandHandler {
  readonly name = "ping"

  execute(_req: Request, res: Response): void {
    sendOctetStream(res, Buffer.alloc(0))
  }
}

/**
 * Human-readable page comparing the relay machine's own host name with
 * the name the HTTP request was addressed to. A mismatch usually points
 * at NAT or a proxy in between.
 */
export class HostnameCommand implements CommandHandler {
  readonly name = "hostname"

  execute(req: Request, res: Response): void {
    const { name, port } = getServerAddress(req)

    let localHostName: string
    try {
      localHostName = ` = ${escapeHtml(os.hostname())}`
    } catch (e) {
      localHostName = ` failed: ${escapeHtml(errorMessage(e))}`
    }

    const page = [
      "",
      "<HTML><HEAD><TITLE>RPC Tunnel Hostname Info</TITLE></HEAD><BODY>",
      "<H1>RPC Tunnel Hostname Info</H1>",
      "<H2>Local host name available to the relay:</H2>",
      `<P>os.hostname()${localHostName}`,
      "<H2>Server host information obtained from the HTTP request:</H2>",
      `<P>SERVER_NAME = ${escapeHtml(name)}`,
      `<P>SERVER_PORT = ${port ?? ""}`,
      "</BODY></HTML>",
      "",
    ].join("\n")

    sendHtml(res, 200, page)
  }
}
