import type { Request, Response } from "express"

export const CLIENT_ERROR_TITLE = "RPC Tunnel Client Error"
export const SERVER_ERROR_TITLE = "RPC Tunnel Server Error"

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
}

export function renderErrorPage(title: string, message: string): string {
  return (
    "<HTML><HEAD>" +
    `<TITLE>${title}</TITLE>` +
    "</HEAD>" +
    "<BODY>" +
    `<H1>${title}</H1>` +
    escapeHtml(message) +
    "</BODY></HTML>"
  )
}

/**
 * Respond with an opaque body and an exact Content-Length.
 */
export function sendOctetStream(res: Response, body: Uint8Array): void {
  res.status(200)
  res.setHeader("Content-Type", "application/octet-stream")
  res.setHeader("Content-Length", String(body.length))
  res.end(body)
}

export function sendHtml(res: Response, status: number, html: string): void {
  res.status(status)
  res.setHeader("Content-Type", "text/html")
  res.setHeader("Content-Length", String(Buffer.byteLength(html)))
  res.end(html)
}

/**
 * 400 with an HTML page describing a problem in the client's request.
 */
export function returnClientError(res: Response, message: string): void {
  console.error(`400 ${CLIENT_ERROR_TITLE}: ${message}`)
  sendOrAbort(res, 400, renderErrorPage(CLIENT_ERROR_TITLE, message))
}

/**
 * 500 with an HTML page describing a failure on the relay side.
 */
export function returnServerError(res: Response, message: string): void {
  console.error(`500 ${SERVER_ERROR_TITLE}: ${message}`)
  sendOrAbort(res, 500, renderErrorPage(SERVER_ERROR_TITLE, message))
}

function sendOrAbort(res: Response, status: number, html: string): void {
  if (res.headersSent) {
    // Too late for an error page; cut the response short instead
    res.destroy()
    return
  }
  sendHtml(res, status, html)
}

/**
 * Raw query string of the request target, undecoded. For
 * `POST /relay?forward=4000` this is `forward=4000`.
 */
export function getQueryString(req: Request): string {
  const target = req.originalUrl || req.url
  const index = target.indexOf("?")
  return index === -1 ? "" : target.slice(index + 1)
}

/**
 * Server name and port the client addressed, taken from the Host header.
 */
export function getServerAddress(req: Request): {
  name: string
  port: number | undefined
} {
  const host = req.headers.host ?? ""
  const match = /^(.*?)(?::(\d+))?$/.exec(host)
  const name = match?.[1] || req.hostname || ""
  const port = match?.[2] ? Number(match[2]) : req.socket?.localPort
  return { name, port }
}
