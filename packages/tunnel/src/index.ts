// Relay (server side)
export { RelayServer } from "./server.js"
export {
  CommandDispatcher,
  GethostnameCommand,
  HostnameCommand,
  PingCommand,
  parseCommand,
} from "./commands.js"
export type { CommandHandler, ParsedCommand } from "./commands.js"
export { ForwardCommand, parsePort, readRequestBody } from "./forward.js"
export {
  loadRelayConfig,
  DEFAULT_RELAY_PATH,
  DEFAULT_RELAY_TIMEOUT,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_LOCAL_HOST,
} from "./config.js"
export type { RelayConfig, RelayLaunchConfig } from "./config.js"

// Sockets (client side and RPC server side)
export { SendOutputStream } from "./SendOutputStream.js"
export type { SendOutputState, SendSocketOwner } from "./SendOutputStream.js"
export { HttpSendSocket } from "./HttpSendSocket.js"
export { HttpReceiveSocket } from "./HttpReceiveSocket.js"
export { StreamSocket } from "./StreamSocket.js"
export { DirectSocketFactory } from "./DirectSocketFactory.js"
export type { DirectSocketOptions } from "./DirectSocketFactory.js"
export {
  HttpToPortSocketFactory,
  HttpToRelaySocketFactory,
  DEFAULT_RELAY_URL_PATH,
} from "./HttpSocketFactory.js"
export type { HttpToRelayOptions } from "./HttpSocketFactory.js"
export { WebSocketSocketFactory } from "./WebSocketSocketFactory.js"
export type { WebSocketSocketFactoryOptions } from "./WebSocketSocketFactory.js"
export { DebugSocketFactory } from "./DebugSocketFactory.js"
export type {
  DebugSocketFactoryOptions,
  TraceLogger,
} from "./DebugSocketFactory.js"
export { FallbackSocketFactory } from "./FallbackSocketFactory.js"
export {
  TunnelSocketFactory,
  TunnelSocketFactoryBuilder,
} from "./TunnelSocketFactory.js"

export {
  CLIENT_ERROR_TITLE,
  SERVER_ERROR_TITLE,
  renderErrorPage,
} from "./utils/server.js"

// Wire helpers
export { ByteReader } from "./reader.js"
export {
  encodeRelayRequest,
  encodeRelayResponse,
  parseContentLength,
  readHeaderBlock,
} from "./framing.js"
export type { HeaderBlock } from "./framing.js"
export { describeBytes } from "./utils.js"

export {
  TunnelError,
  ClientError,
  ServerError,
  EndOfStreamError,
  HttpTunnelError,
} from "./errors.js"

export type {
  ClientSocketFactory,
  InputStream,
  OutputStream,
  ServerSocketFactory,
  SocketFactory,
  TransportOutput,
  TunnelServerSocket,
  TunnelSocket,
} from "./types.js"
