export const DEFAULT_RELAY_PATH = "/"
export const DEFAULT_RELAY_TIMEOUT = 30_000
export const DEFAULT_CONNECT_TIMEOUT = 20_000
export const DEFAULT_LOCAL_HOST = "127.0.0.1"
export const DEFAULT_PORT = 8080
export const DEFAULT_LISTEN_HOST = "0.0.0.0"

export type RelayConfig = {
  /** Host running the RPC servers. Defaults to the relay's own machine. */
  remoteHost?: string
  /** Route the relay answers on. */
  path?: string
  /** Read deadline on relay target connections, in milliseconds. */
  relayTimeout?: number
}

export type RelayLaunchConfig = RelayConfig & {
  port: number
  host: string
}

/**
 * Build the launch configuration from environment variables:
 *
 * - `PORT`, `HOST`: where the relay listens (8080, 0.0.0.0)
 * - `RPC_TUNNEL_REMOTE_HOST`: host the RPC servers run on
 * - `RPC_TUNNEL_PATH`: route for tunnel requests ("/")
 * - `RPC_TUNNEL_RELAY_TIMEOUT`: read deadline in ms (30000)
 */
export function loadRelayConfig(
  env: NodeJS.ProcessEnv = process.env,
): RelayLaunchConfig {
  const path = env.RPC_TUNNEL_PATH || DEFAULT_RELAY_PATH
  if (!path.startsWith("/")) {
    throw new Error(`Invalid RPC_TUNNEL_PATH: ${path} (must start with "/")`)
  }

  return {
    port: parseInteger("PORT", env.PORT, DEFAULT_PORT, 0, 0xffff),
    host: env.HOST || DEFAULT_LISTEN_HOST,
    remoteHost: env.RPC_TUNNEL_REMOTE_HOST || undefined,
    path,
    relayTimeout: parseInteger(
      "RPC_TUNNEL_RELAY_TIMEOUT",
      env.RPC_TUNNEL_RELAY_TIMEOUT,
      DEFAULT_RELAY_TIMEOUT,
      1,
      Number.MAX_SAFE_INTEGER,
    ),
  }
}

function parseInteger(
  name: string,
  value: string | undefined,
  fallback: number,
  min: number,
  max: number,
): number {
  if (value === undefined || value === "") return fallback
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid ${name}: ${value}`)
  }
  const parsed = Number(value)
  if (parsed < min || parsed > max) {
    throw new Error(`Invalid ${name}: ${value} (expected ${min}..${max})`)
  }
  return parsed
}

/**
 * Timeouts end up in `socket.setTimeout`, where 0 switches the deadline off
 * and negative or fractional values throw.
 */
export function requireTimeout(name: string, value: number): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new Error(`Invalid ${name}: ${value} (expected a positive integer)`)
  }
  return value
}
