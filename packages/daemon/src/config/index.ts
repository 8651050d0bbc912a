import { z } from 'zod'
import {
  CLIENT_STOP_GRACE,
  DEFAULT_VSOCK_PORT,
  MAX_SEND_ATTEMPTS,
  RECONNECT_INTERVAL,
  VMADDR_CID_HOST,
  WORKER_SHUTDOWN_TIMEOUT,
} from '@usb-bridge/shared'

/**
 * Default peer table: the host reachable on loopback
 */
const DEFAULT_PEERS: ReadonlyArray<[number, string]> = [[VMADDR_CID_HOST, '127.0.0.1']]

const DEFAULT_GUEST_CIDS = [3]

const cidSchema = z.coerce.number().int().min(0)

/**
 * Parse VSOCK_GUEST_CIDS (comma-separated list)
 */
const parseList = (value: string | undefined): string[] | undefined => {
  if (!value) {
    return undefined
  }
  return value.split(',').map((item) => item.trim()).filter(Boolean)
}

/**
 * Parse VSOCK_PEERS (`cid=host,cid=host`) into [cid, host] pairs
 */
const parsePeers = (value: string | undefined): Array<[string, string]> | undefined =>
  parseList(value)?.map((entry) => {
    const separator = entry.indexOf('=')
    return separator === -1 ? [entry, ''] : [entry.slice(0, separator).trim(), entry.slice(separator + 1).trim()]
  })

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  role: z.enum(['host', 'guest']).default('guest'),
  cid: cidSchema.default(VMADDR_CID_HOST),
  port: z.coerce.number().int().min(0).max(65535).default(DEFAULT_VSOCK_PORT),
  guestCids: z.array(cidSchema).min(1).default(DEFAULT_GUEST_CIDS),
  bindHost: z.string().min(1).default('0.0.0.0'),
  peers: z
    .array(z.tuple([cidSchema, z.string().min(1, 'peer host must not be empty')]))
    .default([...DEFAULT_PEERS])
    .transform((entries) => new Map(entries)),
  reconnectIntervalMs: z.coerce.number().int().positive().default(RECONNECT_INTERVAL),
  sendAttempts: z.coerce.number().int().min(1).max(100).default(MAX_SEND_ATTEMPTS),
  shutdownTimeoutMs: z.coerce.number().int().positive().default(WORKER_SHUTDOWN_TIMEOUT),
  stopGraceMs: z.coerce.number().int().min(0).default(CLIENT_STOP_GRACE),
  dataDir: z.string().min(1).default('/tmp/usb-passthrough'),
  passthroughCommand: z.string().min(1).optional(),
})

export type Config = z.infer<typeof configSchema>

export type Env = Record<string, string | undefined>

/**
 * Load and validate configuration from environment variables
 * @throws Error when validation fails (issues are printed to stderr)
 */
export const loadConfig = (env: Env = process.env): Config => {
  const rawConfig = {
    nodeEnv: env['NODE_ENV'],
    logLevel: env['LOG_LEVEL'],
    role: env['BRIDGE_ROLE'],
    cid: env['VSOCK_CID'],
    port: env['VSOCK_PORT'],
    guestCids: parseList(env['VSOCK_GUEST_CIDS']),
    bindHost: env['VSOCK_BIND_HOST'],
    peers: parsePeers(env['VSOCK_PEERS']),
    reconnectIntervalMs: env['RECONNECT_INTERVAL_MS'],
    sendAttempts: env['SEND_ATTEMPTS'],
    shutdownTimeoutMs: env['SHUTDOWN_TIMEOUT_MS'],
    stopGraceMs: env['STOP_GRACE_MS'],
    dataDir: env['DATA_DIR'],
    passthroughCommand: env['PASSTHROUGH_COMMAND'] || undefined,
  }

  try {
    return configSchema.parse(rawConfig)
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('[Config] Validation failed:')
      error.errors.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`)
      })
      throw new Error('Configuration validation failed')
    }
    throw error
  }
}
