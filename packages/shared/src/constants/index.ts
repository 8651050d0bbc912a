import type { MessageType } from '../types/protocol.types'
import type { PassthroughStatus } from '../types/usb-device.types'

/**
 * Every message kind both peers must understand
 */
export const MESSAGE_TYPES = [
  'get_devices',
  'connected_devices',
  'device_connected',
  'device_removed',
  'passthrough_request',
  'passthrough_ack',
  'reset',
] as const satisfies readonly MessageType[]

/**
 * Allowed values of `passthrough_ack.status`
 */
export const PASSTHROUGH_STATUSES = ['ok', 'denied', 'error'] as const satisfies readonly PassthroughStatus[]

/**
 * Well-known VSOCK context id of the host
 */
export const VMADDR_CID_HOST = 2

/**
 * Port the passthrough manager listens on
 */
export const DEFAULT_VSOCK_PORT = 7000

/**
 * Delay between connection attempts of the reconnecting client (in milliseconds)
 * @default 1 second
 */
export const RECONNECT_INTERVAL = 1000

/**
 * Attempts a client send makes before giving up
 */
export const MAX_SEND_ATTEMPTS = 5

/**
 * How long server shutdown waits for each connection worker (in milliseconds)
 * @default 2 seconds
 */
export const WORKER_SHUTDOWN_TIMEOUT = 2000

/**
 * Grace period between signalling a client to stop and force-closing it (in milliseconds)
 */
export const CLIENT_STOP_GRACE = 1000

/**
 * File the guest mirror of the registry is written to, inside the data directory
 */
export const REGISTRY_FILE_NAME = 'usb_db.json'

/**
 * FIFO the desktop app writes `device_id->vm` passthrough requests to
 */
export const REQUEST_FIFO_NAME = 'app_request.fifo'

/**
 * FIFO the host's hotplug side writes device events to (one protocol envelope per line)
 */
export const DEVICE_EVENT_FIFO_NAME = 'device_events.fifo'
