/**
 * @usb-bridge/shared
 * Device types, protocol messages, schemas and constants shared by host and guest
 */

// Export all device types
export type {
  DeviceInfo,
  DeviceRecord,
  DeviceSnapshot,
  PassthroughStatus,
} from './types/usb-device.types'

// Export all protocol types
export type {
  JsonObject,
  MessageEnvelope,
  EmptyPayload,
  ConnectedDevicesPayload,
  DeviceConnectedPayload,
  DeviceRemovedPayload,
  PassthroughRequestPayload,
  PassthroughAckPayload,
  PayloadMap,
  MessageType,
  MessageOf,
  ProtocolMessage,
  GetDevicesMessage,
  ConnectedDevicesMessage,
  DeviceConnectedMessage,
  DeviceRemovedMessage,
  PassthroughRequestMessage,
  PassthroughAckMessage,
  ResetMessage,
  DecodeResult,
} from './types/protocol.types'

// Export all schemas
export {
  isRecord,
  vmNameSchema,
  currentVmSchema,
  deviceInfoSchema,
  deviceRecordSchema,
  payloadSchemas,
} from './schemas/protocol.schema'

// Export message constructors and codecs
export {
  isMessageType,
  getMessageType,
  createGetDevices,
  createConnectedDevices,
  createDeviceConnected,
  createDeviceRemoved,
  createPassthroughRequest,
  createPassthroughAck,
  createReset,
  toJson,
  fromMessage,
  decodeMessage,
} from './protocol/messages'

// Export error classes
export { ProtocolError, ValidationError, type ValidationIssue } from './errors'

// Export all constants
export {
  MESSAGE_TYPES,
  PASSTHROUGH_STATUSES,
  VMADDR_CID_HOST,
  DEFAULT_VSOCK_PORT,
  RECONNECT_INTERVAL,
  MAX_SEND_ATTEMPTS,
  WORKER_SHUTDOWN_TIMEOUT,
  CLIENT_STOP_GRACE,
  REGISTRY_FILE_NAME,
  REQUEST_FIFO_NAME,
  DEVICE_EVENT_FIFO_NAME,
} from './constants'
