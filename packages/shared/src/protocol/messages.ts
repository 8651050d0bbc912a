import { MESSAGE_TYPES } from '../constants'
import { ValidationError } from '../errors'
import { isRecord, payloadSchemas } from '../schemas/protocol.schema'
import type {
  ConnectedDevicesMessage,
  DecodeResult,
  DeviceConnectedMessage,
  DeviceRemovedMessage,
  GetDevicesMessage,
  MessageEnvelope,
  MessageOf,
  MessageType,
  PassthroughAckMessage,
  PassthroughRequestMessage,
  ProtocolMessage,
  ResetMessage,
} from '../types/protocol.types'
import type { DeviceInfo, DeviceRecord, DeviceSnapshot, PassthroughStatus } from '../types/usb-device.types'

/**
 * Messages are value objects: once built they cannot be changed
 */
const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested)
    }
    Object.freeze(value)
  }
  return value
}

type PayloadResult<T> = Exclude<DecodeResult<T>, { status: 'mismatch' }>

const decodePayload = <K extends MessageType>(type: K, payload: unknown): PayloadResult<MessageOf<K>> => {
  const result = payloadSchemas[type].safeParse(payload)
  if (!result.success) {
    return { status: 'invalid', error: ValidationError.fromZod(type, result.error) }
  }
  const message: MessageOf<K> = { type, payload: result.data }
  return { status: 'ok', message: deepFreeze(message) }
}

/**
 * Validating constructor shared by every kind
 * @throws ValidationError
 */
const build = <K extends MessageType>(type: K, payload: unknown): MessageOf<K> => {
  const result = decodePayload(type, payload)
  if (result.status === 'invalid') {
    throw result.error
  }
  return result.message
}

export const isMessageType = (value: unknown): value is MessageType =>
  MESSAGE_TYPES.some((type) => type === value)

/**
 * Read the `type` tag of a decoded JSON object, if it has one
 */
export const getMessageType = (envelope: unknown): string | undefined => {
  if (!isRecord(envelope)) {
    return undefined
  }
  const { type } = envelope
  return typeof type === 'string' ? type : undefined
}

export const createGetDevices = (): GetDevicesMessage => build('get_devices', {})

export const createConnectedDevices = (devices: DeviceSnapshot): ConnectedDevicesMessage =>
  build('connected_devices', { devices })

export const createDeviceConnected = (device: DeviceRecord): DeviceConnectedMessage =>
  build('device_connected', { device })

export const createDeviceRemoved = (deviceId: string): DeviceRemovedMessage =>
  build('device_removed', { device_id: deviceId })

export const createPassthroughRequest = (deviceId: string, targetVm: string): PassthroughRequestMessage =>
  build('passthrough_request', { device_id: deviceId, target_vm: targetVm })

export const createPassthroughAck = (
  deviceId: string,
  currentVm: string | null,
  status: PassthroughStatus,
  reason?: string
): PassthroughAckMessage =>
  build('passthrough_ack', {
    device_id: deviceId,
    current_vm: currentVm,
    status,
    ...(reason !== undefined && { reason }),
  })

export const createReset = (): ResetMessage => build('reset', {})

const deviceInfoJson = (info: DeviceInfo) => ({
  vendor: info.vendor,
  product: info.product,
  permitted_vms: [...info.permitted_vms],
  current_vm: info.current_vm,
})

/**
 * Canonical wire envelope of a message.
 * Key order is fixed so the same message always encodes to the same bytes.
 */
export const toJson = (message: ProtocolMessage): MessageEnvelope => {
  switch (message.type) {
    case 'get_devices':
    case 'reset':
      return { type: message.type, payload: {} }
    case 'connected_devices': {
      const devices = Object.fromEntries(
        Object.entries(message.payload.devices).map(([deviceId, info]) => [deviceId, deviceInfoJson(info)] as const)
      )
      return { type: message.type, payload: { devices } }
    }
    case 'device_connected': {
      const { device } = message.payload
      return {
        type: message.type,
        payload: { device: { device_id: device.device_id, ...deviceInfoJson(device) } },
      }
    }
    case 'device_removed':
      return { type: message.type, payload: { device_id: message.payload.device_id } }
    case 'passthrough_request':
      return {
        type: message.type,
        payload: { device_id: message.payload.device_id, target_vm: message.payload.target_vm },
      }
    case 'passthrough_ack': {
      const { device_id, current_vm, status, reason } = message.payload
      return {
        type: message.type,
        payload: { device_id, current_vm, status, ...(reason !== undefined && { reason }) },
      }
    }
  }
}

/**
 * Decode an envelope as one specific kind.
 * Returns `mismatch` when it is another kind so callers can dispatch on `type` first.
 */
export const fromMessage = <K extends MessageType>(type: K, envelope: unknown): DecodeResult<MessageOf<K>> => {
  const actualType = getMessageType(envelope)
  if (actualType !== type || !isRecord(envelope)) {
    return { status: 'mismatch', type: actualType }
  }
  return decodePayload(type, envelope.payload ?? {})
}

const decoders: { [K in MessageType]: (envelope: unknown) => DecodeResult<MessageOf<K>> } = {
  get_devices: (envelope) => fromMessage('get_devices', envelope),
  connected_devices: (envelope) => fromMessage('connected_devices', envelope),
  device_connected: (envelope) => fromMessage('device_connected', envelope),
  device_removed: (envelope) => fromMessage('device_removed', envelope),
  passthrough_request: (envelope) => fromMessage('passthrough_request', envelope),
  passthrough_ack: (envelope) => fromMessage('passthrough_ack', envelope),
  reset: (envelope) => fromMessage('reset', envelope),
}

/**
 * Decode any envelope by its `type` tag; unknown kinds come back as `mismatch`
 */
export const decodeMessage = (envelope: unknown): DecodeResult<ProtocolMessage> => {
  const type = getMessageType(envelope)
  if (!isMessageType(type)) {
    return { status: 'mismatch', type }
  }
  return decoders[type](envelope)
}
