import type { ValidationError } from '../errors'
import type { DeviceRecord, DeviceSnapshot, PassthroughStatus } from './usb-device.types'

/**
 * Device passthrough protocol messages exchanged between host and guest
 */

/**
 * A decoded JSON object as produced by the framed codec
 */
export type JsonObject = { [key: string]: unknown }

/**
 * Wire envelope shared by every message kind
 */
export type MessageEnvelope<TType extends string = string, TPayload = JsonObject> = {
  type: TType
  payload: TPayload
}

/**
 * Payload of the kinds that carry nothing (`get_devices`, `reset`)
 */
export type EmptyPayload = Record<string, never>

export interface ConnectedDevicesPayload {
  devices: DeviceSnapshot
}

export interface DeviceConnectedPayload {
  device: DeviceRecord
}

export interface DeviceRemovedPayload {
  device_id: string
}

export interface PassthroughRequestPayload {
  device_id: string
  target_vm: string
}

export interface PassthroughAckPayload {
  device_id: string
  current_vm: string | null
  status: PassthroughStatus
  reason?: string
}

/**
 * Message kind -> payload shape
 */
export interface PayloadMap {
  /** Guest asks the host for a full registry snapshot */
  get_devices: EmptyPayload
  /** Host replies with its full registry */
  connected_devices: ConnectedDevicesPayload
  /** Host announces a newly attached device */
  device_connected: DeviceConnectedPayload
  /** Host announces a device is gone */
  device_removed: DeviceRemovedPayload
  /** Guest asks for a device to be moved to another VM */
  passthrough_request: PassthroughRequestPayload
  /** Host reports the outcome of a passthrough request */
  passthrough_ack: PassthroughAckPayload
  /** Host wiped its registry; the guest must clear its mirror */
  reset: EmptyPayload
}

export type MessageType = keyof PayloadMap

export type MessageOf<K extends MessageType> = MessageEnvelope<K, PayloadMap[K]>

/**
 * Closed union of every protocol message
 */
export type ProtocolMessage = { [K in MessageType]: MessageOf<K> }[MessageType]

export type GetDevicesMessage = MessageOf<'get_devices'>
export type ConnectedDevicesMessage = MessageOf<'connected_devices'>
export type DeviceConnectedMessage = MessageOf<'device_connected'>
export type DeviceRemovedMessage = MessageOf<'device_removed'>
export type PassthroughRequestMessage = MessageOf<'passthrough_request'>
export type PassthroughAckMessage = MessageOf<'passthrough_ack'>
export type ResetMessage = MessageOf<'reset'>

/**
 * Outcome of decoding an envelope as one particular kind
 * - mismatch: the envelope is another kind (or an unknown one)
 * - invalid: the envelope is this kind but fails validation
 */
export type DecodeResult<T> =
  | { status: 'ok'; message: T }
  | { status: 'mismatch'; type: string | undefined }
  | { status: 'invalid'; error: ValidationError }
