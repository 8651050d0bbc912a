import { z } from 'zod'
import { PASSTHROUGH_STATUSES } from '../constants'
import type { DeviceInfo, DeviceRecord } from '../types/usb-device.types'
import type { EmptyPayload, MessageType, PayloadMap } from '../types/protocol.types'

/**
 * Keys older peers wrote with hyphens, mapped to their current spelling
 */
const LEGACY_KEYS: ReadonlyArray<[legacy: string, current: string]> = [
  ['permitted-vms', 'permitted_vms'],
  ['current-vm', 'current_vm'],
]

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const withLegacyKeys = (value: unknown): unknown => {
  if (!isRecord(value)) {
    return value
  }
  const normalized: Record<string, unknown> = { ...value }
  for (const [legacy, current] of LEGACY_KEYS) {
    if (!(current in normalized) && legacy in normalized) {
      normalized[current] = normalized[legacy]
    }
    delete normalized[legacy]
  }
  return normalized
}

const requiredString = (field: string) =>
  z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .min(1, `${field} must be a non-empty string`)

/**
 * A VM name: any non-empty string
 */
export const vmNameSchema = requiredString('VM name')

/**
 * Absent, null, or a non-empty VM name; absent reads as null (unassigned)
 */
export const currentVmSchema = requiredString('current_vm')
  .nullable()
  .optional()
  .transform((vm) => vm ?? null)

const deviceFields = {
  vendor: requiredString('vendor'),
  product: requiredString('product'),
  permitted_vms: z
    .array(vmNameSchema, { invalid_type_error: 'permitted_vms must be a list of VM names' })
    .default([]),
  current_vm: currentVmSchema,
}

/**
 * Device fields inside a snapshot entry
 */
export const deviceInfoSchema: z.ZodType<DeviceInfo, z.ZodTypeDef, unknown> = z.preprocess(
  withLegacyKeys,
  z.object(deviceFields, { invalid_type_error: 'device must be an object' })
)

/**
 * A full device record
 */
export const deviceRecordSchema: z.ZodType<DeviceRecord, z.ZodTypeDef, unknown> = z.preprocess(
  withLegacyKeys,
  z.object(
    { device_id: requiredString('device_id'), ...deviceFields },
    { invalid_type_error: 'device must be an object', required_error: 'device is required' }
  )
)

/**
 * Any payload key is rejected, so a confused peer is noticed instead of silently accepted
 */
const emptyPayloadSchema = (type: MessageType): z.ZodType<EmptyPayload, z.ZodTypeDef, unknown> =>
  z.record(z.never({ invalid_type_error: `'${type}' payload must be empty` }), {
    invalid_type_error: 'payload must be an object',
  })

/**
 * Payload schema for every message kind, used as the decode dispatch table
 */
export const payloadSchemas: { [K in MessageType]: z.ZodType<PayloadMap[K], z.ZodTypeDef, unknown> } = {
  get_devices: emptyPayloadSchema('get_devices'),
  connected_devices: z.object(
    {
      devices: z.record(z.string().min(1, 'device id must be a non-empty string'), deviceInfoSchema, {
        required_error: 'devices is required',
        invalid_type_error: 'devices must be an object keyed by device id',
      }),
    },
    { invalid_type_error: 'payload must be an object' }
  ),
  device_connected: z.object(
    { device: deviceRecordSchema },
    { invalid_type_error: 'payload must be an object' }
  ),
  device_removed: z.object(
    { device_id: requiredString('device_id') },
    { invalid_type_error: 'payload must be an object' }
  ),
  passthrough_request: z.object(
    {
      device_id: requiredString('device_id'),
      target_vm: requiredString('target_vm'),
    },
    { invalid_type_error: 'payload must be an object' }
  ),
  passthrough_ack: z.preprocess(
    withLegacyKeys,
    z.object(
      {
        device_id: requiredString('device_id'),
        current_vm: currentVmSchema,
        status: z
          .enum(PASSTHROUGH_STATUSES, {
            errorMap: () => ({ message: `status must be one of ${PASSTHROUGH_STATUSES.join(', ')}` }),
          })
          .default('ok'),
        reason: requiredString('reason').optional(),
      },
      { invalid_type_error: 'payload must be an object' }
    )
  ),
  reset: emptyPayloadSchema('reset'),
}

