/**
 * USB device records tracked by the passthrough registry
 */

/**
 * Device fields as carried inside a `connected_devices` snapshot,
 * where the device id is the mapping key
 */
export interface DeviceInfo {
  /** Vendor name reported by the device */
  vendor: string
  /** Product name reported by the device */
  product: string
  /** VMs this device may be assigned to (order preserved, duplicates kept) */
  permitted_vms: string[]
  /** VM currently holding the device, null when unassigned */
  current_vm: string | null
}

/**
 * A full device record, keyed by `device_id`
 */
export interface DeviceRecord extends DeviceInfo {
  /** Stable device identifier (non-empty) */
  device_id: string
}

/**
 * Point-in-time copy of a registry: device id -> device fields
 */
export type DeviceSnapshot = Record<string, DeviceInfo>

/**
 * Result of a passthrough request as reported in an ack
 */
export type PassthroughStatus = 'ok' | 'denied' | 'error'
