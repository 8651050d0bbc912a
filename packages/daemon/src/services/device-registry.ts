import type { DeviceInfo, DeviceRecord, DeviceSnapshot } from '@usb-bridge/shared';
import { registryLogger } from '../utils/logger';

/**
 * Outcome of a passthrough assignment
 * - not_found: no device with that id
 * - denied: the target VM is not in the device's permitted list
 * - unchanged: the device is already on the target VM
 * - assigned: current_vm moved to the target; `previous` is the record before the move
 */
export type AssignResult =
  | { status: 'not_found' }
  | { status: 'denied'; device: DeviceRecord }
  | { status: 'unchanged'; device: DeviceRecord }
  | { status: 'assigned'; device: DeviceRecord; previous: DeviceRecord };

export type RegistryChangeListener = (snapshot: DeviceSnapshot) => void;

const copyInfo = (info: DeviceInfo): DeviceInfo => ({
  vendor: info.vendor,
  product: info.product,
  permitted_vms: [...info.permitted_vms],
  current_vm: info.current_vm,
});

const toRecord = (deviceId: string, info: DeviceInfo): DeviceRecord => ({ device_id: deviceId, ...copyInfo(info) });

/**
 * A device is consistent when it is unassigned or assigned to one of its permitted VMs
 */
export const isConsistent = (info: DeviceInfo): boolean =>
  info.current_vm === null || info.permitted_vms.includes(info.current_vm);

/**
 * In-memory device registry, keyed by device id.
 *
 * Every mutation runs synchronously, so within one event-loop turn it is applied whole:
 * a reader never observes a half-applied change. Values handed out are copies.
 */
export class DeviceRegistry {
  private readonly devices = new Map<string, DeviceInfo>();
  private readonly listeners = new Set<RegistryChangeListener>();

  get size(): number {
    return this.devices.size;
  }

  has(deviceId: string): boolean {
    return this.devices.has(deviceId);
  }

  get(deviceId: string): DeviceRecord | undefined {
    const info = this.devices.get(deviceId);
    return info ? toRecord(deviceId, info) : undefined;
  }

  /**
   * Copy of the whole registry
   */
  snapshot(): DeviceSnapshot {
    return Object.fromEntries(
      Array.from(this.devices, ([deviceId, info]): [string, DeviceInfo] => [deviceId, copyInfo(info)])
    );
  }

  /**
   * Insert a device. Idempotent: returns false and keeps the stored record when the id exists.
   */
  add(device: DeviceRecord): boolean {
    if (this.devices.has(device.device_id)) {
      return false;
    }
    this.devices.set(device.device_id, copyInfo(device));
    this.emitChange();
    return true;
  }

  /**
   * Remove a device; false when it was not present
   */
  remove(deviceId: string): boolean {
    if (!this.devices.delete(deviceId)) {
      return false;
    }
    this.emitChange();
    return true;
  }

  /**
   * Move a device to `targetVm` if that VM is permitted
   */
  assign(deviceId: string, targetVm: string): AssignResult {
    const info = this.devices.get(deviceId);
    if (!info) {
      return { status: 'not_found' };
    }
    if (!info.permitted_vms.includes(targetVm)) {
      return { status: 'denied', device: toRecord(deviceId, info) };
    }
    if (info.current_vm === targetVm) {
      return { status: 'unchanged', device: toRecord(deviceId, info) };
    }
    const previous = toRecord(deviceId, info);
    const updated: DeviceInfo = { ...copyInfo(info), current_vm: targetVm };
    this.devices.set(deviceId, updated);
    this.emitChange();
    return { status: 'assigned', device: toRecord(deviceId, updated), previous };
  }

  /**
   * Record the VM a device is on without a permission check (the authority already decided).
   * Returns false when the device is unknown or nothing changed.
   */
  setCurrentVm(deviceId: string, currentVm: string | null): boolean {
    const info = this.devices.get(deviceId);
    if (!info || info.current_vm === currentVm) {
      return false;
    }
    this.devices.set(deviceId, { ...copyInfo(info), current_vm: currentVm });
    this.emitChange();
    return true;
  }

  /**
   * Replace the whole content with `snapshot`
   */
  replace(snapshot: DeviceSnapshot): void {
    this.devices.clear();
    for (const [deviceId, info] of Object.entries(snapshot)) {
      this.devices.set(deviceId, copyInfo(info));
    }
    this.emitChange();
  }

  clear(): void {
    this.devices.clear();
    this.emitChange();
  }

  /**
   * Subscribe to changes; each listener receives a fresh snapshot after every mutation.
   * Returns the unsubscribe function.
   */
  onChange(listener: RegistryChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emitChange(): void {
    if (this.listeners.size === 0) {
      return;
    }
    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        registryLogger.error(
          { error: error instanceof Error ? error.message : String(error) },
          'Registry change listener failed'
        );
      }
    }
  }
}
