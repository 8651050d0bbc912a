import type { DeviceRecord, ProtocolMessage } from '@usb-bridge/shared';
import { hostLogger } from '../utils/logger';
import { DeviceRegistry } from './device-registry';
import { HostPassthroughService, type PassthroughExecutor } from './host-passthrough.service';

export interface HostDeviceHubOptions {
  executor: PassthroughExecutor;
  registry?: DeviceRegistry;
}

/**
 * Device changes reported by the host side (hotplug events, an external attach)
 */
export interface DeviceEventTarget {
  notifyDeviceConnected(device: DeviceRecord): Promise<boolean>;
  notifyDeviceRemoved(deviceId: string): Promise<boolean>;
  notifyDevicePassthrough(deviceId: string, vm: string): Promise<boolean>;
  reset(): Promise<boolean>;
}

/**
 * One authoritative registry shared by the services of every guest cid.
 * Device events go through the hub and reach every connected guest; a granted
 * request is acked to the requesting guest and announced to the others.
 */
export class HostDeviceHub implements DeviceEventTarget {
  readonly registry: DeviceRegistry;
  private readonly executor: PassthroughExecutor;
  private readonly guests = new Map<number, HostPassthroughService>();
  // Applies host-side events; has no guest of its own
  private readonly local: HostPassthroughService;

  constructor(options: HostDeviceHubOptions) {
    this.registry = options.registry ?? new DeviceRegistry();
    this.executor = options.executor;
    this.local = this.createService();
  }

  get guestCids(): number[] {
    return Array.from(this.guests.keys());
  }

  /**
   * Handler for one guest cid, created on first use
   */
  serviceFor(guestCid: number): HostPassthroughService {
    const existing = this.guests.get(guestCid);
    if (existing) {
      return existing;
    }
    const service = this.createService();
    this.guests.set(guestCid, service);
    return service;
  }

  notifyDeviceConnected(device: DeviceRecord): Promise<boolean> {
    return this.local.notifyDeviceConnected(device);
  }

  notifyDeviceRemoved(deviceId: string): Promise<boolean> {
    return this.local.notifyDeviceRemoved(deviceId);
  }

  notifyDevicePassthrough(deviceId: string, vm: string): Promise<boolean> {
    return this.local.notifyDevicePassthrough(deviceId, vm);
  }

  reset(): Promise<boolean> {
    return this.local.reset();
  }

  private createService(): HostPassthroughService {
    return new HostPassthroughService({
      executor: this.executor,
      registry: this.registry,
      broadcast: (message, exclude) => this.broadcast(message, exclude),
    });
  }

  private async broadcast(message: ProtocolMessage, exclude: HostPassthroughService | null): Promise<boolean> {
    const targets = Array.from(this.guests.values()).filter((service) => service !== exclude);
    const results = await Promise.all(targets.map((service) => service.deliver(message)));
    const delivered = results.every(Boolean);
    if (!delivered) {
      hostLogger.warn({ type: message.type, guests: targets.length }, 'Message did not reach every guest');
    }
    return delivered;
  }
}
