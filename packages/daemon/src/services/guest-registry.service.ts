import {
  createGetDevices,
  createPassthroughRequest,
  decodeMessage,
  toJson,
  ValidationError,
  type DeviceRecord,
  type DeviceSnapshot,
  type JsonObject,
  type PassthroughAckPayload,
  type PassthroughRequestMessage,
} from '@usb-bridge/shared';
import { errorMessage } from '../transport/errors';
import { VsockClient, type VsockClientOptions } from '../transport/vsock-client';
import type { VsockAddress, VsockTransport } from '../transport/vsock.types';
import { guestLogger } from '../utils/logger';
import { DeviceRegistry, isConsistent } from './device-registry';

export type PassthroughRequestFn = (deviceId: string, targetVm: string) => Promise<boolean>;

/**
 * User-facing surface of the guest: told about new devices and request outcomes.
 * `request` asks the host to move the device.
 */
export interface DeviceNotifier {
  notifyNewDevice(device: DeviceRecord, request: PassthroughRequestFn): void | Promise<void>;
  notifyPassthroughResult(ack: PassthroughAckPayload): void | Promise<void>;
}

export interface GuestRegistryServiceOptions {
  registry?: DeviceRegistry;
  notifier?: DeviceNotifier;
  client?: VsockClientOptions;
}

/**
 * Mirror side of the protocol: keeps a copy of the host registry up to date over a
 * reconnecting client and forwards passthrough requests to the host.
 */
export class GuestRegistryService {
  readonly registry: DeviceRegistry;
  private readonly notifier: DeviceNotifier | undefined;
  private readonly client: VsockClient;

  constructor(transport: VsockTransport, hostAddress: VsockAddress, options: GuestRegistryServiceOptions = {}) {
    this.registry = options.registry ?? new DeviceRegistry();
    this.notifier = options.notifier;
    this.client = new VsockClient(
      transport,
      hostAddress,
      {
        onMessage: (message) => this.handleMessage(message),
        onConnect: () => this.onConnect(),
        onDisconnect: () => {
          guestLogger.info('Disconnected from host');
        },
      },
      options.client
    );
  }

  isConnected(): boolean {
    return this.client.isConnected();
  }

  start(): void {
    this.client.start();
  }

  stop(): Promise<void> {
    return this.client.stop();
  }

  wait(): Promise<void> {
    return this.client.wait();
  }

  /**
   * Ask the host to move a device; resolves false when the request is invalid or cannot be sent
   */
  async requestPassthrough(deviceId: string, targetVm: string): Promise<boolean> {
    let message: PassthroughRequestMessage;
    try {
      message = createPassthroughRequest(deviceId, targetVm);
    } catch (error) {
      this.logRejected(error, 'Invalid passthrough request');
      return false;
    }
    guestLogger.info({ deviceId, targetVm }, 'Requesting passthrough');
    const sent = await this.client.send(toJson(message));
    if (!sent) {
      guestLogger.error({ deviceId, targetVm }, 'Passthrough request could not be sent');
    }
    return sent;
  }

  /**
   * Apply one decoded message from the host
   */
  async handleMessage(message: JsonObject): Promise<void> {
    const result = decodeMessage(message);
    if (result.status === 'mismatch') {
      guestLogger.error({ type: result.type }, 'Unknown message type');
      return;
    }
    if (result.status === 'invalid') {
      this.logRejected(result.error, 'Rejected invalid message');
      return;
    }

    const decoded = result.message;
    switch (decoded.type) {
      case 'device_connected':
        await this.applyDeviceConnected(decoded.payload.device);
        return;
      case 'device_removed':
        if (!this.registry.remove(decoded.payload.device_id)) {
          guestLogger.warn({ deviceId: decoded.payload.device_id }, 'Removal of unknown device ignored');
        }
        return;
      case 'connected_devices':
        this.applySnapshot(decoded.payload.devices);
        return;
      case 'passthrough_ack':
        await this.applyAck(decoded.payload);
        return;
      case 'reset':
        this.registry.clear();
        guestLogger.info('Registry reset by host');
        return;
      default:
        guestLogger.error({ type: decoded.type }, 'Unexpected message from host');
    }
  }

  private async onConnect(): Promise<void> {
    guestLogger.info('Connected to host, requesting device list');
    if (!(await this.client.send(toJson(createGetDevices())))) {
      guestLogger.error('Device list request could not be sent');
    }
  }

  private async applyDeviceConnected(device: DeviceRecord): Promise<void> {
    if (!this.registry.add(device)) {
      guestLogger.debug({ deviceId: device.device_id }, 'Device already known');
      return;
    }
    guestLogger.info({ deviceId: device.device_id }, 'New device');
    await this.notify('notifyNewDevice', (notifier) =>
      notifier.notifyNewDevice(device, (deviceId, targetVm) => this.requestPassthrough(deviceId, targetVm))
    );
  }

  /**
   * Snapshot entries assigned outside their permitted VMs are kept as the host sent them
   */
  private applySnapshot(devices: DeviceSnapshot): void {
    for (const [deviceId, info] of Object.entries(devices)) {
      if (!isConsistent(info)) {
        guestLogger.warn(
          { deviceId, currentVm: info.current_vm, permittedVms: info.permitted_vms },
          'Host reports device on a VM it is not permitted on'
        );
      }
    }
    this.registry.replace(devices);
    guestLogger.info({ devices: Object.keys(devices).length }, 'Device list received');
  }

  private async applyAck(ack: PassthroughAckPayload): Promise<void> {
    if (ack.status === 'ok') {
      if (!this.registry.has(ack.device_id)) {
        guestLogger.warn({ deviceId: ack.device_id }, 'Passthrough ack for unknown device');
      } else {
        this.registry.setCurrentVm(ack.device_id, ack.current_vm);
        guestLogger.info({ deviceId: ack.device_id, currentVm: ack.current_vm }, 'Passthrough done');
      }
    } else {
      guestLogger.warn(
        { deviceId: ack.device_id, status: ack.status, reason: ack.reason },
        'Passthrough refused by host'
      );
    }
    await this.notify('notifyPassthroughResult', (notifier) => notifier.notifyPassthroughResult(ack));
  }

  private async notify(name: string, call: (notifier: DeviceNotifier) => void | Promise<void>): Promise<void> {
    if (!this.notifier) {
      return;
    }
    try {
      await call(this.notifier);
    } catch (error) {
      guestLogger.error({ callback: name, error: errorMessage(error) }, 'Device notifier failed');
    }
  }

  private logRejected(error: unknown, msg: string): void {
    if (error instanceof ValidationError) {
      guestLogger.warn({ error: error.message, issues: error.issues }, msg);
      return;
    }
    guestLogger.error({ error: errorMessage(error) }, msg);
  }
}
