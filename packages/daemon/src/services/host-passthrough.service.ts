import {
  createConnectedDevices,
  createDeviceConnected,
  createDeviceRemoved,
  createPassthroughAck,
  createReset,
  decodeMessage,
  toJson,
  ValidationError,
  type DeviceConnectedMessage,
  type DeviceRecord,
  type JsonObject,
  type PassthroughAckMessage,
  type PassthroughRequestPayload,
  type ProtocolMessage,
} from '@usb-bridge/shared';
import type { ConnectionContext } from '../transport/connection-context';
import { errorMessage } from '../transport/errors';
import type { PeerChannel, VsockConnectionHandler } from '../transport/vsock.types';
import { hostLogger } from '../utils/logger';
import { DeviceRegistry, type AssignResult } from './device-registry';

/**
 * Carries out the actual attach of `device` (as it was before the move) to `targetVm`.
 * Resolves true on success.
 */
export type PassthroughExecutor = (device: DeviceRecord, targetVm: string) => boolean | Promise<boolean>;

/**
 * Sends a state change to every guest sharing the registry except `exclude`.
 * Resolves false when any guest could not be reached.
 */
export type BroadcastFn = (message: ProtocolMessage, exclude: HostPassthroughService | null) => Promise<boolean>;

export interface HostPassthroughServiceOptions {
  executor: PassthroughExecutor;
  registry?: DeviceRegistry;
  /** Set when several guests share one registry; state changes then reach all of them */
  broadcast?: BroadcastFn;
}

/**
 * Authoritative side of the protocol: owns the registry, decides passthrough requests
 * and keeps the connected guest informed.
 */
export class HostPassthroughService implements VsockConnectionHandler {
  readonly registry: DeviceRegistry;
  private readonly executor: PassthroughExecutor;
  private readonly broadcast: BroadcastFn | null;
  private channel: PeerChannel | null = null;

  constructor(options: HostPassthroughServiceOptions) {
    this.registry = options.registry ?? new DeviceRegistry();
    this.executor = options.executor;
    this.broadcast = options.broadcast ?? null;
  }

  isConnected(): boolean {
    return this.channel !== null;
  }

  /**
   * Use an outbound channel (host-as-client topology) instead of an accepted connection
   */
  bindChannel(channel: PeerChannel | null): void {
    this.channel = channel;
  }

  onConnect(ctx: ConnectionContext): void {
    hostLogger.info({ peerCid: ctx.peerCid, peerPort: ctx.peerPort }, 'Guest connected');
    this.channel = ctx;
  }

  onMessage(message: JsonObject): Promise<void> {
    return this.handleMessage(message);
  }

  onDisconnect(ctx: ConnectionContext): void {
    hostLogger.info({ peerCid: ctx.peerCid, peerPort: ctx.peerPort }, 'Guest disconnected');
    // A replacing connection may already have taken over
    if (this.channel === ctx) {
      this.channel = null;
    }
  }

  /**
   * Register a newly attached device and announce it
   */
  async notifyDeviceConnected(device: DeviceRecord): Promise<boolean> {
    let message: DeviceConnectedMessage;
    try {
      message = createDeviceConnected(device);
    } catch (error) {
      this.logRejected(error, 'Refusing to register invalid device');
      return false;
    }
    if (!this.registry.add(message.payload.device)) {
      hostLogger.info({ deviceId: device.device_id }, 'Device already registered');
      return true;
    }
    hostLogger.info({ deviceId: device.device_id }, 'Device connected');
    return this.publish(message);
  }

  async notifyDeviceRemoved(deviceId: string): Promise<boolean> {
    if (!this.registry.remove(deviceId)) {
      hostLogger.warn({ deviceId }, 'Removal of unknown device ignored');
      return false;
    }
    hostLogger.info({ deviceId }, 'Device removed');
    return this.publish(createDeviceRemoved(deviceId));
  }

  /**
   * Forget every device and tell the guest to do the same
   */
  async reset(): Promise<boolean> {
    this.registry.clear();
    hostLogger.info('Registry reset');
    return this.publish(createReset());
  }

  /**
   * Record a passthrough an external actor already carried out and report it to the guest
   */
  async notifyDevicePassthrough(deviceId: string, vm: string): Promise<boolean> {
    const result = this.registry.assign(deviceId, vm);
    switch (result.status) {
      case 'not_found':
        hostLogger.warn({ deviceId, vm }, 'Passthrough reported for unknown device');
        return false;
      case 'denied':
        hostLogger.warn({ deviceId, vm }, 'Passthrough reported to a VM the device is not permitted on');
        return false;
      case 'unchanged':
      case 'assigned':
        return this.publish(createPassthroughAck(deviceId, vm, 'ok'));
    }
  }

  /**
   * Dispatch one decoded message from the guest
   */
  async handleMessage(message: JsonObject): Promise<void> {
    const result = decodeMessage(message);
    if (result.status === 'mismatch') {
      hostLogger.error({ type: result.type }, 'Unknown message type');
      return;
    }
    if (result.status === 'invalid') {
      this.logRejected(result.error, 'Rejected invalid message');
      return;
    }

    const decoded = result.message;
    switch (decoded.type) {
      case 'get_devices':
        await this.sendSnapshot();
        return;
      case 'passthrough_request':
        await this.handlePassthroughRequest(decoded.payload);
        return;
      default:
        hostLogger.error({ type: decoded.type }, 'Unexpected message from guest');
    }
  }

  /**
   * Decide one request and send exactly one ack, unless the execution failed after the
   * registry was updated. Returns the ack that was sent.
   */
  async handlePassthroughRequest(request: PassthroughRequestPayload): Promise<PassthroughAckMessage | null> {
    const { device_id: deviceId, target_vm: targetVm } = request;
    const result = this.registry.assign(deviceId, targetVm);
    const ack = await this.decide(deviceId, targetVm, result);
    if (!ack) {
      return null;
    }
    if (!(await this.deliver(ack)) && result.status === 'assigned') {
      hostLogger.fatal({ deviceId, targetVm }, 'Passthrough ack could not be sent, service restart required');
    }
    if (result.status === 'assigned' && this.broadcast) {
      await this.broadcast(ack, this);
    }
    return ack;
  }

  private async decide(deviceId: string, targetVm: string, result: AssignResult): Promise<PassthroughAckMessage | null> {
    switch (result.status) {
      case 'not_found':
        hostLogger.warn({ deviceId, targetVm }, 'Passthrough requested for unknown device');
        return createPassthroughAck(deviceId, null, 'error', 'device not found');
      case 'denied':
        hostLogger.warn({ deviceId, targetVm }, 'Passthrough denied');
        return createPassthroughAck(
          deviceId,
          result.device.current_vm,
          'denied',
          `VM ${targetVm} is not permitted for this device`
        );
      case 'unchanged':
        return createPassthroughAck(deviceId, targetVm, 'ok');
      case 'assigned': {
        const previousVm = result.previous.current_vm;
        if (!(await this.execute(result.previous, targetVm))) {
          hostLogger.fatal(
            { deviceId, targetVm, previousVm },
            'Passthrough failed after the registry was updated, service restart required'
          );
          return null;
        }
        hostLogger.info({ deviceId, targetVm, previousVm }, 'Passthrough granted');
        return createPassthroughAck(deviceId, targetVm, 'ok');
      }
    }
  }

  private async sendSnapshot(): Promise<void> {
    const snapshot = this.registry.snapshot();
    if (!(await this.deliver(createConnectedDevices(snapshot)))) {
      hostLogger.error('Device snapshot could not be sent');
    }
  }

  private async execute(device: DeviceRecord, targetVm: string): Promise<boolean> {
    try {
      return await this.executor(device, targetVm);
    } catch (error) {
      hostLogger.error({ deviceId: device.device_id, targetVm, error: errorMessage(error) }, 'Passthrough executor threw');
      return false;
    }
  }

  private publish(message: ProtocolMessage): Promise<boolean> {
    return this.broadcast ? this.broadcast(message, null) : this.deliver(message);
  }

  /**
   * Send through the current channel. With no guest connected the state change stands:
   * the guest catches up with `get_devices` when it connects.
   */
  async deliver(message: ProtocolMessage): Promise<boolean> {
    const channel = this.channel;
    if (!channel) {
      hostLogger.debug({ type: message.type }, 'No guest connected, message not sent');
      return true;
    }
    const sent = await channel.send(toJson(message));
    if (!sent) {
      hostLogger.error({ type: message.type }, 'Failed to send message to guest');
    }
    return sent;
  }

  private logRejected(error: unknown, msg: string): void {
    if (error instanceof ValidationError) {
      hostLogger.warn({ error: error.message, issues: error.issues }, msg);
      return;
    }
    hostLogger.error({ error: errorMessage(error) }, msg);
  }
}
