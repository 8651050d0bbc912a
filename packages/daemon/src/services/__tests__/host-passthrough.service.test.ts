/**
 * Tests for the authoritative host service
 *
 * Tests for:
 * - device notifications (connected, removed, reset, external passthrough)
 * - get_devices snapshots
 * - passthrough decisions: denial, success, no-op, unknown device, failed execution
 * - channel binding through connection contexts
 */

import type { DeviceRecord, JsonObject } from '@usb-bridge/shared';
import { ConnectionContext } from '../../transport/connection-context';
import type { PeerChannel } from '../../transport/vsock.types';
import { hostLogger } from '../../utils/logger';
import { HostPassthroughService, type PassthroughExecutor } from '../host-passthrough.service';

class RecordingChannel implements PeerChannel {
  readonly sent: JsonObject[] = [];
  result = true;

  async send(message: JsonObject): Promise<boolean> {
    this.sent.push(message);
    return this.result;
  }
}

const device = (overrides: Partial<DeviceRecord> = {}): DeviceRecord => ({
  device_id: 'dev-1',
  vendor: '1d6b',
  product: '0002',
  permitted_vms: ['vm-a', 'vm-b'],
  current_vm: 'vm-a',
  ...overrides,
});

const request = (deviceId: string, targetVm: string): JsonObject => ({
  type: 'passthrough_request',
  payload: { device_id: deviceId, target_vm: targetVm },
});

describe('HostPassthroughService', () => {
  let executor: jest.MockedFunction<PassthroughExecutor>;
  let channel: RecordingChannel;
  let service: HostPassthroughService;

  beforeEach(() => {
    executor = jest.fn<ReturnType<PassthroughExecutor>, Parameters<PassthroughExecutor>>(async () => true);
    channel = new RecordingChannel();
    service = new HostPassthroughService({ executor });
    service.bindChannel(channel);
  });

  describe('notifyDeviceConnected', () => {
    it('should register the device and announce it', async () => {
      await expect(service.notifyDeviceConnected(device())).resolves.toBe(true);

      expect(service.registry.get('dev-1')).toEqual(device());
      expect(channel.sent).toEqual([
        {
          type: 'device_connected',
          payload: {
            device: {
              device_id: 'dev-1',
              vendor: '1d6b',
              product: '0002',
              permitted_vms: ['vm-a', 'vm-b'],
              current_vm: 'vm-a',
            },
          },
        },
      ]);
    });

    it('should keep the first record and send nothing for a duplicate', async () => {
      await service.notifyDeviceConnected(device());

      await expect(service.notifyDeviceConnected(device({ vendor: 'ffff' }))).resolves.toBe(true);

      expect(channel.sent).toHaveLength(1);
      expect(service.registry.get('dev-1')?.vendor).toBe('1d6b');
    });

    it('should refuse an invalid device', async () => {
      await expect(service.notifyDeviceConnected(device({ device_id: '' }))).resolves.toBe(false);

      expect(service.registry.size).toBe(0);
      expect(channel.sent).toEqual([]);
    });

    it('should update the registry and succeed with no guest connected', async () => {
      service.bindChannel(null);

      await expect(service.notifyDeviceConnected(device())).resolves.toBe(true);
      expect(service.registry.has('dev-1')).toBe(true);
    });

    it('should report a failed send', async () => {
      channel.result = false;

      await expect(service.notifyDeviceConnected(device())).resolves.toBe(false);
      expect(service.registry.has('dev-1')).toBe(true);
    });
  });

  describe('notifyDeviceRemoved', () => {
    it('should report an unknown device without sending', async () => {
      await expect(service.notifyDeviceRemoved('dev-9')).resolves.toBe(false);
      expect(channel.sent).toEqual([]);
    });

    it('should remove the device and announce it', async () => {
      await service.notifyDeviceConnected(device());

      await expect(service.notifyDeviceRemoved('dev-1')).resolves.toBe(true);

      expect(service.registry.has('dev-1')).toBe(false);
      expect(channel.sent[1]).toEqual({ type: 'device_removed', payload: { device_id: 'dev-1' } });
    });
  });

  describe('reset', () => {
    it('should clear the registry so get_devices returns an empty mapping', async () => {
      await service.notifyDeviceConnected(device());

      await service.reset();
      await service.handleMessage({ type: 'get_devices', payload: {} });

      expect(service.registry.size).toBe(0);
      expect(channel.sent.slice(1)).toEqual([
        { type: 'reset', payload: {} },
        { type: 'connected_devices', payload: { devices: {} } },
      ]);
    });
  });

  describe('get_devices', () => {
    it('should reply with the full snapshot', async () => {
      await service.notifyDeviceConnected(device());
      await service.notifyDeviceConnected(device({ device_id: 'dev-2', current_vm: null, permitted_vms: [] }));

      await service.handleMessage({ type: 'get_devices' });

      expect(channel.sent[2]).toEqual({
        type: 'connected_devices',
        payload: {
          devices: {
            'dev-1': { vendor: '1d6b', product: '0002', permitted_vms: ['vm-a', 'vm-b'], current_vm: 'vm-a' },
            'dev-2': { vendor: '1d6b', product: '0002', permitted_vms: [], current_vm: null },
          },
        },
      });
    });
  });

  describe('passthrough_request', () => {
    beforeEach(async () => {
      await service.notifyDeviceConnected(device());
      channel.sent.length = 0;
    });

    it('should deny a VM outside the permitted list', async () => {
      await service.handleMessage(request('dev-1', 'vm-c'));

      expect(channel.sent).toEqual([
        {
          type: 'passthrough_ack',
          payload: {
            device_id: 'dev-1',
            current_vm: 'vm-a',
            status: 'denied',
            reason: 'VM vm-c is not permitted for this device',
          },
        },
      ]);
      expect(service.registry.get('dev-1')?.current_vm).toBe('vm-a');
      expect(executor).not.toHaveBeenCalled();
    });

    it('should execute and acknowledge a permitted move', async () => {
      await service.handleMessage(request('dev-1', 'vm-b'));

      expect(executor).toHaveBeenCalledWith(device(), 'vm-b');
      expect(channel.sent).toEqual([
        { type: 'passthrough_ack', payload: { device_id: 'dev-1', current_vm: 'vm-b', status: 'ok' } },
      ]);
      expect(service.registry.get('dev-1')?.current_vm).toBe('vm-b');
    });

    it('should acknowledge a move to the current VM without executing', async () => {
      await service.handleMessage(request('dev-1', 'vm-a'));

      expect(executor).not.toHaveBeenCalled();
      expect(channel.sent).toEqual([
        { type: 'passthrough_ack', payload: { device_id: 'dev-1', current_vm: 'vm-a', status: 'ok' } },
      ]);
    });

    it('should answer an unknown device with an error ack', async () => {
      const ack = await service.handlePassthroughRequest({ device_id: 'dev-9', target_vm: 'vm-a' });

      expect(ack?.payload).toEqual({ device_id: 'dev-9', current_vm: null, status: 'error', reason: 'device not found' });
      expect(channel.sent).toEqual([
        {
          type: 'passthrough_ack',
          payload: { device_id: 'dev-9', current_vm: null, status: 'error', reason: 'device not found' },
        },
      ]);
    });

    it('should send no ack and log a fatal error when execution fails', async () => {
      executor.mockResolvedValueOnce(false);

      const ack = await service.handlePassthroughRequest({ device_id: 'dev-1', target_vm: 'vm-b' });

      expect(ack).toBeNull();
      expect(channel.sent).toEqual([]);
      expect(service.registry.get('dev-1')?.current_vm).toBe('vm-b');
      expect(hostLogger.fatal).toHaveBeenCalledWith(
        { deviceId: 'dev-1', targetVm: 'vm-b', previousVm: 'vm-a' },
        'Passthrough failed after the registry was updated, service restart required'
      );
    });

    it('should treat a throwing executor as a failed execution', async () => {
      executor.mockRejectedValueOnce(new Error('usb busy'));

      await service.handleMessage(request('dev-1', 'vm-b'));

      expect(channel.sent).toEqual([]);
      expect(hostLogger.fatal).toHaveBeenCalledTimes(1);
    });

    it('should log a fatal error when the ack of an executed move cannot be sent', async () => {
      channel.result = false;

      await service.handleMessage(request('dev-1', 'vm-b'));

      expect(hostLogger.fatal).toHaveBeenCalledWith(
        { deviceId: 'dev-1', targetVm: 'vm-b' },
        'Passthrough ack could not be sent, service restart required'
      );
    });

    it('should reject a request missing its target', async () => {
      await service.handleMessage({ type: 'passthrough_request', payload: { device_id: 'dev-1' } });

      expect(channel.sent).toEqual([]);
      expect(hostLogger.warn).toHaveBeenCalledWith(
        {
          error: "Invalid 'passthrough_request' message: target_vm: target_vm is required",
          issues: [{ field: 'target_vm', message: 'target_vm is required' }],
        },
        'Rejected invalid message'
      );
    });
  });

  describe('notifyDevicePassthrough', () => {
    beforeEach(async () => {
      await service.notifyDeviceConnected(device());
      channel.sent.length = 0;
    });

    it('should record an external move and acknowledge it', async () => {
      await expect(service.notifyDevicePassthrough('dev-1', 'vm-b')).resolves.toBe(true);

      expect(executor).not.toHaveBeenCalled();
      expect(service.registry.get('dev-1')?.current_vm).toBe('vm-b');
      expect(channel.sent).toEqual([
        { type: 'passthrough_ack', payload: { device_id: 'dev-1', current_vm: 'vm-b', status: 'ok' } },
      ]);
    });

    it('should ignore a move to a VM the device is not permitted on', async () => {
      await expect(service.notifyDevicePassthrough('dev-1', 'vm-c')).resolves.toBe(false);
      expect(channel.sent).toEqual([]);
    });
  });

  describe('unexpected messages', () => {
    it('should log an unknown type', async () => {
      await service.handleMessage({ type: 'bogus', payload: {} });

      expect(channel.sent).toEqual([]);
      expect(hostLogger.error).toHaveBeenCalledWith({ type: 'bogus' }, 'Unknown message type');
    });

    it('should log a message kind the host does not accept', async () => {
      await service.handleMessage({ type: 'reset', payload: {} });

      expect(hostLogger.error).toHaveBeenCalledWith({ type: 'reset' }, 'Unexpected message from guest');
    });
  });

  describe('connection handling', () => {
    it('should only drop the channel of the connection that ended', async () => {
      const first = new ConnectionContext({ cid: 3, port: 1 }, async () => true, () => undefined);
      const second = new ConnectionContext({ cid: 3, port: 2 }, async () => true, () => undefined);

      service.onConnect(first);
      service.onConnect(second);
      service.onDisconnect(first);
      expect(service.isConnected()).toBe(true);

      service.onDisconnect(second);
      expect(service.isConnected()).toBe(false);
    });
  });
});
