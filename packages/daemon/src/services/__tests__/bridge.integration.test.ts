/**
 * Host and guest services talking over the in-memory transport
 *
 * Tests for:
 * - initial snapshot on connect
 * - convergence of the mirror under interleaved notifications
 * - passthrough round trip
 * - reset propagation
 */

import { isDeepStrictEqual } from 'util';
import type { DeviceRecord } from '@usb-bridge/shared';
import { VsockServer } from '../../transport/vsock-server';
import { GuestRegistryService } from '../guest-registry.service';
import { HostPassthroughService } from '../host-passthrough.service';
import { MemoryTransport, waitFor } from '../../__tests__/helpers/memory-transport';

const HOST_ADDRESS = { cid: 2, port: 7000 };
const GUEST_CID = 3;

const device = (deviceId: string, overrides: Partial<DeviceRecord> = {}): DeviceRecord => ({
  device_id: deviceId,
  vendor: '1d6b',
  product: '0002',
  permitted_vms: ['vm-a', 'vm-b'],
  current_vm: 'vm-a',
  ...overrides,
});

describe('host/guest bridge', () => {
  let transport: MemoryTransport;
  let executor: jest.Mock<Promise<boolean>, [DeviceRecord, string]>;
  let host: HostPassthroughService;
  let server: VsockServer;
  let guest: GuestRegistryService;

  const mirrored = () => isDeepStrictEqual(guest.registry.snapshot(), host.registry.snapshot());

  beforeEach(async () => {
    transport = new MemoryTransport(GUEST_CID);
    executor = jest.fn<Promise<boolean>, [DeviceRecord, string]>(async () => true);
    host = new HostPassthroughService({ executor });
    server = new VsockServer(transport, HOST_ADDRESS, { shutdownTimeoutMs: 100 });
    server.registerHandler(GUEST_CID, host);
    await server.start();
    guest = new GuestRegistryService(transport, HOST_ADDRESS, {
      client: { retryIntervalMs: 5, stopGraceMs: 0 },
    });
  });

  afterEach(async () => {
    await guest.stop();
    await server.stop();
  });

  it('should fetch the host registry when the guest connects', async () => {
    await host.notifyDeviceConnected(device('dev-1'));
    await host.notifyDeviceConnected(device('dev-2', { current_vm: null }));

    guest.start();
    await waitFor(() => guest.registry.size === 2);

    expect(guest.registry.snapshot()).toEqual(host.registry.snapshot());
  });

  it('should converge whatever order interleaved notifications are sent in', async () => {
    await host.notifyDeviceConnected(device('dev-1'));
    guest.start();
    await waitFor(() => guest.registry.size === 1);

    await Promise.all([
      host.notifyDeviceConnected(device('dev-2')),
      host.notifyDeviceConnected(device('dev-3', { permitted_vms: ['vm-b'], current_vm: 'vm-b' })),
      host.notifyDeviceRemoved('dev-1'),
      host.notifyDevicePassthrough('dev-2', 'vm-b'),
    ]);
    await waitFor(mirrored);

    expect(Object.keys(guest.registry.snapshot()).sort()).toEqual(['dev-2', 'dev-3']);
    expect(guest.registry.get('dev-2')?.current_vm).toBe('vm-b');
  });

  it('should carry a passthrough request to the host and the ack back', async () => {
    await host.notifyDeviceConnected(device('dev-1'));
    guest.start();
    await waitFor(() => guest.registry.size === 1);

    await expect(guest.requestPassthrough('dev-1', 'vm-b')).resolves.toBe(true);
    await waitFor(() => guest.registry.get('dev-1')?.current_vm === 'vm-b');

    expect(executor).toHaveBeenCalledTimes(1);
    expect(host.registry.get('dev-1')?.current_vm).toBe('vm-b');
  });

  it('should leave both sides unchanged on a denied request', async () => {
    const notifyPassthroughResult = jest.fn();
    guest = new GuestRegistryService(transport, HOST_ADDRESS, {
      client: { retryIntervalMs: 5, stopGraceMs: 0 },
      notifier: { notifyNewDevice: jest.fn(), notifyPassthroughResult },
    });
    await host.notifyDeviceConnected(device('dev-1'));
    guest.start();
    await waitFor(() => guest.registry.size === 1);

    await guest.requestPassthrough('dev-1', 'vm-c');
    await waitFor(() => notifyPassthroughResult.mock.calls.length === 1);

    expect(notifyPassthroughResult).toHaveBeenCalledWith({
      device_id: 'dev-1',
      current_vm: 'vm-a',
      status: 'denied',
      reason: 'VM vm-c is not permitted for this device',
    });
    expect(guest.registry.get('dev-1')?.current_vm).toBe('vm-a');
    expect(executor).not.toHaveBeenCalled();
  });

  it('should clear the mirror on reset', async () => {
    await host.notifyDeviceConnected(device('dev-1'));
    guest.start();
    await waitFor(() => guest.registry.size === 1);

    await host.reset();
    await waitFor(() => guest.registry.size === 0);

    expect(host.registry.size).toBe(0);
  });
});
