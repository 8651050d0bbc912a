import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { decodeMessage, type ProtocolMessage } from '@usb-bridge/shared';
import { errorMessage } from '../transport/errors';
import { FifoReader } from '../utils/fifo-reader';
import { hostLogger } from '../utils/logger';
import type { DeviceEventTarget } from './host-device-hub.service';

/**
 * Host device events arrive as protocol envelopes, one JSON object per line:
 * - device_connected: a device was plugged in
 * - device_removed: a device was unplugged
 * - passthrough_ack (status ok): the device was attached to `current_vm` outside the bridge
 * - reset: forget every device
 */
const parseEventLine = (line: string): ProtocolMessage | null => {
  let envelope: unknown;
  try {
    envelope = JSON.parse(line);
  } catch (error) {
    hostLogger.warn({ line, error: errorMessage(error) }, 'Malformed device event line');
    return null;
  }
  const result = decodeMessage(envelope);
  switch (result.status) {
    case 'ok':
      return result.message;
    case 'mismatch':
      hostLogger.warn({ type: result.type }, 'Unknown device event type');
      return null;
    case 'invalid':
      hostLogger.warn({ error: result.error.message, issues: result.error.issues }, 'Rejected invalid device event');
      return null;
  }
};

/**
 * Apply one decoded event; false when the event kind carries no device change
 */
export const applyDeviceEvent = async (event: ProtocolMessage, target: DeviceEventTarget): Promise<boolean> => {
  switch (event.type) {
    case 'device_connected':
      await target.notifyDeviceConnected(event.payload.device);
      return true;
    case 'device_removed':
      await target.notifyDeviceRemoved(event.payload.device_id);
      return true;
    case 'reset':
      await target.reset();
      return true;
    case 'passthrough_ack': {
      const { device_id: deviceId, current_vm: vm, status } = event.payload;
      if (status !== 'ok' || vm === null) {
        hostLogger.warn({ deviceId, status }, 'Ignoring passthrough event without a granted VM');
        return false;
      }
      await target.notifyDevicePassthrough(deviceId, vm);
      return true;
    }
    default:
      hostLogger.warn({ type: event.type }, 'Not a device event');
      return false;
  }
};

/**
 * Apply every well-formed event line of `input`.
 * Resolves with the number of events applied once the input ends.
 */
export const readDeviceEvents = async (input: Readable, target: DeviceEventTarget): Promise<number> => {
  const lines = createInterface({ input, crlfDelay: Infinity });
  let applied = 0;
  for await (const line of lines) {
    if (!line.trim()) {
      continue;
    }
    const event = parseEventLine(line);
    if (event && (await applyDeviceEvent(event, target))) {
      applied++;
    }
  }
  return applied;
};

/**
 * Reads device events the hotplug side writes to a FIFO
 */
export class DeviceEventReader extends FifoReader {
  constructor(fifoPath: string, target: DeviceEventTarget) {
    super(fifoPath, (input) => readDeviceEvents(input, target), hostLogger);
  }
}
