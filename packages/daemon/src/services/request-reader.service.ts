import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { FifoReader } from '../utils/fifo-reader';
import { guestLogger } from '../utils/logger';
import type { PassthroughRequestFn } from './guest-registry.service';

const SEPARATOR = '->';

export interface PassthroughRequestLine {
  deviceId: string;
  targetVm: string;
}

/**
 * Parse one `device_id->vm` line; null when malformed
 */
export const parsePassthroughRequestLine = (line: string): PassthroughRequestLine | null => {
  const separator = line.indexOf(SEPARATOR);
  if (separator === -1) {
    return null;
  }
  const deviceId = line.slice(0, separator).trim();
  const targetVm = line.slice(separator + SEPARATOR.length).trim();
  if (!deviceId || !targetVm) {
    return null;
  }
  return { deviceId, targetVm };
};

/**
 * Forward every well-formed line of `input` as a passthrough request.
 * Resolves with the number of requests forwarded once the input ends.
 */
export const readPassthroughRequests = async (input: Readable, request: PassthroughRequestFn): Promise<number> => {
  const lines = createInterface({ input, crlfDelay: Infinity });
  let forwarded = 0;
  for await (const line of lines) {
    if (!line.trim()) {
      continue;
    }
    const parsed = parsePassthroughRequestLine(line);
    if (!parsed) {
      guestLogger.warn({ line }, 'Malformed passthrough request line');
      continue;
    }
    await request(parsed.deviceId, parsed.targetVm);
    forwarded++;
  }
  return forwarded;
};

/**
 * Reads requests the desktop app writes to a FIFO
 */
export class PassthroughRequestReader extends FifoReader {
  constructor(fifoPath: string, request: PassthroughRequestFn) {
    super(fifoPath, (input) => readPassthroughRequests(input, request), guestLogger);
  }
}
