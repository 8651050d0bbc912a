/**
 * Tests for the newline-delimited JSON codec
 *
 * Tests for:
 * - encodeFrame exact bytes
 * - sendMessage writes and failures
 * - receiveMessages under arbitrary chunking, empty lines, end of stream
 * - ProtocolError on malformed lines
 */

import { PassThrough } from 'stream';
import { ProtocolError, type JsonObject } from '@usb-bridge/shared';
import { encodeFrame, receiveMessages, sendMessage } from '../codec';
import { TransportError } from '../errors';
import { MemorySocket } from '../../__tests__/helpers/memory-transport';

async function* fromChunks(chunks: Array<Buffer | string>): AsyncGenerator<Buffer | string> {
  for (const chunk of chunks) {
    yield chunk;
  }
}

const splitEvery = (bytes: Buffer, size: number): Buffer[] => {
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < bytes.length; offset += size) {
    chunks.push(bytes.subarray(offset, offset + size));
  }
  return chunks;
};

const collect = async (chunks: Array<Buffer | string>): Promise<JsonObject[]> => {
  const messages: JsonObject[] = [];
  for await (const message of receiveMessages(fromChunks(chunks))) {
    messages.push(message);
  }
  return messages;
};

describe('encodeFrame', () => {
  it('should encode one compact JSON object terminated by a newline', () => {
    const frame = encodeFrame({ type: 'get_devices', payload: {} });

    expect(frame.toString('utf8')).toBe('{"type":"get_devices","payload":{}}\n');
  });

  it('should encode non-ASCII text as UTF-8', () => {
    const frame = encodeFrame({ name: 'é' });

    expect([...frame]).toEqual([...Buffer.from('{"name":"', 'utf8'), 0xc3, 0xa9, ...Buffer.from('"}\n', 'utf8')]);
  });
});

describe('sendMessage', () => {
  it('should write exactly the encoded frame', async () => {
    const stream = new PassThrough();

    await sendMessage(stream, { type: 'reset', payload: {} });

    expect(stream.read().toString('utf8')).toBe('{"type":"reset","payload":{}}\n');
  });

  it('should reject with TransportError when the stream is destroyed', async () => {
    const stream = new PassThrough();
    stream.destroy();

    await expect(sendMessage(stream, { type: 'reset', payload: {} })).rejects.toBeInstanceOf(TransportError);
  });

  it('should reject with TransportError when the write fails', async () => {
    const socket = new MemorySocket();
    socket.failWrites = true;
    const errors: Error[] = [];
    socket.on('error', (error) => errors.push(error));

    await expect(sendMessage(socket, { type: 'reset', payload: {} })).rejects.toThrow(
      'Write failed: EPIPE: broken pipe'
    );
  });
});

describe('receiveMessages', () => {
  const messages: JsonObject[] = [
    { type: 'device_removed', payload: { device_id: 'dev-1' } },
    { type: 'note', payload: { text: 'héllo ✓ wörld' } },
    { type: 'reset', payload: {} },
  ];
  const stream = Buffer.concat(messages.map((message) => encodeFrame(message)));

  it.each([1, 2, 3, 5, 7, 16])('should decode every message in order with %i-byte chunks', async (size) => {
    await expect(collect(splitEvery(stream, size))).resolves.toEqual(messages);
  });

  it('should decode a whole stream delivered in one chunk', async () => {
    await expect(collect([stream])).resolves.toEqual(messages);
  });

  it('should decode string chunks', async () => {
    await expect(collect(['{"a":1}\n{"b"', ':2}\n'])).resolves.toEqual([{ a: 1 }, { b: 2 }]);
  });

  it('should skip empty and whitespace-only lines', async () => {
    await expect(collect(['\n\n   \n{"a":1}\r\n\n'])).resolves.toEqual([{ a: 1 }]);
  });

  it('should discard a trailing partial line at end of stream', async () => {
    await expect(collect(['{"a":1}\n{"b":'])).resolves.toEqual([{ a: 1 }]);
  });

  it('should end without messages on an empty stream', async () => {
    await expect(collect([])).resolves.toEqual([]);
  });

  it('should yield earlier messages then throw ProtocolError on malformed JSON', async () => {
    const received: JsonObject[] = [];
    let caught: unknown;

    try {
      for await (const message of receiveMessages(fromChunks(['{"a":1}\nnot json\n{"b":2}\n']))) {
        received.push(message);
      }
    } catch (error) {
      caught = error;
    }

    expect(received).toEqual([{ a: 1 }]);
    expect(caught).toBeInstanceOf(ProtocolError);
    if (caught instanceof ProtocolError) {
      expect(caught.line).toBe('not json');
    }
  });

  it('should throw ProtocolError when a line is JSON but not an object', async () => {
    await expect(collect(['[1,2]\n'])).rejects.toThrow('Line is not a JSON object');
    await expect(collect(['null\n'])).rejects.toBeInstanceOf(ProtocolError);
    await expect(collect(['"text"\n'])).rejects.toBeInstanceOf(ProtocolError);
  });
});
