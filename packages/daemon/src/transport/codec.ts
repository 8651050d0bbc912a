import type { Writable } from 'stream';
import { ProtocolError, isRecord, type JsonObject } from '@usb-bridge/shared';
import { TransportError, errorMessage } from './errors';

/**
 * Newline-delimited JSON framing: one compact JSON object per line, UTF-8, `\n` terminated.
 */

const NEWLINE = 0x0a;

/**
 * Exact bytes written for one message
 */
export const encodeFrame = (message: JsonObject): Buffer =>
  Buffer.from(`${JSON.stringify(message)}\n`, 'utf8');

/**
 * Write one framed message and resolve once the stream reports it flushed.
 * @throws TransportError when the stream is gone or the write fails
 */
export const sendMessage = async (stream: Writable, message: JsonObject): Promise<void> => {
  if (stream.destroyed || !stream.writable) {
    throw new TransportError('Stream is not writable');
  }
  const frame = encodeFrame(message);
  await new Promise<void>((resolve, reject) => {
    stream.write(frame, (error) => {
      if (error) {
        reject(new TransportError(`Write failed: ${errorMessage(error)}`, { cause: error }));
        return;
      }
      resolve();
    });
  });
};

const parseLine = (line: string): JsonObject => {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    throw new ProtocolError(`Malformed JSON line: ${errorMessage(error)}`, line);
  }
  if (!isRecord(value)) {
    throw new ProtocolError('Line is not a JSON object', line);
  }
  return value;
};

/**
 * Lazily decode the messages of a byte stream.
 * Chunks may split lines anywhere (including inside a multi-byte character); empty lines are skipped.
 * Ends when the stream ends; a malformed line throws ProtocolError and ends the sequence.
 */
export async function* receiveMessages(
  stream: AsyncIterable<Uint8Array | string>
): AsyncGenerator<JsonObject, void, undefined> {
  let buffer = Buffer.alloc(0);

  for await (const chunk of stream) {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    buffer = Buffer.concat([buffer, bytes]);

    let newline = buffer.indexOf(NEWLINE);
    while (newline !== -1) {
      const line = buffer.subarray(0, newline).toString('utf8').trim();
      buffer = buffer.subarray(newline + 1);
      if (line) {
        yield parseLine(line);
      }
      newline = buffer.indexOf(NEWLINE);
    }
  }
}
