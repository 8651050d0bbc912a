/**
 * Socket-level failure: a write that did not flush, a stream that is gone, a refused connect.
 * Absorbed by the transport layer (reconnect, worker teardown, a `false` send result).
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * Best-effort error message for logging
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
