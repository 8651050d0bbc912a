import type { JsonObject } from '@usb-bridge/shared';
import type { PeerChannel, VsockAddress } from './vsock.types';

/**
 * Handle on one live server-side connection.
 * Protocol code sends and closes through it without touching the socket.
 */
export class ConnectionContext implements PeerChannel {
  readonly peerCid: number;
  readonly peerPort: number;

  constructor(
    peer: VsockAddress,
    private readonly sendFn: (message: JsonObject) => Promise<boolean>,
    private readonly closeFn: () => void
  ) {
    this.peerCid = peer.cid;
    this.peerPort = peer.port;
  }

  /**
   * Send one message to the peer; resolves true on success, never rejects.
   * No retry here: a peer that dropped is gone until it reconnects.
   */
  send(message: JsonObject): Promise<boolean> {
    return this.sendFn(message);
  }

  /**
   * Close this connection (idempotent)
   */
  close(): void {
    this.closeFn();
  }
}
