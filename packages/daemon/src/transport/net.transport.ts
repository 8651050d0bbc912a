import net from 'net';
import type { Duplex } from 'stream';
import { transportLogger } from '../utils/logger';
import { TransportError, errorMessage } from './errors';
import {
  UNKNOWN_CID,
  formatAddress,
  type ConnectionListener,
  type VsockAddress,
  type VsockListener,
  type VsockTransport,
} from './vsock.types';

/**
 * cid -> host name or IP the peer with that cid is reachable at
 */
export type PeerTable = ReadonlyMap<number, string>;

const normalizeHost = (host: string | undefined): string => {
  if (!host) {
    return '';
  }
  return host.startsWith('::ffff:') ? host.slice('::ffff:'.length) : host;
};

/**
 * VSOCK addressing carried over TCP.
 *
 * Node has no AF_VSOCK sockets, so each cid is mapped to a host through the peer table;
 * an inbound connection is identified by looking its remote address up in that table.
 * Listening binds `bindHost` on the requested port, whatever cid is asked for.
 */
export class NetTransport implements VsockTransport {
  constructor(
    private readonly peers: PeerTable,
    private readonly bindHost = '0.0.0.0'
  ) {}

  /**
   * cid of the peer at `host`, or UNKNOWN_CID when the table has no entry for it
   */
  resolveCid(host: string | undefined): number {
    const normalized = normalizeHost(host);
    for (const [cid, peerHost] of this.peers) {
      if (normalizeHost(peerHost) === normalized) {
        return cid;
      }
    }
    return UNKNOWN_CID;
  }

  listen(address: VsockAddress, onConnection: ConnectionListener, backlog = 16): Promise<VsockListener> {
    const server = net.createServer((socket) => {
      const peer: VsockAddress = {
        cid: this.resolveCid(socket.remoteAddress),
        port: socket.remotePort ?? 0,
      };
      onConnection(socket, peer);
    });

    server.on('error', (error) => {
      transportLogger.error({ address: formatAddress(address), error: errorMessage(error) }, 'Listener error');
    });

    return new Promise((resolve, reject) => {
      const onListenError = (error: Error) => {
        reject(new TransportError(`Cannot listen on ${formatAddress(address)}: ${error.message}`, { cause: error }));
      };
      server.once('error', onListenError);
      server.listen({ host: this.bindHost, port: address.port, backlog }, () => {
        server.off('error', onListenError);
        const bound = server.address();
        const port = bound !== null && typeof bound === 'object' ? bound.port : address.port;
        resolve({
          address: () => ({ cid: address.cid, port }),
          // Stops accepting at once; live connections belong to their workers
          close: async () => {
            server.close();
          },
        });
      });
    });
  }

  connect(address: VsockAddress): Promise<Duplex> {
    const host = this.peers.get(address.cid);
    if (host === undefined) {
      return Promise.reject(new TransportError(`No host known for cid ${address.cid}`));
    }

    return new Promise((resolve, reject) => {
      const socket = net.connect({ host, port: address.port });
      const onError = (error: Error) => {
        socket.destroy();
        reject(new TransportError(`Cannot connect to ${formatAddress(address)}: ${error.message}`, { cause: error }));
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(socket);
      });
    });
  }
}
