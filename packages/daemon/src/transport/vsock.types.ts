import type { Duplex } from 'stream';
import type { JsonObject } from '@usb-bridge/shared';
import type { ConnectionContext } from './connection-context';

/**
 * VSOCK endpoint: context id + port
 */
export interface VsockAddress {
  cid: number;
  port: number;
}

/**
 * Context id given to peers the transport cannot identify; no handler is ever registered for it
 */
export const UNKNOWN_CID = -1;

/**
 * A bound listening endpoint
 */
export interface VsockListener {
  /** Address actually bound (port resolved when 0 was requested) */
  address(): VsockAddress;
  /** Stop accepting and release the endpoint */
  close(): Promise<void>;
}

export type ConnectionListener = (socket: Duplex, peer: VsockAddress) => void;

/**
 * Stream transport addressed by (cid, port) pairs
 */
export interface VsockTransport {
  listen(address: VsockAddress, onConnection: ConnectionListener, backlog?: number): Promise<VsockListener>;
  connect(address: VsockAddress): Promise<Duplex>;
}

/**
 * Callbacks of a server-side connection handler
 */
export interface VsockConnectionHandler {
  onConnect(ctx: ConnectionContext): void | Promise<void>;
  onMessage(message: JsonObject): void | Promise<void>;
  onDisconnect(ctx: ConnectionContext): void | Promise<void>;
}

/**
 * Something a message can be sent through: a server-side connection or a reconnecting client
 */
export interface PeerChannel {
  send(message: JsonObject): Promise<boolean>;
}

export const formatAddress = ({ cid, port }: VsockAddress): string => `${cid}:${port}`;
