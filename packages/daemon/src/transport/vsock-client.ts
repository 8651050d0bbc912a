import type { Duplex } from 'stream';
import {
  CLIENT_STOP_GRACE,
  MAX_SEND_ATTEMPTS,
  RECONNECT_INTERVAL,
  type JsonObject,
} from '@usb-bridge/shared';
import { transportLogger } from '../utils/logger';
import { sleep } from '../utils/sleep';
import { receiveMessages, sendMessage } from './codec';
import { errorMessage } from './errors';
import { formatAddress, type PeerChannel, type VsockAddress, type VsockTransport } from './vsock.types';

export interface VsockClientCallbacks {
  onMessage(message: JsonObject): void | Promise<void>;
  onConnect?(): void | Promise<void>;
  onDisconnect?(): void | Promise<void>;
}

export interface VsockClientOptions {
  /** Fixed delay between connection attempts, in ms */
  retryIntervalMs?: number;
  /** Attempts per `send` before it reports failure */
  sendAttempts?: number;
  /** Delay between the stop signal and the forced close, in ms */
  stopGraceMs?: number;
}

/**
 * One logical outbound connection that reconnects by itself.
 *
 * Connecting retries on a fixed interval with no cap: the peer is a co-located
 * privileged service that is expected to show up eventually.
 */
export class VsockClient implements PeerChannel {
  private socket: Duplex | null = null;
  private connecting: Promise<Duplex | null> | null = null;
  private loop: Promise<void> | null = null;
  private stopped = false;
  private readonly abort = new AbortController();
  private readonly retryIntervalMs: number;
  private readonly sendAttempts: number;
  private readonly stopGraceMs: number;

  constructor(
    private readonly transport: VsockTransport,
    readonly address: VsockAddress,
    private readonly callbacks: VsockClientCallbacks,
    options: VsockClientOptions = {}
  ) {
    this.retryIntervalMs = options.retryIntervalMs ?? RECONNECT_INTERVAL;
    this.sendAttempts = options.sendAttempts ?? MAX_SEND_ATTEMPTS;
    this.stopGraceMs = options.stopGraceMs ?? CLIENT_STOP_GRACE;
  }

  isConnected(): boolean {
    return this.socket !== null;
  }

  /**
   * Start the receive loop (idempotent)
   */
  start(): void {
    if (!this.loop) {
      this.loop = this.receiveLoop();
    }
  }

  /**
   * Resolves when the receive loop has exited
   */
  wait(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  /**
   * Send one message, reconnecting between failed attempts.
   * Resolves false once every attempt failed (or the client is stopped).
   */
  async send(message: JsonObject): Promise<boolean> {
    for (let attempt = 1; attempt <= this.sendAttempts; attempt++) {
      const socket = await this.acquire();
      if (!socket) {
        return false;
      }
      try {
        await sendMessage(socket, message);
        return true;
      } catch (error) {
        transportLogger.error(
          { server: formatAddress(this.address), attempt, error: errorMessage(error) },
          'Send failed, retrying on a fresh connection'
        );
        this.closeConnection(socket);
      }
    }
    return false;
  }

  /**
   * Signal the loop to exit, give it a grace period, then force-close the connection
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      return this.wait();
    }
    this.stopped = true;
    this.abort.abort();
    await sleep(this.stopGraceMs);
    if (this.socket) {
      this.closeConnection(this.socket);
    }
    await this.wait();
  }

  private async receiveLoop(): Promise<void> {
    while (!this.stopped) {
      const socket = await this.acquire();
      if (!socket) {
        break;
      }
      try {
        for await (const message of receiveMessages(socket)) {
          if (this.stopped) {
            break;
          }
          await this.invoke('onMessage', () => this.callbacks.onMessage(message));
        }
      } catch (error) {
        if (!this.stopped) {
          transportLogger.error({ server: formatAddress(this.address), error: errorMessage(error) }, 'Vsock server error');
        }
      }
      this.closeConnection(socket);
    }
  }

  /**
   * Current connection, or a new one. Concurrent callers share one pending attempt.
   * Resolves null only when the client is stopped while waiting.
   */
  private acquire(): Promise<Duplex | null> {
    if (this.socket) {
      return Promise.resolve(this.socket);
    }
    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async connect(): Promise<Duplex | null> {
    const server = formatAddress(this.address);
    while (!this.stopped) {
      try {
        transportLogger.info({ server }, 'Waiting for server');
        const socket = await this.connectUnlessStopped();
        if (!socket) {
          return null;
        }
        if (this.stopped) {
          socket.destroy();
          return null;
        }
        socket.on('error', (error) => {
          transportLogger.debug({ server, error: errorMessage(error) }, 'Client socket error');
        });
        this.socket = socket;
        transportLogger.info({ server }, 'Connected to server');
        void this.invoke('onConnect', () => this.callbacks.onConnect?.());
        return socket;
      } catch (error) {
        transportLogger.debug({ server, error: errorMessage(error) }, 'Connect failed');
        await sleep(this.retryIntervalMs, this.abort.signal);
      }
    }
    return null;
  }

  /**
   * One transport connect, raced against stop. Resolves null once stopped;
   * a socket that arrives after that is destroyed.
   */
  private connectUnlessStopped(): Promise<Duplex | null> {
    const { signal } = this.abort;
    const pending = this.transport.connect(this.address);

    return new Promise<Duplex | null>((resolve, reject) => {
      const onAbort = () => {
        resolve(null);
        pending.then(
          (late) => late.destroy(),
          (error: unknown) => {
            transportLogger.debug({ server: formatAddress(this.address), error: errorMessage(error) }, 'Connect failed after stop');
          }
        );
      };
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      pending.then(
        (socket) => {
          signal.removeEventListener('abort', onAbort);
          resolve(socket);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /**
   * Close `socket` if it is still the current connection; fires onDisconnect once per connection
   */
  private closeConnection(socket: Duplex): void {
    if (this.socket !== socket) {
      return;
    }
    this.socket = null;
    socket.destroy();
    void this.invoke('onDisconnect', () => this.callbacks.onDisconnect?.());
  }

  private async invoke(name: string, callback: () => void | Promise<void>): Promise<void> {
    try {
      await callback();
    } catch (error) {
      transportLogger.error({ callback: name, error: errorMessage(error) }, 'Client callback failed');
    }
  }
}
