import type { Duplex } from 'stream';
import { ProtocolError, type JsonObject } from '@usb-bridge/shared';
import { transportLogger } from '../utils/logger';
import { receiveMessages, sendMessage } from './codec';
import { ConnectionContext } from './connection-context';
import { errorMessage } from './errors';
import { formatAddress, type VsockAddress, type VsockConnectionHandler } from './vsock.types';

/**
 * Lifecycle of one accepted connection
 */
export type WorkerState = 'connected' | 'reading' | 'disconnecting' | 'closed';

/**
 * Owns one accepted connection: read loop, dispatch to the handler, cleanup.
 *
 * Whatever ends the loop (stream end, stop, socket error, bad frame, a throwing handler),
 * the socket is closed once and `onDisconnect` fires once.
 */
export class VsockConnectionWorker {
  readonly context: ConnectionContext;
  private state: WorkerState = 'connected';
  private stopRequested = false;
  private socketClosed = false;
  private runPromise: Promise<void> | null = null;

  constructor(
    private readonly socket: Duplex,
    readonly peer: VsockAddress,
    private readonly handler: VsockConnectionHandler
  ) {
    this.context = new ConnectionContext(
      peer,
      (message) => this.send(message),
      () => this.stop()
    );
    socket.on('error', (error) => {
      transportLogger.debug({ peer: formatAddress(peer), error: errorMessage(error) }, 'Connection socket error');
    });
  }

  getState(): WorkerState {
    return this.state;
  }

  /**
   * Start the read loop (idempotent); resolves once cleanup is complete
   */
  start(): Promise<void> {
    if (!this.runPromise) {
      this.runPromise = this.run();
    }
    return this.runPromise;
  }

  /**
   * Resolves once the worker has fully closed
   */
  get done(): Promise<void> {
    return this.runPromise ?? Promise.resolve();
  }

  /**
   * Cooperative stop: no further reads are dispatched, the socket is shut down in both
   * directions so a pending read returns. A message already inside the handler completes.
   */
  stop(): void {
    if (this.stopRequested) {
      return;
    }
    this.stopRequested = true;
    this.closeSocket();
  }

  private async run(): Promise<void> {
    const peer = formatAddress(this.peer);
    try {
      await this.handler.onConnect(this.context);
      this.state = 'reading';
      for await (const message of receiveMessages(this.socket)) {
        if (this.stopRequested) {
          break;
        }
        await this.handler.onMessage(message);
      }
    } catch (error) {
      if (error instanceof ProtocolError) {
        transportLogger.warn({ peer, error: error.message }, 'Framing lost, dropping connection');
      } else if (!this.stopRequested) {
        transportLogger.info({ peer, error: errorMessage(error) }, 'Connection loop ended with error');
      }
    } finally {
      this.state = 'disconnecting';
      this.closeSocket();
      try {
        await this.handler.onDisconnect(this.context);
      } catch (error) {
        transportLogger.error({ peer, error: errorMessage(error) }, 'onDisconnect handler failed');
      }
      this.state = 'closed';
    }
  }

  private async send(message: JsonObject): Promise<boolean> {
    try {
      await sendMessage(this.socket, message);
      return true;
    } catch (error) {
      transportLogger.warn({ peer: formatAddress(this.peer), error: errorMessage(error) }, 'Send failed');
      return false;
    }
  }

  private closeSocket(): void {
    if (this.socketClosed) {
      return;
    }
    this.socketClosed = true;
    this.socket.destroy();
  }
}
