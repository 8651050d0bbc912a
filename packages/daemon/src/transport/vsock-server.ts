import type { Duplex } from 'stream';
import { WORKER_SHUTDOWN_TIMEOUT } from '@usb-bridge/shared';
import { transportLogger } from '../utils/logger';
import { waitWithTimeout } from '../utils/sleep';
import { VsockConnectionWorker } from './connection-worker';
import { errorMessage } from './errors';
import {
  formatAddress,
  type VsockAddress,
  type VsockConnectionHandler,
  type VsockListener,
  type VsockTransport,
} from './vsock.types';

export interface VsockServerOptions {
  /** Pending-connection queue length handed to the transport */
  backlog?: number;
  /** Per-worker wait on shutdown, in ms */
  shutdownTimeoutMs?: number;
}

/**
 * Accepts connections and routes each to the handler registered for the peer's cid.
 * Each accepted connection gets its own worker, tracked by full (cid, port) identity.
 */
export class VsockServer {
  private readonly handlers = new Map<number, VsockConnectionHandler>();
  private readonly workers = new Map<string, VsockConnectionWorker>();
  private readonly backlog: number;
  private readonly shutdownTimeoutMs: number;
  private listener: VsockListener | null = null;
  private stopping = false;

  constructor(
    private readonly transport: VsockTransport,
    private readonly address: VsockAddress,
    options: VsockServerOptions = {}
  ) {
    this.backlog = options.backlog ?? 16;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? WORKER_SHUTDOWN_TIMEOUT;
  }

  /**
   * Register the handler for one peer cid.
   * Returns false when that cid already has one; this is a start-up configuration contract.
   */
  registerHandler(cid: number, handler: VsockConnectionHandler): boolean {
    if (this.handlers.has(cid)) {
      transportLogger.error({ cid }, 'Handler already registered for cid');
      return false;
    }
    this.handlers.set(cid, handler);
    return true;
  }

  /**
   * Bind and start accepting; resolves with the bound address
   */
  async start(): Promise<VsockAddress> {
    if (this.listener) {
      return this.listener.address();
    }
    this.listener = await this.transport.listen(
      this.address,
      (socket, peer) => this.accept(socket, peer),
      this.backlog
    );
    const bound = this.listener.address();
    transportLogger.info({ address: formatAddress(bound), handlers: [...this.handlers.keys()] }, 'Vsock server listening');
    return bound;
  }

  /**
   * Peers with a live worker
   */
  activeWorkers(): VsockAddress[] {
    return [...this.workers.values()].map((worker) => worker.peer);
  }

  /**
   * Stop accepting, release the endpoint, then stop every worker and wait for each
   * at most `shutdownTimeoutMs`.
   */
  async stop(): Promise<void> {
    if (this.stopping) {
      return;
    }
    this.stopping = true;

    if (this.listener) {
      try {
        await this.listener.close();
      } catch (error) {
        transportLogger.warn({ error: errorMessage(error) }, 'Error closing listener');
      }
    }

    const workers = [...this.workers.values()];
    await Promise.all(
      workers.map(async (worker) => {
        worker.stop();
        const finished = await waitWithTimeout(worker.done, this.shutdownTimeoutMs);
        if (!finished) {
          transportLogger.warn({ peer: formatAddress(worker.peer) }, 'Worker did not finish before shutdown timeout');
        }
      })
    );
    transportLogger.info({ workers: workers.length }, 'Vsock server stopped');
  }

  private accept(socket: Duplex, peer: VsockAddress): void {
    if (this.stopping) {
      socket.destroy();
      return;
    }

    const handler = this.handlers.get(peer.cid);
    if (!handler) {
      transportLogger.warn({ peer: formatAddress(peer) }, 'No handler for peer cid, closing connection');
      socket.destroy();
      return;
    }

    const key = formatAddress(peer);
    const stale = this.workers.get(key);
    if (stale) {
      transportLogger.warn({ peer: key }, 'Replacing stale worker for peer');
      stale.stop();
    }

    const worker = new VsockConnectionWorker(socket, peer, handler);
    this.workers.set(key, worker);
    transportLogger.info({ peer: key }, 'Connection accepted');

    void worker.start().then(() => {
      if (this.workers.get(key) === worker) {
        this.workers.delete(key);
      }
      transportLogger.info({ peer: key }, 'Connection closed');
    });
  }
}
