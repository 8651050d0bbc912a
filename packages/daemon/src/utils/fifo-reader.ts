import { createReadStream, promises as fs, type ReadStream } from 'fs';
import type { Readable } from 'stream';
import type { Logger } from 'pino';
import { errorMessage } from '../transport/errors';
import { sleep } from './sleep';

const REOPEN_DELAY_MS = 1000;

/**
 * Reads a FIFO written by a local process, reopening it after each writer closes.
 * `consume` gets one stream per writer session.
 */
export class FifoReader {
  private stopped = false;
  private stream: ReadStream | null = null;
  private loop: Promise<void> | null = null;
  private readonly abort = new AbortController();

  constructor(
    readonly fifoPath: string,
    private readonly consume: (input: Readable) => Promise<unknown>,
    private readonly log: Logger
  ) {}

  /**
   * Start reading; resolves false (and reads nothing) when the path is not a FIFO
   */
  async start(): Promise<boolean> {
    if (this.loop) {
      return true;
    }
    try {
      const stats = await fs.stat(this.fifoPath);
      if (!stats.isFIFO()) {
        this.log.warn({ path: this.fifoPath }, 'Path is not a FIFO, input disabled');
        return false;
      }
    } catch (error) {
      this.log.warn({ path: this.fifoPath, error: errorMessage(error) }, 'FIFO missing, input disabled');
      return false;
    }
    this.loop = this.run();
    return true;
  }

  /**
   * Stop reading. A FIFO open still waiting for a writer is abandoned, not awaited.
   */
  stop(): void {
    this.stopped = true;
    this.abort.abort();
    this.stream?.destroy();
  }

  private async run(): Promise<void> {
    while (!this.stopped) {
      const stream = createReadStream(this.fifoPath, { encoding: 'utf8' });
      this.stream = stream;
      try {
        await this.consume(stream);
      } catch (error) {
        if (!this.stopped) {
          this.log.error({ path: this.fifoPath, error: errorMessage(error) }, 'FIFO read failed');
          await sleep(REOPEN_DELAY_MS, this.abort.signal);
        }
      } finally {
        stream.destroy();
        this.stream = null;
      }
    }
  }
}
