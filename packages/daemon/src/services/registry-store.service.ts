import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { REGISTRY_FILE_NAME, deviceInfoSchema, type DeviceSnapshot } from '@usb-bridge/shared';
import { errorMessage } from '../transport/errors';
import { registryLogger } from '../utils/logger';
import type { DeviceRegistry } from './device-registry';

const DIR_MODE = 0o755;
const FILE_MODE = 0o644;

const snapshotFileSchema = z.record(deviceInfoSchema);

/**
 * Persists registry snapshots as indented JSON so other local processes can read them.
 *
 * Writes go to a temporary file that is then renamed over the target, and are chained
 * so an older snapshot never lands after a newer one.
 */
export class RegistryFileStore {
  readonly filePath: string;
  private pending: Promise<void> = Promise.resolve();
  private sequence = 0;

  constructor(
    readonly dataDir: string,
    fileName = REGISTRY_FILE_NAME
  ) {
    this.filePath = path.join(dataDir, fileName);
  }

  /**
   * Create the data directory and an empty registry file when missing
   */
  async init(): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
    try {
      await fs.chmod(this.dataDir, DIR_MODE);
    } catch (error) {
      registryLogger.warn({ dir: this.dataDir, error: errorMessage(error) }, 'Failed to set data directory permissions');
    }
    try {
      await fs.access(this.filePath);
    } catch {
      await this.write({});
    }
  }

  /**
   * Queue one snapshot; the returned promise settles when it is on disk (or the write failed and was logged)
   */
  save(snapshot: DeviceSnapshot): Promise<void> {
    this.pending = this.pending.then(() => this.write(snapshot)).catch((error: unknown) => {
      registryLogger.error({ file: this.filePath, error: errorMessage(error) }, 'Failed to persist registry');
    });
    return this.pending;
  }

  /**
   * Resolves once every queued write has settled
   */
  flush(): Promise<void> {
    return this.pending;
  }

  /**
   * Read the stored snapshot; a missing or unreadable file reads as empty
   */
  async load(): Promise<DeviceSnapshot> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      registryLogger.debug({ file: this.filePath, error: errorMessage(error) }, 'No stored registry');
      return {};
    }
    try {
      const parsed = snapshotFileSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
      registryLogger.warn({ file: this.filePath, issues: parsed.error.issues.length }, 'Stored registry is invalid');
    } catch (error) {
      registryLogger.warn({ file: this.filePath, error: errorMessage(error) }, 'Stored registry is not JSON');
    }
    return {};
  }

  /**
   * Persist every change of `registry`; returns the unsubscribe function
   */
  attach(registry: DeviceRegistry): () => void {
    return registry.onChange((snapshot) => {
      void this.save(snapshot);
    });
  }

  private async write(snapshot: DeviceSnapshot): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.${++this.sequence}.tmp`;
    try {
      await fs.writeFile(tmpPath, `${JSON.stringify(snapshot, null, 2)}\n`, { mode: FILE_MODE });
      await fs.chmod(tmpPath, FILE_MODE);
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }
  }
}
