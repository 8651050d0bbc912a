import { execFile } from 'child_process';
import { promisify } from 'util';
import { errorMessage } from '../transport/errors';
import { hostLogger } from '../utils/logger';
import type { PassthroughExecutor } from './host-passthrough.service';

const execFileAsync = promisify(execFile);

/**
 * Runs `file` with `args`; rejects on a non-zero exit, a spawn failure or the timeout
 */
export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<void>;

const DEFAULT_TIMEOUT_MS = 30_000;

export const runCommand: CommandRunner = async (file, args, timeoutMs) => {
  await execFileAsync(file, args, { timeout: timeoutMs });
};

export interface CommandExecutorOptions {
  timeoutMs?: number;
  run?: CommandRunner;
}

/**
 * Executor that runs `command device_id vendor product target_vm`; exit status 0 is success
 */
export const createCommandExecutor = (command: string, options: CommandExecutorOptions = {}): PassthroughExecutor => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const run = options.run ?? runCommand;

  return async (device, targetVm) => {
    const args = [device.device_id, device.vendor, device.product, targetVm];
    try {
      await run(command, args, timeoutMs);
      hostLogger.info({ command, deviceId: device.device_id, targetVm }, 'Passthrough command succeeded');
      return true;
    } catch (error) {
      hostLogger.error(
        { command, deviceId: device.device_id, targetVm, error: errorMessage(error) },
        'Passthrough command failed'
      );
      return false;
    }
  };
};

/**
 * Executor used when no command is configured: every execution fails
 */
export const refusingExecutor: PassthroughExecutor = (device, targetVm) => {
  hostLogger.error({ deviceId: device.device_id, targetVm }, 'No passthrough command configured');
  return false;
};
