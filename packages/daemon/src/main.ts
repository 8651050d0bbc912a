#!/usr/bin/env node
import path from 'path';
import dotenv from 'dotenv';
import { DEVICE_EVENT_FIFO_NAME, REQUEST_FIFO_NAME } from '@usb-bridge/shared';
import { loadConfig, type Config } from './config';
import { GuestRegistryService } from './services/guest-registry.service';
import { HostDeviceHub } from './services/host-device-hub.service';
import { DeviceEventReader } from './services/host-events.service';
import { createCommandExecutor, refusingExecutor } from './services/passthrough-executor.service';
import { RegistryFileStore } from './services/registry-store.service';
import { PassthroughRequestReader } from './services/request-reader.service';
import { NetTransport } from './transport/net.transport';
import { VsockServer } from './transport/vsock-server';
import { logger } from './utils/logger';

// Load environment variables
dotenv.config();

type StopFn = () => Promise<void>;

const startHost = async (config: Config, transport: NetTransport): Promise<StopFn> => {
  const executor = config.passthroughCommand ? createCommandExecutor(config.passthroughCommand) : refusingExecutor;
  if (!config.passthroughCommand) {
    logger.warn('PASSTHROUGH_COMMAND not set, passthrough requests will fail');
  }

  const hub = new HostDeviceHub({ executor });
  const server = new VsockServer(transport, { cid: config.cid, port: config.port }, {
    shutdownTimeoutMs: config.shutdownTimeoutMs,
  });
  for (const guestCid of config.guestCids) {
    server.registerHandler(guestCid, hub.serviceFor(guestCid));
  }
  await server.start();

  const events = new DeviceEventReader(path.join(config.dataDir, DEVICE_EVENT_FIFO_NAME), hub);
  await events.start();

  return async () => {
    events.stop();
    await server.stop();
  };
};

const startGuest = async (config: Config, transport: NetTransport): Promise<StopFn> => {
  const store = new RegistryFileStore(config.dataDir);
  await store.init();

  const guest = new GuestRegistryService(transport, { cid: config.cid, port: config.port }, {
    client: {
      retryIntervalMs: config.reconnectIntervalMs,
      sendAttempts: config.sendAttempts,
      stopGraceMs: config.stopGraceMs,
    },
  });
  const detach = store.attach(guest.registry);
  guest.start();

  const reader = new PassthroughRequestReader(path.join(config.dataDir, REQUEST_FIFO_NAME), (deviceId, targetVm) =>
    guest.requestPassthrough(deviceId, targetVm)
  );
  await reader.start();

  return async () => {
    reader.stop();
    await guest.stop();
    detach();
    await store.flush();
  };
};

let stop: StopFn | null = null;
let shuttingDown = false;

/**
 * Graceful shutdown handler
 */
const gracefulShutdown = async (signal: string) => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info({ signal }, 'Received shutdown signal, starting graceful shutdown');

  try {
    if (stop) {
      await stop();
    }
    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Error during graceful shutdown');
    setTimeout(() => {
      logger.info('Forcing shutdown after error');
      process.exit(1);
    }, 1000);
  }
};

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

/**
 * Handle unhandled rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise rejection');
});

/**
 * Handle uncaught exceptions
 */
process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught exception');
  process.exit(1);
});

const startDaemon = async () => {
  try {
    const config = loadConfig();
    const transport = new NetTransport(config.peers, config.bindHost);
    stop = config.role === 'host' ? await startHost(config, transport) : await startGuest(config, transport);
    logger.info({ role: config.role, cid: config.cid, port: config.port }, 'USB bridge daemon started');
  } catch (error) {
    logger.error({ error }, 'Failed to start daemon');
    process.exit(1);
  }
};

void startDaemon();
