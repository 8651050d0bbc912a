/**
 * @usb-bridge/daemon
 * Transport, registry and host/guest services of the USB passthrough bridge
 */

// Transport
export { encodeFrame, sendMessage, receiveMessages } from './transport/codec';
export { TransportError, errorMessage } from './transport/errors';
export { ConnectionContext } from './transport/connection-context';
export { VsockConnectionWorker, type WorkerState } from './transport/connection-worker';
export { VsockServer, type VsockServerOptions } from './transport/vsock-server';
export { VsockClient, type VsockClientCallbacks, type VsockClientOptions } from './transport/vsock-client';
export { NetTransport, type PeerTable } from './transport/net.transport';
export {
  UNKNOWN_CID,
  formatAddress,
  type VsockAddress,
  type VsockListener,
  type ConnectionListener,
  type VsockTransport,
  type VsockConnectionHandler,
  type PeerChannel,
} from './transport/vsock.types';

// Registry and services
export {
  DeviceRegistry,
  isConsistent,
  type AssignResult,
  type RegistryChangeListener,
} from './services/device-registry';
export {
  HostPassthroughService,
  type HostPassthroughServiceOptions,
  type PassthroughExecutor,
  type BroadcastFn,
} from './services/host-passthrough.service';
export { HostDeviceHub, type HostDeviceHubOptions, type DeviceEventTarget } from './services/host-device-hub.service';
export { DeviceEventReader, applyDeviceEvent, readDeviceEvents } from './services/host-events.service';
export {
  GuestRegistryService,
  type GuestRegistryServiceOptions,
  type DeviceNotifier,
  type PassthroughRequestFn,
} from './services/guest-registry.service';
export { RegistryFileStore } from './services/registry-store.service';
export {
  createCommandExecutor,
  refusingExecutor,
  runCommand,
  type CommandRunner,
  type CommandExecutorOptions,
} from './services/passthrough-executor.service';
export {
  PassthroughRequestReader,
  parsePassthroughRequestLine,
  readPassthroughRequests,
  type PassthroughRequestLine,
} from './services/request-reader.service';

// Utilities
export { FifoReader } from './utils/fifo-reader';

// Configuration
export { loadConfig, type Config, type Env } from './config';
