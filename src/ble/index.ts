/**
 * BLE connection engine exports
 * @module ble
 */

export {
  BleError,
  isBleError,
  categoryOf,
  type BleErrorCode,
  type BleErrorCategory,
  type BleTransportErrorCode,
  type BleProtocolErrorCode,
} from './errors';

export { withTimeout, delay, type TimeoutOptions } from './timeout';

// Readiness
export {
  Readiness,
  HAPPY_PATH,
  isLinkEstablished,
  canStream,
  canTransition,
  describeReadiness,
  readinessEquals,
  type ConnectionReadiness,
  type ReadinessKind,
} from './readiness';
export {
  ReadinessStateMachine,
  type ReadinessListener,
  type ReadinessView,
  type ScanController,
  type ReadinessStateMachineOptions,
} from './readiness-machine';

// Transport seam
export type {
  BleTransport,
  BluetoothState,
  DiscoveredPeripheral,
  TransportEvent,
  TransportEventListener,
  PeripheralDriver,
  DriverFactory,
} from './transport';

// Orchestration
export {
  DiscoveryOrchestrator,
  type DiscoveryOutcome,
  type DiscoveryOrchestratorOptions,
} from './discovery-orchestrator';
export {
  ReconnectionPolicy,
  reconnectDelay,
  type ReconnectionEvent,
  type ReconnectionEventListener,
  type ReconnectAttempt,
  type RssiReader,
  type ReconnectionPolicyConfig,
  type ReconnectionPolicyOptions,
} from './reconnection-policy';

// Devices
export { DeviceDirectory, type DeviceInfo } from './device-directory';
export {
  InMemoryRememberedDeviceStore,
  type RememberedDevice,
  type RememberedDeviceStore,
} from './remembered-devices';
export { DeviceManager, type DeviceManagerOptions, type PeripheralTarget } from './device-manager';
