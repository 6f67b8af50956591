/**
 * Device Manager
 *
 * Integration layer of the connection engine. Consumes transport events,
 * keeps per-peripheral drivers keyed by peripheral id, and coordinates:
 *
 * - readiness (single authoritative record per peripheral)
 * - discovery runs after each connection
 * - reconnection and liveness
 * - routing of decoded readings from ready peripherals
 *
 * @module ble/device-manager
 */

import { DEFAULT_CONNECTION_CONFIG } from '../config/defaults';
import { ReadingRouter } from '../readings/reading-router';
import type { ConnectionConfig, SensorReading } from '../types';
import type { LogTarget } from '../utils/logger';
import { createLogger, toError } from '../utils/logger';
import type { Unsubscribe } from '../utils/listeners';
import { validatePeripheralTarget } from '../utils/validation';
import type { DeviceInfo } from './device-directory';
import { DeviceDirectory } from './device-directory';
import { DiscoveryOrchestrator } from './discovery-orchestrator';
import { BleError } from './errors';
import type { ConnectionReadiness } from './readiness';
import { Readiness, canStream, isLinkEstablished } from './readiness';
import type { ReadinessListener } from './readiness-machine';
import { ReadinessStateMachine } from './readiness-machine';
import type { ReconnectionEvent, ReconnectionEventListener } from './reconnection-policy';
import { ReconnectionPolicy } from './reconnection-policy';
import type { RememberedDeviceStore } from './remembered-devices';
import { InMemoryRememberedDeviceStore } from './remembered-devices';
import { delay, withTimeout } from './timeout';
import type {
  BleTransport,
  BluetoothState,
  DiscoveredPeripheral,
  DriverFactory,
  PeripheralDriver,
  TransportEvent,
} from './transport';

/** A peripheral id, or anything carrying one (such as a `DeviceInfo`) */
export type PeripheralTarget = string | { readonly id: string };

export interface DeviceManagerOptions {
  transport: BleTransport;
  driverFactory: DriverFactory;
  config?: Partial<ConnectionConfig>;
  router?: ReadingRouter;
  rememberedDevices?: RememberedDeviceStore;
  /** Epoch-ms clock for reading timestamps and remembered devices */
  clock?: () => number;
  logger?: LogTarget;
}

interface ReadyWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

export class DeviceManager {
  readonly config: Readonly<ConnectionConfig>;
  readonly router: ReadingRouter;

  private readonly transport: BleTransport;
  private readonly driverFactory: DriverFactory;
  private readonly remembered: RememberedDeviceStore;
  private readonly clock: () => number;
  private readonly logger: LogTarget;

  private readonly machine: ReadinessStateMachine;
  private readonly directory = new DeviceDirectory();
  private readonly orchestrator: DiscoveryOrchestrator;
  private readonly policy: ReconnectionPolicy;

  private readonly drivers = new Map<string, PeripheralDriver>();
  private readonly discoveries = new Map<string, AbortController>();
  private readonly readyWaiters: ReadyWaiter[] = [];
  private readonly subscriptions: Unsubscribe[] = [];

  private state: BluetoothState;
  private error: Error | null = null;
  private disposed = false;

  constructor(options: DeviceManagerOptions) {
    this.transport = options.transport;
    this.driverFactory = options.driverFactory;
    this.config = { ...DEFAULT_CONNECTION_CONFIG, ...options.config };
    this.remembered = options.rememberedDevices ?? new InMemoryRememberedDeviceStore();
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createLogger('ble:manager');
    this.router = options.router ?? new ReadingRouter({ logger: options.logger });
    this.state = this.transport.state;

    this.machine = new ReadinessStateMachine({ scanner: this.transport, logger: options.logger });
    this.subscriptions.push(this.machine.addView(this.directory));

    this.orchestrator = new DiscoveryOrchestrator({
      readiness: this.machine,
      isLinkUp: (id) => this.transport.isConnected(id),
      stepTimeoutMs: this.config.stepTimeoutMs,
      logger: options.logger,
    });

    this.policy = new ReconnectionPolicy({
      attempt: (id, signal) => this.reconnectAttempt(id, signal),
      readRssi: (id) => this.transport.readRssi(id),
      config: this.config,
      logger: options.logger,
    });

    this.subscriptions.push(
      this.policy.subscribe((event) => this.handleReconnectionEvent(event)),
      this.transport.subscribe((event) => this.handleTransportEvent(event))
    );
  }

  // ==========================================================================
  // Views
  // ==========================================================================

  get discoveredDevices(): DeviceInfo[] {
    return this.directory.discoveredDevices;
  }

  get connectedDevices(): DeviceInfo[] {
    return this.directory.connectedDevices;
  }

  get primaryDevice(): DeviceInfo | null {
    return this.directory.primaryDevice;
  }

  get bluetoothState(): BluetoothState {
    return this.state;
  }

  get lastError(): Error | null {
    return this.error;
  }

  get isScanning(): boolean {
    return this.transport.isScanning();
  }

  readiness(target: PeripheralTarget): ConnectionReadiness {
    return this.machine.get(validatePeripheralTarget(target));
  }

  onReadinessChange(listener: ReadinessListener): Unsubscribe {
    return this.machine.onChange(listener);
  }

  onReconnectionEvent(listener: ReconnectionEventListener): Unsubscribe {
    return this.policy.subscribe(listener);
  }

  // ==========================================================================
  // Scanning
  // ==========================================================================

  /**
   * Start scanning unless a device is already ready or a scan is running
   */
  startScanning(): void {
    if (this.hasReadyDevice()) {
      this.logger.debug('Device already ready, not scanning');
      return;
    }
    if (this.transport.isScanning()) return;
    if (this.state !== 'poweredOn') {
      throw BleError.bluetoothUnavailable(this.state);
    }

    this.logger.info('Scanning for peripherals');
    this.transport.startScanning();
  }

  stopScanning(): void {
    if (this.transport.isScanning()) {
      this.transport.stopScanning();
    }
  }

  /**
   * Resolve once Bluetooth is powered on
   */
  whenReady(): Promise<void> {
    if (this.state === 'poweredOn') return Promise.resolve();
    if (this.disposed) return Promise.reject(BleError.cancelled('Waiting for Bluetooth'));

    return new Promise<void>((resolve, reject) => {
      this.readyWaiters.push({ resolve, reject });
    });
  }

  // ==========================================================================
  // Connection
  // ==========================================================================

  async connect(target: PeripheralTarget): Promise<void> {
    const id = validatePeripheralTarget(target);
    if (!this.drivers.has(id) || !this.directory.has(id)) {
      throw BleError.peripheralNotFound(id);
    }

    this.policy.cancel(id);

    const current = this.machine.get(id);
    if (isLinkEstablished(current)) {
      this.logger.debug('Already connected', { peripheralId: id });
      return;
    }

    this.logger.info('Connecting', { peripheralId: id });
    this.machine.transition(id, Readiness.connecting);

    try {
      await withTimeout((signal) => this.transport.connect(id, signal), this.config.connectTimeoutMs, {
        label: `Connection to ${id}`,
      });
    } catch (err) {
      const error = BleError.connectionFailed(id, err);
      this.logger.error('Connection failed', error, { peripheralId: id });
      this.machine.transition(id, Readiness.failed(toError(err).message));
      this.error = error;
      throw error;
    }
  }

  async disconnect(target: PeripheralTarget): Promise<void> {
    const id = validatePeripheralTarget(target);

    this.policy.cancel(id);
    this.abortDiscovery(id);

    this.logger.info('Disconnecting', { peripheralId: id });
    await this.transport.disconnect(id);

    if (!this.transport.isConnected(id)) {
      this.machine.transition(id, Readiness.disconnected);
    }
  }

  async disconnectAll(): Promise<void> {
    const ids = [...this.directory.connectedIdList];
    this.policy.cancelAll();
    await Promise.all(ids.map((id) => this.disconnect(id)));
  }

  /**
   * Wait for Bluetooth, scan for `discoveryWindowMs`, then connect to the
   * most recently used remembered device that showed up.
   *
   * @returns the connected peripheral id, or null when none was found
   */
  async attemptAutoReconnect(discoveryWindowMs: number = this.config.autoReconnectScanMs): Promise<string | null> {
    const remembered = this.remembered.list();
    if (remembered.length === 0) return null;

    await this.whenReady();

    this.startScanning();
    try {
      await delay(discoveryWindowMs);
    } finally {
      this.stopScanning();
    }

    const match = remembered.find((device) => this.directory.has(device.id) && this.drivers.has(device.id));
    if (!match) {
      this.logger.info('No remembered device in range', { remembered: remembered.length });
      return null;
    }

    this.logger.info('Auto-reconnecting to remembered device', { peripheralId: match.id });
    await this.connect(match.id);
    return match.id;
  }

  forgetDevice(target: PeripheralTarget): void {
    this.remembered.forget(validatePeripheralTarget(target));
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    for (const unsubscribe of this.subscriptions.splice(0)) unsubscribe();
    for (const controller of this.discoveries.values()) controller.abort();
    this.discoveries.clear();
    this.policy.dispose();

    const cancelled = BleError.cancelled('Waiting for Bluetooth');
    for (const waiter of this.readyWaiters.splice(0)) waiter.reject(cancelled);
  }

  // ==========================================================================
  // Transport events
  // ==========================================================================

  private handleTransportEvent(event: TransportEvent): void {
    switch (event.type) {
      case 'deviceDiscovered':
        this.onDiscovered(event.peripheral);
        break;
      case 'deviceConnected':
        this.onConnected(event.peripheralId);
        break;
      case 'deviceDisconnected':
        this.onDisconnected(event.peripheralId, event.error);
        break;
      case 'characteristicUpdated':
        this.onCharacteristic(event.peripheralId, event.characteristicId, event.value);
        break;
      case 'bluetoothStateChanged':
        this.onBluetoothState(event.state);
        break;
      case 'error':
        this.logger.error('Transport error', event.error);
        this.error = event.error;
        break;
    }
  }

  private onDiscovered(peripheral: DiscoveredPeripheral): void {
    let driver = this.drivers.get(peripheral.id);
    if (!driver) {
      const created = this.driverFactory(peripheral);
      if (!created) {
        this.logger.debug('Ignoring unsupported peripheral', { peripheralId: peripheral.id, name: peripheral.name });
        return;
      }
      driver = created;
      this.drivers.set(peripheral.id, driver);
      this.logger.info('Discovered peripheral', {
        peripheralId: peripheral.id,
        name: peripheral.name ?? driver.name,
        deviceType: driver.deviceType,
      });
    }

    this.directory.upsert(
      {
        id: peripheral.id,
        name: peripheral.name ?? driver.name,
        deviceType: driver.deviceType,
        signalStrength: peripheral.rssi,
      },
      this.machine.get(peripheral.id)
    );
  }

  private onConnected(id: string): void {
    if (isLinkEstablished(this.machine.get(id))) {
      this.logger.debug('Duplicate connection event', { peripheralId: id });
      return;
    }

    const driver = this.drivers.get(id);
    if (!driver) {
      this.logger.warn('Connected peripheral has no driver', { peripheralId: id });
      this.machine.transition(id, Readiness.failed('No driver for peripheral'));
      return;
    }

    if (this.machine.get(id).kind !== 'connecting') {
      this.machine.transition(id, Readiness.connecting);
    }
    this.machine.transition(id, Readiness.connected);
    this.logger.info('Peripheral connected', { peripheralId: id });

    this.policy.handleConnectionSuccess(id);
    this.directory.markConnected(id);

    const info = this.directory.get(id);
    this.remembered.remember({ id, name: info?.name ?? driver.name, lastConnectedAt: this.clock() });
    this.policy.setConnected(this.directory.connectedIdList);

    this.startDiscovery(id, driver);
  }

  private onDisconnected(id: string, error?: Error): void {
    this.abortDiscovery(id);

    if (error) {
      this.logger.warn('Peripheral disconnected unexpectedly', { peripheralId: id, error: error.message });
      this.error = new BleError('unexpectedDisconnection', error.message, id, { cause: error });
    } else {
      this.logger.info('Peripheral disconnected', { peripheralId: id });
    }

    this.machine.transition(id, Readiness.disconnected);
    this.directory.markDisconnected(id);
    this.policy.handleDisconnection(id, error !== undefined);
    this.policy.setConnected(this.directory.connectedIdList);
  }

  private onCharacteristic(id: string, characteristicId: string, value: Uint8Array): void {
    const driver = this.drivers.get(id);
    if (!driver || !canStream(this.machine.get(id))) return;

    this.policy.recordActivity(id);

    let readings: SensorReading[];
    try {
      readings = driver.decode(characteristicId, value, this.clock());
    } catch (err) {
      this.logger.warn('Dropping undecodable notification', {
        peripheralId: id,
        characteristicId,
        error: toError(err).message,
      });
      return;
    }

    this.router.ingest(readings, { deviceId: id, deviceType: driver.deviceType });
  }

  private onBluetoothState(state: BluetoothState): void {
    this.state = state;
    this.logger.info('Bluetooth state changed', { state });

    if (state === 'unauthorized') {
      this.error = new BleError('bluetoothUnauthorized', 'Bluetooth permission denied');
    }
    if (state === 'poweredOn') {
      for (const waiter of this.readyWaiters.splice(0)) waiter.resolve();
    }
  }

  // ==========================================================================
  // Discovery and reconnection
  // ==========================================================================

  private startDiscovery(id: string, driver: PeripheralDriver): void {
    this.abortDiscovery(id);

    const controller = new AbortController();
    this.discoveries.set(id, controller);

    this.orchestrator
      .runDiscovery(id, driver, controller.signal)
      .then((outcome) => {
        this.logger.debug('Discovery finished', { peripheralId: id, status: outcome.status });
      })
      .catch((err: unknown) => {
        this.logger.error('Discovery crashed', toError(err), { peripheralId: id });
      })
      .finally(() => {
        if (this.discoveries.get(id) === controller) {
          this.discoveries.delete(id);
        }
      });
  }

  private abortDiscovery(id: string): void {
    const controller = this.discoveries.get(id);
    if (controller) {
      controller.abort();
      this.discoveries.delete(id);
    }
  }

  private async reconnectAttempt(id: string, signal: AbortSignal): Promise<void> {
    this.machine.transition(id, Readiness.connecting);

    try {
      await withTimeout((connectSignal) => this.transport.connect(id, connectSignal), this.config.connectTimeoutMs, {
        label: `Reconnection to ${id}`,
        signal,
      });
    } catch (err) {
      // A cancelled attempt no longer owns the record; a manual connect or disconnect does
      if (!signal.aborted && !isLinkEstablished(this.machine.get(id))) {
        this.machine.transition(id, Readiness.disconnected);
      }
      throw err;
    }
  }

  private handleReconnectionEvent(event: ReconnectionEvent): void {
    switch (event.type) {
      case 'gaveUp':
        this.machine.transition(
          event.peripheralId,
          Readiness.failed(`Reconnection failed after ${event.attempts} attempts`)
        );
        this.error = BleError.maxReconnectionAttemptsExceeded(event.peripheralId, event.attempts);
        break;
      case 'rssiUpdated':
        this.directory.updateSignalStrength(event.peripheralId, event.rssi);
        break;
      case 'attemptStarted':
      case 'attemptFailed':
      case 'succeeded':
      case 'connectionStale':
        break;
    }
  }

  private hasReadyDevice(): boolean {
    for (const readiness of this.machine.snapshot().values()) {
      if (readiness.kind === 'ready') return true;
    }
    return false;
  }
}
