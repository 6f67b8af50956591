/**
 * Radio and device-driver boundaries
 *
 * The engine never talks to a BLE stack directly. A platform adapter
 * implements `BleTransport` and reports everything that happens on the radio
 * as `TransportEvent`s; per-model `PeripheralDriver`s own GATT setup and
 * packet decoding.
 *
 * @module ble/transport
 */

import type { DeviceType, SensorReading } from '../types';
import type { Unsubscribe } from '../utils/listeners';

export type BluetoothState =
  | 'unknown'
  | 'resetting'
  | 'unsupported'
  | 'unauthorized'
  | 'poweredOff'
  | 'poweredOn';

export interface DiscoveredPeripheral {
  id: string;
  /** Advertised local name, if any */
  name?: string;
  rssi: number;
}

export type TransportEvent =
  | { type: 'deviceDiscovered'; peripheral: DiscoveredPeripheral }
  | { type: 'deviceConnected'; peripheralId: string }
  | { type: 'deviceDisconnected'; peripheralId: string; error?: Error }
  | { type: 'bluetoothStateChanged'; state: BluetoothState }
  | { type: 'characteristicUpdated'; peripheralId: string; characteristicId: string; value: Uint8Array }
  | { type: 'error'; error: Error };

export type TransportEventListener = (event: TransportEvent) => void;

export interface BleTransport {
  readonly state: BluetoothState;
  isScanning(): boolean;
  startScanning(): void;
  stopScanning(): void;
  /** Resolves once the link is up; `deviceConnected` is emitted as well */
  connect(peripheralId: string, signal?: AbortSignal): Promise<void>;
  disconnect(peripheralId: string): Promise<void>;
  isConnected(peripheralId: string): boolean;
  readRssi(peripheralId: string): Promise<number>;
  subscribe(listener: TransportEventListener): Unsubscribe;
}

/**
 * Per-peripheral GATT setup and packet decoding for one device model
 */
export interface PeripheralDriver {
  readonly peripheralId: string;
  readonly name: string;
  readonly deviceType: DeviceType;
  /** Optional notification channels enabled best-effort after the main one */
  readonly secondaryChannels: readonly string[];

  discoverServices(signal: AbortSignal): Promise<void>;
  discoverCharacteristics(signal: AbortSignal): Promise<void>;
  enableNotifications(signal: AbortSignal): Promise<void>;
  enableSecondaryNotifications(channel: string, signal: AbortSignal): Promise<void>;
  /** Device-specific setup such as switching on LEDs */
  configure?(signal: AbortSignal): Promise<void>;
  /** Turn one notification payload into readings stamped with `timestamp` */
  decode(characteristicId: string, value: Uint8Array, timestamp: number): SensorReading[];
}

/**
 * Picks a driver for an advertised peripheral; null for unsupported models
 */
export type DriverFactory = (peripheral: DiscoveredPeripheral) => PeripheralDriver | null;
