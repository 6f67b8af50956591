/**
 * In-memory stand-in for a platform BLE adapter
 */

import type {
  BleTransport,
  BluetoothState,
  TransportEvent,
  TransportEventListener,
} from '../../src/ble/transport';
import type { Unsubscribe } from '../../src/utils/listeners';

/**
 * - succeed: link comes up, `deviceConnected` is emitted, connect resolves
 * - fail: connect rejects
 * - hang: connect settles only when its signal aborts
 */
export type ConnectBehavior = 'succeed' | 'fail' | 'hang';

export class FakeTransport implements BleTransport {
  state: BluetoothState;
  connectBehavior: ConnectBehavior = 'succeed';

  readonly connectCalls: string[] = [];
  readonly disconnectCalls: string[] = [];
  readonly rssi = new Map<string, number>();

  private scanning = false;
  private readonly links = new Set<string>();
  private readonly listeners = new Set<TransportEventListener>();
  private readonly queued: ConnectBehavior[] = [];

  constructor(state: BluetoothState = 'poweredOn') {
    this.state = state;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  isScanning(): boolean {
    return this.scanning;
  }

  startScanning(): void {
    this.scanning = true;
  }

  stopScanning(): void {
    this.scanning = false;
  }

  connect(peripheralId: string, signal?: AbortSignal): Promise<void> {
    this.connectCalls.push(peripheralId);

    switch (this.queued.shift() ?? this.connectBehavior) {
      case 'succeed':
        this.links.add(peripheralId);
        this.emit({ type: 'deviceConnected', peripheralId });
        return Promise.resolve();
      case 'fail':
        return Promise.reject(new Error('Link refused'));
      case 'hang':
        return new Promise<void>((_, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('Connect aborted')), { once: true });
        });
    }
  }

  disconnect(peripheralId: string): Promise<void> {
    this.disconnectCalls.push(peripheralId);
    if (this.links.delete(peripheralId)) {
      this.emit({ type: 'deviceDisconnected', peripheralId });
    }
    return Promise.resolve();
  }

  isConnected(peripheralId: string): boolean {
    return this.links.has(peripheralId);
  }

  readRssi(peripheralId: string): Promise<number> {
    const value = this.rssi.get(peripheralId);
    return value === undefined ? Promise.reject(new Error('RSSI unavailable')) : Promise.resolve(value);
  }

  subscribe(listener: TransportEventListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ==========================================================================
  // Test controls
  // ==========================================================================

  /** Behaviours for the next connect calls, before falling back to `connectBehavior` */
  queueConnect(...behaviors: ConnectBehavior[]): void {
    this.queued.push(...behaviors);
  }

  emit(event: TransportEvent): void {
    for (const listener of [...this.listeners]) listener(event);
  }

  advertise(peripheralId: string, name?: string, rssi = -60): void {
    this.emit({ type: 'deviceDiscovered', peripheral: { id: peripheralId, name, rssi } });
  }

  /** Drop the link as if the radio lost it */
  dropLink(peripheralId: string, error: Error = new Error('Link lost')): void {
    this.links.delete(peripheralId);
    this.emit({ type: 'deviceDisconnected', peripheralId, error });
  }

  /** Take the link down without telling anyone */
  severLink(peripheralId: string): void {
    this.links.delete(peripheralId);
  }

  setState(state: BluetoothState): void {
    this.state = state;
    this.emit({ type: 'bluetoothStateChanged', state });
  }

  notify(peripheralId: string, characteristicId: string, value: Uint8Array): void {
    this.emit({ type: 'characteristicUpdated', peripheralId, characteristicId, value });
  }
}
