/**
 * Devices remembered for auto-reconnect
 * @module ble/remembered-devices
 */

export interface RememberedDevice {
  readonly id: string;
  readonly name: string;
  /** Epoch ms of the last successful connection */
  readonly lastConnectedAt: number;
}

/**
 * Storage for remembered devices. Hosts persist it however they like;
 * the engine only needs these three calls.
 */
export interface RememberedDeviceStore {
  remember(device: RememberedDevice): void;
  forget(peripheralId: string): void;
  /** Most recently connected first */
  list(): RememberedDevice[];
}

export class InMemoryRememberedDeviceStore implements RememberedDeviceStore {
  private readonly devices = new Map<string, RememberedDevice>();

  constructor(initial: readonly RememberedDevice[] = []) {
    for (const device of initial) {
      this.devices.set(device.id, device);
    }
  }

  remember(device: RememberedDevice): void {
    this.devices.set(device.id, device);
  }

  forget(peripheralId: string): void {
    this.devices.delete(peripheralId);
  }

  list(): RememberedDevice[] {
    return [...this.devices.values()].sort((a, b) => b.lastConnectedAt - a.lastConnectedAt);
  }
}
