/**
 * Discovered / connected device lists with the primary device.
 *
 * Holds denormalized readiness copies and is kept in step with the
 * readiness state machine as a registered `ReadinessView`.
 *
 * @module ble/device-directory
 */

import type { DeviceType } from '../types';
import type { ConnectionReadiness } from './readiness';
import { Readiness } from './readiness';
import type { ReadinessView } from './readiness-machine';

export interface DeviceInfo {
  readonly id: string;
  readonly name: string;
  readonly deviceType: DeviceType;
  /** Last known RSSI in dBm */
  readonly signalStrength: number;
  readonly readiness: ConnectionReadiness;
}

export class DeviceDirectory implements ReadinessView {
  private readonly discovered = new Map<string, DeviceInfo>();
  private readonly connectedIds: string[] = [];
  private primaryId: string | null = null;

  get discoveredDevices(): DeviceInfo[] {
    return [...this.discovered.values()];
  }

  get connectedDevices(): DeviceInfo[] {
    return this.connectedIds.flatMap((id) => {
      const device = this.discovered.get(id);
      return device ? [device] : [];
    });
  }

  get primaryDevice(): DeviceInfo | null {
    return this.primaryId === null ? null : (this.discovered.get(this.primaryId) ?? null);
  }

  get(peripheralId: string): DeviceInfo | undefined {
    return this.discovered.get(peripheralId);
  }

  has(peripheralId: string): boolean {
    return this.discovered.has(peripheralId);
  }

  /**
   * Add a newly advertised device or refresh a known one
   */
  upsert(device: Omit<DeviceInfo, 'readiness'>, readiness: ConnectionReadiness = Readiness.disconnected): DeviceInfo {
    const existing = this.discovered.get(device.id);
    const next: DeviceInfo = existing
      ? { ...existing, name: device.name, signalStrength: device.signalStrength }
      : { ...device, readiness };
    this.discovered.set(device.id, next);
    return next;
  }

  updateSignalStrength(peripheralId: string, rssi: number): void {
    const device = this.discovered.get(peripheralId);
    if (device) {
      this.discovered.set(peripheralId, { ...device, signalStrength: rssi });
    }
  }

  applyReadiness(peripheralId: string, readiness: ConnectionReadiness): void {
    const device = this.discovered.get(peripheralId);
    if (device) {
      this.discovered.set(peripheralId, { ...device, readiness });
    }
  }

  /**
   * Mark connected; becomes primary when there is none
   */
  markConnected(peripheralId: string): void {
    if (!this.discovered.has(peripheralId)) return;
    if (!this.connectedIds.includes(peripheralId)) {
      this.connectedIds.push(peripheralId);
    }
    if (this.primaryId === null) {
      this.primaryId = peripheralId;
    }
  }

  /**
   * Remove from the connected list; the primary moves to the next connected device
   */
  markDisconnected(peripheralId: string): void {
    const index = this.connectedIds.indexOf(peripheralId);
    if (index >= 0) {
      this.connectedIds.splice(index, 1);
    }
    if (this.primaryId === peripheralId) {
      this.primaryId = this.connectedIds[0] ?? null;
    }
  }

  isConnected(peripheralId: string): boolean {
    return this.connectedIds.includes(peripheralId);
  }

  get connectedIdList(): readonly string[] {
    return this.connectedIds;
  }

  clear(): void {
    this.discovered.clear();
    this.connectedIds.length = 0;
    this.primaryId = null;
  }
}
