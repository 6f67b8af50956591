/**
 * Folds batches of single-channel readings into per-device samples.
 *
 * Optical devices need a fresh infrared value above the validity floor;
 * channels missing from the batch fall back to the device's previous
 * values, then to 0. EMG devices need a positive muscle reading.
 *
 * @module readings/sample-builder
 */

import { DEFAULT_ROUTER_CONFIG } from '../config/defaults';
import type {
  DeviceType,
  EMGSensorSample,
  PPGSensorSample,
  SensorReading,
  SensorSample,
  SensorType,
} from '../types';
import { isReadingValid } from '../types';

export interface ReadingSource {
  deviceId: string;
  deviceType: DeviceType;
}

/**
 * Last valid reading of each type within `batch`
 */
export function lastValidByType(batch: readonly SensorReading[]): Map<SensorType, SensorReading> {
  const result = new Map<SensorType, SensorReading>();
  for (const reading of batch) {
    if (isReadingValid(reading)) {
      result.set(reading.sensorType, reading);
    }
  }
  return result;
}

export class SampleBuilder {
  private readonly deviceState = new Map<string, Map<SensorType, number>>();

  constructor(private readonly ppgValidityFloor: number = DEFAULT_ROUTER_CONFIG.ppgValidityFloor) {}

  /**
   * Sample for `source` from `batch`, or null when the batch carries no
   * usable primary channel
   */
  build(batch: readonly SensorReading[], source: ReadingSource): SensorSample | null {
    if (batch.length === 0) return null;

    const fresh = lastValidByType(batch);
    const state = this.stateFor(source.deviceId);
    for (const [type, reading] of fresh) {
      state.set(type, reading.value);
    }

    const timestamp = Math.max(...batch.map((r) => r.timestamp));

    return source.deviceType === 'ppg'
      ? this.buildPPG(fresh, state, source.deviceId, timestamp)
      : this.buildEMG(fresh, source.deviceId, timestamp);
  }

  reset(deviceId?: string): void {
    if (deviceId === undefined) {
      this.deviceState.clear();
    } else {
      this.deviceState.delete(deviceId);
    }
  }

  private stateFor(deviceId: string): Map<SensorType, number> {
    let state = this.deviceState.get(deviceId);
    if (!state) {
      state = new Map();
      this.deviceState.set(deviceId, state);
    }
    return state;
  }

  private buildPPG(
    fresh: ReadonlyMap<SensorType, SensorReading>,
    state: ReadonlyMap<SensorType, number>,
    deviceId: string,
    timestamp: number
  ): PPGSensorSample | null {
    const ir = fresh.get('ppgInfrared');
    if (!ir || ir.value <= this.ppgValidityFloor) return null;

    const value = (type: SensorType): number => state.get(type) ?? 0;
    const heartRate = fresh.get('heartRate');
    const spo2 = fresh.get('spo2');

    return {
      deviceType: 'ppg',
      deviceId,
      timestamp,
      ppg: { red: value('ppgRed'), ir: ir.value, green: value('ppgGreen') },
      accelerometer: {
        x: value('accelerometerX'),
        y: value('accelerometerY'),
        z: value('accelerometerZ'),
      },
      temperature: { celsius: value('temperature') },
      battery: { percentage: value('battery') },
      ...(heartRate ? { heartRate: { bpm: heartRate.value, quality: heartRate.quality ?? 1 } } : {}),
      ...(spo2 ? { spo2: { percentage: spo2.value, quality: spo2.quality ?? 1 } } : {}),
    };
  }

  private buildEMG(
    fresh: ReadonlyMap<SensorType, SensorReading>,
    deviceId: string,
    timestamp: number
  ): EMGSensorSample | null {
    const reading = fresh.get('emg') ?? fresh.get('muscleActivity');
    if (!reading || reading.value <= 0) return null;

    return { deviceType: 'emg', deviceId, timestamp, emg: { value: reading.value } };
  }
}
