/**
 * Sensor reading and multi-channel sample types
 * @module types/sensor
 */

/**
 * Every channel a connected biosensor can report
 */
export const SENSOR_TYPES = [
  'ppgRed',
  'ppgInfrared',
  'ppgGreen',
  'emg',
  'muscleActivity',
  'accelerometerX',
  'accelerometerY',
  'accelerometerZ',
  'temperature',
  'battery',
  'heartRate',
  'spo2',
] as const;

export type SensorType = (typeof SENSOR_TYPES)[number];

/**
 * Primary optical (PPG) device vs. EMG-style comparison device
 */
export type DeviceType = 'ppg' | 'emg';

/**
 * One channel value at one instant. Never mutated after creation.
 */
export interface SensorReading {
  readonly sensorType: SensorType;
  readonly value: number;
  /** Signal quality 0..1, when the device reports one */
  readonly quality?: number;
  /** Epoch milliseconds */
  readonly timestamp: number;
  /** Peripheral that produced the reading */
  readonly deviceId?: string;
}

export interface PPGChannels {
  readonly red: number;
  readonly ir: number;
  readonly green: number;
}

export interface AccelerometerChannels {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

interface SampleBase {
  /** Epoch milliseconds */
  readonly timestamp: number;
  readonly deviceId: string;
}

/**
 * Coherent snapshot from the optical device
 */
export interface PPGSensorSample extends SampleBase {
  readonly deviceType: 'ppg';
  readonly ppg: PPGChannels;
  readonly accelerometer: AccelerometerChannels;
  readonly temperature: { readonly celsius: number };
  readonly battery: { readonly percentage: number };
  readonly heartRate?: { readonly bpm: number; readonly quality: number };
  readonly spo2?: { readonly percentage: number; readonly quality: number };
}

/**
 * Snapshot from the EMG comparison device; it reports muscle activity only
 */
export interface EMGSensorSample extends SampleBase {
  readonly deviceType: 'emg';
  readonly emg: { readonly value: number };
}

export type SensorSample = PPGSensorSample | EMGSensorSample;

/**
 * Plausible value range per channel
 */
const VALID_RANGES: Record<SensorType, readonly [number, number]> = {
  heartRate: [30, 250],
  spo2: [50, 100],
  temperature: [20, 45],
  battery: [0, 100],
  ppgRed: [0, Infinity],
  ppgInfrared: [0, Infinity],
  ppgGreen: [0, Infinity],
  emg: [0, Infinity],
  muscleActivity: [0, Infinity],
  accelerometerX: [-20, 20],
  accelerometerY: [-20, 20],
  accelerometerZ: [-20, 20],
};

/**
 * Whether a reading is finite and inside its channel's range
 */
export function isReadingValid(reading: SensorReading): boolean {
  if (!Number.isFinite(reading.value)) return false;
  const [min, max] = VALID_RANGES[reading.sensorType];
  return reading.value >= min && reading.value <= max;
}
