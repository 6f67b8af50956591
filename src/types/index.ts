/**
 * Type Definitions
 *
 * @module types
 */

export { SENSOR_TYPES, isReadingValid } from './sensor';
export type {
  SensorType,
  DeviceType,
  SensorReading,
  PPGChannels,
  AccelerometerChannels,
  PPGSensorSample,
  EMGSensorSample,
  SensorSample,
} from './sensor';

export {
  pulseAmplitude,
  symmetryRatio,
  durationSeconds,
  instantaneousBpm,
  hasValidTiming,
  morphologyQuality,
} from './beat';
export type { BeatFeature } from './beat';

export type { HRVSVDResult, HRVResult, IRDCResult, BiomarkerSnapshot } from './biomarkers';

export type {
  FilterConfig,
  BeatDetectionConfig,
  IRDCConfig,
  HRVConfig,
  ReadingRouterConfig,
  ConnectionConfig,
  PipelineConfig,
  EngineConfig,
  EngineConfigOverrides,
} from './config';
