/**
 * Default configuration values
 * @module config/defaults
 */

import type {
  BeatDetectionConfig,
  ConnectionConfig,
  EngineConfig,
  EngineConfigOverrides,
  FilterConfig,
  HRVConfig,
  IRDCConfig,
  PipelineConfig,
  ReadingRouterConfig,
} from '../types';

/**
 * Nominal PPG sample rate of the optical device (Hz)
 */
export const DEFAULT_SAMPLE_RATE = 50;

export const DEFAULT_FILTER_CONFIG: Readonly<FilterConfig> = Object.freeze({
  order: 4,
});

export const DEFAULT_BEAT_DETECTION_CONFIG: Readonly<BeatDetectionConfig> = Object.freeze({
  minPeakDistanceSeconds: 0.4,
  prominenceMultiplier: 0.5,
  minimumProminence: 0,
  bandpassLowHz: 0.5,
  bandpassHighHz: 8.0,
  edgeSearchSeconds: 0.8,
});

export const DEFAULT_IRDC_CONFIG: Readonly<IRDCConfig> = Object.freeze({
  lowpassCutoffHz: 0.8,
  rollingWindowSeconds: 5.0,
  referenceWindowSeconds: 1.0,
  bufferSeconds: 60,
  occlusionShiftThreshold: 1000,
});

export const DEFAULT_HRV_CONFIG: Readonly<HRVConfig> = Object.freeze({
  embeddingDimension: 3,
  windowSeconds: 5.0,
  maxPeakHistory: 100,
  minRRSeconds: 0.33,
  maxRRSeconds: 1.5,
  singularValueEpsilon: 1e-10,
});

export const DEFAULT_ROUTER_CONFIG: Readonly<ReadingRouterConfig> = Object.freeze({
  historyCapacity: 1000,
  evictionChunk: 100,
  sampleHistoryCapacity: 1000,
  ppgValidityFloor: 100,
});

export const DEFAULT_CONNECTION_CONFIG: Readonly<ConnectionConfig> = Object.freeze({
  stepTimeoutMs: 10_000,
  connectTimeoutMs: 15_000,
  maxReconnectAttempts: 5,
  reconnectBaseDelayMs: 1_000,
  reconnectMaxDelayMs: 15_000,
  rssiPollIntervalMs: 5_000,
  staleThresholdMs: 30_000,
  autoReconnectScanMs: 3_000,
});

export const DEFAULT_PIPELINE_CONFIG: Readonly<PipelineConfig> = Object.freeze({
  sampleRate: DEFAULT_SAMPLE_RATE,
  beatChannel: 'green',
  analysisWindowSeconds: 10,
  analysisHopSeconds: 2,
  hrvWindowSeconds: 5,
});

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  filter: DEFAULT_FILTER_CONFIG,
  beatDetection: DEFAULT_BEAT_DETECTION_CONFIG,
  irdc: DEFAULT_IRDC_CONFIG,
  hrv: DEFAULT_HRV_CONFIG,
  router: DEFAULT_ROUTER_CONFIG,
  connection: DEFAULT_CONNECTION_CONFIG,
  pipeline: DEFAULT_PIPELINE_CONFIG,
});

/**
 * Merge per-section overrides onto the defaults
 */
export function resolveConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  return {
    filter: { ...DEFAULT_FILTER_CONFIG, ...overrides.filter },
    beatDetection: { ...DEFAULT_BEAT_DETECTION_CONFIG, ...overrides.beatDetection },
    irdc: { ...DEFAULT_IRDC_CONFIG, ...overrides.irdc },
    hrv: { ...DEFAULT_HRV_CONFIG, ...overrides.hrv },
    router: { ...DEFAULT_ROUTER_CONFIG, ...overrides.router },
    connection: { ...DEFAULT_CONNECTION_CONFIG, ...overrides.connection },
    pipeline: { ...DEFAULT_PIPELINE_CONFIG, ...overrides.pipeline },
  };
}
