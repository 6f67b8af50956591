/**
 * Configuration Type Definitions
 *
 * Every tuned constant in the engine lives here rather than in code:
 * peak-detection thresholds, the occlusion-shift threshold, timeouts,
 * retry counts and history capacities.
 *
 * @module types/config
 */

/**
 * Butterworth design shared by the beat detector and IR DC analyzer
 */
export interface FilterConfig {
  /** Even filter order per band edge */
  order: number;
}

export interface BeatDetectionConfig {
  /** Minimum time between accepted peaks (0.4 s caps the rate at 150/min) */
  minPeakDistanceSeconds: number;
  /** Prominence threshold as a multiple of the filtered signal's std dev */
  prominenceMultiplier: number;
  /** Absolute prominence floor; 0 disables it */
  minimumProminence: number;
  bandpassLowHz: number;
  bandpassHighHz: number;
  /** Onset look-back / offset look-ahead at the ends of the peak sequence */
  edgeSearchSeconds: number;
}

export interface IRDCConfig {
  lowpassCutoffHz: number;
  rollingWindowSeconds: number;
  /** Early sub-window used as the shift reference */
  referenceWindowSeconds: number;
  /** Streaming buffer length */
  bufferSeconds: number;
  /** Shift (ADC units) above which an occlusion is flagged */
  occlusionShiftThreshold: number;
}

export interface HRVConfig {
  embeddingDimension: number;
  windowSeconds: number;
  maxPeakHistory: number;
  /** Physiological RR bounds in seconds */
  minRRSeconds: number;
  maxRRSeconds: number;
  /** Singular values at or below this count as zero when forming the ratio */
  singularValueEpsilon: number;
}

export interface ReadingRouterConfig {
  historyCapacity: number;
  /** Minimum number of entries dropped once the history overflows */
  evictionChunk: number;
  sampleHistoryCapacity: number;
  /** Infrared value a PPG batch must exceed to produce a sample */
  ppgValidityFloor: number;
}

export interface ConnectionConfig {
  /** Timeout for each discovery/notification step */
  stepTimeoutMs: number;
  connectTimeoutMs: number;
  maxReconnectAttempts: number;
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
  rssiPollIntervalMs: number;
  staleThresholdMs: number;
  /** Scan time before auto-reconnect picks a remembered device */
  autoReconnectScanMs: number;
}

export interface PipelineConfig {
  sampleRate: number;
  /** Channel fed to the beat detector */
  beatChannel: 'green' | 'ir';
  analysisWindowSeconds: number;
  analysisHopSeconds: number;
  hrvWindowSeconds: number;
}

export interface EngineConfig {
  filter: FilterConfig;
  beatDetection: BeatDetectionConfig;
  irdc: IRDCConfig;
  hrv: HRVConfig;
  router: ReadingRouterConfig;
  connection: ConnectionConfig;
  pipeline: PipelineConfig;
}

/**
 * Partial overrides, one level deep per section
 */
export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: Partial<EngineConfig[K]>;
};
