/**
 * Pulse Beat Detector
 *
 * Turns a raw optical (PPG) waveform into discrete cardiac beats with
 * onset / systolic peak / offset landmarks.
 *
 * Pipeline:
 * 1. Remove the mean and band-pass filter (0.5-8 Hz, zero-phase)
 * 2. Find local maxima at least `minPeakDistanceSeconds` apart whose
 *    prominence exceeds `prominenceMultiplier` x std dev
 * 3. For each peak, take the lowest point between it and the neighbouring
 *    peaks (or a fixed edge window) as onset / offset
 *
 * @module signal/analysis/beat-detector
 */

import { DEFAULT_BEAT_DETECTION_CONFIG, DEFAULT_FILTER_CONFIG, DEFAULT_SAMPLE_RATE } from '../../config/defaults';
import type { BeatDetectionConfig, BeatFeature } from '../../types';
import type { LogTarget } from '../../utils/logger';
import { createLogger } from '../../utils/logger';
import { argMin, mean, rangeMin, standardDeviation } from '../../utils/statistics';
import { ButterworthFilter } from '../filters/butterworth';

export interface BeatDetectorOptions extends Partial<BeatDetectionConfig> {
  filterOrder?: number;
  /** Time source for signals without timestamps (epoch ms) */
  clock?: () => number;
  logger?: LogTarget;
}

export interface DetectBeatsInput {
  /** Per-sample epoch-ms timestamps; used when long enough to cover every landmark */
  timestamps?: readonly number[];
  /** Per-sample IR DC baseline, copied onto each beat at its peak */
  irDcValues?: readonly number[];
  /** Epoch ms of sample 0 when `timestamps` is absent; defaults to clock() minus the signal duration */
  startTime?: number;
}

export class PulseBeatDetector {
  readonly sampleRate: number;
  readonly config: Readonly<BeatDetectionConfig>;

  private readonly bandpass: ButterworthFilter;
  private readonly clock: () => number;
  private readonly logger: LogTarget;

  constructor(sampleRate: number = DEFAULT_SAMPLE_RATE, options: BeatDetectorOptions = {}) {
    const { filterOrder, clock, logger, ...overrides } = options;
    this.sampleRate = sampleRate;
    this.config = { ...DEFAULT_BEAT_DETECTION_CONFIG, ...overrides };
    this.clock = clock ?? Date.now;
    this.logger = logger ?? createLogger('signal:beats');

    this.bandpass = new ButterworthFilter({
      type: 'bandpass',
      low: this.config.bandpassLowHz,
      high: this.config.bandpassHighHz,
      sampleRate,
      order: filterOrder ?? DEFAULT_FILTER_CONFIG.order,
    });
  }

  /**
   * Detect beats in `signal`. Returns `[]` for fewer than 3 samples or
   * fewer than 2 accepted peaks.
   */
  detectBeats(signal: readonly number[], input: DetectBeatsInput = {}): BeatFeature[] {
    if (signal.length < 3) return [];

    const filtered = this.filter(signal);
    const minDistance = Math.max(1, Math.floor(this.config.minPeakDistanceSeconds * this.sampleRate));
    const threshold = this.prominenceThreshold(filtered);
    const peaks = findPeaks(filtered, minDistance, threshold);

    if (peaks.length < 2) {
      this.logger.debug('Too few peaks for beat extraction', { peaks: peaks.length, samples: signal.length });
      return [];
    }

    const edgeSamples = Math.floor(this.config.edgeSearchSeconds * this.sampleRate);
    const timeOf = this.timeResolver(signal.length, input);
    const beats: BeatFeature[] = [];

    for (let i = 0; i < peaks.length; i++) {
      const peakIndex = peaks[i];

      const searchStart = i === 0 ? Math.max(0, peakIndex - edgeSamples) : peaks[i - 1];
      if (searchStart >= peakIndex) continue;
      const onsetIndex = argMin(filtered, searchStart, peakIndex - 1);

      const searchEnd =
        i === peaks.length - 1 ? Math.min(signal.length - 1, peakIndex + edgeSamples) : peaks[i + 1];
      if (peakIndex >= searchEnd) continue;
      const offsetIndex = argMin(filtered, peakIndex, searchEnd);

      if (!(onsetIndex < peakIndex && peakIndex < offsetIndex)) continue;
      if (offsetIndex >= signal.length) continue;

      const irDc = input.irDcValues?.[peakIndex];

      beats.push(
        Object.freeze({
          onsetIndex,
          peakIndex,
          offsetIndex,
          onsetTime: timeOf(onsetIndex),
          peakTime: timeOf(peakIndex),
          offsetTime: timeOf(offsetIndex),
          riseTime: (peakIndex - onsetIndex) / this.sampleRate,
          fallTime: (offsetIndex - peakIndex) / this.sampleRate,
          peakAmplitude: signal[peakIndex],
          onsetAmplitude: signal[onsetIndex],
          ...(irDc !== undefined && Number.isFinite(irDc) ? { irDcMean: irDc } : {}),
        })
      );
    }

    return beats;
  }

  /**
   * Mean-removed, zero-phase band-passed copy of `signal`
   */
  filter(signal: readonly number[]): number[] {
    const offset = mean(signal);
    return this.bandpass.filtfilt(signal.map((v) => v - offset));
  }

  /**
   * Prominence threshold for `filtered`, or `null` when the check is skipped
   */
  private prominenceThreshold(filtered: readonly number[]): number | null {
    const relative = standardDeviation(filtered, false) * this.config.prominenceMultiplier;
    const threshold = Math.max(relative, this.config.minimumProminence);
    return threshold > 0 ? threshold : null;
  }

  private timeResolver(length: number, input: DetectBeatsInput): (index: number) => number {
    const { timestamps } = input;
    if (timestamps && timestamps.length >= length) {
      return (index) => timestamps[index];
    }

    const msPerSample = 1000 / this.sampleRate;
    const start = input.startTime ?? this.clock() - length * msPerSample;
    return (index) => start + index * msPerSample;
  }
}

/**
 * Local maxima (over +/-2 samples) that are `minDistance` apart and, when
 * `minProminence` is set, rise at least that far above the higher of the
 * lowest points within `minDistance` on either side.
 */
export function findPeaks(
  signal: readonly number[],
  minDistance: number,
  minProminence: number | null
): number[] {
  const peaks: number[] = [];

  for (let i = 2; i < signal.length - 2; i++) {
    const current = signal[i];

    if (!(current > signal[i - 1] && current > signal[i + 1])) continue;
    if (!(current > signal[i - 2] && current > signal[i + 2])) continue;

    if (minProminence !== null) {
      const leftMin = rangeMin(signal, i - minDistance, i, current);
      const rightMin = rangeMin(signal, i + 1, i + minDistance + 1, current);
      if (current - Math.max(leftMin, rightMin) < minProminence) continue;
    }

    const lastPeak = peaks[peaks.length - 1];
    if (lastPeak !== undefined && i - lastPeak < minDistance) continue;

    peaks.push(i);
  }

  return peaks;
}
