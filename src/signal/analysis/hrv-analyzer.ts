/**
 * HRV Biomarker Extractor
 *
 * Keeps a bounded history of beat peak times and derives RR-interval
 * statistics over a trailing window:
 * - SDNN and RMSSD (milliseconds)
 * - leading singular values of the delay-embedded RR series, whose s1/s2
 *   ratio is a candidate marker for separating sleep bruxism from
 *   ordinary arousals
 *
 * @module signal/analysis/hrv-analyzer
 */

import { DEFAULT_HRV_CONFIG } from '../../config/defaults';
import type { BeatFeature, HRVConfig, HRVResult, HRVSVDResult } from '../../types';
import type { LogTarget } from '../../utils/logger';
import { createLogger } from '../../utils/logger';
import { rmssd, standardDeviation } from '../../utils/statistics';
import { singularValues } from './svd';

export interface HRVAnalyzerOptions extends Partial<HRVConfig> {
  /** Epoch-ms clock used when `analyzeWindow` gets no end time */
  clock?: () => number;
  logger?: LogTarget;
}

export class HRVAnalyzer {
  readonly config: Readonly<HRVConfig>;

  private readonly peaks: number[] = [];
  private readonly clock: () => number;
  private readonly logger: LogTarget;

  constructor(options: HRVAnalyzerOptions = {}) {
    const { clock, logger, ...overrides } = options;
    this.config = { ...DEFAULT_HRV_CONFIG, ...overrides };
    this.clock = clock ?? Date.now;
    this.logger = logger ?? createLogger('signal:hrv');
  }

  /** Stored peak times (epoch ms), ascending */
  get peakTimes(): readonly number[] {
    return this.peaks;
  }

  // ==========================================================================
  // Peak history
  // ==========================================================================

  addPeakTime(time: number): void {
    if (!Number.isFinite(time)) return;

    let index = this.peaks.length;
    while (index > 0 && this.peaks[index - 1] > time) index--;
    this.peaks.splice(index, 0, time);

    const excess = this.peaks.length - this.config.maxPeakHistory;
    if (excess > 0) {
      this.peaks.splice(0, excess);
    }
  }

  addBeats(beats: readonly BeatFeature[]): void {
    for (const beat of beats) {
      this.addPeakTime(beat.peakTime);
    }
  }

  reset(): void {
    this.peaks.length = 0;
  }

  // ==========================================================================
  // RR intervals
  // ==========================================================================

  /**
   * RR intervals (seconds) for peaks in [start, end), extended by one peak
   * on each side and limited to the physiological range.
   */
  getRRIntervals(start: number, end: number): number[] {
    const inWindow: number[] = [];
    let previous: number | undefined;
    let next: number | undefined;

    for (const t of this.peaks) {
      if (t < start) {
        previous = t;
      } else if (t < end) {
        inWindow.push(t);
      } else if (next === undefined) {
        next = t;
      }
    }

    if (inWindow.length < 2) return [];

    const relevant = [
      ...(previous !== undefined ? [previous] : []),
      ...inWindow,
      ...(next !== undefined ? [next] : []),
    ];

    const intervals: number[] = [];
    for (let i = 1; i < relevant.length; i++) {
      const rr = (relevant[i] - relevant[i - 1]) / 1000;
      if (rr >= this.config.minRRSeconds && rr <= this.config.maxRRSeconds) {
        intervals.push(rr);
      }
    }
    return intervals;
  }

  // ==========================================================================
  // Metrics
  // ==========================================================================

  /**
   * Sample standard deviation of RR intervals, in ms
   */
  calculateSDNN(rr: readonly number[]): number {
    if (rr.length < 2) return 0;
    return standardDeviation(rr, false) * 1000;
  }

  /**
   * Root mean square of successive RR differences, in ms
   */
  calculateRMSSD(rr: readonly number[]): number {
    if (rr.length < 2) return 0;
    return rmssd(rr) * 1000;
  }

  /**
   * Singular values of the delay-embedding matrix whose rows are
   * [rr[i], rr[i+1], ..., rr[i+dim-1]].
   */
  calculateSVDBiomarker(rr: readonly number[]): HRVSVDResult | null {
    const dim = this.config.embeddingDimension;
    if (rr.length < dim + 1) return null;

    const rows = rr.length - dim;
    const matrix: number[][] = [];
    for (let i = 0; i < rows; i++) {
      matrix.push(rr.slice(i, i + dim));
    }

    const values = singularValues(matrix, this.logger);
    if (!values || values.length === 0) return null;

    const [s1, s2] = values;
    if (s2 === undefined) return { s1 };
    if (s2 > this.config.singularValueEpsilon) return { s1, s2, ratio: s1 / s2 };
    return { s1, s2 };
  }

  /**
   * HRV over the `windowSeconds` ending at `end` (epoch ms)
   */
  analyzeWindow(windowSeconds: number = this.config.windowSeconds, end: number = this.clock()): HRVResult {
    const rr = this.getRRIntervals(end - windowSeconds * 1000, end);

    return {
      sdnnMs: this.calculateSDNN(rr),
      rmssdMs: this.calculateRMSSD(rr),
      svd: this.calculateSVDBiomarker(rr),
      rrCount: rr.length,
      windowSeconds,
      isValid: rr.length >= 3,
    };
  }
}

/**
 * True when the result carries an SVD ratio above `threshold`. The caller
 * supplies the threshold; there is no validated default.
 */
export function exceedsRatioThreshold(result: HRVResult, threshold: number): boolean {
  const ratio = result.svd?.ratio;
  return ratio !== undefined && ratio > threshold;
}
