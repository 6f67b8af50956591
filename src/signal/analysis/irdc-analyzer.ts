/**
 * IR DC Occlusion Analyzer
 *
 * Tracks the slow (DC) baseline of the infrared channel. A sustained drop
 * of the baseline against its early reference indicates tissue occlusion,
 * typically from jaw muscle contraction.
 *
 * Batch methods work on a whole window with zero-phase filtering; streaming
 * methods keep one minute of causally filtered DC values.
 *
 * @module signal/analysis/irdc-analyzer
 */

import { DEFAULT_FILTER_CONFIG, DEFAULT_IRDC_CONFIG, DEFAULT_SAMPLE_RATE } from '../../config/defaults';
import type { IRDCConfig, IRDCResult } from '../../types';
import { RingBuffer } from '../../utils/ring-buffer';
import { mean, rangeMean } from '../../utils/statistics';
import { ButterworthFilter } from '../filters/butterworth';

/** Below this many DC samples the shift is reported as 0 */
const MIN_SHIFT_SAMPLES = 10;

export interface IRDCAnalyzerOptions extends Partial<IRDCConfig> {
  filterOrder?: number;
}

export interface IRDCWindowAnalysis {
  dc: number[];
  rollingMean: number[];
  /** Values at the last sample; null for an empty window */
  latest: IRDCResult | null;
}

export class IRDCAnalyzer {
  readonly sampleRate: number;
  readonly config: Readonly<IRDCConfig>;

  private readonly batchFilter: ButterworthFilter;
  private readonly streamFilter: ButterworthFilter;
  private readonly buffer: RingBuffer<number>;

  constructor(sampleRate: number = DEFAULT_SAMPLE_RATE, options: IRDCAnalyzerOptions = {}) {
    const { filterOrder, ...overrides } = options;
    this.sampleRate = sampleRate;
    this.config = { ...DEFAULT_IRDC_CONFIG, ...overrides };

    const spec = {
      type: 'lowpass',
      cutoff: this.config.lowpassCutoffHz,
      sampleRate,
      order: filterOrder ?? DEFAULT_FILTER_CONFIG.order,
    } as const;
    this.batchFilter = new ButterworthFilter(spec);
    this.streamFilter = new ButterworthFilter(spec);
    this.buffer = new RingBuffer(Math.max(1, Math.round(this.config.bufferSeconds * sampleRate)));
  }

  private get rollingSamples(): number {
    return Math.max(1, Math.floor(this.config.rollingWindowSeconds * this.sampleRate));
  }

  private get referenceSamples(): number {
    return Math.max(1, Math.floor(this.config.referenceWindowSeconds * this.sampleRate));
  }

  // ==========================================================================
  // Batch
  // ==========================================================================

  /**
   * Zero-phase low-pass of the raw IR signal
   */
  extractDC(ir: readonly number[]): number[] {
    return this.batchFilter.filtfilt(ir);
  }

  /**
   * Centered rolling mean; the window shrinks at the edges
   */
  rollingMean(dc: readonly number[], windowSeconds?: number): number[] {
    const windowSamples = Math.floor((windowSeconds ?? this.config.rollingWindowSeconds) * this.sampleRate);
    const half = Math.floor(windowSamples / 2);

    return dc.map((_, i) => rangeMean(dc, i - half, i + half + 1));
  }

  /**
   * Mean of the reference window minus mean of the whole window.
   * Positive when the baseline dropped.
   */
  calculateShift(dc: readonly number[]): number {
    if (dc.length < MIN_SHIFT_SAMPLES) return 0;

    const reference = rangeMean(dc, 0, Math.min(this.referenceSamples, dc.length));
    return reference - mean(dc);
  }

  analyzeWindow(ir: readonly number[]): IRDCWindowAnalysis {
    const dc = this.extractDC(ir);
    const rolling = this.rollingMean(dc);

    if (dc.length === 0) {
      return { dc, rollingMean: rolling, latest: null };
    }

    const last = dc.length - 1;
    return {
      dc,
      rollingMean: rolling,
      latest: {
        dcValue: dc[last],
        rollingMean5s: rolling[last],
        shift5s: this.calculateShift(dc.slice(-this.rollingSamples)),
      },
    };
  }

  // ==========================================================================
  // Streaming
  // ==========================================================================

  processSample(ir: number): IRDCResult {
    this.buffer.push(this.streamFilter.processSample(ir));
    return this.current();
  }

  processBatch(irs: readonly number[]): IRDCResult {
    for (const ir of irs) {
      this.buffer.push(this.streamFilter.processSample(ir));
    }
    return this.current();
  }

  get currentDC(): number {
    return this.buffer.last() ?? 0;
  }

  /**
   * Mean of the newest rolling window of DC values
   */
  get currentRollingMean(): number {
    return mean(this.buffer.tail(this.rollingSamples));
  }

  /**
   * Shift over the newest rolling window; 0 until a reference window exists
   */
  get currentShift(): number {
    const window = this.buffer.tail(this.rollingSamples);
    if (window.length < this.referenceSamples) return 0;
    return this.calculateShift(window);
  }

  hasSignificantShift(threshold: number = this.config.occlusionShiftThreshold): boolean {
    return this.currentShift > threshold;
  }

  current(): IRDCResult {
    return {
      dcValue: this.currentDC,
      rollingMean5s: this.currentRollingMean,
      shift5s: this.currentShift,
    };
  }

  reset(): void {
    this.buffer.clear();
    this.streamFilter.reset();
  }
}
