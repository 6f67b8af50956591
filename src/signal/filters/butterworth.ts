/**
 * Butterworth IIR Filter
 *
 * Even-order Butterworth low-pass, high-pass and band-pass filters realised
 * as cascaded second-order sections (bilinear transform with frequency
 * prewarping). Each section runs in direct form II transposed.
 *
 * Two operating modes:
 * - streaming: `processSample` keeps recursive state between calls
 * - batch zero-phase: `filtfilt` runs forward then backward
 *
 * A band-pass of order N is a high-pass of order N at `low` cascaded with a
 * low-pass of order N at `high`.
 *
 * @module signal/filters/butterworth
 */

import {
  ValidationError,
  validateCutoff,
  validateSampleRate,
} from '../../utils/validation';

export type ButterworthType = 'lowpass' | 'highpass' | 'bandpass';

export type ButterworthSpec =
  | {
      type: 'lowpass' | 'highpass';
      /** Cutoff in Hz */
      cutoff: number;
      sampleRate: number;
      /** Even order, default 4 */
      order?: number;
    }
  | {
      type: 'bandpass';
      low: number;
      high: number;
      sampleRate: number;
      order?: number;
    };

/**
 * Normalised biquad coefficients (a0 = 1)
 */
export interface BiquadCoefficients {
  readonly b0: number;
  readonly b1: number;
  readonly b2: number;
  readonly a1: number;
  readonly a2: number;
}

class BiquadSection {
  private z1 = 0;
  private z2 = 0;

  constructor(readonly coefficients: BiquadCoefficients) {}

  step(x: number): number {
    const { b0, b1, b2, a1, a2 } = this.coefficients;
    const y = b0 * x + this.z1;
    this.z1 = b1 * x - a1 * y + this.z2;
    this.z2 = b2 * x - a2 * y;
    return y;
  }

  reset(): void {
    this.z1 = 0;
    this.z2 = 0;
  }
}

/**
 * Pole-pair quality factors of an order-N Butterworth prototype
 */
export function butterworthQFactors(order: number): number[] {
  const qs: number[] = [];
  for (let k = 0; k < order / 2; k++) {
    qs.push(1 / (2 * Math.sin(((2 * k + 1) * Math.PI) / (2 * order))));
  }
  return qs;
}

function designSection(
  kind: 'lowpass' | 'highpass',
  cutoff: number,
  sampleRate: number,
  q: number
): BiquadCoefficients {
  const k = Math.tan((Math.PI * cutoff) / sampleRate);
  const k2 = k * k;
  const norm = 1 / (1 + k / q + k2);
  const a1 = 2 * (k2 - 1) * norm;
  const a2 = (1 - k / q + k2) * norm;

  if (kind === 'lowpass') {
    const b0 = k2 * norm;
    return { b0, b1: 2 * b0, b2: b0, a1, a2 };
  }
  return { b0: norm, b1: -2 * norm, b2: norm, a1, a2 };
}

function designCascade(
  kind: 'lowpass' | 'highpass',
  cutoff: number,
  sampleRate: number,
  order: number
): BiquadCoefficients[] {
  return butterworthQFactors(order).map((q) => designSection(kind, cutoff, sampleRate, q));
}

function validateOrder(order: unknown): number {
  if (typeof order !== 'number' || !Number.isInteger(order) || order < 2 || order % 2 !== 0) {
    throw new ValidationError('Filter order must be an even integer >= 2', 'order', order);
  }
  return order;
}

export class ButterworthFilter {
  readonly type: ButterworthType;
  readonly sampleRate: number;
  readonly order: number;
  /** [cutoff] for low/high-pass, [low, high] for band-pass */
  readonly cutoffs: readonly number[];

  private readonly sections: BiquadSection[];

  constructor(spec: ButterworthSpec) {
    this.type = spec.type;
    this.sampleRate = validateSampleRate(spec.sampleRate);
    this.order = validateOrder(spec.order ?? 4);

    let designs: BiquadCoefficients[];
    if (spec.type === 'bandpass') {
      const low = validateCutoff(spec.low, this.sampleRate, 'low');
      const high = validateCutoff(spec.high, this.sampleRate, 'high');
      if (low >= high) {
        throw new ValidationError('Band-pass low cutoff must be below high cutoff', 'low', low);
      }
      this.cutoffs = [low, high];
      designs = [
        ...designCascade('highpass', low, this.sampleRate, this.order),
        ...designCascade('lowpass', high, this.sampleRate, this.order),
      ];
    } else {
      const cutoff = validateCutoff(spec.cutoff, this.sampleRate, 'cutoff');
      this.cutoffs = [cutoff];
      designs = designCascade(spec.type, cutoff, this.sampleRate, this.order);
    }

    this.sections = designs.map((c) => new BiquadSection(c));
  }

  get coefficients(): readonly BiquadCoefficients[] {
    return this.sections.map((s) => s.coefficients);
  }

  /**
   * Filter one sample, advancing the streaming state
   */
  processSample(input: number): number {
    let value = input;
    for (const section of this.sections) {
      value = section.step(value);
    }
    return value;
  }

  /**
   * Forward (causal) pass over `signal`, continuing from the current state
   */
  process(signal: readonly number[]): number[] {
    const output = new Array<number>(signal.length);
    for (let i = 0; i < signal.length; i++) {
      output[i] = this.processSample(signal[i]);
    }
    return output;
  }

  /**
   * Zero-phase forward-backward filtering.
   *
   * Signals of 3 samples or fewer are returned unchanged. Streaming state is
   * reset before and after.
   */
  filtfilt(signal: readonly number[]): number[] {
    if (signal.length <= 3) return [...signal];

    this.reset();
    const forward = this.process(signal);

    this.reset();
    const backward = this.process(forward.reverse());
    this.reset();

    return backward.reverse();
  }

  /**
   * Clear streaming state
   */
  reset(): void {
    for (const section of this.sections) {
      section.reset();
    }
  }

  /**
   * Magnitude response |H(f)| of the cascade at `frequency` Hz
   */
  magnitudeAt(frequency: number): number {
    const w = (2 * Math.PI * frequency) / this.sampleRate;
    const cos1 = Math.cos(w);
    const sin1 = Math.sin(w);
    const cos2 = Math.cos(2 * w);
    const sin2 = Math.sin(2 * w);

    let magnitude = 1;
    for (const { b0, b1, b2, a1, a2 } of this.coefficients) {
      const numRe = b0 + b1 * cos1 + b2 * cos2;
      const numIm = -(b1 * sin1 + b2 * sin2);
      const denRe = 1 + a1 * cos1 + a2 * cos2;
      const denIm = -(a1 * sin1 + a2 * sin2);
      magnitude *= Math.hypot(numRe, numIm) / Math.hypot(denRe, denIm);
    }
    return magnitude;
  }
}
