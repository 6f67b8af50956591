/**
 * Biomarker result values handed to consumers (dashboards, storage)
 * @module types/biomarkers
 */

import type { BeatFeature } from './beat';

/**
 * Leading singular values of the delay-embedded RR matrix
 */
export interface HRVSVDResult {
  readonly s1: number;
  readonly s2?: number;
  /** s1 / s2, present only when s2 is meaningfully non-zero */
  readonly ratio?: number;
}

export interface HRVResult {
  readonly sdnnMs: number;
  readonly rmssdMs: number;
  readonly svd: HRVSVDResult | null;
  /** Intervals that survived the physiological range filter */
  readonly rrCount: number;
  readonly windowSeconds: number;
  /** At least 3 intervals */
  readonly isValid: boolean;
}

/**
 * IR baseline drift; a positive shift means the baseline dropped
 */
export interface IRDCResult {
  readonly dcValue: number;
  readonly rollingMean5s: number;
  readonly shift5s: number;
}

export interface BiomarkerSnapshot {
  /** Epoch milliseconds of the newest sample analysed */
  readonly timestamp: number;
  readonly irdc: IRDCResult;
  /** Beats first seen in this analysis pass */
  readonly beats: readonly BeatFeature[];
  readonly hrv: HRVResult;
}
