/**
 * Pulse beat landmarks and morphology helpers
 * @module types/beat
 */

/**
 * One detected cardiac beat. Frozen once detected.
 */
export interface BeatFeature {
  readonly onsetIndex: number;
  readonly peakIndex: number;
  readonly offsetIndex: number;
  /** Epoch milliseconds */
  readonly onsetTime: number;
  readonly peakTime: number;
  readonly offsetTime: number;
  /** Onset to peak, seconds */
  readonly riseTime: number;
  /** Peak to offset, seconds */
  readonly fallTime: number;
  /** Raw signal value at the peak */
  readonly peakAmplitude: number;
  /** Raw signal value at the onset */
  readonly onsetAmplitude: number;
  /** IR DC baseline at the peak, when supplied */
  readonly irDcMean?: number;
}

export function pulseAmplitude(beat: BeatFeature): number {
  return beat.peakAmplitude - beat.onsetAmplitude;
}

/**
 * Rise time / fall time; 0 when the fall time is 0
 */
export function symmetryRatio(beat: BeatFeature): number {
  return beat.fallTime > 0 ? beat.riseTime / beat.fallTime : 0;
}

export function durationSeconds(beat: BeatFeature): number {
  return beat.riseTime + beat.fallTime;
}

export function instantaneousBpm(beat: BeatFeature): number {
  const duration = durationSeconds(beat);
  return duration > 0 ? 60 / duration : 0;
}

/**
 * Rise 50-200 ms, fall 150-500 ms, symmetry 0.1-1.0
 */
export function hasValidTiming(beat: BeatFeature): boolean {
  const riseMs = beat.riseTime * 1000;
  const fallMs = beat.fallTime * 1000;
  const symmetry = symmetryRatio(beat);

  return (
    riseMs >= 50 &&
    riseMs <= 200 &&
    fallMs >= 150 &&
    fallMs <= 500 &&
    symmetry >= 0.1 &&
    symmetry <= 1.0
  );
}

/**
 * Morphology score in [0, 1]: rise time (0.3), fall time (0.3), symmetry (0.4)
 */
export function morphologyQuality(beat: BeatFeature): number {
  const riseMs = beat.riseTime * 1000;
  const fallMs = beat.fallTime * 1000;
  const symmetry = symmetryRatio(beat);
  let score = 0;

  if (riseMs >= 80 && riseMs <= 150) {
    score += 0.3;
  } else if (riseMs >= 50 && riseMs <= 200) {
    score += 0.15;
  }

  if (fallMs >= 200 && fallMs <= 400) {
    score += 0.3;
  } else if (fallMs >= 150 && fallMs <= 500) {
    score += 0.15;
  }

  if (symmetry >= 0.3 && symmetry <= 0.5) {
    score += 0.4;
  } else if (symmetry >= 0.2 && symmetry <= 0.7) {
    score += 0.2;
  }

  return Math.min(1, score);
}
