/**
 * Signal processing exports
 * @module signal
 */

// Filters
export {
  ButterworthFilter,
  butterworthQFactors,
  type ButterworthSpec,
  type ButterworthType,
  type BiquadCoefficients,
} from './filters/butterworth';

// Beat detection
export {
  PulseBeatDetector,
  findPeaks,
  type BeatDetectorOptions,
  type DetectBeatsInput,
} from './analysis/beat-detector';

// IR DC baseline
export {
  IRDCAnalyzer,
  type IRDCAnalyzerOptions,
  type IRDCWindowAnalysis,
} from './analysis/irdc-analyzer';

// HRV
export {
  HRVAnalyzer,
  exceedsRatioThreshold,
  type HRVAnalyzerOptions,
} from './analysis/hrv-analyzer';
export { singularValues, gramMatrix } from './analysis/svd';
