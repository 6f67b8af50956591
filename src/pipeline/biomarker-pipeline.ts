/**
 * Biomarker Pipeline
 *
 * Feeds routed optical samples through the DSP core on a sliding window:
 * IR DC tracking on every sample, beat detection and HRV every hop once
 * the window is full.
 *
 * @module pipeline/biomarker-pipeline
 */

import { DEFAULT_PIPELINE_CONFIG } from '../config/defaults';
import type { ReadingRouter } from '../readings/reading-router';
import { PulseBeatDetector } from '../signal/analysis/beat-detector';
import { HRVAnalyzer } from '../signal/analysis/hrv-analyzer';
import { IRDCAnalyzer } from '../signal/analysis/irdc-analyzer';
import type {
  BeatDetectionConfig,
  BiomarkerSnapshot,
  HRVConfig,
  IRDCConfig,
  PipelineConfig,
  PPGSensorSample,
  SensorSample,
} from '../types';
import type { LogTarget } from '../utils/logger';
import { createLogger } from '../utils/logger';
import type { Unsubscribe } from '../utils/listeners';
import { ListenerSet } from '../utils/listeners';
import { RingBuffer } from '../utils/ring-buffer';
import { validatePositiveInteger, validateSampleRate } from '../utils/validation';

export type SnapshotListener = (snapshot: BiomarkerSnapshot) => void;

export interface BiomarkerPipelineOptions extends Partial<PipelineConfig> {
  beatDetection?: Partial<BeatDetectionConfig>;
  irdc?: Partial<IRDCConfig>;
  hrv?: Partial<HRVConfig>;
  logger?: LogTarget;
}

interface WindowSample {
  value: number;
  timestamp: number;
  dc: number;
}

export class BiomarkerPipeline {
  readonly config: Readonly<PipelineConfig>;

  private readonly irdc: IRDCAnalyzer;
  private readonly detector: PulseBeatDetector;
  private readonly hrv: HRVAnalyzer;
  private readonly logger: LogTarget;
  private readonly window: RingBuffer<WindowSample>;
  private readonly hopSamples: number;
  private readonly listeners: ListenerSet<Parameters<SnapshotListener>>;

  private samplesSinceAnalysis = 0;
  private lastPeakTime = -Infinity;
  private latest: BiomarkerSnapshot | null = null;

  constructor(options: BiomarkerPipelineOptions = {}) {
    const { beatDetection, irdc, hrv, logger, ...overrides } = options;
    this.config = { ...DEFAULT_PIPELINE_CONFIG, ...overrides };
    this.logger = logger ?? createLogger('pipeline');

    const sampleRate = validateSampleRate(this.config.sampleRate);
    const windowSamples = validatePositiveInteger(
      Math.round(this.config.analysisWindowSeconds * sampleRate),
      'analysisWindowSeconds'
    );
    this.hopSamples = validatePositiveInteger(
      Math.round(this.config.analysisHopSeconds * sampleRate),
      'analysisHopSeconds'
    );

    this.irdc = new IRDCAnalyzer(sampleRate, irdc);
    this.detector = new PulseBeatDetector(sampleRate, { ...beatDetection, logger: this.logger });
    this.hrv = new HRVAnalyzer({ ...hrv, logger: this.logger });
    this.window = new RingBuffer(windowSamples);
    this.listeners = new ListenerSet('snapshot', this.logger);
  }

  /** Most recent snapshot, or null before the first analysis */
  get lastSnapshot(): BiomarkerSnapshot | null {
    return this.latest;
  }

  /**
   * Analyse every optical sample the router produces
   */
  attach(router: ReadingRouter): Unsubscribe {
    return router.onSample((sample) => this.pushSample(sample));
  }

  onSnapshot(listener: SnapshotListener): Unsubscribe {
    return this.listeners.add(listener);
  }

  /**
   * Add one sample; returns the snapshot when this sample completed a hop.
   * EMG samples are ignored.
   */
  pushSample(sample: SensorSample): BiomarkerSnapshot | null {
    if (sample.deviceType !== 'ppg') return null;

    const irdc = this.irdc.processSample(sample.ppg.ir);
    this.window.push({ value: this.beatValue(sample), timestamp: sample.timestamp, dc: irdc.dcValue });
    this.samplesSinceAnalysis++;

    if (!this.window.isFull() || this.samplesSinceAnalysis < this.hopSamples) {
      return null;
    }

    this.samplesSinceAnalysis = 0;
    return this.analyze();
  }

  reset(): void {
    this.irdc.reset();
    this.hrv.reset();
    this.window.clear();
    this.samplesSinceAnalysis = 0;
    this.lastPeakTime = -Infinity;
    this.latest = null;
  }

  private beatValue(sample: PPGSensorSample): number {
    return this.config.beatChannel === 'ir' ? sample.ppg.ir : sample.ppg.green;
  }

  private analyze(): BiomarkerSnapshot {
    const window = this.window.toArray();
    const timestamps = window.map((s) => s.timestamp);
    const endTime = timestamps[timestamps.length - 1] ?? 0;

    const beats = this.detector.detectBeats(
      window.map((s) => s.value),
      { timestamps, irDcValues: window.map((s) => s.dc) }
    );

    const fresh = beats.filter((beat) => beat.peakTime > this.lastPeakTime);
    if (fresh.length > 0) {
      this.hrv.addBeats(fresh);
      this.lastPeakTime = fresh[fresh.length - 1]?.peakTime ?? this.lastPeakTime;
    }

    const snapshot: BiomarkerSnapshot = Object.freeze({
      timestamp: endTime,
      irdc: Object.freeze(this.irdc.current()),
      beats: Object.freeze(fresh),
      hrv: Object.freeze(this.hrv.analyzeWindow(this.config.hrvWindowSeconds, endTime)),
    });

    this.logger.debug('Biomarker snapshot', {
      beats: fresh.length,
      rrCount: snapshot.hrv.rrCount,
      shift: snapshot.irdc.shift5s,
    });

    this.latest = snapshot;
    this.listeners.emit(snapshot);
    return snapshot;
  }
}
