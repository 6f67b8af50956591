/**
 * Reading Router
 *
 * Fans out each decoded batch to three audiences:
 * - batch subscribers, in source order
 * - latest-value subscribers, once per changed sensor type
 * - sample subscribers, with the per-device sample derived from the batch
 *
 * Keeps a bounded history of raw readings and derived samples.
 *
 * @module readings/reading-router
 */

import { DEFAULT_ROUTER_CONFIG } from '../config/defaults';
import type { ReadingRouterConfig, SensorReading, SensorSample, SensorType } from '../types';
import type { LogTarget } from '../utils/logger';
import { createLogger } from '../utils/logger';
import type { Unsubscribe } from '../utils/listeners';
import { ListenerSet } from '../utils/listeners';
import { RingBuffer } from '../utils/ring-buffer';
import type { ReadingSource } from './sample-builder';
import { SampleBuilder } from './sample-builder';

export type BatchListener = (batch: readonly SensorReading[], source: ReadingSource) => void;
export type LatestListener = (reading: SensorReading) => void;
export type SampleListener = (sample: SensorSample) => void;

export interface ReadingRouterOptions extends Partial<ReadingRouterConfig> {
  logger?: LogTarget;
}

export class ReadingRouter {
  readonly config: Readonly<ReadingRouterConfig>;

  private readonly logger: LogTarget;
  private readonly builder: SampleBuilder;
  private readonly latestByType = new Map<SensorType, SensorReading>();
  private readonly sampleHistory: RingBuffer<SensorSample>;
  private readingHistory: SensorReading[] = [];

  private readonly batchListeners: ListenerSet<Parameters<BatchListener>>;
  private readonly latestListeners: ListenerSet<Parameters<LatestListener>>;
  private readonly sampleListeners: ListenerSet<Parameters<SampleListener>>;

  constructor(options: ReadingRouterOptions = {}) {
    const { logger, ...overrides } = options;
    this.config = { ...DEFAULT_ROUTER_CONFIG, ...overrides };
    this.logger = logger ?? createLogger('readings:router');
    this.builder = new SampleBuilder(this.config.ppgValidityFloor);
    this.sampleHistory = new RingBuffer(this.config.sampleHistoryCapacity);

    this.batchListeners = new ListenerSet('batch', this.logger);
    this.latestListeners = new ListenerSet('latest', this.logger);
    this.sampleListeners = new ListenerSet('sample', this.logger);
  }

  ingest(batch: readonly SensorReading[], source: ReadingSource): void {
    if (batch.length === 0) return;

    this.appendHistory(batch);

    const changed = new Map<SensorType, SensorReading>();
    for (const reading of batch) {
      changed.set(reading.sensorType, reading);
    }
    for (const [type, reading] of changed) {
      this.latestByType.set(type, reading);
    }

    this.logger.debug('Routing batch', {
      deviceId: source.deviceId,
      readings: batch.length,
      types: changed.size,
    });

    this.batchListeners.emit(batch, source);
    for (const reading of changed.values()) {
      this.latestListeners.emit(reading);
    }

    const sample = this.builder.build(batch, source);
    if (sample) {
      this.sampleHistory.push(sample);
      this.sampleListeners.emit(sample);
    }
  }

  latest(type: SensorType): SensorReading | undefined {
    return this.latestByType.get(type);
  }

  latestReadings(): ReadonlyMap<SensorType, SensorReading> {
    return new Map(this.latestByType);
  }

  history(): readonly SensorReading[] {
    return [...this.readingHistory];
  }

  samples(): readonly SensorSample[] {
    return this.sampleHistory.toArray();
  }

  clear(): void {
    this.readingHistory = [];
    this.latestByType.clear();
    this.sampleHistory.clear();
    this.builder.reset();
  }

  onBatch(listener: BatchListener): Unsubscribe {
    return this.batchListeners.add(listener);
  }

  onLatest(listener: LatestListener): Unsubscribe {
    return this.latestListeners.add(listener);
  }

  onSample(listener: SampleListener): Unsubscribe {
    return this.sampleListeners.add(listener);
  }

  /**
   * Append, then drop at least `evictionChunk` of the oldest entries once
   * the history overflows
   */
  private appendHistory(batch: readonly SensorReading[]): void {
    this.readingHistory.push(...batch);

    const excess = this.readingHistory.length - this.config.historyCapacity;
    if (excess > 0) {
      const drop = Math.min(this.readingHistory.length, Math.max(excess, this.config.evictionChunk));
      this.readingHistory.splice(0, drop);
    }
  }
}
