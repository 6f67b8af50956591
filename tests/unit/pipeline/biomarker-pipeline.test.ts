/**
 * Biomarker Pipeline Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { BiomarkerPipeline } from '../../../src/pipeline/biomarker-pipeline';
import { ReadingRouter } from '../../../src/readings/reading-router';
import type { BiomarkerSnapshot, PPGSensorSample } from '../../../src/types';
import { createSilentLogger } from '../../../src/utils/logger';
import { ValidationError } from '../../../src/utils/validation';

const logger = createSilentLogger('test');
const FS = 50;
const START = 1_700_000_000_000;
const PULSE_HZ = 1.2;

function sampleAt(i: number, ir = 50_000): PPGSensorSample {
  const green = 30_000 + 400 * Math.sin((2 * Math.PI * PULSE_HZ * i) / FS);
  return {
    deviceType: 'ppg',
    deviceId: 'ring-1',
    timestamp: START + i * (1000 / FS),
    ppg: { red: 40_000, ir, green },
    accelerometer: { x: 0, y: 0, z: 1 },
    temperature: { celsius: 33 },
    battery: { percentage: 90 },
  };
}

function feed(pipeline: BiomarkerPipeline, from: number, to: number, ir?: (i: number) => number): BiomarkerSnapshot[] {
  const snapshots: BiomarkerSnapshot[] = [];
  for (let i = from; i < to; i++) {
    const snapshot = pipeline.pushSample(sampleAt(i, ir?.(i)));
    if (snapshot) snapshots.push(snapshot);
  }
  return snapshots;
}

describe('BiomarkerPipeline', () => {
  it('should wait for a full analysis window', () => {
    const pipeline = new BiomarkerPipeline({ logger });

    expect(feed(pipeline, 0, 499)).toEqual([]);
    expect(pipeline.lastSnapshot).toBeNull();

    expect(feed(pipeline, 499, 500)).toHaveLength(1);
  });

  it('should analyse once per hop after the window fills', () => {
    const pipeline = new BiomarkerPipeline({ logger });
    feed(pipeline, 0, 500);

    expect(feed(pipeline, 500, 599)).toEqual([]);
    expect(feed(pipeline, 599, 600)).toHaveLength(1);
    expect(feed(pipeline, 600, 1000)).toHaveLength(4);
  });

  it('should report beats and HRV for a steady pulse', () => {
    const pipeline = new BiomarkerPipeline({ logger });
    const [snapshot] = feed(pipeline, 0, 500);

    expect(snapshot?.timestamp).toBe(START + 499 * 20);
    expect(snapshot?.beats.length).toBeGreaterThanOrEqual(8);
    expect(snapshot?.hrv.isValid).toBe(true);
    expect(snapshot?.hrv.windowSeconds).toBe(5);
    expect(snapshot?.hrv.sdnnMs).toBeLessThan(30);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot?.beats)).toBe(true);
  });

  it('should only hand new beats to later snapshots', () => {
    const pipeline = new BiomarkerPipeline({ logger });
    const snapshots = feed(pipeline, 0, 1000);

    let lastPeak = -Infinity;
    for (const snapshot of snapshots) {
      for (const beat of snapshot.beats) {
        expect(beat.peakTime).toBeGreaterThan(lastPeak);
        lastPeak = beat.peakTime;
      }
    }
  });

  it('should attach the IR baseline to each beat', () => {
    const pipeline = new BiomarkerPipeline({ logger });
    const [snapshot] = feed(pipeline, 0, 500);

    const late = snapshot?.beats.filter((b) => b.peakTime > START + 7000) ?? [];
    expect(late.length).toBeGreaterThan(0);
    for (const beat of late) {
      expect(Math.abs((beat.irDcMean ?? 0) - 50_000)).toBeLessThan(1);
    }
  });

  it('should track a steady IR baseline without a shift', () => {
    const pipeline = new BiomarkerPipeline({ logger });
    const [snapshot] = feed(pipeline, 0, 500);

    expect(Math.abs((snapshot?.irdc.dcValue ?? 0) - 50_000)).toBeLessThan(1);
    expect(Math.abs(snapshot?.irdc.shift5s ?? Infinity)).toBeLessThan(50);
  });

  it('should report a positive shift when the IR baseline drops', () => {
    const pipeline = new BiomarkerPipeline({ logger });
    const [snapshot] = feed(pipeline, 0, 500, (i) => (i < 325 ? 50_000 : 45_000));

    expect(snapshot?.irdc.shift5s).toBeGreaterThan(1000);
  });

  it('should run beat detection on the IR channel when configured', () => {
    const pipeline = new BiomarkerPipeline({ beatChannel: 'ir', logger });
    const [snapshot] = feed(pipeline, 0, 500, (i) => 50_000 + 300 * Math.sin((2 * Math.PI * PULSE_HZ * i) / FS));

    expect(snapshot?.beats.length).toBeGreaterThanOrEqual(8);
  });

  it('should ignore EMG samples', () => {
    const pipeline = new BiomarkerPipeline({ analysisWindowSeconds: 0.1, analysisHopSeconds: 0.1, logger });

    for (let i = 0; i < 10; i++) {
      pipeline.pushSample({ deviceType: 'emg', deviceId: 'band-1', timestamp: START + i * 20, emg: { value: 5 } });
    }

    expect(pipeline.lastSnapshot).toBeNull();
  });

  it('should analyse samples routed from a reading router', () => {
    const router = new ReadingRouter({ logger });
    const pipeline = new BiomarkerPipeline({ logger });
    const onSnapshot = vi.fn();
    pipeline.attach(router);
    pipeline.onSnapshot(onSnapshot);

    for (let i = 0; i < 500; i++) {
      const { timestamp, ppg } = sampleAt(i);
      router.ingest(
        [
          { sensorType: 'ppgInfrared', value: ppg.ir, timestamp },
          { sensorType: 'ppgRed', value: ppg.red, timestamp },
          { sensorType: 'ppgGreen', value: ppg.green, timestamp },
        ],
        { deviceId: 'ring-1', deviceType: 'ppg' }
      );
    }

    expect(onSnapshot).toHaveBeenCalledTimes(1);
    expect(onSnapshot.mock.calls[0]?.[0]).toBe(pipeline.lastSnapshot);
  });

  it('should start over after reset', () => {
    const pipeline = new BiomarkerPipeline({ logger });
    feed(pipeline, 0, 500);

    pipeline.reset();

    expect(pipeline.lastSnapshot).toBeNull();
    expect(feed(pipeline, 500, 999)).toEqual([]);
  });

  it('should reject a window shorter than one sample', () => {
    expect(() => new BiomarkerPipeline({ analysisWindowSeconds: 0, logger })).toThrow(ValidationError);
  });
});
