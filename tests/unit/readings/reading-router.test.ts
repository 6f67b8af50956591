/**
 * Reading Router Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ReadingRouter } from '../../../src/readings/reading-router';
import { SampleBuilder, lastValidByType, type ReadingSource } from '../../../src/readings/sample-builder';
import type { SensorReading, SensorType } from '../../../src/types';
import { createSilentLogger } from '../../../src/utils/logger';

const logger = createSilentLogger('test');
const RING: ReadingSource = { deviceId: 'ring-1', deviceType: 'ppg' };
const BAND: ReadingSource = { deviceId: 'band-1', deviceType: 'emg' };

function reading(sensorType: SensorType, value: number, timestamp = 1000, quality?: number): SensorReading {
  return quality === undefined ? { sensorType, value, timestamp } : { sensorType, value, timestamp, quality };
}

describe('ReadingRouter', () => {
  describe('history', () => {
    it('should evict a chunk of the oldest readings once full', () => {
      const router = new ReadingRouter({ logger });

      for (let i = 0; i < 1001; i++) {
        router.ingest([reading('ppgRed', i)], RING);
      }

      const history = router.history();
      expect(history).toHaveLength(901);
      expect(history[0]?.value).toBe(100);
      expect(history[900]?.value).toBe(1000);
    });

    it('should drop the whole excess of an oversized batch', () => {
      const router = new ReadingRouter({ logger });

      router.ingest(
        Array.from({ length: 1500 }, (_, i) => reading('ppgRed', i)),
        RING
      );

      const history = router.history();
      expect(history).toHaveLength(1000);
      expect(history[0]?.value).toBe(500);
    });

    it('should honour a custom capacity', () => {
      const router = new ReadingRouter({ historyCapacity: 10, evictionChunk: 4, logger });

      router.ingest(
        Array.from({ length: 11 }, (_, i) => reading('ppgRed', i)),
        RING
      );

      expect(router.history().map((r) => r.value)).toEqual([4, 5, 6, 7, 8, 9, 10]);
    });
  });

  describe('fan-out', () => {
    it('should ignore an empty batch', () => {
      const router = new ReadingRouter({ logger });
      const onBatch = vi.fn();
      router.onBatch(onBatch);

      router.ingest([], RING);

      expect(onBatch).not.toHaveBeenCalled();
      expect(router.history()).toEqual([]);
    });

    it('should publish the latest value once per changed type', () => {
      const router = new ReadingRouter({ logger });
      const onLatest = vi.fn();
      router.onLatest(onLatest);

      const first = reading('ppgInfrared', 50_000);
      const second = reading('ppgInfrared', 50_200, 1020);
      const red = reading('ppgRed', 40_000);
      router.ingest([first, red, second], RING);

      expect(onLatest.mock.calls).toEqual([[second], [red]]);
      expect(router.latest('ppgInfrared')).toBe(second);
      expect(router.latestReadings().size).toBe(2);
    });

    it('should notify batch, then latest, then sample subscribers', () => {
      const router = new ReadingRouter({ logger });
      const order: string[] = [];
      router.onBatch((_, source) => order.push(`batch:${source.deviceId}`));
      router.onLatest((r) => order.push(`latest:${r.sensorType}`));
      router.onSample((s) => order.push(`sample:${s.deviceType}`));

      router.ingest([reading('ppgInfrared', 50_000)], RING);

      expect(order).toEqual(['batch:ring-1', 'latest:ppgInfrared', 'sample:ppg']);
    });

    it('should stop notifying after unsubscribe', () => {
      const router = new ReadingRouter({ logger });
      const onSample = vi.fn();
      const unsubscribe = router.onSample(onSample);

      unsubscribe();
      router.ingest([reading('ppgInfrared', 50_000)], RING);

      expect(onSample).not.toHaveBeenCalled();
    });

    it('should keep routing when a subscriber throws', () => {
      const router = new ReadingRouter({ logger });
      const healthy = vi.fn();
      router.onBatch(() => {
        throw new Error('subscriber bug');
      });
      router.onBatch(healthy);

      router.ingest([reading('ppgInfrared', 50_000)], RING);

      expect(healthy).toHaveBeenCalledTimes(1);
    });
  });

  describe('samples', () => {
    it('should not build a PPG sample at or below the validity floor', () => {
      const router = new ReadingRouter({ logger });

      router.ingest([reading('ppgInfrared', 100), reading('ppgRed', 4000)], RING);

      expect(router.samples()).toEqual([]);
    });

    it('should fill missing channels from earlier batches of the same device', () => {
      const router = new ReadingRouter({ logger });

      router.ingest(
        [
          reading('ppgInfrared', 5000, 1000),
          reading('ppgRed', 4000, 1000),
          reading('ppgGreen', 3000, 1000),
          reading('battery', 80, 1000),
          reading('temperature', 33.5, 1000),
        ],
        RING
      );
      router.ingest([reading('ppgInfrared', 5100, 1020), reading('accelerometerZ', 1, 1025)], RING);

      expect(router.samples()[1]).toEqual({
        deviceType: 'ppg',
        deviceId: 'ring-1',
        timestamp: 1025,
        ppg: { red: 4000, ir: 5100, green: 3000 },
        accelerometer: { x: 0, y: 0, z: 1 },
        temperature: { celsius: 33.5 },
        battery: { percentage: 80 },
      });
    });

    it('should include heart rate and SpO2 only from the current batch', () => {
      const router = new ReadingRouter({ logger });

      router.ingest([reading('ppgInfrared', 5000), reading('heartRate', 62, 1000, 0.9), reading('spo2', 97)], RING);
      router.ingest([reading('ppgInfrared', 5000, 1020)], RING);

      const [first, second] = router.samples();
      expect(first).toMatchObject({ heartRate: { bpm: 62, quality: 0.9 }, spo2: { percentage: 97, quality: 1 } });
      expect(second && 'heartRate' in second).toBe(false);
    });

    it('should ignore out-of-range readings when building samples', () => {
      const router = new ReadingRouter({ logger });

      router.ingest([reading('ppgInfrared', 5000), reading('heartRate', 400)], RING);

      expect(router.samples()[0]).not.toHaveProperty('heartRate');
    });

    it('should build EMG samples from a positive muscle reading', () => {
      const router = new ReadingRouter({ logger });

      router.ingest([reading('emg', 0)], BAND);
      router.ingest([reading('muscleActivity', 12, 2000)], BAND);

      expect(router.samples()).toEqual([{ deviceType: 'emg', deviceId: 'band-1', timestamp: 2000, emg: { value: 12 } }]);
    });

    it('should keep per-device channel state apart', () => {
      const router = new ReadingRouter({ logger });
      const other: ReadingSource = { deviceId: 'ring-2', deviceType: 'ppg' };

      router.ingest([reading('ppgInfrared', 5000), reading('ppgRed', 4000)], RING);
      router.ingest([reading('ppgInfrared', 6000)], other);

      const sample = router.samples()[1];
      expect(sample?.deviceType === 'ppg' && sample.ppg.red).toBe(0);
    });

    it('should clear history, latest values and channel state', () => {
      const router = new ReadingRouter({ logger });
      router.ingest([reading('ppgInfrared', 5000), reading('ppgRed', 4000)], RING);

      router.clear();
      router.ingest([reading('ppgInfrared', 5000)], RING);

      expect(router.history()).toHaveLength(1);
      expect(router.latest('ppgRed')).toBeUndefined();
      const sample = router.samples()[0];
      expect(sample?.deviceType === 'ppg' && sample.ppg.red).toBe(0);
    });
  });
});

describe('lastValidByType', () => {
  it('should keep the last valid reading of each type', () => {
    const good = reading('heartRate', 70);
    const result = lastValidByType([good, reading('heartRate', 10), reading('spo2', Number.NaN)]);

    expect([...result.entries()]).toEqual([['heartRate', good]]);
  });
});

describe('SampleBuilder', () => {
  it('should return null for an empty batch', () => {
    expect(new SampleBuilder().build([], RING)).toBeNull();
  });

  it('should forget one device on reset', () => {
    const builder = new SampleBuilder();
    builder.build([reading('ppgInfrared', 5000), reading('ppgGreen', 3000)], RING);

    builder.reset('ring-1');
    const sample = builder.build([reading('ppgInfrared', 5000)], RING);

    expect(sample?.deviceType === 'ppg' && sample.ppg.green).toBe(0);
  });
});
