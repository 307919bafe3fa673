import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CalibrationEngine } from './CalibrationEngine';
import { CalibrationStore } from './CalibrationStore';
import type { CalibrationOracle } from './types';
import { buildFrame } from '../glove-protocol/CharacteristicCodec';
import type { SensorFrame, SensorSource } from '../glove-protocol/types';
import { DriftExceededError, InsufficientSamplesError, InvalidConfigError } from '../shared/errors';

function frame(source: SensorSource, values: number[], valid = true): SensorFrame {
  return buildFrame(source, 0, null, values, values.map(() => 'u'), valid);
}

function feed(engine: CalibrationEngine, source: SensorSource, values: number[], count: number): void {
  for (let i = 0; i < count; i++) engine.process(frame(source, values));
}

const FIXED_NOW = () => new Date('2026-01-02T03:04:05.000Z');

describe('CalibrationEngine', () => {
  const fullScale = (source: SensorSource) => (source === 'imu1' ? [1000, 1000, 1000] : null);

  describe('zero calibration', () => {
    test('should correct a constant input to zero', async () => {
      const engine = new CalibrationEngine({ fullScale, now: FIXED_NOW });

      const calibrating = engine.zeroCalibrate('imu1', { samples: 30 });
      feed(engine, 'imu1', [10, -5, 1000], 30);
      const profile = await calibrating;

      expect(profile).toEqual({
        source: 'imu1',
        offset: [10, -5, 1000],
        scale: [1, 1, 1],
        drift: null,
        driftExceeded: false,
        sampleCount: 30,
        calibratedAt: '2026-01-02T03:04:05.000Z',
        origin: 'zero',
      });

      const corrected = engine.process(frame('imu1', [10, -5, 1000]));
      expect(corrected.values).toEqual([0, 0, 0]);
      expect(corrected.calibrated).toBe(true);
    });

    test('should ignore invalid frames while capturing', async () => {
      const engine = new CalibrationEngine({ fullScale });

      const calibrating = engine.zeroCalibrate('flex', { samples: 20 });
      engine.process(frame('flex', [999, 999], false));
      feed(engine, 'flex', [2, 4], 20);

      await expect(calibrating).resolves.toMatchObject({ offset: [2, 4], sampleCount: 20 });
    });

    test('should pass other sources through unchanged', async () => {
      const engine = new CalibrationEngine({ fullScale });
      const calibrating = engine.zeroCalibrate('imu1', { samples: 20 });
      feed(engine, 'imu1', [1, 2, 3], 20);
      await calibrating;

      const joystick = frame('joystick', [100, -100, 0]);

      expect(engine.process(joystick)).toBe(joystick);
    });

    test('should reject when too few samples arrive before the timeout', async () => {
      jest.useFakeTimers();
      try {
        const engine = new CalibrationEngine({ fullScale });

        const calibrating = engine.zeroCalibrate('imu2');
        const outcome = expect(calibrating).rejects.toBeInstanceOf(InsufficientSamplesError);
        feed(engine, 'imu2', [1, 1, 1], 5);
        await jest.advanceTimersByTimeAsync(5000);

        await outcome;
        await expect(calibrating).rejects.toMatchObject({ received: 5, required: 20 });
        expect(engine.getProfile('imu2')).toBeNull();
      } finally {
        jest.useRealTimers();
      }
    });
  });

  describe('drift check', () => {
    test('should flag a corrected rest mean beyond 1% of full scale', async () => {
      const engine = new CalibrationEngine({ fullScale });
      const drifted = jest.fn();
      engine.on('driftExceeded', drifted);

      const calibrating = engine.zeroCalibrate('imu1', { samples: 20 });
      feed(engine, 'imu1', [100, 200, 300], 20);
      await calibrating;

      const checking = engine.checkDrift('imu1', { samples: 20 });
      feed(engine, 'imu1', [105, 200, 320], 20);
      const report = await checking;

      expect(report).toEqual({ source: 'imu1', drift: [5, 0, 20], limit: [10, 10, 10], exceeded: true, sampleCount: 20 });
      expect(drifted).toHaveBeenCalledTimes(1);
      expect(drifted.mock.calls[0][0]).toBeInstanceOf(DriftExceededError);
      expect(engine.getProfile('imu1')).toMatchObject({ drift: [5, 0, 20], driftExceeded: true });
    });

    test('should pass a rest window within the limit', async () => {
      const engine = new CalibrationEngine({ fullScale });
      const drifted = jest.fn();
      engine.on('driftExceeded', drifted);

      const checking = engine.checkDrift('imu1', { samples: 20 });
      feed(engine, 'imu1', [1, -2, 9], 20);

      await expect(checking).resolves.toMatchObject({ drift: [1, -2, 9], exceeded: false });
      expect(drifted).not.toHaveBeenCalled();
    });

    test('should flag drift over a rolling window of live frames once per excursion', async () => {
      const engine = new CalibrationEngine({ fullScale });
      const drifted = jest.fn();
      const restored = jest.fn();
      engine.on('driftExceeded', drifted);
      engine.on('driftRestored', restored);

      const calibrating = engine.zeroCalibrate('imu1', { samples: 20 });
      feed(engine, 'imu1', [100, 200, 300], 20);
      await calibrating;

      engine.monitorDrift('imu1', 4);
      feed(engine, 'imu1', [100, 200, 300], 4);
      feed(engine, 'imu1', [100, 200, 340], 1);
      expect(drifted).not.toHaveBeenCalled();

      // Window corrected z: 0, 0, 40, 40 → mean 20 > 10
      feed(engine, 'imu1', [100, 200, 340], 2);
      expect(drifted).toHaveBeenCalledTimes(1);
      expect(drifted.mock.calls[0][0]).toMatchObject({ source: 'imu1', drift: [0, 0, 20], limit: [10, 10, 10] });
      expect(engine.getProfile('imu1')).toMatchObject({ drift: [0, 0, 20], driftExceeded: true });

      // Window 40, 40, 40, 0 → 30; then 40, 40, 0, 0 → 20; then 40, 0, 0, 0 → 10
      feed(engine, 'imu1', [100, 200, 300], 3);
      expect(restored).toHaveBeenCalledWith('imu1');
      expect(engine.getProfile('imu1')).toMatchObject({ drift: [0, 0, 10], driftExceeded: false });

      engine.stopDriftMonitor('imu1');
      feed(engine, 'imu1', [100, 200, 400], 8);
      expect(drifted).toHaveBeenCalledTimes(1);
    });

    test('should report no limit when full scale is unknown', async () => {
      const engine = new CalibrationEngine({ fullScale });

      const checking = engine.checkDrift('pressure', { samples: 20 });
      feed(engine, 'pressure', [12.5], 20);

      await expect(checking).resolves.toEqual({
        source: 'pressure',
        drift: [12.5],
        limit: [],
        exceeded: false,
        sampleCount: 20,
      });
    });
  });

  describe('oracle hand-off', () => {
    test('should store the offset and scale the oracle returns', async () => {
      const engine = new CalibrationEngine({ fullScale });
      const oracle: CalibrationOracle = {
        calibrate: jest.fn(async () => ({ offset: [1, 2, 3], scale: [2, 2, 2] })),
      };

      const calibrating = engine.calibrateWithOracle('imu1', oracle, { samples: 20 });
      feed(engine, 'imu1', [7, 8, 9], 20);
      const profile = await calibrating;

      expect(profile.origin).toBe('oracle');
      expect(oracle.calibrate).toHaveBeenCalledWith('imu1', expect.any(Array));
      expect(engine.process(frame('imu1', [1, 1, 1])).values).toEqual([1, 0, -1]);
    });

    test('should reject a zero scale from the oracle', async () => {
      const engine = new CalibrationEngine({ fullScale });
      const oracle: CalibrationOracle = {
        calibrate: async () => ({ offset: [0, 0, 0], scale: [1, 0, 1] }),
      };

      const calibrating = engine.calibrateWithOracle('imu1', oracle, { samples: 20 });
      feed(engine, 'imu1', [7, 8, 9], 20);

      await expect(calibrating).rejects.toBeInstanceOf(InvalidConfigError);
      expect(engine.getProfile('imu1')).toBeNull();
    });
  });

  describe('persistence', () => {
    let directory: string;

    beforeEach(() => {
      directory = fs.mkdtempSync(path.join(os.tmpdir(), 'glove-calibration-'));
    });

    afterEach(() => {
      fs.rmSync(directory, { recursive: true, force: true });
    });

    test('should restore profiles for the same device after a restart', async () => {
      const filePath = path.join(directory, 'calibration.json');
      const first = new CalibrationEngine({ fullScale, store: new CalibrationStore(filePath), now: FIXED_NOW });
      await first.loadDevice('AA:BB:CC:DD:EE:01');

      const calibrating = first.zeroCalibrate('imu1', { samples: 20 });
      feed(first, 'imu1', [3, 4, 5], 20);
      const profile = await calibrating;

      const second = new CalibrationEngine({ fullScale, store: new CalibrationStore(filePath) });
      await second.loadDevice('aa:bb:cc:dd:ee:01');

      expect(second.getProfile('imu1')).toEqual(profile);
      expect(fs.readdirSync(directory)).toEqual(['calibration.json']);
    });

    test('should keep other devices when saving', async () => {
      const store = new CalibrationStore(path.join(directory, 'calibration.json'));
      const profile = {
        source: 'flex' as const,
        offset: [1],
        scale: [1],
        drift: null,
        driftExceeded: false,
        sampleCount: 20,
        calibratedAt: '2026-01-02T03:04:05.000Z',
        origin: 'zero' as const,
      };

      await store.save('device-a', { flex: profile });
      await store.save('device-b', {});

      await expect(store.load('device-a')).resolves.toEqual({ flex: profile });
      await expect(store.load('device-b')).resolves.toEqual({});
    });

    test('should start empty from a corrupt file', async () => {
      const filePath = path.join(directory, 'calibration.json');
      fs.writeFileSync(filePath, '{ not json');

      await expect(new CalibrationStore(filePath).load('device-a')).resolves.toEqual({});
    });
  });
});
