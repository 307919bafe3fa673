import { TelemetryRouter } from './TelemetryRouter';
import { NotificationChannel, type RawNotification } from '../ble-bridge/NotificationChannel';
import { buildFrame, encodeTelemetry } from '../glove-protocol/CharacteristicCodec';
import type { SensorFrame, SensorSource } from '../glove-protocol/types';
import { DecodeError } from '../shared/errors';

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

async function settle(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await flush();
  }
}

function frame(source: SensorSource, hostMs: number): SensorFrame {
  return buildFrame(source, hostMs, null, [hostMs], ['counts'], true);
}

describe('TelemetryRouter', () => {
  test('should deliver frames to every subscriber in arrival order', async () => {
    const router = new TelemetryRouter();
    const a: number[] = [];
    const b: number[] = [];
    router.subscribe('a', f => {
      a.push(f.timestamp.hostMs);
    });
    router.subscribe('b', async f => {
      b.push(f.timestamp.hostMs);
    });

    [1, 2, 3, 4].forEach(t => router.publish(frame('imu1', t)));
    await settle();

    expect(a).toEqual([1, 2, 3, 4]);
    expect(b).toEqual([1, 2, 3, 4]);
  });

  test('should filter by source', async () => {
    const router = new TelemetryRouter();
    const seen: SensorSource[] = [];
    router.subscribe('joystick-only', f => {
      seen.push(f.source);
    }, { sources: ['joystick'] });

    router.publish(frame('imu1', 1));
    router.publish(frame('joystick', 2));
    router.publish(frame('flex', 3));
    await settle();

    expect(seen).toEqual(['joystick']);
  });

  test('should not let a stuck subscriber delay the others', async () => {
    const router = new TelemetryRouter();
    const backpressure = jest.fn();
    router.on('backpressure', backpressure);

    router.subscribe('stuck', () => new Promise<void>(() => undefined), { capacity: 4 });
    const healthy: number[] = [];
    router.subscribe('healthy', f => {
      healthy.push(f.timestamp.hostMs);
    }, { capacity: 16 });

    for (let t = 1; t <= 10; t++) {
      router.publish(frame('imu1', t));
    }
    await settle();

    expect(healthy).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(backpressure).toHaveBeenCalledTimes(1);
    expect(backpressure).toHaveBeenCalledWith({ subscriber: 'stuck', dropped: 1 });

    const stats = router.getStats();
    expect(stats.published).toBe(10);
    expect(stats.subscribers.stuck).toEqual({ capacity: 4, queued: 3, delivered: 0, dropped: 6, handlerErrors: 0 });
    expect(stats.subscribers.healthy).toEqual({ capacity: 16, queued: 0, delivered: 10, dropped: 0, handlerErrors: 0 });
  });

  test('should keep draining after a handler throws', async () => {
    const router = new TelemetryRouter();
    const seen: number[] = [];
    router.subscribe('flaky', f => {
      if (f.timestamp.hostMs === 2) throw new Error('boom');
      seen.push(f.timestamp.hostMs);
    });

    [1, 2, 3].forEach(t => router.publish(frame('flex', t)));
    await settle();

    expect(seen).toEqual([1, 3]);
    expect(router.getStats().subscribers.flaky.handlerErrors).toBe(1);
  });

  test('should decode, transform and count decode errors from an attached channel', async () => {
    const router = new TelemetryRouter();
    const decodeErrors: unknown[] = [];
    router.on('decodeError', (error: unknown) => decodeErrors.push(error));
    router.setTransform(f => buildFrame(f.source, f.timestamp.hostMs, f.timestamp.sequence, f.values, f.units, f.valid, true));

    const frames: SensorFrame[] = [];
    router.subscribe('collector', f => {
      frames.push(f);
    });

    const channel = new NotificationChannel<RawNotification>('joystick', 8);
    router.attach(channel);
    channel.push({
      key: 'joystick',
      payload: encodeTelemetry('joystick', { values: [100, -48, 1], timestamp: { hostMs: 0, sequence: null } }),
      hostMs: 10,
    });
    channel.push({ key: 'joystick', payload: Buffer.from([1, 2, 3]), hostMs: 11 });
    channel.push({ key: 'overallStatus', payload: Buffer.from([0, 3, 2, 2]), hostMs: 12 });
    channel.close();

    await router.drained();
    await settle();

    expect(frames).toHaveLength(1);
    expect(frames[0]).toMatchObject({ source: 'joystick', values: [100, -48, 1], calibrated: true });
    expect(decodeErrors).toHaveLength(1);
    expect(decodeErrors[0]).toBeInstanceOf(DecodeError);
    expect(router.getStats()).toMatchObject({ published: 1, decodeErrors: 1 });
  });

  test('should stop delivering after unsubscribe', async () => {
    const router = new TelemetryRouter();
    const seen: number[] = [];
    const unsubscribe = router.subscribe('short-lived', f => {
      seen.push(f.timestamp.hostMs);
    });

    router.publish(frame('imu2', 1));
    unsubscribe();
    router.publish(frame('imu2', 2));
    await settle();

    expect(seen).toEqual([]);
    expect(router.getStats().subscribers).toEqual({});
  });

  test('should reject a duplicate subscriber name', () => {
    const router = new TelemetryRouter();
    router.subscribe('logger', () => undefined);

    expect(() => router.subscribe('logger', () => undefined)).toThrow('Subscriber "logger" already registered');
  });
});
