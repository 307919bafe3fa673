import { decodeTimestamp, encodeTimestamp } from '../glove-protocol/CharacteristicCodec';
import type { CharacteristicKey } from '../glove-protocol/types';
import { DeviceClockSync } from './DeviceClockSync';
import type { ClockSyncTarget } from './types';

const BASE_MS = 1_760_000_000_000;

class FakeClockTarget implements ClockSyncTarget {
  register = encodeTimestamp(0);
  writes: Buffer[] = [];

  constructor(
    private readonly skewSeconds = 0,
    private readonly keys: CharacteristicKey[] = ['timestamp']
  ) {}

  hasCharacteristic(key: CharacteristicKey): boolean {
    return this.keys.includes(key);
  }

  async read(_key: CharacteristicKey): Promise<Buffer> {
    return this.register;
  }

  async writeConfig(_key: CharacteristicKey, data: Buffer): Promise<Buffer> {
    this.writes.push(data);
    this.register = encodeTimestamp(decodeTimestamp(data) + this.skewSeconds);
    return this.register;
  }
}

describe('DeviceClockSync', () => {
  test('should write host seconds and report a device running ahead', async () => {
    const target = new FakeClockTarget(3);
    const sync = new DeviceClockSync(() => BASE_MS);

    const result = await sync.sync(target);

    expect(decodeTimestamp(target.writes[0])).toBe(1_760_000_000);
    expect(result).toEqual({
      writtenSeconds: 1_760_000_000,
      readBackSeconds: 1_760_000_003,
      offsetSeconds: 3,
      avgRttMs: 0,
      sampleCount: 4,
      inSync: false,
      syncedAt: '2025-10-09T08:53:20.000Z',
    });
    expect(sync.getLastResult()).toBe(result);
  });

  test('should take the median midpoint offset of the fastest reads', async () => {
    let calls = 0;
    const sync = new DeviceClockSync(() => BASE_MS + 100 * calls++);

    const result = await sync.sync(new FakeClockTarget());

    // Offsets -150, -350, -550, -750 (the last of five dropped): median -450 ms
    expect(result).toMatchObject({
      writtenSeconds: 1_760_000_000,
      offsetSeconds: -0.45,
      avgRttMs: 100,
      sampleCount: 4,
      inSync: true,
      syncedAt: '2025-10-09T08:53:21.100Z',
    });
  });

  test('should skip gloves without a timestamp characteristic', async () => {
    const target = new FakeClockTarget(0, []);

    await expect(new DeviceClockSync(() => BASE_MS).sync(target)).resolves.toBeNull();
    expect(target.writes).toHaveLength(0);
  });
});
