import { buildFrame } from '../glove-protocol/CharacteristicCodec';
import type { SensorSource } from '../glove-protocol/types';
import type { FrameHandler } from '../telemetry/TelemetryRouter';
import { SessionState } from '../ble-management/types';
import { DisplayFeed, type FrameSource } from './DisplayFeed';
import { MESSAGE_TYPES, type DisplayMessage, type DisplayStatus } from './types/MessageTypes';

class FakeRouter implements FrameSource {
  handler: FrameHandler | null = null;
  capacity: number | undefined;

  subscribe(_name: string, handler: FrameHandler, options?: { capacity?: number }): () => void {
    this.handler = handler;
    this.capacity = options?.capacity;
    return () => {
      this.handler = null;
    };
  }

  publish(source: SensorSource, hostMs: number, values: number[]): void {
    void this.handler?.(buildFrame(source, hostMs, null, values, values.map(() => 'u'), true));
  }
}

const STATUS: DisplayStatus = {
  connectionState: SessionState.READY,
  device: null,
  config: null,
  logging: false,
  droppedFrames: 0,
};

describe('DisplayFeed', () => {
  let router: FakeRouter;
  let feed: DisplayFeed;
  let messages: DisplayMessage[];

  beforeEach(() => {
    jest.useFakeTimers();
    router = new FakeRouter();
    feed = new DisplayFeed({ status: () => STATUS, now: () => 42 });
    messages = [];
    feed.on('message', (message: DisplayMessage) => messages.push(message));
    feed.start(router);
  });

  afterEach(() => {
    feed.stop();
    jest.useRealTimers();
  });

  test('should coalesce to the latest frame per source on each display tick', () => {
    router.publish('joystick', 1, [10, 10, 0]);
    router.publish('imu1', 2, [1]);
    router.publish('imu1', 3, [2]);

    jest.advanceTimersByTime(17);

    expect(messages).toHaveLength(1);
    const [batch] = messages;
    expect(batch.type).toBe(MESSAGE_TYPES.SENSOR_BATCH);
    if (batch.type !== MESSAGE_TYPES.SENSOR_BATCH) return;
    expect(batch.timestamp).toBe(42);
    expect(batch.frames.map(frame => [frame.source, frame.hostMs])).toEqual([
      ['imu1', 3],
      ['joystick', 1],
    ]);
    expect(feed.getStats()).toMatchObject({ framesIn: 3, framesOut: 2, coalesced: 1, batches: 1 });
  });

  test('should not emit empty batches', () => {
    jest.advanceTimersByTime(17 * 3);
    expect(messages).toEqual([]);
  });

  test('should zero joystick axes inside the deadzone', () => {
    router.publish('joystick', 1, [50, -300, 1]);
    jest.advanceTimersByTime(17);

    const [batch] = messages;
    if (batch?.type !== MESSAGE_TYPES.SENSOR_BATCH) throw new Error('expected a sensor batch');
    expect(batch.frames[0].values).toEqual([0, -300, 1]);
  });

  test('should publish a status snapshot every 100 ms', () => {
    jest.advanceTimersByTime(300);

    const statuses = messages.filter(message => message.type === MESSAGE_TYPES.DEVICE_STATUS);
    expect(statuses).toEqual([
      { type: MESSAGE_TYPES.DEVICE_STATUS, timestamp: 42, status: STATUS },
      { type: MESSAGE_TYPES.DEVICE_STATUS, timestamp: 42, status: STATUS },
      { type: MESSAGE_TYPES.DEVICE_STATUS, timestamp: 42, status: STATUS },
    ]);
  });

  test('should subscribe with a small queue and detach on stop', () => {
    expect(router.capacity).toBe(64);
    feed.stop();
    expect(router.handler).toBeNull();
    expect(feed.isRunning()).toBe(false);
  });
});
