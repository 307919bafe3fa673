import { GloveSession } from './GloveSession';
import { MockGloveTransport, type SimulatedGloveOptions } from './transports/MockGloveTransport';
import type { DeviceHandle, GloveSessionOptions } from './BleBridgeTypes';
import { SessionState } from '../ble-management/types';
import { DEFAULT_SENSOR_CONFIG, decodeConfig, encodeConfig } from '../glove-protocol/ConfigCodec';
import { encodeTelemetry } from '../glove-protocol/CharacteristicCodec';
import { CommandState } from '../glove-protocol/types';
import {
  ConnectTimeoutError,
  ConnectionLostError,
  DeviceUnreachableError,
  GattTimeoutError,
  OperationCancelledError,
  WriteRejectedError,
} from '../shared/errors';

function imuPayload(sequence: number): Buffer {
  return encodeTelemetry('imu1Raw', {
    values: [10, -20, 1000, 0.5, -0.25, 0, 30, -12, 41],
    timestamp: { hostMs: 0, sequence },
  });
}

function setup(glove: SimulatedGloveOptions = {}, options: Partial<GloveSessionOptions> = {}) {
  const transport = new MockGloveTransport(glove);
  const session = new GloveSession(transport, { clock: () => 1234, ...options });
  return { transport, session };
}

async function discoverGlove(session: GloveSession, address = 'aa:bb:cc:dd:ee:01'): Promise<DeviceHandle> {
  const discovering = session.discover({ address });
  await jest.advanceTimersByTimeAsync(10);
  const devices = await discovering;
  expect(devices).toHaveLength(1);
  return devices[0];
}

async function connectGlove(session: GloveSession): Promise<DeviceHandle> {
  const device = await discoverGlove(session);
  await session.connect(device);
  return device;
}

describe('GloveSession', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('discover', () => {
    test('should return the advertising glove and move to DISCOVERED', async () => {
      const { session } = setup();

      const device = await discoverGlove(session);

      expect(device).toEqual({ id: 'mock-glove-01', name: 'VR-Glove-01', address: 'aa:bb:cc:dd:ee:01', rssi: -50 });
      expect(session.getState()).toBe(SessionState.DISCOVERED);
    });

    test('should return to IDLE after the scan window when nothing advertises', async () => {
      const { transport, session } = setup();
      transport.glove.advertising = false;

      const discovering = session.discover();
      await jest.advanceTimersByTimeAsync(2500);

      await expect(discovering).resolves.toEqual([]);
      expect(session.getState()).toBe(SessionState.IDLE);
      expect(transport.isScanning).toBe(false);
    });

    test('should stop the scan early for an address the transport already knows', async () => {
      const { transport, session } = setup();
      await discoverGlove(session);
      const announced = jest.fn();
      transport.on('deviceDiscovered', announced);
      const stopped = jest.fn();
      transport.on('scanStopped', stopped);

      const discovering = session.discover({ address: 'AA:BB:CC:DD:EE:01' });
      await jest.advanceTimersByTimeAsync(10);

      await expect(discovering).resolves.toHaveLength(1);
      expect(announced).not.toHaveBeenCalled();
      expect(stopped).toHaveBeenCalledTimes(1);
      expect(session.getState()).toBe(SessionState.DISCOVERED);
    });

    test('should ignore gloves below the RSSI floor', async () => {
      const { transport, session } = setup({ rssi: -95 });

      const discovering = session.discover();
      await jest.advanceTimersByTimeAsync(2500);

      await expect(discovering).resolves.toEqual([]);
      expect(transport.getDiscoveredDevices()).toEqual([]);
    });
  });

  describe('connect', () => {
    test('should reach READY with every characteristic mapped', async () => {
      const { session } = setup();

      await connectGlove(session);

      const snapshot = session.getSnapshot();
      expect(snapshot.state).toBe(SessionState.READY);
      expect(snapshot.address).toBe('aa:bb:cc:dd:ee:01');
      expect(snapshot.characteristics).toHaveLength(17);
      expect(session.hasCharacteristic('config')).toBe(true);
    });

    test('should fail with DeviceUnreachable when a required characteristic is missing', async () => {
      const { session } = setup({ omitCharacteristics: ['imu2Raw'] });
      const device = await discoverGlove(session);

      const connecting = session.connect(device);

      await expect(connecting).rejects.toBeInstanceOf(DeviceUnreachableError);
      await expect(connecting).rejects.toThrow('missing required characteristics: imu2Raw');
      expect(session.getState()).toBe(SessionState.DISCOVERED);
    });

    test('should connect without optional characteristics', async () => {
      const { session } = setup({ omitCharacteristics: ['imu1Euler', 'flex'] });

      await connectGlove(session);

      expect(session.getState()).toBe(SessionState.READY);
      expect(session.hasCharacteristic('flex')).toBe(false);
    });

    test('should time out with ConnectTimeoutError', async () => {
      const { session } = setup({ connectDelayMs: 20000 });
      const device = await discoverGlove(session);

      const connecting = session.connect(device);
      const outcome = expect(connecting).rejects.toBeInstanceOf(ConnectTimeoutError);
      await jest.advanceTimersByTimeAsync(10000);

      await outcome;
      expect(session.getState()).toBe(SessionState.DISCOVERED);
    });

    test('should report an unreachable peripheral', async () => {
      const { transport, session } = setup();
      const device = await discoverGlove(session);
      transport.glove.failNextConnects = 1;

      await expect(session.connect(device)).rejects.toThrow('Peripheral not reachable');
      expect(session.getState()).toBe(SessionState.DISCOVERED);
    });
  });

  describe('notifications', () => {
    test('should deliver payloads with the host receive time', async () => {
      const { transport, session } = setup();
      await connectGlove(session);

      const channel = await session.subscribe('imu1Raw');
      transport.glove.notify('imu1Raw', imuPayload(7));

      expect(channel.tryShift()).toEqual({ key: 'imu1Raw', payload: imuPayload(7), hostMs: 1234 });
    });

    test('should return the same channel for a repeated subscribe', async () => {
      const { session } = setup();
      await connectGlove(session);

      const first = await session.subscribe('joystick');
      const second = await session.subscribe('joystick');

      expect(second).toBe(first);
      expect(session.getSnapshot().subscriptions).toEqual(['joystick']);
    });

    test('should drop the oldest payload when the channel is full', async () => {
      const { transport, session } = setup({}, { channelCapacity: 2 });
      await connectGlove(session);

      const channel = await session.subscribe('imu1Raw');
      [1, 2, 3].forEach(sequence => transport.glove.notify('imu1Raw', imuPayload(sequence)));

      expect(channel.getStats()).toEqual({ capacity: 2, queued: 2, pushed: 3, dropped: 1, closed: false });
      expect(channel.tryShift()?.payload).toEqual(imuPayload(2));
    });

    test('should close the channel on unsubscribe', async () => {
      const { transport, session } = setup();
      await connectGlove(session);

      const channel = await session.subscribe('buttons');
      await session.unsubscribe('buttons');

      expect(channel.isClosed()).toBe(true);
      expect(transport.glove.notify('buttons', Buffer.from([0, 1, 0, 0]))).toBe(false);
    });

    test('should refuse to subscribe before READY', async () => {
      const { session } = setup();

      await expect(session.subscribe('imu1Raw')).rejects.toBeInstanceOf(DeviceUnreachableError);
    });
  });

  describe('writeConfig', () => {
    test('should return the read-back acknowledgment', async () => {
      const { session } = setup();
      await connectGlove(session);
      const requested = encodeConfig({ ...DEFAULT_SENSOR_CONFIG, command: CommandState.RUN });

      const ack = await session.writeConfig('config', requested);

      expect(ack).toEqual(requested);
    });

    test('should return the device-coerced value when the glove adjusts the request', async () => {
      const { session } = setup({
        coerceConfig: requested => ({ ...requested, updateIntervalMs: 40 }),
      });
      await connectGlove(session);

      const ack = await session.writeConfig('config', encodeConfig({ ...DEFAULT_SENSOR_CONFIG, updateIntervalMs: 10 }));

      expect(decodeConfig(ack).updateIntervalMs).toBe(40);
    });

    test('should surface a GATT write error as WriteRejected', async () => {
      const { transport, session } = setup();
      await connectGlove(session);
      transport.glove.rejectConfigWrites = true;

      await expect(session.writeConfig('config', encodeConfig(DEFAULT_SENSOR_CONFIG))).rejects.toBeInstanceOf(
        WriteRejectedError
      );
    });

    test('should report a config write that is never acknowledged as WriteRejected', async () => {
      const { transport, session } = setup({}, { operationTimeoutMs: 1000 });
      await connectGlove(session);
      transport.glove.configWriteDelayMs = 5000;

      const writing = session.writeConfig('config', encodeConfig(DEFAULT_SENSOR_CONFIG));
      const outcome = expect(writing).rejects.toThrow(
        new WriteRejectedError('config', 'no acknowledgment within 1000ms')
      );
      await jest.advanceTimersByTimeAsync(1000);
      await outcome;
      await expect(writing).rejects.toMatchObject({ code: 'WRITE_REJECTED', cause: expect.any(GattTimeoutError) });

      // The stalled write still lands; later operations are not blocked behind it
      await jest.advanceTimersByTimeAsync(4000);
      const firmware = await session.read('firmwareRevision');
      expect(firmware.toString('utf8')).toBe('1.2.0');
    });

    test('should read device information', async () => {
      const { session } = setup();
      await connectGlove(session);

      const firmware = await session.read('firmwareRevision');

      expect(firmware.toString('utf8')).toBe('1.2.0');
    });
  });

  describe('disconnect', () => {
    test('should cancel a pending connect', async () => {
      const { session } = setup({ connectDelayMs: 60000 });
      const device = await discoverGlove(session);

      const connecting = session.connect(device);
      const outcome = expect(connecting).rejects.toBeInstanceOf(OperationCancelledError);
      await jest.advanceTimersByTimeAsync(100);
      await session.disconnect();

      await outcome;
      expect(session.getState()).toBe(SessionState.IDLE);
    });

    test('should cancel a pending discover', async () => {
      const { transport, session } = setup();
      transport.glove.advertising = false;

      const discovering = session.discover({ timeoutMs: 60000 });
      const outcome = expect(discovering).rejects.toBeInstanceOf(OperationCancelledError);
      await jest.advanceTimersByTimeAsync(100);
      await session.disconnect();

      await outcome;
      expect(session.getState()).toBe(SessionState.IDLE);
      expect(transport.isScanning).toBe(false);
    });

    test('should release subscriptions and not reconnect', async () => {
      const { transport, session } = setup();
      const linkLost = jest.fn();
      session.on('linkLost', linkLost);
      await connectGlove(session);
      const channel = await session.subscribe('imu1Raw');

      await session.disconnect();
      await jest.advanceTimersByTimeAsync(30000);

      expect(channel.isClosed()).toBe(true);
      expect(linkLost).not.toHaveBeenCalled();
      expect(session.getState()).toBe(SessionState.IDLE);
      expect(transport.getPeripheral('mock-glove-01')?.state).toBe('disconnected');
    });
  });

  describe('link loss', () => {
    test('should reapply configuration before notifications resume', async () => {
      const { transport, session } = setup();
      await connectGlove(session);
      const channel = await session.subscribe('imu1Raw');

      const desired = encodeConfig({ ...DEFAULT_SENSOR_CONFIG, command: CommandState.RUN, updateIntervalMs: 50 });
      await session.writeConfig('config', desired);

      const deliveredDuringRestore: boolean[] = [];
      session.addRestoreHook(async () => {
        deliveredDuringRestore.push(transport.glove.notify('imu1Raw', imuPayload(99)));
        await session.writeConfig('config', desired);
      });

      const reconnected = jest.fn();
      session.on('reconnected', reconnected);

      transport.simulateLinkLoss();
      expect(session.getState()).toBe(SessionState.RECONNECTING);
      expect(transport.glove.getConfig()).toEqual(DEFAULT_SENSOR_CONFIG);

      await jest.advanceTimersByTimeAsync(5000);
      await jest.advanceTimersByTimeAsync(0);

      expect(session.getState()).toBe(SessionState.READY);
      expect(reconnected).toHaveBeenCalledWith({ attempts: 1 });
      expect(deliveredDuringRestore).toEqual([false]);
      expect(transport.glove.getConfig().updateIntervalMs).toBe(50);

      transport.glove.notify('imu1Raw', imuPayload(100));
      expect(channel.tryShift()?.payload).toEqual(imuPayload(100));
    });

    test('should give up after five attempts and return to IDLE', async () => {
      const { transport, session } = setup();
      await connectGlove(session);
      const channel = await session.subscribe('imu1Raw');
      const connectionLost = jest.fn();
      session.on('connectionLost', connectionLost);

      transport.glove.failNextConnects = 10;
      transport.simulateLinkLoss();
      await jest.advanceTimersByTimeAsync(25000);
      await jest.advanceTimersByTimeAsync(0);

      expect(connectionLost).toHaveBeenCalledTimes(1);
      const error: unknown = connectionLost.mock.calls[0][0];
      expect(error).toBeInstanceOf(ConnectionLostError);
      expect(error).toMatchObject({ attempts: 5 });
      expect(transport.glove.failNextConnects).toBe(5);
      expect(session.getState()).toBe(SessionState.IDLE);
      expect(channel.isClosed()).toBe(true);
    });

    test('should stop auto-reconnect on user disconnect', async () => {
      const { transport, session } = setup();
      await connectGlove(session);

      transport.simulateLinkLoss();
      await session.disconnect();
      await jest.advanceTimersByTimeAsync(30000);

      expect(session.getState()).toBe(SessionState.IDLE);
      expect(transport.getPeripheral('mock-glove-01')?.state).toBe('disconnected');
    });
  });

  describe('reconnect', () => {
    test('should rescan for the last device and run restore hooks', async () => {
      const { transport, session } = setup();
      await connectGlove(session);
      const restore = jest.fn(async () => undefined);
      session.addRestoreHook(restore);

      const states: SessionState[] = [];
      session.on('stateChanged', (change: { newState: SessionState }) => states.push(change.newState));

      const reconnecting = session.reconnect();
      await jest.advanceTimersByTimeAsync(10);
      const snapshot = await reconnecting;

      expect(snapshot.state).toBe(SessionState.READY);
      expect(restore).toHaveBeenCalledTimes(1);
      expect(states).toEqual([
        SessionState.DISCONNECTED,
        SessionState.SCANNING,
        SessionState.DISCOVERED,
        SessionState.CONNECTING,
        SessionState.SERVICE_DISCOVERY,
        SessionState.READY,
      ]);
      expect(transport.glove.writes).toEqual([]);
    });

    test('should fail without a previous device', async () => {
      const { session } = setup();

      await expect(session.reconnect()).rejects.toBeInstanceOf(DeviceUnreachableError);
    });
  });
});
