import { WebSocket } from 'ws';
import { SessionState } from '../ble-management/types';
import { WebSocketBridge } from './WebSocketBridge';
import { MESSAGE_TYPES, type DeviceStatusMessage, type SensorBatchMessage } from './types/MessageTypes';

class TestClient {
  readonly socket: WebSocket;
  private received: unknown[] = [];
  private waiters: Array<(message: unknown) => void> = [];

  constructor(port: number) {
    this.socket = new WebSocket(`ws://127.0.0.1:${port}`);
    this.socket.on('message', data => {
      const message: unknown = JSON.parse(data.toString());
      const waiter = this.waiters.shift();
      if (waiter) waiter(message);
      else this.received.push(message);
    });
  }

  opened(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.once('open', () => resolve());
      this.socket.once('error', reject);
    });
  }

  next(): Promise<unknown> {
    if (this.received.length > 0) return Promise.resolve(this.received.shift());
    return new Promise(resolve => this.waiters.push(resolve));
  }

  close(): void {
    this.socket.close();
  }
}

const STATUS_MESSAGE: DeviceStatusMessage = {
  type: MESSAGE_TYPES.DEVICE_STATUS,
  timestamp: 1,
  status: { connectionState: SessionState.READY, device: null, config: null, logging: true, droppedFrames: 0 },
};

describe('WebSocketBridge', () => {
  let bridge: WebSocketBridge;
  let port: number;
  const clients: TestClient[] = [];

  async function connect(): Promise<TestClient> {
    const client = new TestClient(port);
    clients.push(client);
    await client.opened();
    return client;
  }

  beforeEach(async () => {
    bridge = new WebSocketBridge({ port: 0 });
    port = await bridge.start();
  });

  afterEach(async () => {
    clients.splice(0).forEach(client => client.close());
    await bridge.stop();
  });

  test('should broadcast batches to connected clients', async () => {
    const client = await connect();
    const batch: SensorBatchMessage = {
      type: MESSAGE_TYPES.SENSOR_BATCH,
      timestamp: 2,
      frames: [{ source: 'battery', hostMs: 5, sequence: null, values: [80], units: ['%'], valid: true, calibrated: false }],
    };

    expect(bridge.broadcast(batch)).toBe(1);
    await expect(client.next()).resolves.toEqual(batch);
  });

  test('should send the latest status to a client as it connects', async () => {
    expect(bridge.broadcast(STATUS_MESSAGE)).toBe(0);

    const client = await connect();

    await expect(client.next()).resolves.toEqual(STATUS_MESSAGE);
  });

  test('should answer PING with PONG and reject unknown types', async () => {
    const client = await connect();

    client.socket.send(JSON.stringify({ type: MESSAGE_TYPES.PING, timestamp: 0 }));
    await expect(client.next()).resolves.toMatchObject({ type: MESSAGE_TYPES.PONG });

    client.socket.send(JSON.stringify({ type: 0x99 }));
    await expect(client.next()).resolves.toMatchObject({
      type: MESSAGE_TYPES.ERROR,
      error: 'Unsupported message type: 153',
    });
  });

  test('should refuse a second start', async () => {
    await expect(bridge.start()).rejects.toThrow('WebSocket bridge already running');
  });
});
