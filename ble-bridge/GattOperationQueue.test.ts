import { GattOperationQueue } from './GattOperationQueue';
import { GattTimeoutError, OperationCancelledError } from '../shared/errors';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('GattOperationQueue', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  test('should run one operation at a time in priority order', async () => {
    const queue = new GattOperationQueue('test');
    const order: string[] = [];
    const gate = deferred<void>();

    const first = queue.enqueue('first', async () => {
      order.push('first');
      await gate.promise;
    });
    const low = queue.enqueue('low', async () => {
      order.push('low');
    });
    const high = queue.enqueue(
      'high',
      async () => {
        order.push('high');
      },
      { priority: 2 }
    );

    expect(queue.getStatus().queueSize).toBe(2);
    gate.resolve();
    await Promise.all([first, low, high]);

    expect(order).toEqual(['first', 'high', 'low']);
  });

  test('should resolve with the operation result', async () => {
    const queue = new GattOperationQueue('test');

    await expect(queue.enqueue('read', async () => Buffer.from([1, 2]))).resolves.toEqual(Buffer.from([1, 2]));
  });

  test('should time out a stuck operation and continue with the next', async () => {
    jest.useFakeTimers();
    const queue = new GattOperationQueue('test');

    const stuck = queue.enqueue('stuck', () => new Promise<void>(() => undefined), { timeoutMs: 100 });
    const outcome = expect(stuck).rejects.toBeInstanceOf(GattTimeoutError);
    const next = queue.enqueue('next', async () => 'done');

    await jest.advanceTimersByTimeAsync(100);

    await outcome;
    await expect(next).resolves.toBe('done');
  });

  test('should reject active and queued operations on cancelAll', async () => {
    const queue = new GattOperationQueue('test');

    const active = queue.enqueue('active', () => new Promise<void>(() => undefined));
    const queued = queue.enqueue('queued', async () => undefined);
    queue.cancelAll(() => new OperationCancelledError('GATT operation'));

    await expect(active).rejects.toBeInstanceOf(OperationCancelledError);
    await expect(queued).rejects.toBeInstanceOf(OperationCancelledError);
    expect(queue.getStatus()).toEqual({ queueSize: 0, isActive: false, activeOperation: null });
  });
});
