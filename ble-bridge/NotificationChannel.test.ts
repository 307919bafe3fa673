import { NotificationChannel } from './NotificationChannel';

describe('NotificationChannel', () => {
  test('should hand items to a waiting consumer', async () => {
    const channel = new NotificationChannel<number>('test', 4);

    const pending = channel.next();
    channel.push(1);

    await expect(pending).resolves.toEqual({ value: 1, done: false });
    expect(channel.getStats().queued).toBe(0);
  });

  test('should drop the oldest item when full', () => {
    const channel = new NotificationChannel<number>('test', 3);

    [1, 2, 3, 4, 5].forEach(n => channel.push(n));

    expect(channel.getStats()).toEqual({ capacity: 3, queued: 3, pushed: 5, dropped: 2, closed: false });
    expect([channel.tryShift(), channel.tryShift(), channel.tryShift()]).toEqual([3, 4, 5]);
  });

  test('should drain remaining items after close, then finish', async () => {
    const channel = new NotificationChannel<string>('test', 4);
    channel.push('a');
    channel.push('b');
    channel.close();

    const received: string[] = [];
    for await (const item of channel) {
      received.push(item);
    }

    expect(received).toEqual(['a', 'b']);
    expect(channel.push('c')).toBe(false);
  });

  test('should release waiting consumers on close', async () => {
    const channel = new NotificationChannel<number>('test', 4);

    const pending = channel.next();
    channel.close();

    await expect(pending).resolves.toEqual({ value: undefined, done: true });
  });
});
