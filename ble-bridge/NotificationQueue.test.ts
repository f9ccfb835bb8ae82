import { NotificationQueue } from './NotificationQueue';
import { TransportError } from './TransportErrors';

describe('NotificationQueue', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('returns a pending payload immediately', async () => {
    const queue = new NotificationQueue();
    queue.push(Buffer.from([1]));

    await expect(queue.next(1000)).resolves.toEqual(Buffer.from([1]));
  });

  it('keeps only the newest unread payload', async () => {
    const queue = new NotificationQueue();
    queue.push(Buffer.from([1]));
    queue.push(Buffer.from([2]));
    queue.push(Buffer.from([3]));

    await expect(queue.next(1000)).resolves.toEqual(Buffer.from([3]));
    expect(queue.replaced).toBe(2);
  });

  it('hands a payload to a waiting reader', async () => {
    const queue = new NotificationQueue();
    const read = queue.next(1000);
    queue.push(Buffer.from([7]));

    await expect(read).resolves.toEqual(Buffer.from([7]));
  });

  it('times out with a Timeout error', async () => {
    jest.useFakeTimers();
    const queue = new NotificationQueue();
    const read = queue.next(250);

    jest.advanceTimersByTime(250);

    await expect(read).rejects.toMatchObject({
      name: 'TransportError',
      kind: 'Timeout',
      message: 'No notification within 250ms',
    });
  });

  it('does not hand a later payload to a reader that timed out', async () => {
    jest.useFakeTimers();
    const queue = new NotificationQueue();
    const read = queue.next(10);
    jest.advanceTimersByTime(10);
    await expect(read).rejects.toBeInstanceOf(TransportError);

    queue.push(Buffer.from([9]));
    await expect(queue.next(10)).resolves.toEqual(Buffer.from([9]));
  });

  it('rejects when the signal aborts', async () => {
    const queue = new NotificationQueue();
    const controller = new AbortController();
    const read = queue.next(60_000, controller.signal);

    controller.abort();

    await expect(read).rejects.toMatchObject({ kind: 'Timeout', message: 'Notification wait aborted' });
  });

  it('rejects immediately for an already aborted signal', async () => {
    const queue = new NotificationQueue();
    const controller = new AbortController();
    controller.abort();

    await expect(queue.next(1000, controller.signal)).rejects.toMatchObject({ kind: 'Timeout' });
  });

  it('fails waiting and future reads once closed', async () => {
    const queue = new NotificationQueue();
    const read = queue.next(60_000);

    queue.close('link lost');

    await expect(read).rejects.toMatchObject({ kind: 'Disconnected', message: 'link lost' });
    await expect(queue.next(1000)).rejects.toMatchObject({ kind: 'Disconnected' });
    expect(queue.isClosed).toBe(true);
  });

  it('ignores payloads after close', async () => {
    const queue = new NotificationQueue();
    queue.close('gone');
    queue.push(Buffer.from([1]));

    await expect(queue.next(1000)).rejects.toMatchObject({ kind: 'Disconnected' });
  });
});
