import { AsyncLock } from './AsyncLock';

describe('AsyncLock', () => {
  test('should run tasks one at a time in call order', async () => {
    const lock = new AsyncLock();
    const events: string[] = [];

    const slow = lock.run(async () => {
      events.push('slow:start');
      await new Promise((resolve) => setImmediate(resolve));
      events.push('slow:end');
      return 'slow';
    });
    const fast = lock.run(() => {
      events.push('fast');
      return 'fast';
    });

    await expect(Promise.all([slow, fast])).resolves.toEqual(['slow', 'fast']);
    expect(events).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  test('should keep running later tasks after one fails', async () => {
    const lock = new AsyncLock();

    const failing = lock.run(async () => {
      throw new Error('task failed');
    });
    const next = lock.run(async () => 42);

    await expect(failing).rejects.toThrow('task failed');
    await expect(next).resolves.toBe(42);
  });

  test('should report queue status while busy', async () => {
    const lock = new AsyncLock();
    expect(lock.getStatus()).toEqual({ queueLength: 0, isLocked: false });

    let release: () => void = () => undefined;
    const first = lock.run(
      () =>
        new Promise<void>((resolve) => {
          release = () => resolve();
        })
    );
    const second = lock.run(() => undefined);

    expect(lock.isLocked).toBe(true);
    expect(lock.getStatus().queueLength).toBe(1);

    release();
    await Promise.all([first, second]);
    expect(lock.getStatus()).toEqual({ queueLength: 0, isLocked: false });
  });
});
