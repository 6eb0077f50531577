import { SerialLock } from '../../../src/music/lock';

describe('SerialLock', () => {
  it('runs tasks one at a time in call order', async () => {
    const lock = new SerialLock();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.run(async () => {
      events.push('first:start');
      await firstGate;
      events.push('first:end');
      return 1;
    });
    const second = lock.run(() => {
      events.push('second');
      return 2;
    });

    await new Promise<void>((resolve) => setImmediate(resolve));
    expect(events).toEqual(['first:start']);

    releaseFirst();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('releases the lock when a task throws', async () => {
    const lock = new SerialLock();
    const failing = lock.run(async () => {
      throw new Error('boom');
    });
    const next = lock.run(() => 'after');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('after');
  });
});
