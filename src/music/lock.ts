export type LockedTask<T> = () => Promise<T> | T;

/**
 * Promise-chain mutex. Tasks run one at a time in the order `run` was called;
 * a failing task releases the lock for the next one.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(task: LockedTask<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await task();
    } finally {
      release();
    }
  }
}
