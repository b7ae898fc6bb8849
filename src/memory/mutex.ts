/**
 * Promise-chain mutex: callers queue behind the previous holder and run one
 * at a time, in arrival order. A rejected section releases the lock too.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
