/**
 * In-process async lock: callers run one at a time, in arrival order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    // the next caller waits for this one whether it resolves or rejects
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
