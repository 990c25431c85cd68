/**
 * Promise-chained mutual exclusion.
 *
 * Callers are served strictly in arrival order; a rejected task does not
 * poison the chain for the next caller.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
