/**
 * Promise-chain mutex
 *
 * Callers queue behind the previous holder; a rejected task releases the
 * lock the same way a resolved one does.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => this.release(),
      () => this.release()
    );
    return run;
  }

  /**
   * Number of tasks holding or waiting for the lock
   */
  get queueLength(): number {
    return this.pending;
  }

  private release(): void {
    this.pending -= 1;
  }
}
