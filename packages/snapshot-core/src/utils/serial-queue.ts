/**
 * Runs async tasks one at a time, in submission order.
 *
 * A failed task rejects its own promise only; the queue keeps going.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task, task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result.finally(() => {
      this.pending--;
    });
  }

  /** Tasks submitted and not yet settled (including the running one) */
  get size(): number {
    return this.pending;
  }

  /** Resolves once every task submitted so far has settled */
  async drain(): Promise<void> {
    await this.tail;
  }
}
