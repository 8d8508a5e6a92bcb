/**
 * Promise-chained single-writer queue.
 *
 * Tasks run one at a time in submission order. A failing task rejects
 * its own promise only; the chain continues with the next task.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Enqueue a task. Resolves or rejects with the task's own outcome.
   */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(async () => {
      try {
        return await task();
      } finally {
        this.pending--;
      }
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Number of tasks queued or running. */
  get size(): number {
    return this.pending;
  }

  /** Resolves once every task queued so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }
}
