/**
 * SerialQueue - runs async tasks one at a time, in submission order.
 *
 * A task's failure rejects only its own promise; later tasks still run.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Queue a task. Resolves or rejects with the task's own outcome.
   */
  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;

    const result = this.tail.then(task);

    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );

    return result;
  }

  /**
   * Number of tasks queued or running.
   */
  get size(): number {
    return this.pending;
  }

  /**
   * Resolve once every task queued so far has settled.
   */
  idle(): Promise<void> {
    return this.tail;
  }
}
