/**
 * Serial Queue
 *
 * Runs async tasks one at a time, in submission order. A failed task
 * rejects its own promise and does not block the ones queued after it.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
