/**
 * Single-writer serialization. Tasks run one at a time in submission order;
 * a task starts only after the previous one settled (resolved or rejected).
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
