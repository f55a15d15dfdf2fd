/**
 * Runs async tasks one at a time, in submission order.
 *
 * A rejected task does not poison the queue: the next task still runs,
 * and the rejection is delivered only to the caller that submitted it.
 */
export class SerialQueue {
  #tail: Promise<unknown> = Promise.resolve();
  #pending = 0;

  /**
   * Number of tasks submitted and not yet settled.
   */
  get size(): number {
    return this.#pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.#pending++;
    const settled = () => {
      this.#pending--;
    };
    const next = this.#tail.then(task, task);
    this.#tail = next.then(settled, settled);
    return next;
  }
}
