/** Keeps the queue closed behind the current task until `settling` settles. */
export type Hold = (settling: Promise<unknown>) => void;

/**
 * Runs tasks one at a time in submission order. A rejected task does not
 * stall the tasks queued behind it. A task may `hold` the queue past its own
 * completion, e.g. while a collaborator call it gave up on is still running.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: (hold: Hold) => Promise<T> | T): Promise<T> {
    this.pending++;
    const holds: Promise<unknown>[] = [];
    const result = this.tail.then(() =>
      task((settling) => {
        holds.push(settling);
      })
    );
    this.tail = result
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => Promise.allSettled(holds))
      .then(() => this.settle());
    return result;
  }

  get size(): number {
    return this.pending;
  }

  private settle(): void {
    this.pending--;
  }
}
