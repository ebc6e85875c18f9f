/**
 * Runs one task at a time, in arrival order. A failed task rejects its own
 * caller and does not stop the tasks queued behind it.
 */
export class Mailbox {
  private queue: Promise<unknown> = Promise.resolve();
  private pending = 0;

  get depth(): number {
    return this.pending;
  }

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const taskPromise = this.queue.then(task).finally(() => {
      this.pending--;
    });
    this.queue = taskPromise.catch(() => {}); // prevent unhandled promise rejection
    return taskPromise;
  }
}
