/**
 * Runs tasks one at a time in submission order. A task starts only after the
 * previous one has settled, so a read-modify-persist sequence inside `run`
 * is never interleaved with another.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  public get queued() {
    return this.pending;
  }

  public run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task).finally(() => {
      this.pending -= 1;
    });
    // the caller observes failures through `result`; the chain only waits for settlement
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
