/**
 * Keyed serial execution: tasks sharing a key run one at a time, in the
 * order `run` was called. Tasks on different keys run independently.
 *
 * `run` enqueues synchronously, so callers that invoke it before their first
 * `await` keep their arrival order.
 */
export class SerialLanes {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  /** Resolves once every task queued on `key` so far has settled. */
  async idle(key: string): Promise<void> {
    await this.tails.get(key);
  }
}
