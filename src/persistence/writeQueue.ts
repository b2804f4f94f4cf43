/**
 * Serializes async work per key. Tasks for one key run one after another in
 * submission order; tasks for different keys run independently.
 */
export class KeyedWriteQueue {
  // tail of each key's chain
  private pending = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.pending.get(key) ?? Promise.resolve();
    // a failed predecessor must not block its successors
    const result = previous.then(task, task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.pending.set(key, tail);

    void tail.then(() => {
      if (this.pending.get(key) === tail) {
        this.pending.delete(key);
      }
    });

    return result;
  }

  get activeKeys(): string[] {
    return [...this.pending.keys()];
  }

  /**
   * Resolves once every task submitted so far has settled
   */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending.values());
    }
  }
}
