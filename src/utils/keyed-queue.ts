// =============================================================================
// KeyedSerialQueue — Serializes async tasks that share a key
// =============================================================================

/**
 * Tasks submitted under the same key run one at a time, in submission order.
 * Tasks under different keys run concurrently. A failing task does not stop
 * the ones queued behind it.
 */
export class KeyedSerialQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }

  /** True while any task for `key` is queued or running */
  isBusy(key: string): boolean {
    return this.tails.has(key);
  }

  /** Resolves once every task submitted so far has settled */
  async drain(): Promise<void> {
    await Promise.all([...this.tails.values()]);
  }
}
