/**
 * Coalesces concurrent calls per key: the first caller runs the task, later callers
 * await the same promise. The key is released once the task settles either way.
 */
export class SingleFlight<V> {
  private inFlight = new Map<string, Promise<V>>();

  run(key: string, task: () => Promise<V>): { promise: Promise<V>; shared: boolean } {
    const existing = this.inFlight.get(key);
    if (existing) {
      return { promise: existing, shared: true };
    }

    // The task starts on the next microtask, after the key is registered.
    const promise = Promise.resolve()
      .then(task)
      .finally(() => this.inFlight.delete(key));

    this.inFlight.set(key, promise);
    return { promise, shared: false };
  }

  isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }

  get size(): number {
    return this.inFlight.size;
  }
}
