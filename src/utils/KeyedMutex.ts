/**
 * Per-key async mutex: callbacks for the same key run one at a time, in call order.
 * Keys with nothing queued are dropped from the map.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(() => fn());

    const tail: Promise<void> = result.then(
      () => this.settle(key, tail),
      () => this.settle(key, tail)
    );
    this.tails.set(key, tail);

    return result;
  }

  /**
   * Number of keys with a queued or running callback
   */
  get activeKeys(): number {
    return this.tails.size;
  }

  private settle(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
