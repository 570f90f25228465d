/**
 * Serializes async work per chain. Tasks for the same chain run one after
 * another in submission order; tasks for different chains run concurrently.
 */
export class ChainLock {
  private readonly tails: Map<number, Promise<void>> = new Map();

  run<T>(chainId: number, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(chainId) ?? Promise.resolve();
    const result = previous.then(task);

    const tail: Promise<void> = result.then(
      () => this.release(chainId, tail),
      () => this.release(chainId, tail),
    );
    this.tails.set(chainId, tail);

    return result;
  }

  /** Resolves once every queued task has settled. */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(this.tails.values());
    }
  }

  private release(chainId: number, tail: Promise<void>): void {
    if (this.tails.get(chainId) === tail) {
      this.tails.delete(chainId);
    }
  }
}
