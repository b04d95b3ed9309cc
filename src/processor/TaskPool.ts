export class TaskPool {
  /**
   * Runs `worker` over `items` with at most `limit` calls in flight.
   * Results are returned in the order of `items`, whatever order the calls finish in.
   * Rejects with the first worker error; workers are expected to report their own failures as values.
   */
  static async runAll<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>
  ): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;

    const runner = async (): Promise<void> => {
      while (next < items.length) {
        const index = next++;
        results[index] = await worker(items[index], index);
      }
    };

    const runnerCount = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: runnerCount }, () => runner()));
    return results;
  }
}
