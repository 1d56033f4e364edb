/**
 * Parallel Executor - bounded-concurrency execution
 *
 * Results come back in input order. The first rejection rejects the whole run.
 */

export interface ParallelOptions {
  concurrency?: number;
}

export class ParallelExecutor {
  /**
   * Run `fns` with at most `concurrency` in flight (unbounded when unset)
   */
  async execute<T>(fns: (() => Promise<T>)[], options?: ParallelOptions): Promise<T[]> {
    const concurrency = options?.concurrency;
    if (concurrency !== undefined && !(Number.isInteger(concurrency) && concurrency >= 1)) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    if (!concurrency || concurrency >= fns.length) {
      return Promise.all(fns.map(fn => fn()));
    }

    // boxed so an `undefined` result is still distinguishable from a missing one
    const results: Map<number, { value: T }> = new Map();
    const executing: Set<Promise<T>> = new Set();

    for (let i = 0; i < fns.length; i++) {
      const fn = fns[i];
      const index = i;

      const promise = fn().then(result => {
        results.set(index, { value: result });
        executing.delete(promise);
        return result;
      });

      executing.add(promise);

      if (executing.size >= concurrency) {
        await Promise.race(executing);
      }
    }

    await Promise.all(executing);

    const resultArray: T[] = [];
    for (let i = 0; i < fns.length; i++) {
      const entry = results.get(i);
      if (!entry) {
        throw new Error(`Missing result for function at index ${i}`);
      }
      resultArray.push(entry.value);
    }
    return resultArray;
  }

  async map<T, R>(items: T[], mapper: (item: T, index: number) => Promise<R>, options?: ParallelOptions): Promise<R[]> {
    const fns = items.map((item, index) => () => mapper(item, index));
    return this.execute(fns, options);
  }
}
