/**
 * Keyed serial executor.
 *
 * Tasks submitted under the same key run one at a time, in submission
 * order; tasks under different keys run concurrently. A failing task does
 * not block the ones queued behind it.
 *
 * @example
 * ```typescript
 * const lock = new ProjectLock();
 * // These two never interleave:
 * lock.run('prj_1', () => gradeQuiz(...));
 * lock.run('prj_1', () => getReport(...));
 * ```
 */
export class ProjectLock {
  /** Tail of the queue per key; settles when the last queued task does */
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      // Drop the entry once nothing is queued behind this task
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /** True while a task is running or queued under `key`. */
  isBusy(key: string): boolean {
    return this.tails.has(key);
  }
}
