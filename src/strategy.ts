/**
 * Edit strategies
 * Decide how per-section edit tasks are scheduled before rendering
 */

/**
 * Single unit of edit work, one per section
 */
export type EditTask = () => void | Promise<void>;

/**
 * Scheduling strategy for edit tasks
 *
 * `run` resolves once every task has completed and rejects with the
 * first failure observed, unwrapped.
 */
export interface EditStrategy {
  run(tasks: EditTask[]): Promise<void>;
}

/**
 * Run tasks one after another in the given order
 */
export const sequentialStrategy: EditStrategy = {
  async run(tasks: EditTask[]): Promise<void> {
    for (const task of tasks) {
      await task();
    }
  },
};

/**
 * Run tasks concurrently with an optional limit
 *
 * Workers pull tasks from a shared queue. After the first failure no
 * further tasks are started; tasks already running are left to finish,
 * possibly after `run` has rejected.
 *
 * @param limit - Maximum number of tasks in flight (default: unbounded)
 * @throws {RangeError} When limit is not a positive integer
 *
 * @example
 * ```typescript
 * const editor = new SectionEditor({ strategy: concurrentStrategy(8) });
 * ```
 */
export function concurrentStrategy(limit: number = Number.POSITIVE_INFINITY): EditStrategy {
  if (limit !== Number.POSITIVE_INFINITY && (!Number.isInteger(limit) || limit < 1)) {
    throw new RangeError(`Invalid concurrency limit: ${limit}. Must be a positive integer`);
  }

  return {
    async run(tasks: EditTask[]): Promise<void> {
      let next = 0;
      let failed = false;

      const worker = async (): Promise<void> => {
        while (!failed && next < tasks.length) {
          const task = tasks[next++];
          try {
            await task();
          } catch (error) {
            failed = true;
            throw error;
          }
        }
      };

      const workerCount = Math.min(limit, tasks.length);
      await Promise.all(Array.from({ length: workerCount }, () => worker()));
    },
  };
}
