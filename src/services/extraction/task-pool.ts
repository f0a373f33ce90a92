/**
 * Bounded worker pool
 *
 * Runs async tasks with at most `concurrency` in flight, in submission
 * order. When the signal aborts, tasks not yet started are skipped and
 * running tasks see the abort through their own signal.
 *
 * @module services/extraction/task-pool
 */

export type TaskOutcome<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export type Task<T> = (signal: AbortSignal) => Promise<T>;

export class TaskPool {
  private readonly concurrency: number;

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`TaskPool concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  /**
   * @returns One outcome per task, in task order. Never rejects.
   */
  async run<T>(tasks: Array<Task<T>>, signal?: AbortSignal): Promise<Array<TaskOutcome<T>>> {
    const outcomes: Array<TaskOutcome<T>> = tasks.map(() => ({ status: 'skipped' }));
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < tasks.length && !controller.signal.aborted) {
        const index = next++;
        try {
          outcomes[index] = { status: 'fulfilled', value: await tasks[index](controller.signal) };
        } catch (reason) {
          outcomes[index] = { status: 'rejected', reason };
        }
      }
    };

    try {
      const workers = Array.from({ length: Math.min(this.concurrency, tasks.length) }, () => worker());
      await Promise.all(workers);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    return outcomes;
  }
}
