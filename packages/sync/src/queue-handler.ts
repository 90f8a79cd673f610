import { ConfigurationError, toError } from '@tablesync/core';

export const MIN_PARALLELISM = 1;
export const MAX_PARALLELISM = 8;

export type JobRunner<T> = (job: T) => Promise<void>;

/**
 * Bounded-parallel job queue. At most `maxParallelism` jobs run at once;
 * `whenComplete()` resolves once everything queued so far has finished.
 *
 * @example
 * ```typescript
 * const handler = new QueueHandler<PendingOperation>(4, (op) => push(op));
 * handler.enqueueRange(operations);
 * await handler.whenComplete();
 * ```
 */
export class QueueHandler<T> {
  private readonly maxParallelism: number;
  private readonly runner: JobRunner<T>;
  private readonly waiting: T[] = [];
  private running = 0;
  private firstError: Error | null = null;
  private idleListeners: (() => void)[] = [];

  constructor(maxParallelism: number, runner: JobRunner<T>) {
    if (
      !Number.isInteger(maxParallelism) ||
      maxParallelism < MIN_PARALLELISM ||
      maxParallelism > MAX_PARALLELISM
    ) {
      throw new ConfigurationError([
        {
          path: 'parallelOperations',
          message: `must be an integer between ${MIN_PARALLELISM} and ${MAX_PARALLELISM}`,
        },
      ]);
    }
    this.maxParallelism = maxParallelism;
    this.runner = runner;
  }

  /** Jobs queued but not yet started */
  get count(): number {
    return this.waiting.length;
  }

  /** Jobs currently running */
  get active(): number {
    return this.running;
  }

  enqueue(job: T): void {
    this.waiting.push(job);
    this.pump();
  }

  enqueueRange(jobs: Iterable<T>): void {
    for (const job of jobs) {
      this.waiting.push(job);
    }
    this.pump();
  }

  /**
   * Drop every job that has not started. Running jobs finish normally.
   */
  cancel(): number {
    const dropped = this.waiting.length;
    this.waiting.length = 0;
    return dropped;
  }

  /**
   * Resolves when no job is running or waiting. Rejects with the first
   * error a job threw, after every running job has settled.
   */
  async whenComplete(): Promise<void> {
    if (!this.isIdle()) {
      await new Promise<void>((resolve) => this.idleListeners.push(resolve));
    }
    if (this.firstError) {
      const error = this.firstError;
      this.firstError = null;
      throw error;
    }
  }

  private isIdle(): boolean {
    return this.running === 0 && this.waiting.length === 0;
  }

  private pump(): void {
    while (this.running < this.maxParallelism && this.waiting.length > 0) {
      const job = this.waiting.shift();
      if (job === undefined) break;
      this.running += 1;
      void this.run(job);
    }
  }

  private async run(job: T): Promise<void> {
    try {
      await this.runner(job);
    } catch (error) {
      this.firstError ??= toError(error);
    } finally {
      this.running -= 1;
      this.pump();
      if (this.isIdle()) {
        const listeners = this.idleListeners;
        this.idleListeners = [];
        for (const listener of listeners) listener();
      }
    }
  }
}
