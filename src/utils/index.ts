/**
 * Utility functions
 */

import { availableParallelism } from 'node:os';

export interface ConcurrencyOptions {
  /** Maximum concurrent executions */
  concurrency: number;
  /** No task starts once this is aborted; running tasks are left to finish */
  signal?: AbortSignal;
}

/**
 * Run promises with limited concurrency using worker pool pattern
 *
 * Resolves once every started task has settled. When `signal` aborts, the
 * tasks that never started are reported as `undefined` in the results.
 *
 * @param tasks - Array of functions that return promises
 * @returns Array of results in same order as tasks
 */
export async function withConcurrency<T>(
  tasks: readonly (() => Promise<T>)[],
  options: ConcurrencyOptions
): Promise<(T | undefined)[]> {
  const results: (T | undefined)[] = new Array<T | undefined>(tasks.length).fill(undefined);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < tasks.length && !options.signal?.aborted) {
      const currentIndex = nextIndex++;
      const task = tasks[currentIndex];
      if (task) {
        results[currentIndex] = await task();
      }
    }
  }

  // Create worker pool
  const workerCount = Math.max(1, Math.min(options.concurrency, tasks.length));
  const workers = Array.from({ length: workerCount }, () => worker());

  await Promise.all(workers);
  return results;
}

/**
 * Default pool size: one worker per available CPU
 */
export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism());
}

/**
 * Format duration in ms to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = Math.floor(ms / 1000);
  const remainingMs = ms % 1000;
  if (seconds < 60) {
    return remainingMs > 0 ? `${seconds}.${Math.floor(remainingMs / 100)}s` : `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  return `${minutes}m ${remainingSeconds}s`;
}
