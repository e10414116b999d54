/**
 * TaskScheduler
 *
 * Runs collection tasks on a bounded pool of async workers that pull from a
 * shared queue. A failing task is recorded and the rest keep running.
 */

import { createChildLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

export type Task<T> = () => Promise<T[]>;

export type ProgressCallback = (label: string, completed: number, total: number) => void;

export interface RunTasksOptions {
  /** Upper bound on simultaneously running tasks */
  concurrency: number;
  label: string;
  onProgress?: ProgressCallback;
  logger?: Logger;
}

export interface RunTasksResult<T> {
  /** Task results concatenated in completion order */
  results: T[];
  errors: string[];
}

const defaultLogger = createChildLogger({ module: 'TaskScheduler' });

export async function runTasks<T>(
  tasks: ReadonlyArray<Task<T>>,
  options: RunTasksOptions
): Promise<RunTasksResult<T>> {
  const log = options.logger ?? defaultLogger;
  const results: T[] = [];
  const errors: string[] = [];
  const total = tasks.length;

  if (total === 0) {
    return { results, errors };
  }

  const workerCount = Math.min(Math.max(1, Math.floor(options.concurrency)), total);
  let nextIndex = 0;
  let completed = 0;

  const reportProgress = (): void => {
    if (!options.onProgress) {
      return;
    }
    try {
      options.onProgress(options.label, completed, total);
    } catch (error) {
      log.debug({ error: errorMessage(error) }, 'Progress callback failed');
    }
  };

  const worker = async (): Promise<void> => {
    while (nextIndex < total) {
      const task = tasks[nextIndex++];
      if (!task) {
        continue;
      }
      try {
        results.push(...(await task()));
      } catch (error) {
        const message = `Failed to fetch transactions (${options.label}): ${errorMessage(error)}`;
        log.error({ label: options.label }, message);
        errors.push(message);
      } finally {
        completed++;
        reportProgress();
      }
    }
  };

  log.info({ label: options.label, tasks: total, workers: workerCount }, 'Dispatching tasks');
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  log.info({ label: options.label, results: results.length, errors: errors.length }, 'Tasks finished');

  return { results, errors };
}
