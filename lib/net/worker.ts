import pLimit from 'p-limit';
import { withTimeout } from './timeout';
import logger from '../logger';

export interface KeyedTask<K extends string, T> {
  key: K;
  run: () => Promise<T>;
}

export type TaskOutcome<K extends string, T> =
  | { key: K; ok: true; value: T }
  | { key: K; ok: false; error: Error };

/**
 * Run keyed tasks through a bounded pool, each under its own timeout.
 * Resolves once every task has settled; never rejects.
 */
export async function runKeyedTasks<K extends string, T>(
  tasks: Array<KeyedTask<K, T>>,
  opts?: { concurrency?: number; timeoutMs?: number }
): Promise<Array<TaskOutcome<K, T>>> {
  const concurrency = opts?.concurrency ?? 3;
  const timeoutMs = opts?.timeoutMs ?? 10000;

  const limit = pLimit(concurrency);

  const ps = tasks.map((task) => limit(async (): Promise<TaskOutcome<K, T>> => {
    try {
      const value = await withTimeout(task.run(), timeoutMs, task.key);
      return { key: task.key, ok: true, value };
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      logger.debug({ key: task.key, err: error }, 'worker task failed');
      return { key: task.key, ok: false, error };
    }
  }));
  return Promise.all(ps);
}

export default runKeyedTasks;
