/**
 * Per-path exclusive lock.
 *
 * Tasks for the same resolved path run one at a time in call order;
 * tasks for different paths do not wait on each other. Each path keeps
 * only the tail of its queue, dropped once the queue drains.
 */

import { resolve } from 'node:path';

export class PathLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(path: string, task: () => Promise<T>): Promise<T> {
    const key = resolve(path);
    const previous = this.tails.get(key) ?? Promise.resolve();

    const result = previous.then(task);
    const settle = (): void => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
    const tail: Promise<void> = result.then(settle, settle);
    this.tails.set(key, tail);

    return result;
  }

  isLocked(path: string): boolean {
    return this.tails.has(resolve(path));
  }
}

/** Default lock for pipelines in this process */
export const sharedPathLock = new PathLock();
