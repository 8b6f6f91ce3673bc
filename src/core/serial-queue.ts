import { logger } from '../utils/logger.js';

/**
 * Runs tasks one at a time in submission order. Request handling, config
 * reloads and state flushes all go through one queue, so a task never
 * observes another task's half-applied state.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get depth(): number {
    return this.pending;
  }

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    // The chain continues past failures; the caller sees the rejection on `result`.
    this.tail = result.then(
      () => undefined,
      (error: unknown) => {
        logger.debug({ error }, 'Queued task failed');
      },
    );
    return result;
  }

  /** Resolves once everything submitted so far has finished. */
  drain(): Promise<void> {
    return this.tail;
  }
}
