/**
 * Concurrent Fan-Out
 *
 * Runs independent async tasks concurrently and joins their settled results
 * in input order. Each task writes only to its own result slot, so completion
 * order never leaks into the output.
 */

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { getErrorMessage } from './types';

// ============================================================================
// Types
// ============================================================================

export type SettledTask<T> =
  | { readonly index: number; readonly status: 'fulfilled'; readonly value: T }
  | { readonly index: number; readonly status: 'rejected'; readonly reason: unknown };

export interface FanOutOptions<T> {
  /**
   * Maximum tasks in flight. Omit or pass 0 to start every task at once.
   */
  readonly concurrency?: number;
  /** Called as each task settles, in completion order. A throwing callback is logged and ignored. */
  readonly onSettled?: (result: SettledTask<T>, settledCount: number, total: number) => void;
  readonly logger?: Logger;
}

// ============================================================================
// Fan-Out
// ============================================================================

/**
 * Executes `task` for every item and returns one settled slot per item, in
 * input order. A rejected task never cancels its siblings.
 *
 * @example
 * const results = await fanOut(sections, (section) => write(section), { concurrency: 4 });
 * const written = results.flatMap((r) => (r.status === 'fulfilled' ? [r.value] : []));
 */
export async function fanOut<I, T>(
  items: readonly I[],
  task: (item: I, index: number) => Promise<T>,
  options: FanOutOptions<T> = {}
): Promise<SettledTask<T>[]> {
  const total = items.length;
  const slots = new Array<SettledTask<T> | undefined>(total).fill(undefined);
  let settledCount = 0;
  const log = options.logger ?? createPrefixedLogger('[FanOut]');

  const runOne = async (index: number): Promise<void> => {
    let result: SettledTask<T>;
    try {
      const value = await task(items[index], index);
      result = { index, status: 'fulfilled', value };
    } catch (reason) {
      result = { index, status: 'rejected', reason };
    }
    slots[index] = result;
    settledCount += 1;
    try {
      options.onSettled?.(result, settledCount, total);
    } catch (error) {
      log.warn(`onSettled callback failed for task ${index}: ${getErrorMessage(error)}`);
    }
  };

  const limit = options.concurrency && options.concurrency > 0 ? Math.min(options.concurrency, total) : total;

  if (limit >= total) {
    await Promise.all(items.map((_, index) => runOne(index)));
  } else {
    let nextIndex = 0;
    const worker = async (): Promise<void> => {
      while (nextIndex < total) {
        const index = nextIndex;
        nextIndex += 1;
        await runOne(index);
      }
    };
    await Promise.all(Array.from({ length: limit }, () => worker()));
  }

  return slots.map((slot, index) => slot ?? { index, status: 'rejected', reason: new Error('Task did not settle') });
}

/**
 * Values of fulfilled tasks, in input order.
 */
export function fulfilledValues<T>(results: readonly SettledTask<T>[]): T[] {
  return results.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));
}
