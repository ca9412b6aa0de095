/**
 * Async Utilities
 */

import type { ILogger } from "../types/logging";
import { toError } from "./error.utils";

export interface ConcurrentExecutionResult<R> {
  results: (R | null)[];
  errors: (Error | null)[];
  successful: number;
  failed: number;
}

/**
 * Execute async operations over `items` with at most `concurrency` running at once.
 * Results and errors are reported by item index, whatever the completion order.
 */
export async function executeWithConcurrency<T, R>(
  items: readonly T[],
  operation: (item: T, index: number) => Promise<R>,
  options: {
    concurrency?: number;
    onError?: "throw" | "continue";
    logger?: ILogger;
  } = {}
): Promise<ConcurrentExecutionResult<R>> {
  const { concurrency = 5, onError = "continue", logger } = options;
  const results: (R | null)[] = new Array<R | null>(items.length).fill(null);
  const errors: (Error | null)[] = new Array<Error | null>(items.length).fill(null);
  let successful = 0;
  let failed = 0;
  let cursor = 0;
  let aborted = false;

  const worker = async (): Promise<void> => {
    while (!aborted && cursor < items.length) {
      const index = cursor++;
      try {
        results[index] = await operation(items[index], index);
        successful++;
      } catch (error) {
        const err = toError(error);
        errors[index] = err;
        failed++;

        logger?.warn(`Operation failed for item ${index}: ${err.message}`);

        if (onError === "throw") {
          aborted = true;
          throw err;
        }
      }
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  const workers = Array.from({ length: workerCount }, () => worker());

  if (onError === "throw") {
    await Promise.all(workers);
  } else {
    await Promise.allSettled(workers);
  }

  return { results, errors, successful, failed };
}
