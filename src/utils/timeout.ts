/**
 * Deadlines for suspension points (model and retrieval calls)
 */

import { DeadlineExceededError, OperationCancelledError } from '../core/errors.js';

/**
 * Run `task` with its own AbortSignal that fires when `timeoutMs` elapses or
 * the caller's `parent` signal aborts, whichever comes first.
 *
 * Rejects with DeadlineExceededError on timeout and OperationCancelledError
 * on caller cancellation. The task is expected to stop work when its signal
 * fires.
 */
export async function withDeadline<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new OperationCancelledError(operation);
  }

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new DeadlineExceededError(operation, timeoutMs));
      controller.abort();
    }, timeoutMs);

    onParentAbort = () => {
      reject(new OperationCancelledError(operation));
      controller.abort();
    };
    parent?.addEventListener('abort', onParentAbort, { once: true });
  });

  try {
    return await Promise.race([task(controller.signal), guard]);
  } finally {
    clearTimeout(timeoutId);
    if (onParentAbort) {
      parent?.removeEventListener('abort', onParentAbort);
    }
  }
}
