/**
 * Tests for deadline handling
 */

import { describe, it, expect } from 'vitest';
import { withDeadline } from './timeout.js';
import { DeadlineExceededError, OperationCancelledError } from '../core/errors.js';

function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

describe('withDeadline', () => {
  it('should resolve with the task result when it finishes in time', async () => {
    await expect(withDeadline('fast', 1000, async () => 'done')).resolves.toBe('done');
  });

  it('should reject with DeadlineExceededError and abort the task signal on timeout', async () => {
    let taskSignal: AbortSignal | undefined;
    const pending = withDeadline('slow call', 20, (signal) => {
      taskSignal = signal;
      return waitForAbort(signal);
    });

    await expect(pending).rejects.toBeInstanceOf(DeadlineExceededError);
    expect(taskSignal?.aborted).toBe(true);
  });

  it('should reject with OperationCancelledError when the parent aborts', async () => {
    const parent = new AbortController();
    const pending = withDeadline('model call', 10_000, (signal) => waitForAbort(signal), parent.signal);
    parent.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('should not start the task when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    let started = false;

    await expect(
      withDeadline('model call', 1000, async () => {
        started = true;
        return 1;
      }, parent.signal)
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(started).toBe(false);
  });

  it('should pass through task errors', async () => {
    await expect(
      withDeadline('failing', 1000, async () => {
        throw new Error('upstream down');
      })
    ).rejects.toThrow('upstream down');
  });
});
