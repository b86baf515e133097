/**
 * Unit tests for withDeadline
 */

import { describe, it, expect } from 'vitest';
import { DeadlineExceededError, OperationAbortedError, withDeadline } from '../../src/lib/deadline.js';

function never(signal: AbortSignal): Promise<string> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted inside')), { once: true });
  });
}

describe('withDeadline', () => {
  it('should resolve with the operation value', async () => {
    await expect(withDeadline(async () => 42, { timeoutMs: 100 })).resolves.toBe(42);
  });

  it('should pass through the operation error', async () => {
    await expect(
      withDeadline(async () => {
        throw new Error('backend down');
      }, { timeoutMs: 100 })
    ).rejects.toThrow('backend down');
  });

  it('should reject a synchronous throw', async () => {
    await expect(
      withDeadline(() => {
        throw new Error('sync failure');
      }, { timeoutMs: 100 })
    ).rejects.toThrow('sync failure');
  });

  it('should reject with DeadlineExceededError and abort the operation', async () => {
    let seen: AbortSignal | undefined;

    const pending = withDeadline((signal) => {
      seen = signal;
      return never(signal);
    }, { timeoutMs: 10 });

    await expect(pending).rejects.toBeInstanceOf(DeadlineExceededError);
    await expect(pending).rejects.toThrow('Operation timed out after 10ms');
    expect(seen?.aborted).toBe(true);
  });

  it('should reject with OperationAbortedError when the parent aborts', async () => {
    const parent = new AbortController();
    let seen: AbortSignal | undefined;

    const pending = withDeadline((signal) => {
      seen = signal;
      return never(signal);
    }, { timeoutMs: 1000, signal: parent.signal });
    parent.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationAbortedError);
    expect(seen?.aborted).toBe(true);
  });

  it('should not start the operation for an already aborted parent', async () => {
    const parent = new AbortController();
    parent.abort();
    let started = false;

    await expect(
      withDeadline(async () => {
        started = true;
      }, { timeoutMs: 100, signal: parent.signal })
    ).rejects.toBeInstanceOf(OperationAbortedError);
    expect(started).toBe(false);
  });
});
