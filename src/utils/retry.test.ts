import { describe, it, expect, vi } from 'vitest';
import { withRetry } from './retry.js';
import { SerialQueue } from './serialQueue.js';

describe('withRetry', () => {
  it('backs off exponentially and returns the first success', async () => {
    const sleep = vi.fn(async () => undefined);
    const onRetry = vi.fn();
    const fn = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(new Error('down'))
      .mockRejectedValueOnce(new Error('down'))
      .mockResolvedValue('ok');

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 50, sleep, onRetry })).resolves.toBe('ok');

    expect(sleep.mock.calls).toEqual([[50], [100]]);
    expect(onRetry.mock.calls.map((call) => call[1])).toEqual([1, 2]);
  });

  it('gives up after maxRetries and rethrows the last error', async () => {
    const fn = vi.fn(async () => {
      throw new Error('still down');
    });
    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1, sleep: async () => undefined })).rejects.toThrow(
      'still down',
    );
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry errors the caller marks final', async () => {
    const fn = vi.fn(async () => {
      throw new Error('denied');
    });
    await expect(withRetry(fn, { maxRetries: 5, baseDelayMs: 1, isRetryable: () => false })).rejects.toThrow('denied');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('SerialQueue', () => {
  it('runs tasks in submission order, past a failure', async () => {
    const queue = new SerialQueue();
    const order: string[] = [];
    const slow = queue.run(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push('slow');
    });
    const failing = queue.run(async () => {
      order.push('failing');
      throw new Error('boom');
    });
    const fast = queue.run(async () => {
      order.push('fast');
      return 3;
    });

    await slow;
    await expect(failing).rejects.toThrow('boom');
    await expect(fast).resolves.toBe(3);
    expect(order).toEqual(['slow', 'failing', 'fast']);
  });
});
