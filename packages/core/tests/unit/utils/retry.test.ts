import { describe, expect, it, vi } from 'vitest';
import { backoffDelay, withRetry } from '../../../src/utils/retry.js';

describe('backoffDelay', () => {
  it('doubles per attempt', () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(n, 100))).toEqual([100, 200, 400, 800]);
  });

  it('caps at maxBackoff', () => {
    expect([1, 2, 3].map((n) => backoffDelay(n, 1000, 1500))).toEqual([1000, 1500, 1500]);
  });
});

describe('withRetry', () => {
  it('returns result on first success', async () => {
    const fn = vi.fn().mockResolvedValue('ok');
    const result = await withRetry(fn);
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('passes the 1-based attempt number', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('fail')).mockResolvedValue('ok');
    await withRetry(fn, { attempts: 3, backoff: 0 });
    expect(fn.mock.calls).toEqual([[1], [2]]);
  });

  it('throws after all attempts exhausted', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('always fails'));

    await expect(withRetry(fn, { attempts: 3, backoff: 1 })).rejects.toThrow('always fails');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('reports each retry before sleeping', async () => {
    const onRetry = vi.fn();
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('ok');

    await withRetry(fn, { attempts: 3, backoff: 1, maxBackoff: 1, onRetry });

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls.map(([error, attempt, delay]) => [String(error), attempt, delay])).toEqual([
      ['Error: first', 1, 1],
      ['Error: second', 2, 1],
    ]);
  });

  it('uses exponential backoff', async () => {
    vi.useFakeTimers();
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('fail'))
      .mockRejectedValueOnce(new Error('fail'))
      .mockResolvedValue('ok');

    const promise = withRetry(fn, { attempts: 3, backoff: 100 });

    // First retry: 100ms * 2^0 = 100ms
    await vi.advanceTimersByTimeAsync(100);
    expect(fn).toHaveBeenCalledTimes(2);
    // Second retry: 100ms * 2^1 = 200ms
    await vi.advanceTimersByTimeAsync(200);

    const result = await promise;
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);

    vi.useRealTimers();
  });

  it('does not schedule a timer for a zero delay', async () => {
    vi.useFakeTimers();
    const fn = vi.fn().mockRejectedValueOnce(new Error('fail')).mockResolvedValue('ok');
    await expect(withRetry(fn, { attempts: 2, backoff: 0 })).resolves.toBe('ok');
    expect(vi.getTimerCount()).toBe(0);
    vi.useRealTimers();
  });

  it('defaults to 3 attempts', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fail'));
    await expect(withRetry(fn, { backoff: 1 })).rejects.toThrow('fail');
    expect(fn).toHaveBeenCalledTimes(3);
  });
});
