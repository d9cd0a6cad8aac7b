import { describe, it, expect, vi } from 'vitest';
import { runAttempts } from '../../../src/shared/RetryPolicy.js';

describe('RetryPolicy', () => {
  it('should succeed on first try', async () => {
    const fn = vi.fn().mockResolvedValue('ok');
    const result = await runAttempts(fn, { maxAttempts: 3, cooldownAfter: () => 0 });

    expect(result).toEqual({ ok: true, value: 'ok', attempts: 1 });
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(0);
  });

  it('should wait before every attempt, including the first', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('busy'))
      .mockResolvedValue('ok');

    const result = await runAttempts(fn, {
      maxAttempts: 3,
      delayBefore: (attempt) => 100 + attempt,
      cooldownAfter: () => 50,
      sleep,
    });

    expect(result.ok).toBe(true);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 50, 101]);
  });

  it('should stop after maxAttempts and report the last error', async () => {
    const err = new Error('busy');
    const fn = vi.fn().mockRejectedValue(err);

    const result = await runAttempts(fn, { maxAttempts: 2, cooldownAfter: () => 0 });

    expect(result).toEqual({ ok: false, attempts: 2, lastError: err, rejected: false });
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should give up immediately when cooldownAfter returns null', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));
    const onFailure = vi.fn();

    const result = await runAttempts(fn, { maxAttempts: 5, cooldownAfter: () => null, onFailure });

    expect(result.attempts).toBe(1);
    expect(onFailure).toHaveBeenCalledWith(0, expect.any(Error), null);
  });

  it('should spend an attempt on a rejected result without cooling down', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const onRejected = vi.fn();
    const fn = vi.fn()
      .mockResolvedValueOnce('')
      .mockResolvedValue('good');

    const result = await runAttempts(fn, {
      maxAttempts: 3,
      accept: (value: string) => value.length > 0,
      cooldownAfter: () => 999,
      onRejected,
      sleep,
    });

    expect(result).toEqual({ ok: true, value: 'good', attempts: 2 });
    expect(onRejected).toHaveBeenCalledWith(0, '');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should flag exhaustion caused by rejected results', async () => {
    const fn = vi.fn().mockResolvedValue('same');
    const result = await runAttempts(fn, {
      maxAttempts: 2,
      accept: () => false,
      cooldownAfter: () => 0,
    });

    expect(result).toEqual({ ok: false, attempts: 2, lastError: undefined, rejected: true });
  });
});
