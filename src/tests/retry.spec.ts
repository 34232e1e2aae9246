import { describe, it, expect, vi } from 'vitest';
import { isRetryableTransport, withRetry } from '../llm/retry.js';
import { TransportError } from '../errors.js';

describe('withRetry', () => {
  it('returns the first success', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('one'))
      .mockRejectedValueOnce(new Error('two'))
      .mockResolvedValue('ok');
    const onRetry = vi.fn();
    await expect(withRetry(fn, { attempts: 3, backoff: 0, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([, n]) => n)).toEqual([1, 2]);
  });

  it('throws the last error once attempts run out', async () => {
    const last = new Error('last');
    const fn = vi.fn<() => Promise<string>>().mockRejectedValueOnce(new Error('first')).mockRejectedValue(last);
    await expect(withRetry(fn, { attempts: 2, backoff: 0 })).rejects.toBe(last);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops at once when retryOn declines the error', async () => {
    const fatal = new TransportError('LLM HTTP 400: bad request', false, 400);
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(fatal);
    await expect(withRetry(fn, { attempts: 5, backoff: 0, retryOn: isRetryableTransport })).rejects.toBe(fatal);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('isRetryableTransport', () => {
  it('accepts only transport errors marked retryable', () => {
    expect(isRetryableTransport(new TransportError('LLM HTTP 429: slow down', true, 429))).toBe(true);
    expect(isRetryableTransport(new TransportError('LLM HTTP 401: no key', false, 401))).toBe(false);
    expect(isRetryableTransport(new Error('boom'))).toBe(false);
  });

  it('classifies statuses', () => {
    const limited = new TransportError('LLM HTTP 429: slow down', true, 429);
    const down = new TransportError('LLM HTTP 502: bad gateway', true, 502);
    expect([limited.isRateLimit, limited.isServerError]).toEqual([true, false]);
    expect([down.isRateLimit, down.isServerError]).toEqual([false, true]);
  });
});
