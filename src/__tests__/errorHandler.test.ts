import { describe, it, expect, vi } from 'vitest';
import { ErrorHandlerService } from '../services/errorHandler.service';

const handlerWithSpySleep = () => {
  const sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
  return { handler: new ErrorHandlerService(sleep), sleep };
};

describe('ErrorHandlerService.executeWithRetry', () => {
  it('returns the first successful result', async () => {
    const { handler, sleep } = handlerWithSpySleep();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValue('ok');

    await expect(
      handler.executeWithRetry(fn, {}, { maxRetries: 3, baseDelay: 100, strategy: 'exponential' })
    ).resolves.toBe('ok');

    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('rethrows the last error once retries run out', async () => {
    const { handler } = handlerWithSpySleep();
    const failure = new Error('down');
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(
      handler.executeWithRetry(fn, {}, { maxRetries: 2, baseDelay: 10, strategy: 'fixed' })
    ).rejects.toBe(failure);

    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry errors the predicate rejects', async () => {
    const { handler, sleep } = handlerWithSpySleep();
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('bad request'));

    await expect(
      handler.executeWithRetry(fn, {}, { maxRetries: 3, shouldRetry: () => false })
    ).rejects.toThrow('bad request');

    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('lets the error dictate the delay', async () => {
    const { handler, sleep } = handlerWithSpySleep();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('slow down'))
      .mockResolvedValue('ok');

    await handler.executeWithRetry(fn, {}, { baseDelay: 1000, delayFor: () => 3000 });

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([3000]);
  });
});

describe('ErrorHandlerService.calculateDelay', () => {
  const handler = new ErrorHandlerService();

  it('supports exponential, linear and fixed strategies', () => {
    expect(handler.calculateDelay(3, { baseDelay: 100, strategy: 'exponential' })).toBe(400);
    expect(handler.calculateDelay(3, { baseDelay: 100, strategy: 'linear' })).toBe(300);
    expect(handler.calculateDelay(3, { baseDelay: 100, strategy: 'fixed' })).toBe(100);
  });
});
