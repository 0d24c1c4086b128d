import { retry, retryDelay } from '../../src/shared/retry.js';

function networkError(code: string): Error {
  return Object.assign(new Error(`connect ${code}`), { code });
}

describe('retry', () => {
  it('repeats a call that failed with a retryable code', async () => {
    const request = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(networkError('ECONNRESET'))
      .mockResolvedValueOnce('body');

    await expect(
      retry(request, { maxAttempts: 2, baseDelayMs: 0, retryableErrors: ['ECONNRESET'] }),
    ).resolves.toBe('body');
    expect(request).toHaveBeenCalledTimes(2);
  });

  it('reads the code of a thrown plain object', async () => {
    const request = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce({ code: 'ETIMEDOUT' })
      .mockResolvedValueOnce('body');

    await expect(
      retry(request, { maxAttempts: 2, baseDelayMs: 0, retryableErrors: ['ETIMEDOUT'] }),
    ).resolves.toBe('body');
  });

  it('throws a non-retryable failure at once', async () => {
    const failure = networkError('ENOTFOUND');
    const request = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(
      retry(request, { maxAttempts: 3, baseDelayMs: 0, retryableErrors: ['ECONNRESET'] }),
    ).rejects.toBe(failure);
    expect(request).toHaveBeenCalledTimes(1);
  });

  it('rethrows the last failure once attempts run out', async () => {
    const last = networkError('ECONNRESET');
    const request = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(networkError('ECONNRESET'))
      .mockRejectedValueOnce(last);

    await expect(retry(request, { maxAttempts: 2, baseDelayMs: 0 })).rejects.toBe(last);
    expect(request).toHaveBeenCalledTimes(2);
  });

  it('refuses a zero attempt budget without calling', async () => {
    const request = vi.fn<() => Promise<string>>();

    await expect(retry(request, { maxAttempts: 0, baseDelayMs: 0 })).rejects.toBeInstanceOf(
      RangeError,
    );
    expect(request).not.toHaveBeenCalled();
  });
});

describe('retryDelay', () => {
  it('doubles per attempt within ten percent', () => {
    const delay = retryDelay(3, 1000);

    expect(delay).toBeGreaterThanOrEqual(3600);
    expect(delay).toBeLessThanOrEqual(4400);
  });
});
