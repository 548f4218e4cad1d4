import {
  executeWithRetry,
  exponentialBackoff,
  type RetryPolicy,
} from './retry-policy';

describe('executeWithRetry', () => {
  let delays: number[];
  let sleepMock: jest.Mock<Promise<void>, [number]>;

  function policy(
    overrides: Partial<RetryPolicy<boolean>> = {},
  ): RetryPolicy<boolean> {
    return {
      maxAttempts: 3,
      delayMs: exponentialBackoff(1000),
      isSuccess: (ok) => ok,
      sleep: sleepMock,
      ...overrides,
    };
  }

  beforeEach(() => {
    delays = [];
    sleepMock = jest.fn((ms: number) => {
      delays.push(ms);
      return Promise.resolve();
    });
  });

  it('computes a doubling schedule from the base delay', () => {
    const delayMs = exponentialBackoff(1000);
    expect([1, 2, 3, 4].map(delayMs)).toEqual([1000, 2000, 4000, 8000]);
  });

  it('returns immediately when the first attempt succeeds', async () => {
    const op = jest.fn().mockResolvedValue(true);

    await expect(executeWithRetry(op, policy())).resolves.toBe(true);

    expect(op).toHaveBeenCalledTimes(1);
    expect(sleepMock).not.toHaveBeenCalled();
  });

  it('calls an always-failing operation exactly maxAttempts times with doubling delays', async () => {
    const op = jest.fn().mockResolvedValue(false);

    await expect(executeWithRetry(op, policy())).resolves.toBe(false);

    expect(op).toHaveBeenCalledTimes(3);
    expect(op.mock.calls).toEqual([[1], [2], [3]]);
    expect(delays).toEqual([1000, 2000]);
  });

  it('stops retrying once an attempt succeeds', async () => {
    const op = jest
      .fn()
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(true);

    await expect(
      executeWithRetry(op, policy({ maxAttempts: 5 })),
    ).resolves.toBe(true);

    expect(op).toHaveBeenCalledTimes(2);
    expect(delays).toEqual([1000]);
  });

  it('swallows faults on non-final attempts and keeps retrying', async () => {
    const op = jest
      .fn()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(true);

    await expect(executeWithRetry(op, policy())).resolves.toBe(true);

    expect(op).toHaveBeenCalledTimes(2);
    expect(delays).toEqual([1000]);
  });

  it('rethrows a fault raised on the final attempt', async () => {
    const fault = new Error('connection refused');
    const op = jest
      .fn()
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(false)
      .mockRejectedValueOnce(fault);

    await expect(executeWithRetry(op, policy())).rejects.toBe(fault);

    expect(op).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('rethrows non-retryable errors without waiting', async () => {
    const fault = new TypeError('bad payload');
    const op = jest.fn().mockRejectedValue(fault);

    await expect(
      executeWithRetry(
        op,
        policy({ isRetryableError: (err) => !(err instanceof TypeError) }),
      ),
    ).rejects.toBe(fault);

    expect(op).toHaveBeenCalledTimes(1);
    expect(sleepMock).not.toHaveBeenCalled();
  });

  it('reports every retry to onRetry', async () => {
    const onRetry = jest.fn();
    const fault = new Error('timeout');
    const op = jest
      .fn()
      .mockResolvedValueOnce(false)
      .mockRejectedValueOnce(fault)
      .mockResolvedValueOnce(true);

    await executeWithRetry(op, policy({ onRetry }));

    expect(onRetry.mock.calls).toEqual([
      [{ attempt: 1, delayMs: 1000 }],
      [{ attempt: 2, delayMs: 2000, error: fault }],
    ]);
  });

  it('rejects a non-positive attempt budget', async () => {
    const op = jest.fn().mockResolvedValue(true);

    await expect(
      executeWithRetry(op, policy({ maxAttempts: 0 })),
    ).rejects.toThrow('maxAttempts must be a positive integer, got 0');
    expect(op).not.toHaveBeenCalled();
  });
});
