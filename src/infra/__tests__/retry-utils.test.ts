import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  RetryStrategy,
  RetryableError,
  FatalError,
  BrowserLaunchError,
  MailboxUnavailableError,
  CancelledError,
  isInfrastructureError,
  isRetryableError,
  toError,
} from '../retry-utils.js';

describe('RetryStrategy', () => {
  let retryStrategy: RetryStrategy;

  beforeEach(() => {
    retryStrategy = new RetryStrategy();
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('execute', () => {
    it('should succeed on first attempt', async () => {
      const operation = vi.fn().mockResolvedValue('success');

      const result = await retryStrategy.execute(operation, {
        maxRetries: 3,
        backoff: 'exponential'
      });

      expect(result).toBe('success');
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should retry on RetryableError', async () => {
      const operation = vi.fn()
        .mockRejectedValueOnce(new RetryableError('temp error'))
        .mockResolvedValueOnce('success');

      const promise = retryStrategy.execute(operation, {
        maxRetries: 3,
        backoff: 'constant',
        initialDelay: 100
      });

      await vi.runAllTimersAsync();
      const result = await promise;

      expect(result).toBe('success');
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('should not retry on FatalError', async () => {
      const operation = vi.fn().mockRejectedValue(new FatalError('fatal'));

      await expect(
        retryStrategy.execute(operation, {
          maxRetries: 3,
          backoff: 'exponential'
        })
      ).rejects.toThrow('fatal');

      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should use exponential backoff', async () => {
      const operation = vi.fn()
        .mockRejectedValueOnce(new RetryableError('error1'))
        .mockRejectedValueOnce(new RetryableError('error2'))
        .mockResolvedValueOnce('success');

      const promise = retryStrategy.execute(operation, {
        maxRetries: 3,
        backoff: 'exponential',
        initialDelay: 100,
        maxDelay: 10000
      });

      // First retry: ~100ms
      await vi.advanceTimersByTimeAsync(150);
      expect(operation).toHaveBeenCalledTimes(2);

      // Second retry: ~200ms
      await vi.advanceTimersByTimeAsync(250);
      const result = await promise;

      expect(result).toBe('success');
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should fail after max retries', async () => {
      const operation = vi.fn().mockRejectedValue(new RetryableError('always fails'));

      const promise = retryStrategy.execute(operation, {
        maxRetries: 2,
        backoff: 'constant',
        initialDelay: 100
      });

      // Catch the promise rejection to prevent unhandled rejection
      promise.catch(() => {});

      await vi.runAllTimersAsync();

      await expect(promise).rejects.toThrow('always fails');
      expect(operation).toHaveBeenCalledTimes(3); // Initial + 2 retries
    });

    it('should call onRetry callback', async () => {
      const onRetry = vi.fn();
      const operation = vi.fn()
        .mockRejectedValueOnce(new RetryableError('error'))
        .mockResolvedValueOnce('success');

      const promise = retryStrategy.execute(operation, {
        maxRetries: 3,
        backoff: 'constant',
        initialDelay: 100,
        onRetry
      });

      await vi.runAllTimersAsync();
      await promise;

      expect(onRetry).toHaveBeenCalledTimes(1);
      expect(onRetry).toHaveBeenCalledWith(
        expect.objectContaining({ message: 'error' }),
        1
      );
    });

    it('should respect maxDelay cap', async () => {
      const operation = vi.fn()
        .mockRejectedValueOnce(new RetryableError('error'))
        .mockResolvedValueOnce('success');

      const promise = retryStrategy.execute(operation, {
        maxRetries: 3,
        backoff: 'exponential',
        initialDelay: 100,
        maxDelay: 150
      });

      await vi.advanceTimersByTimeAsync(200);
      const result = await promise;

      expect(result).toBe('success');
    });

    it('should retry any listed error type', async () => {
      const operation = vi.fn()
        .mockRejectedValueOnce(new Error('provider said no'))
        .mockResolvedValueOnce('success');

      const promise = retryStrategy.execute(operation, {
        maxRetries: 1,
        backoff: 'constant',
        initialDelay: 10,
        retryableErrors: [Error]
      });

      await vi.runAllTimersAsync();

      expect(await promise).toBe('success');
    });

    it('should stop with CancelledError when aborted during backoff', async () => {
      const controller = new AbortController();
      const operation = vi.fn().mockRejectedValue(new RetryableError('busy'));

      const promise = retryStrategy.execute(operation, {
        maxRetries: 5,
        backoff: 'constant',
        initialDelay: 1000,
        signal: controller.signal
      });
      promise.catch(() => {});

      await vi.advanceTimersByTimeAsync(10);
      controller.abort();

      await expect(promise).rejects.toBeInstanceOf(CancelledError);
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });

  describe('error classification', () => {
    it('should retry on timeout errors', async () => {
      const operation = vi.fn()
        .mockRejectedValueOnce(new Error('Operation timeout'))
        .mockResolvedValueOnce('success');

      const promise = retryStrategy.execute(operation, {
        maxRetries: 3,
        backoff: 'constant',
        initialDelay: 100
      });

      await vi.runAllTimersAsync();
      const result = await promise;

      expect(result).toBe('success');
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('should retry on rate limit errors', async () => {
      const operation = vi.fn()
        .mockRejectedValueOnce(new Error('Rate limit exceeded'))
        .mockResolvedValueOnce('success');

      const promise = retryStrategy.execute(operation, {
        maxRetries: 3,
        backoff: 'constant',
        initialDelay: 100
      });

      await vi.runAllTimersAsync();
      const result = await promise;

      expect(result).toBe('success');
    });
  });
});

describe('isRetryableError', () => {
  it('should treat page-in-motion errors as transient', () => {
    expect(isRetryableError(new Error('Execution context was destroyed, most likely because of a navigation'))).toBe(true);
    expect(isRetryableError(new Error('element is not visible'))).toBe(true);
    expect(isRetryableError(new RetryableError('stale element reference'))).toBe(true);
  });

  it('should never retry fatal or cancelled errors', () => {
    expect(isRetryableError(new BrowserLaunchError('timeout launching'))).toBe(false);
    expect(isRetryableError(new CancelledError())).toBe(false);
  });

  it('should not retry unknown errors', () => {
    expect(isRetryableError(new Error('Unexpected token <'))).toBe(false);
  });
});

describe('isInfrastructureError', () => {
  it('should flag a browser that went away', () => {
    expect(isInfrastructureError(new Error('Target page, context or browser has been closed'))).toBe(true);
    expect(isInfrastructureError(new Error('Target crashed'))).toBe(true);
  });

  it('should flag declared fatal errors and cancellation', () => {
    expect(isInfrastructureError(new MailboxUnavailableError('Mailbox list failed: offline'))).toBe(true);
    expect(isInfrastructureError(new CancelledError('stop'))).toBe(true);
  });

  it('should leave ordinary driver errors to the caller', () => {
    expect(isInfrastructureError(new Error('Timeout 500ms exceeded'))).toBe(false);
  });
});

describe('toError', () => {
  it('should wrap non-errors', () => {
    const error = toError('plain text');
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('plain text');
  });
});
