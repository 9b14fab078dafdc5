/**
 * Retry utilities and the engine's error taxonomy
 * Provides exponential backoff for flaky infrastructure calls and the error
 * classes that separate transient failures from hard ones.
 */

import type { ILogger } from './logger.js';
import { sleep } from './abort.js';

export type BackoffKind = 'exponential' | 'linear' | 'constant';

export interface RetryOptions {
  maxRetries: number;
  backoff: BackoffKind;
  initialDelay?: number; // milliseconds
  maxDelay?: number; // milliseconds
  retryableErrors?: Array<new (...args: never[]) => Error>;
  onRetry?: (error: Error, attempt: number) => void;
  signal?: AbortSignal;
}

export class RetryableError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'RetryableError';
  }
}

export class FatalError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'FatalError';
  }
}

/**
 * The browser engine could not be started; raised before any session exists.
 */
export class BrowserLaunchError extends FatalError {
  constructor(message: string, originalError?: Error) {
    super(message, originalError);
    this.name = 'BrowserLaunchError';
  }
}

/**
 * The mailbox provider could not be reached after the poller's own retries.
 */
export class MailboxUnavailableError extends FatalError {
  constructor(message: string, originalError?: Error) {
    super(message, originalError);
    this.name = 'MailboxUnavailableError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

// Driver errors that describe a page in motion rather than a broken browser
const RETRYABLE_PATTERNS = [
  /timeout/i,
  /network/i,
  /connection/i,
  /ECONNREFUSED/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
  /detached/i,
  /not attached/i,
  /NS_BINDING_ABORTED/i,
  /interrupted by another navigation/i,
  /execution context was destroyed/i,
  /element is not (visible|enabled|editable|stable)/i,
  /rate.?limit/i,
  /too many requests/i,
  /50[234]/,
];

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Check if error is retryable
 */
export function isRetryableError(
  error: Error,
  retryableErrors: Array<new (...args: never[]) => Error> = []
): boolean {
  if (error instanceof RetryableError) {
    return true;
  }

  if (error instanceof FatalError || error instanceof CancelledError) {
    return false;
  }

  if (retryableErrors.length > 0) {
    return retryableErrors.some(ErrorType => error instanceof ErrorType);
  }

  return RETRYABLE_PATTERNS.some(pattern => pattern.test(error.message));
}

// The browser itself is gone; nothing inside a phase can recover from these
const BROWSER_GONE_PATTERNS = [
  /has been closed/i,
  /browser has disconnected/i,
  /Target crashed/i,
  /Browser closed/i,
];

/**
 * True for errors no in-phase retry can fix: declared fatal errors,
 * cancellation, and a browser that closed or crashed underneath the page.
 */
export function isInfrastructureError(error: Error): boolean {
  if (error instanceof FatalError || error instanceof CancelledError) {
    return true;
  }
  return BROWSER_GONE_PATTERNS.some(pattern => pattern.test(error.message));
}

/**
 * Retry strategy with configurable backoff
 */
export class RetryStrategy {
  constructor(private logger?: ILogger) {}

  /**
   * Execute an operation with retry logic
   */
  async execute<T>(
    operation: () => Promise<T>,
    options: RetryOptions
  ): Promise<T> {
    const {
      maxRetries,
      backoff,
      initialDelay = 1000,
      maxDelay = 30000,
      retryableErrors = [],
      onRetry,
      signal
    } = options;

    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = toError(error);

        const isRetryable = isRetryableError(lastError, retryableErrors);

        if (!isRetryable || attempt === maxRetries || signal?.aborted) {
          this.logger?.error('Operation failed after retries', {
            attempt: attempt + 1,
            maxRetries,
            error: lastError.message,
            isRetryable
          });
          throw lastError;
        }

        const delay = this.calculateDelay(attempt, backoff, initialDelay, maxDelay);

        this.logger?.warn(`Retry attempt ${attempt + 1}/${maxRetries}`, {
          error: lastError.message,
          nextRetryIn: delay
        });

        if (onRetry) {
          onRetry(lastError, attempt + 1);
        }

        const completed = await sleep(delay, signal);
        if (!completed) {
          throw new CancelledError();
        }
      }
    }

    throw lastError ?? new Error('Operation failed');
  }

  /**
   * Calculate retry delay based on backoff strategy
   */
  private calculateDelay(
    attempt: number,
    backoff: BackoffKind,
    initialDelay: number,
    maxDelay: number
  ): number {
    let delay: number;

    switch (backoff) {
      case 'exponential':
        delay = initialDelay * Math.pow(2, attempt);
        break;
      case 'linear':
        delay = initialDelay * (attempt + 1);
        break;
      case 'constant':
        delay = initialDelay;
        break;
      default:
        delay = initialDelay;
    }

    // Add jitter (0-20% random variation)
    const jitter = delay * 0.2 * Math.random();
    delay = delay + jitter;

    return Math.min(delay, maxDelay);
  }
}
