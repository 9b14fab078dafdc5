/**
 * Adaptive Waiter
 * Polls a readiness predicate with multiplicative backoff instead of sleeping
 * for a fixed time.
 */

import { sleep } from './abort.js';
import type { IPageDriver } from '../browser/index.js';
import type { IElementLocator, ILocateContext } from '../element-discovery/index.js';
import type { Intent } from '../constants/index.js';
import type { IDocumentSnapshot, IElementCandidate } from '../types/index.js';

export type Predicate = () => boolean | Promise<boolean>;

export interface WaitOptions {
  minIntervalMs: number;
  maxIntervalMs: number;
  timeoutMs: number;
  factor?: number;
  signal?: AbortSignal;
}

/**
 * Evaluate `predicate` until it holds or `timeoutMs` elapses.
 *
 * The first check runs immediately; each sleep is clipped to the time left,
 * so an always-false predicate returns false no earlier than `timeoutMs` and
 * no later than one interval after it. A predicate that throws counts as
 * "not yet". Aborting `signal` ends the current sleep and returns false.
 */
export async function waitForCondition(
  predicate: Predicate,
  options: WaitOptions
): Promise<boolean> {
  const { minIntervalMs, maxIntervalMs, timeoutMs, factor = 2, signal } = options;
  const startedAt = Date.now();
  let interval = Math.max(1, minIntervalMs);

  for (;;) {
    if (signal?.aborted) {
      return false;
    }

    let satisfied = false;
    try {
      satisfied = await predicate();
    } catch {
      satisfied = false;
    }
    if (satisfied) {
      return true;
    }

    const remaining = timeoutMs - (Date.now() - startedAt);
    if (remaining <= 0) {
      return false;
    }

    const completed = await sleep(Math.min(interval, remaining), signal);
    if (!completed) {
      return false;
    }
    interval = Math.min(interval * factor, Math.max(minIntervalMs, maxIntervalMs));
  }
}

/**
 * Holds default intervals so callers only pass a timeout.
 */
export class AdaptiveWaiter {
  constructor(
    private defaults: { minIntervalMs: number; maxIntervalMs: number; factor: number }
  ) {}

  until(predicate: Predicate, timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    return waitForCondition(predicate, {
      ...this.defaults,
      timeoutMs,
      signal,
    });
  }
}

// Predicate factories

/**
 * Holds once `intent` resolves. `onFound` receives the winning candidate and
 * the snapshot it came from, so callers can act on it without locating twice.
 */
export function elementLocated(
  page: IPageDriver,
  locator: IElementLocator,
  intent: Intent,
  context?: ILocateContext,
  onFound?: (candidate: IElementCandidate, snapshot: IDocumentSnapshot) => void
): Predicate {
  return async () => {
    const snapshot = await page.snapshot();
    const result = locator.locate(intent, snapshot, context);
    if (result.found) {
      onFound?.(result.candidate, snapshot);
    }
    return result.found;
  };
}

export function networkIdle(page: IPageDriver, checkTimeoutMs = 500): Predicate {
  return () => page.isNetworkIdle(checkTimeoutMs);
}

export function textPresent(page: IPageDriver, text: string | RegExp): Predicate {
  return async () => {
    const snapshot = await page.snapshot();
    return typeof text === 'string'
      ? snapshot.bodyText.toLowerCase().includes(text.toLowerCase())
      : text.test(snapshot.bodyText);
  };
}

export function urlMatches(page: IPageDriver, pattern: RegExp): Predicate {
  return () => pattern.test(page.url());
}

export function anyOf(...predicates: Predicate[]): Predicate {
  return async () => {
    for (const predicate of predicates) {
      if (await predicate()) {
        return true;
      }
    }
    return false;
  };
}
