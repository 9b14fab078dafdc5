import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AdaptiveWaiter, anyOf, elementLocated, textPresent, urlMatches, waitForCondition } from '../adaptive-waiter.js';
import { linkAbort, sleep } from '../abort.js';
import { RankedElementLocator } from '../../element-discovery/ranked-element-locator.js';
import { INTENTS } from '../../constants/index.js';
import { FakePage } from '../../__tests__/fixtures/fake-page.js';
import { element } from '../../__tests__/fixtures/snapshots.js';

describe('waitForCondition', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return true without sleeping when the predicate already holds', async () => {
    const predicate = vi.fn().mockReturnValue(true);

    const result = await waitForCondition(predicate, { minIntervalMs: 100, maxIntervalMs: 1000, timeoutMs: 5000 });

    expect(result).toBe(true);
    expect(predicate).toHaveBeenCalledTimes(1);
  });

  it('should back off multiplicatively up to the ceiling', async () => {
    const checks: number[] = [];
    const start = Date.now();
    const predicate = () => {
      checks.push(Date.now() - start);
      return false;
    };

    const promise = waitForCondition(predicate, { minIntervalMs: 100, maxIntervalMs: 400, factor: 2, timeoutMs: 1500 });
    await vi.runAllTimersAsync();

    expect(await promise).toBe(false);
    // 100, 200, 400, 400, then the last sleep is clipped to what is left
    expect(checks).toEqual([0, 100, 300, 700, 1100, 1500]);
  });

  it('should stop once the predicate holds', async () => {
    let calls = 0;
    const promise = waitForCondition(() => ++calls === 3, { minIntervalMs: 50, maxIntervalMs: 50, timeoutMs: 1000 });

    await vi.runAllTimersAsync();

    expect(await promise).toBe(true);
    expect(calls).toBe(3);
  });

  it('should treat a throwing predicate as not ready', async () => {
    let calls = 0;
    const predicate = async () => {
      calls++;
      if (calls === 1) throw new Error('snapshot failed');
      return true;
    };

    const promise = waitForCondition(predicate, { minIntervalMs: 10, maxIntervalMs: 10, timeoutMs: 100 });
    await vi.runAllTimersAsync();

    expect(await promise).toBe(true);
    expect(calls).toBe(2);
  });

  it('should check once with a zero timeout', async () => {
    const predicate = vi.fn().mockReturnValue(false);

    expect(await waitForCondition(predicate, { minIntervalMs: 10, maxIntervalMs: 10, timeoutMs: 0 })).toBe(false);
    expect(predicate).toHaveBeenCalledTimes(1);
  });

  it('should give up as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const predicate = vi.fn().mockReturnValue(false);

    const promise = waitForCondition(predicate, {
      minIntervalMs: 1000,
      maxIntervalMs: 1000,
      timeoutMs: 60000,
      signal: controller.signal,
    });
    await vi.advanceTimersByTimeAsync(10);
    controller.abort();

    expect(await promise).toBe(false);
    expect(predicate).toHaveBeenCalledTimes(1);
  });
});

describe('AdaptiveWaiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should apply its default intervals', async () => {
    const waiter = new AdaptiveWaiter({ minIntervalMs: 100, maxIntervalMs: 100, factor: 2 });
    const predicate = vi.fn().mockReturnValue(false);

    const promise = waiter.until(predicate, 250);
    await vi.runAllTimersAsync();

    expect(await promise).toBe(false);
    // t=0, 100, 200, 250
    expect(predicate).toHaveBeenCalledTimes(4);
  });
});

describe('predicates', () => {
  const page = new FakePage();

  beforeEach(() => {
    page.show({
      url: 'https://app.example.test/signup',
      bodyText: 'Check your inbox',
      elements: [element({ ref: 0, tag: 'input', type: 'email', id: 'email' })],
    });
  });

  it('should match the current URL', () => {
    expect(urlMatches(page, /signup$/)()).toBe(true);
    expect(urlMatches(page, /dashboard/)()).toBe(false);
  });

  it('should find body text case-insensitively for strings', async () => {
    expect(await textPresent(page, 'CHECK YOUR')()).toBe(true);
    expect(await textPresent(page, /^Check/)()).toBe(true);
    expect(await textPresent(page, 'welcome')()).toBe(false);
  });

  it('should hand the located candidate to the callback', async () => {
    const onFound = vi.fn();

    const holds = await elementLocated(page, new RankedElementLocator(), INTENTS.EMAIL_FIELD, undefined, onFound)();

    expect(holds).toBe(true);
    expect(onFound).toHaveBeenCalledWith(expect.objectContaining({ ref: 0 }), expect.objectContaining({ url: page.url() }));
  });

  it('should hold when any predicate holds', async () => {
    expect(await anyOf(() => false, async () => true)()).toBe(true);
    expect(await anyOf(() => false)()).toBe(false);
  });
});

describe('abort helpers', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should report whether a sleep completed', async () => {
    const controller = new AbortController();
    const full = sleep(100);
    const cut = sleep(100, controller.signal);

    controller.abort();
    await vi.advanceTimersByTimeAsync(100);

    expect(await full).toBe(true);
    expect(await cut).toBe(false);
  });

  it('should abort a linked scope on timeout and mark it', async () => {
    const parent = new AbortController();
    const scope = linkAbort(parent.signal, 50);

    await vi.advanceTimersByTimeAsync(50);

    expect(scope.signal.aborted).toBe(true);
    expect(scope.timedOut()).toBe(true);
    expect(parent.signal.aborted).toBe(false);
    scope.dispose();
  });

  it('should follow the parent without marking a timeout', () => {
    const parent = new AbortController();
    const scope = linkAbort(parent.signal, 50);

    parent.abort(new Error('stop'));

    expect(scope.signal.aborted).toBe(true);
    expect(scope.timedOut()).toBe(false);
    scope.dispose();
  });

  it('should not fire after dispose', async () => {
    const scope = linkAbort(new AbortController().signal, 50);
    scope.dispose();

    await vi.advanceTimersByTimeAsync(100);

    expect(scope.signal.aborted).toBe(false);
  });

  it('should start aborted under an aborted parent', () => {
    const parent = new AbortController();
    parent.abort();

    const scope = linkAbort(parent.signal, 50);

    expect(scope.signal.aborted).toBe(true);
    scope.dispose();
  });
});
