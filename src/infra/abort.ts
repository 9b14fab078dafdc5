/**
 * Cancellation helpers shared by the waiter, the mailbox poller and the
 * phase state machine.
 */

/**
 * Sleep for `ms`, ending early when `signal` aborts.
 * Resolves true when the full delay elapsed, false when cancelled.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface LinkedAbort {
  signal: AbortSignal;
  /** True once the timeout (not the parent) fired */
  timedOut(): boolean;
  dispose(): void;
}

/**
 * A signal that aborts when the parent aborts or after `timeoutMs`,
 * whichever comes first. Call dispose() when the scope ends.
 */
export function linkAbort(parent: AbortSignal, timeoutMs: number): LinkedAbort {
  const controller = new AbortController();
  let expired = false;

  const onParentAbort = () => controller.abort(parent.reason);
  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, Math.max(0, timeoutMs));

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent.removeEventListener('abort', onParentAbort);
    },
  };
}
