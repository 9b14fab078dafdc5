import { FAILURE_KINDS, OUTCOMES, type FailureKind, type Phase } from '../../constants/index.js';
import type { IPageDriver } from '../../browser/index.js';
import type { IElementLocator } from '../../element-discovery/index.js';
import { AdaptiveWaiter, networkIdle } from '../../infra/adaptive-waiter.js';
import type { IFormInteractor, IInteractionOutcome } from '../../interaction/index.js';
import type { IPhaseResult } from '../../types/index.js';
import type { IEngineSettings } from '../../types/settings.js';

/**
 * Collaborators shared by the browser-driven phase handlers.
 */
export interface IPhaseDeps {
  settings: IEngineSettings;
  interactor: IFormInteractor;
  locator: IElementLocator;
  waiter: AdaptiveWaiter;
}

export function succeeded(phase: Phase, value?: string): IPhaseResult {
  return { phase, outcome: OUTCOMES.SUCCESS, value };
}

export function retryable(phase: Phase, reason: string): IPhaseResult {
  return { phase, outcome: OUTCOMES.RETRY, reason };
}

export function fatal(phase: Phase, reason: string, failureKind: FailureKind = FAILURE_KINDS.PHASE): IPhaseResult {
  return { phase, outcome: OUTCOMES.FATAL, reason, failureKind };
}

/**
 * A non-success interaction as a phase result. Interaction `fatal` only
 * comes from cancellation.
 */
export function fromInteraction(phase: Phase, outcome: IInteractionOutcome): IPhaseResult {
  const reason = outcome.reason ?? 'interaction failed';
  return outcome.status === OUTCOMES.FATAL ? fatal(phase, reason, FAILURE_KINDS.CANCELLED) : retryable(phase, reason);
}

/**
 * Navigate and give the page a bounded chance to go quiet.
 */
export async function navigate(page: IPageDriver, url: string, deps: IPhaseDeps, signal: AbortSignal): Promise<void> {
  await page.goto(url);
  await deps.waiter.until(networkIdle(page), deps.settings.wait.networkIdleTimeoutMs, signal);
}
