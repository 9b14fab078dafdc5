import type { IPageDriver } from '../browser/index.js';
import type { Intent, Outcome } from '../constants/index.js';
import type { ILocateContext } from '../element-discovery/index.js';

/**
 * Result of one form operation. `attempts` counts fill attempts or clicks;
 * `value` carries what a successful fill wrote or what readText read.
 */
export interface IInteractionOutcome {
  status: Outcome;
  attempts: number;
  reason?: string;
  value?: string;
}

export interface IInteractionOptions {
  signal?: AbortSignal;
  context?: ILocateContext;
  /** How long to wait for the element; defaults to the waiter's element timeout */
  timeoutMs?: number;
}

/**
 * Form Interaction Layer
 * Locates by intent, acts, then checks the page reacted. Never throws for
 * "element missing" or "no effect"; those come back as a `retry` outcome.
 * Errors that mean the browser is gone are rethrown.
 */
export interface IFormInteractor {
  fill(page: IPageDriver, intent: Intent, value: string, options?: IInteractionOptions): Promise<IInteractionOutcome>;
  activate(page: IPageDriver, intent: Intent, options?: IInteractionOptions): Promise<IInteractionOutcome>;
  readText(page: IPageDriver, intent: Intent, options?: IInteractionOptions): Promise<IInteractionOutcome>;
  /** Whether `intent` is locatable now, or within `timeoutMs` when given */
  isPresent(page: IPageDriver, intent: Intent, options?: IInteractionOptions): Promise<boolean>;
}
