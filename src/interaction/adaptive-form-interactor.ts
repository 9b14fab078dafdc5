import { ERROR_MESSAGES, OUTCOMES, type Intent } from '../constants/index.js';
import type { IPageDriver } from '../browser/index.js';
import type { IElementLocator } from '../element-discovery/index.js';
import { AdaptiveWaiter, elementLocated } from '../infra/adaptive-waiter.js';
import type { ILogger } from '../infra/logger.js';
import type { IDocumentSnapshot, IElementCandidate, IElementSnapshot } from '../types/index.js';
import type { IInteractionSettings, IWaitSettings } from '../types/settings.js';
import { documentSignature } from './document-signature.js';
import type { IFormInteractor, IInteractionOptions, IInteractionOutcome } from './index.js';
import { absorbDriverError, cancelledOutcome, notLocatedOutcome } from './outcomes.js';

interface ILocated {
  candidate: IElementCandidate;
  snapshot: IDocumentSnapshot;
}

interface IPageState {
  url: string;
  signature: string;
}

// A control gets this many clicks before activate gives up
const MAX_CLICKS = 2;

/**
 * Locate → act → verify. Fills are read back; clicks must leave a trace
 * (new URL or a changed document) within the grace period.
 */
export class AdaptiveFormInteractor implements IFormInteractor {
  constructor(
    private locator: IElementLocator,
    private waiter: AdaptiveWaiter,
    private settings: { wait: IWaitSettings; interaction: IInteractionSettings },
    private logger: ILogger
  ) {}

  async fill(
    page: IPageDriver,
    intent: Intent,
    value: string,
    options: IInteractionOptions = {}
  ): Promise<IInteractionOutcome> {
    const { signal } = options;
    const maxAttempts = Math.max(1, this.settings.interaction.fillAttempts);
    let reason: string = ERROR_MESSAGES.ELEMENT_NOT_LOCATED(intent);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        return cancelledOutcome(attempt - 1);
      }

      const located = await this.waitForElement(page, intent, options);
      if (signal?.aborted) {
        return cancelledOutcome(attempt);
      }
      if (!located) {
        reason = ERROR_MESSAGES.ELEMENT_NOT_LOCATED(intent);
        continue;
      }

      const target = located.candidate.element;
      try {
        // Clear first so a retried fill never appends to a partial value
        await page.fill(target, '');
        await page.fill(target, value);
        const readBack = await page.readValue(target);

        if (readBack === value) {
          this.logger.debug(`Filled ${intent}`, { attempt, ref: target.ref });
          return { status: OUTCOMES.SUCCESS, attempts: attempt, value };
        }

        reason = ERROR_MESSAGES.READ_BACK_MISMATCH(intent, attempt);
        this.logger.debug(`Read-back mismatch on ${intent}`, {
          attempt,
          expectedLength: value.length,
          actualLength: readBack.length,
        });
      } catch (error) {
        reason = absorbDriverError(error, intent, attempt, this.logger);
      }
    }

    this.logger.warn(`Giving up on ${intent}`, { attempts: maxAttempts, reason });
    return { status: OUTCOMES.RETRY, attempts: maxAttempts, reason };
  }

  async activate(page: IPageDriver, intent: Intent, options: IInteractionOptions = {}): Promise<IInteractionOutcome> {
    const { signal } = options;

    const located = await this.waitForElement(page, intent, options);
    if (signal?.aborted) {
      return cancelledOutcome(0);
    }
    if (!located) {
      return notLocatedOutcome(intent, 0);
    }

    const target = located.candidate.element;
    const before: IPageState = { url: page.url(), signature: documentSignature(located.snapshot) };
    let reason: string = ERROR_MESSAGES.NO_OBSERVABLE_EFFECT(intent);

    for (let click = 1; click <= MAX_CLICKS; click++) {
      try {
        await page.click(target);
      } catch (error) {
        reason = absorbDriverError(error, intent, click, this.logger);
        continue;
      }

      const reacted = await this.waiter.until(
        () => this.hasReacted(page, before),
        this.settings.interaction.activateGraceMs,
        signal
      );
      if (reacted) {
        this.logger.debug(`Activated ${intent}`, { clicks: click, ref: target.ref });
        return { status: OUTCOMES.SUCCESS, attempts: click };
      }
      if (signal?.aborted) {
        return cancelledOutcome(click);
      }
      reason = ERROR_MESSAGES.NO_OBSERVABLE_EFFECT(intent);
    }

    this.logger.warn(`No reaction to ${intent}`, { clicks: MAX_CLICKS, url: before.url });
    return { status: OUTCOMES.RETRY, attempts: MAX_CLICKS, reason };
  }

  async readText(page: IPageDriver, intent: Intent, options: IInteractionOptions = {}): Promise<IInteractionOutcome> {
    const located = await this.waitForElement(page, intent, options);
    if (options.signal?.aborted) {
      return cancelledOutcome(0);
    }
    if (!located) {
      return notLocatedOutcome(intent, 0);
    }

    try {
      const value = await this.read(page, located.candidate.element);
      return { status: OUTCOMES.SUCCESS, attempts: 1, value };
    } catch (error) {
      return { status: OUTCOMES.RETRY, attempts: 1, reason: absorbDriverError(error, intent, 1, this.logger) };
    }
  }

  async isPresent(page: IPageDriver, intent: Intent, options: IInteractionOptions = {}): Promise<boolean> {
    const located = await this.waitForElement(page, intent, { ...options, timeoutMs: options.timeoutMs ?? 0 });
    return located !== null;
  }

  private async read(page: IPageDriver, target: IElementSnapshot): Promise<string> {
    return (await page.readValue(target)).trim();
  }

  private async waitForElement(
    page: IPageDriver,
    intent: Intent,
    options: IInteractionOptions
  ): Promise<ILocated | null> {
    const holder: { located?: ILocated } = {};
    const found = await this.waiter.until(
      elementLocated(page, this.locator, intent, options.context, (candidate, snapshot) => {
        holder.located = { candidate, snapshot };
      }),
      options.timeoutMs ?? this.settings.wait.elementTimeoutMs,
      options.signal
    );
    return found && holder.located ? holder.located : null;
  }

  // Disabled state is part of the signature, so a control that greys out counts
  private async hasReacted(page: IPageDriver, before: IPageState): Promise<boolean> {
    if (page.url() !== before.url) {
      return true;
    }
    const snapshot = await page.snapshot();
    return documentSignature(snapshot) !== before.signature;
  }
}
