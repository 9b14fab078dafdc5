import { OUTCOMES, type Intent } from '../constants/index.js';
import type { IPageDriver } from '../browser/index.js';
import type { IElementLocator } from '../element-discovery/index.js';
import { sleep } from '../infra/abort.js';
import type { ILogger } from '../infra/logger.js';
import type { IElementSnapshot } from '../types/index.js';
import type { IFormInteractor, IInteractionOptions, IInteractionOutcome } from './index.js';
import { absorbDriverError, cancelledOutcome, notLocatedOutcome } from './outcomes.js';

/**
 * Baseline interactor: sleep a fixed time, look once, act once.
 * No read-back and no post-condition. Useful to compare against the
 * adaptive interactor when a site misbehaves.
 */
export class FixedWaitFormInteractor implements IFormInteractor {
  constructor(
    private locator: IElementLocator,
    private settings: { fixedWaitMs: number },
    private logger: ILogger
  ) {}

  async fill(
    page: IPageDriver,
    intent: Intent,
    value: string,
    options: IInteractionOptions = {}
  ): Promise<IInteractionOutcome> {
    const target = await this.settleAndLocate(page, intent, options);
    if (target === 'cancelled') return cancelledOutcome(0);
    if (!target) return notLocatedOutcome(intent, 1);

    try {
      await page.fill(target, value);
      return { status: OUTCOMES.SUCCESS, attempts: 1, value };
    } catch (error) {
      return { status: OUTCOMES.RETRY, attempts: 1, reason: absorbDriverError(error, intent, 1, this.logger) };
    }
  }

  async activate(page: IPageDriver, intent: Intent, options: IInteractionOptions = {}): Promise<IInteractionOutcome> {
    const target = await this.settleAndLocate(page, intent, options);
    if (target === 'cancelled') return cancelledOutcome(0);
    if (!target) return notLocatedOutcome(intent, 1);

    try {
      await page.click(target);
    } catch (error) {
      return { status: OUTCOMES.RETRY, attempts: 1, reason: absorbDriverError(error, intent, 1, this.logger) };
    }

    if (!(await sleep(this.settings.fixedWaitMs, options.signal))) {
      return cancelledOutcome(1);
    }
    return { status: OUTCOMES.SUCCESS, attempts: 1 };
  }

  async readText(page: IPageDriver, intent: Intent, options: IInteractionOptions = {}): Promise<IInteractionOutcome> {
    const target = await this.settleAndLocate(page, intent, options);
    if (target === 'cancelled') return cancelledOutcome(0);
    if (!target) return notLocatedOutcome(intent, 1);

    try {
      const value = (await page.readValue(target)).trim();
      return { status: OUTCOMES.SUCCESS, attempts: 1, value };
    } catch (error) {
      return { status: OUTCOMES.RETRY, attempts: 1, reason: absorbDriverError(error, intent, 1, this.logger) };
    }
  }

  async isPresent(page: IPageDriver, intent: Intent, options: IInteractionOptions = {}): Promise<boolean> {
    if (options.timeoutMs && !(await sleep(this.settings.fixedWaitMs, options.signal))) {
      return false;
    }
    const snapshot = await page.snapshot();
    return this.locator.locate(intent, snapshot, options.context).found;
  }

  private async settleAndLocate(
    page: IPageDriver,
    intent: Intent,
    options: IInteractionOptions
  ): Promise<IElementSnapshot | null | 'cancelled'> {
    if (!(await sleep(this.settings.fixedWaitMs, options.signal))) {
      return 'cancelled';
    }

    const snapshot = await page.snapshot();
    const result = this.locator.locate(intent, snapshot, options.context);
    if (!result.found) {
      this.logger.debug(`Fixed wait: ${intent} not on page`, { url: snapshot.url });
      return null;
    }
    return result.candidate.element;
  }
}
