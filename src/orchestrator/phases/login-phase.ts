import { ERROR_MESSAGES, INTENTS, OUTCOMES, PHASES } from '../../constants/index.js';
import type { IPageDriver } from '../../browser/index.js';
import { anyOf, elementLocated, type Predicate } from '../../infra/adaptive-waiter.js';
import type { IPhaseResult } from '../../types/index.js';
import type { ISiteSettings } from '../../types/settings.js';
import type { IPhaseContext, IPhaseHandler } from '../index.js';
import { fromInteraction, navigate, retryable, succeeded, type IPhaseDeps } from './phase-support.js';

const PHASE = PHASES.LOGGING_IN;

function onDashboard(page: IPageDriver, site: ISiteSettings): Predicate {
  return () => {
    const url = page.url();
    return site.dashboardUrlPattern.test(url) && !site.loginUrlPattern.test(url);
  };
}

/**
 * First attempt follows the verification link; later attempts go to the
 * dashboard URL, which presents the login prompt when signed out.
 */
export class LoginPhase implements IPhaseHandler {
  readonly phase = PHASE;

  constructor(private deps: IPhaseDeps) {}

  async run(context: IPhaseContext): Promise<IPhaseResult> {
    const { page, identity, signal, attempt, verificationLink, logger } = context;
    const { interactor, locator, settings, waiter } = this.deps;
    const { site } = settings;
    const options = { signal };
    const dashboard = onDashboard(page, site);

    const target = attempt === 1 && verificationLink ? verificationLink : site.dashboardUrl;
    await navigate(page, target, this.deps, signal);

    // Either we are already in, or a login form shows up
    await waiter.until(
      anyOf(dashboard, elementLocated(page, locator, INTENTS.EMAIL_FIELD)),
      settings.wait.elementTimeoutMs,
      signal
    );
    if (await dashboard()) {
      logger.info('Already signed in', { url: page.url() });
      return succeeded(PHASE);
    }

    const email = await interactor.fill(page, INTENTS.EMAIL_FIELD, identity.address, options);
    if (email.status !== OUTCOMES.SUCCESS) return fromInteraction(PHASE, email);

    if (!(await interactor.isPresent(page, INTENTS.PASSWORD_FIELD))) {
      const proceed = await interactor.activate(page, INTENTS.SUBMIT_BUTTON, options);
      if (proceed.status !== OUTCOMES.SUCCESS) return fromInteraction(PHASE, proceed);
    }

    const password = await interactor.fill(page, INTENTS.PASSWORD_FIELD, identity.secret, options);
    if (password.status !== OUTCOMES.SUCCESS) return fromInteraction(PHASE, password);

    const submit = await interactor.activate(page, INTENTS.SUBMIT_BUTTON, options);
    if (submit.status !== OUTCOMES.SUCCESS) return fromInteraction(PHASE, submit);

    if (!(await waiter.until(dashboard, settings.wait.elementTimeoutMs, signal))) {
      return retryable(PHASE, ERROR_MESSAGES.DASHBOARD_NOT_REACHED);
    }

    logger.info('Signed in', { url: page.url() });
    return succeeded(PHASE);
  }
}
