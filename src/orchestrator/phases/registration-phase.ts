import { ERROR_MESSAGES, INTENTS, OUTCOMES, PHASES } from '../../constants/index.js';
import { anyOf, textPresent, urlMatches } from '../../infra/adaptive-waiter.js';
import type { IPhaseResult } from '../../types/index.js';
import type { IPhaseContext, IPhaseHandler } from '../index.js';
import { fromInteraction, navigate, retryable, succeeded, type IPhaseDeps } from './phase-support.js';

const PHASE = PHASES.REGISTERING;

/**
 * Home page → sign-up form → address → password (+ confirmation) → submit.
 * Every attempt starts from a fresh navigation.
 */
export class RegistrationPhase implements IPhaseHandler {
  readonly phase = PHASE;

  constructor(private deps: IPhaseDeps) {}

  async run(context: IPhaseContext): Promise<IPhaseResult> {
    const { page, identity, signal, logger } = context;
    const { interactor, settings, waiter } = this.deps;
    const { site } = settings;
    const options = { signal };

    await navigate(page, site.homeUrl, this.deps, signal);

    if (await interactor.isPresent(page, INTENTS.SIGNUP_LINK)) {
      const opened = await interactor.activate(page, INTENTS.SIGNUP_LINK, options);
      if (opened.status === OUTCOMES.FATAL) return fromInteraction(PHASE, opened);
      if (opened.status !== OUTCOMES.SUCCESS) {
        logger.debug('Sign-up link did not react, using the signup URL', { reason: opened.reason });
        await navigate(page, site.signupUrl, this.deps, signal);
      }
    } else if (site.signupUrl !== site.homeUrl) {
      logger.debug('No sign-up link on the home page, using the signup URL');
      await navigate(page, site.signupUrl, this.deps, signal);
    }

    const email = await interactor.fill(page, INTENTS.EMAIL_FIELD, identity.address, options);
    if (email.status !== OUTCOMES.SUCCESS) return fromInteraction(PHASE, email);

    const proceed = await interactor.activate(page, INTENTS.SUBMIT_BUTTON, options);
    if (proceed.status !== OUTCOMES.SUCCESS) return fromInteraction(PHASE, proceed);

    // fill() waits for the password step to render
    const password = await interactor.fill(page, INTENTS.PASSWORD_FIELD, identity.secret, options);
    if (password.status !== OUTCOMES.SUCCESS) return fromInteraction(PHASE, password);

    if (await interactor.isPresent(page, INTENTS.CONFIRM_FIELD)) {
      const confirm = await interactor.fill(page, INTENTS.CONFIRM_FIELD, identity.secret, options);
      if (confirm.status !== OUTCOMES.SUCCESS) return fromInteraction(PHASE, confirm);
    }

    const submit = await interactor.activate(page, INTENTS.SUBMIT_BUTTON, options);
    if (submit.status !== OUTCOMES.SUCCESS) return fromInteraction(PHASE, submit);

    const confirmed = await waiter.until(
      anyOf(urlMatches(page, site.postSignupUrlPattern), textPresent(page, site.postSignupText)),
      settings.wait.elementTimeoutMs,
      signal
    );
    if (!confirmed) {
      return retryable(PHASE, ERROR_MESSAGES.SIGNUP_NOT_CONFIRMED);
    }

    logger.info('Signup submitted', { url: page.url() });
    return succeeded(PHASE);
  }
}
