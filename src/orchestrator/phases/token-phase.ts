import { ERROR_MESSAGES, INTENTS, OUTCOMES, PHASES } from '../../constants/index.js';
import type { IPhaseResult } from '../../types/index.js';
import type { IPhaseContext, IPhaseHandler } from '../index.js';
import { fromInteraction, navigate, retryable, succeeded, type IPhaseDeps } from './phase-support.js';

const PHASE = PHASES.EXTRACTING_TOKEN;

export class TokenPhase implements IPhaseHandler {
  readonly phase = PHASE;

  constructor(private deps: IPhaseDeps) {}

  async run(context: IPhaseContext): Promise<IPhaseResult> {
    const { page, signal, attempt, logger } = context;
    const { interactor, settings } = this.deps;
    const { tokenPattern } = settings.site;

    if (attempt > 1) {
      await navigate(page, settings.site.dashboardUrl, this.deps, signal);
    }

    if (await interactor.isPresent(page, INTENTS.TOKEN_REVEAL)) {
      const reveal = await interactor.activate(page, INTENTS.TOKEN_REVEAL, { signal });
      if (reveal.status === OUTCOMES.FATAL) return fromInteraction(PHASE, reveal);
      if (reveal.status !== OUTCOMES.SUCCESS) {
        logger.debug('Reveal control did not react; reading as is', { reason: reveal.reason });
      }
    }

    const read = await interactor.readText(page, INTENTS.TOKEN_DISPLAY, {
      signal,
      context: { textPattern: tokenPattern },
    });
    if (read.status !== OUTCOMES.SUCCESS) return fromInteraction(PHASE, read);

    const token = read.value ?? '';
    if (!tokenPattern.test(token)) {
      return retryable(PHASE, ERROR_MESSAGES.MALFORMED_TOKEN(token));
    }

    logger.info('Token extracted', { length: token.length });
    return succeeded(PHASE, token);
  }
}
