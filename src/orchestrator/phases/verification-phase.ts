import { ERROR_MESSAGES, FAILURE_KINDS, PHASES } from '../../constants/index.js';
import type { IMailboxPoller, ISessionStateStore } from '../../mailbox/index.js';
import type { IPhaseResult } from '../../types/index.js';
import type { IMailboxSettings } from '../../types/settings.js';
import type { IPhaseContext, IPhaseHandler } from '../index.js';
import { fatal, succeeded } from './phase-support.js';

const PHASE = PHASES.AWAITING_VERIFICATION;

/**
 * Restore the mailbox session, then wait for the verification link.
 * Neither step is retried here: the poller already polls until its deadline.
 */
export class VerificationPhase implements IPhaseHandler {
  readonly phase = PHASE;

  constructor(
    private mailbox: IMailboxPoller,
    private sessionState: ISessionStateStore,
    private settings: IMailboxSettings,
    private clock: () => number = Date.now
  ) {}

  async run(context: IPhaseContext): Promise<IPhaseResult> {
    const { identity, signal, logger } = context;

    const state = await this.sessionState.load();
    if (!(await this.mailbox.authenticate(state))) {
      return fatal(PHASE, ERROR_MESSAGES.MAILBOX_NOT_AUTHENTICATED, FAILURE_KINDS.MAILBOX_AUTH);
    }

    const deadline = this.clock() + this.settings.maxWaitMs;
    logger.info('Waiting for verification message', { address: identity.address, deadline: new Date(deadline).toISOString() });

    const link = await this.mailbox.findVerificationLink(identity.address, deadline, signal);
    if (signal.aborted) {
      return fatal(PHASE, ERROR_MESSAGES.CANCELLED, FAILURE_KINDS.CANCELLED);
    }
    if (!link) {
      return fatal(PHASE, ERROR_MESSAGES.NO_VERIFICATION_LINK(identity.address));
    }

    return succeeded(PHASE, link);
  }
}
