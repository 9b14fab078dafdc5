/**
 * Signup Orchestrator
 * The phase state machine: Init → Registering → AwaitingVerification →
 * LoggingIn → ExtractingToken → Persisting → Done, or Failed from any of them.
 */

import {
  ERROR_MESSAGES,
  FAILURE_KINDS,
  OUTCOMES,
  PHASES,
  type FailureKind,
  type Phase,
} from '../constants/index.js';
import type { IBrowserContextHandle, IBrowserLauncher, IPageDriver } from '../browser/index.js';
import { captureDiagnostic } from '../diagnostics/capture.js';
import type { IDiagnosticsSink } from '../diagnostics/index.js';
import type { IElementLocator } from '../element-discovery/index.js';
import { RankedElementLocator } from '../element-discovery/ranked-element-locator.js';
import { linkAbort } from '../infra/abort.js';
import { AdaptiveWaiter } from '../infra/adaptive-waiter.js';
import { ScopedLogger, type ILogger } from '../infra/logger.js';
import { CancelledError, isInfrastructureError, isRetryableError, toError } from '../infra/retry-utils.js';
import { AdaptiveFormInteractor } from '../interaction/adaptive-form-interactor.js';
import type { IFormInteractor } from '../interaction/index.js';
import type { IMailboxPoller, ISessionStateStore } from '../mailbox/index.js';
import type { IResultStore } from '../storage/index.js';
import type { IDiagnostic, IIdentity, IPhaseResult, IRecord, ISessionOutcome } from '../types/index.js';
import type { IEngineSettings, IIdentitySettings } from '../types/settings.js';
import type { IPhaseHandler, ISignupEngine } from './index.js';
import { generateIdentity } from './identity.js';
import { LoginPhase } from './phases/login-phase.js';
import type { IPhaseDeps } from './phases/phase-support.js';
import { RegistrationPhase } from './phases/registration-phase.js';
import { TokenPhase } from './phases/token-phase.js';
import { VerificationPhase } from './phases/verification-phase.js';

export interface SignupOrchestratorDeps {
  settings: IEngineSettings;
  launcher: IBrowserLauncher;
  mailbox: IMailboxPoller;
  sessionState: ISessionStateStore;
  store: IResultStore;
  diagnostics: IDiagnosticsSink;
  logger: ILogger;
  /** Defaults to the adaptive interactor over the ranked locator */
  interactor?: IFormInteractor;
  locator?: IElementLocator;
  identityFactory?: (settings: IIdentitySettings) => IIdentity;
  clock?: () => number;
}

interface ISession {
  id: string;
  identity: IIdentity;
  phase: Phase;
  startedAt: number;
  signal: AbortSignal;
  history: IPhaseResult[];
  logger: ILogger;
  verificationLink?: string;
}

export class SignupOrchestrator implements ISignupEngine {
  private settings: IEngineSettings;
  private logger: ILogger;
  private clock: () => number;
  private identityFactory: (settings: IIdentitySettings) => IIdentity;
  private handlers: { phase: IPhaseHandler; maxAttempts: number }[];

  private active = false;
  private controller: AbortController | null = null;
  private session: ISession | null = null;

  constructor(private deps: SignupOrchestratorDeps) {
    this.settings = deps.settings;
    this.logger = deps.logger;
    this.clock = deps.clock ?? Date.now;
    this.identityFactory = deps.identityFactory ?? (identity => generateIdentity(identity));

    const locator = deps.locator ?? new RankedElementLocator(undefined, deps.logger);
    const waiter = new AdaptiveWaiter(deps.settings.wait);
    const phaseDeps: IPhaseDeps = {
      settings: deps.settings,
      locator,
      waiter,
      interactor: deps.interactor ?? new AdaptiveFormInteractor(locator, waiter, deps.settings, deps.logger),
    };

    const { maxAttempts } = deps.settings.phases;
    this.handlers = [
      { phase: new RegistrationPhase(phaseDeps), maxAttempts },
      {
        phase: new VerificationPhase(deps.mailbox, deps.sessionState, deps.settings.mailbox, this.clock),
        maxAttempts: 1,
      },
      { phase: new LoginPhase(phaseDeps), maxAttempts },
      { phase: new TokenPhase(phaseDeps), maxAttempts },
    ];
  }

  get activePhase(): Phase | null {
    return this.session?.phase ?? null;
  }

  async run(): Promise<ISessionOutcome> {
    if (this.active) {
      throw new Error(ERROR_MESSAGES.SESSION_ALREADY_ACTIVE);
    }
    this.active = true;
    const controller = new AbortController();
    this.controller = controller;

    let context: IBrowserContextHandle | null = null;
    try {
      // Resource-fatal: a launch failure propagates before any session exists
      context = await this.deps.launcher.openContext();

      const session = this.createSession(controller.signal);
      this.session = session;
      return await this.drive(session, context);
    } finally {
      if (context) {
        await this.release(context);
      }
      this.session = null;
      this.controller = null;
      this.active = false;
    }
  }

  cancel(reason: string = ERROR_MESSAGES.CANCELLED): void {
    if (!this.controller || this.controller.signal.aborted) {
      return;
    }
    this.logger.warn('Cancellation requested', { sessionId: this.session?.id, phase: this.activePhase, reason });
    this.controller.abort(new CancelledError(reason));
  }

  private createSession(signal: AbortSignal): ISession {
    const id = `session-${this.clock()}-${Math.random().toString(36).slice(2, 11)}`;
    const identity = this.identityFactory(this.settings.identity);
    const session: ISession = {
      id,
      identity,
      phase: PHASES.INIT,
      startedAt: this.clock(),
      signal,
      history: [],
      logger: new ScopedLogger(this.logger, { sessionId: id }),
    };
    session.logger.info('Session started', { address: identity.address });
    return session;
  }

  private async drive(session: ISession, context: IBrowserContextHandle): Promise<ISessionOutcome> {
    let page: IPageDriver | null = null;

    try {
      if (session.signal.aborted) {
        return this.failed(session, FAILURE_KINDS.CANCELLED, ERROR_MESSAGES.CANCELLED);
      }
      page = await context.newPage();

      let token = '';
      for (const { phase: handler, maxAttempts } of this.handlers) {
        const result = await this.runPhase(session, page, handler, maxAttempts);
        if (result.outcome !== OUTCOMES.SUCCESS) {
          return this.failed(
            session,
            result.failureKind ?? FAILURE_KINDS.PHASE,
            result.reason ?? 'phase failed',
            result.diagnostic?.reference
          );
        }

        if (handler.phase === PHASES.AWAITING_VERIFICATION) {
          // LoggingIn is only reachable with a link in hand
          if (!result.value) {
            return this.failed(session, FAILURE_KINDS.PHASE, ERROR_MESSAGES.NO_VERIFICATION_LINK(session.identity.address));
          }
          session.verificationLink = result.value;
        }
        if (handler.phase === PHASES.EXTRACTING_TOKEN) {
          token = result.value ?? '';
        }
      }

      return await this.persist(session, token);
    } catch (error) {
      const err = toError(error);
      const cancelled = session.signal.aborted || err instanceof CancelledError;
      session.logger.error(`PHASE ABORTED: ${session.phase}`, err);

      const reference = await this.recordDiagnostic(session, page, err.message);
      return this.failed(
        session,
        cancelled ? FAILURE_KINDS.CANCELLED : FAILURE_KINDS.INFRASTRUCTURE,
        cancelled ? ERROR_MESSAGES.CANCELLED : err.message,
        reference
      );
    }
  }

  /**
   * Run one phase with its retry budget and time budget. Transient driver
   * errors count as a retry; anything else propagates to drive().
   */
  private async runPhase(
    session: ISession,
    page: IPageDriver,
    handler: IPhaseHandler,
    maxAttempts: number
  ): Promise<IPhaseResult> {
    const phase = handler.phase;
    session.phase = phase;

    const timeoutMs = this.settings.phaseTimeouts[phaseTimeoutKey(phase)];
    const scope = linkAbort(session.signal, timeoutMs);
    session.logger.info(`PHASE STARTED: ${phase}`, { maxAttempts, timeoutMs });

    try {
      let last: IPhaseResult | undefined;

      for (let attempt = 1; attempt <= Math.max(1, maxAttempts); attempt++) {
        let result: IPhaseResult;
        try {
          result = await handler.run({
            sessionId: session.id,
            identity: session.identity,
            page,
            attempt,
            signal: scope.signal,
            verificationLink: session.verificationLink,
            logger: session.logger,
          });
        } catch (error) {
          const err = toError(error);
          const transient = isRetryableError(err) && !isInfrastructureError(err);
          // A driver call cut short by the phase budget still ends as a timeout below
          if (!transient && !scope.timedOut()) {
            throw err;
          }
          result = { phase, outcome: OUTCOMES.RETRY, reason: err.message };
        }

        if (result.outcome !== OUTCOMES.SUCCESS && scope.signal.aborted) {
          result = session.signal.aborted
            ? { phase, outcome: OUTCOMES.FATAL, reason: ERROR_MESSAGES.CANCELLED, failureKind: FAILURE_KINDS.CANCELLED }
            : { phase, outcome: OUTCOMES.FATAL, reason: ERROR_MESSAGES.PHASE_TIMEOUT(phase, timeoutMs), failureKind: FAILURE_KINDS.PHASE };
        }

        const recorded = await this.record(session, page, { ...result, phase });
        if (recorded.outcome === OUTCOMES.SUCCESS) {
          session.logger.info(`PHASE COMPLETED: ${phase}`, { attempt });
          return recorded;
        }
        if (recorded.outcome === OUTCOMES.FATAL) {
          session.logger.error(`PHASE FAILED: ${phase}`, { attempt, reason: recorded.reason });
          return recorded;
        }

        last = recorded;
        session.logger.warn(`PHASE RETRY: ${phase}`, { attempt, maxAttempts, reason: recorded.reason });
      }

      return {
        phase,
        outcome: OUTCOMES.FATAL,
        reason: `${last?.reason ?? 'no progress'} (after ${maxAttempts} attempts)`,
        failureKind: FAILURE_KINDS.PHASE,
        diagnostic: last?.diagnostic,
      };
    } finally {
      scope.dispose();
    }
  }

  /**
   * Append to history; retry and fatal results get a diagnostic first.
   */
  private async record(session: ISession, page: IPageDriver, result: IPhaseResult): Promise<IPhaseResult> {
    if (result.outcome === OUTCOMES.SUCCESS) {
      session.history.push(result);
      return result;
    }

    const diagnostic = await captureDiagnostic(page, result.reason ?? result.outcome, this.settings.output, session.logger);
    diagnostic.reference = await this.store(session, result.phase, diagnostic);
    const withDiagnostic: IPhaseResult = { ...result, diagnostic };
    session.history.push(withDiagnostic);
    return withDiagnostic;
  }

  private async recordDiagnostic(session: ISession, page: IPageDriver | null, note: string): Promise<string | undefined> {
    const diagnostic = await captureDiagnostic(page, note, this.settings.output, session.logger);
    return this.store(session, session.phase, diagnostic);
  }

  private async store(
    session: ISession,
    phase: Phase,
    diagnostic: IDiagnostic
  ): Promise<string | undefined> {
    try {
      return await this.deps.diagnostics.record(session.id, phase, diagnostic);
    } catch (error) {
      session.logger.warn('Diagnostics sink failed', { phase, error: toError(error).message });
      return undefined;
    }
  }

  private async persist(session: ISession, token: string): Promise<ISessionOutcome> {
    session.phase = PHASES.PERSISTING;
    const record: IRecord = Object.freeze({
      address: session.identity.address,
      secret: session.identity.secret,
      token,
      completedAt: new Date(this.clock()).toISOString(),
    });

    let persistenceError: string | undefined;
    try {
      await this.deps.store.append(record);
      session.history.push({ phase: PHASES.PERSISTING, outcome: OUTCOMES.SUCCESS });
      session.logger.info('Record persisted', { address: record.address });
    } catch (error) {
      // The token is already issued; keep it and report the store failure
      persistenceError = toError(error).message;
      session.history.push({ phase: PHASES.PERSISTING, outcome: OUTCOMES.FATAL, reason: persistenceError });
      session.logger.error('Record could not be persisted', { error: persistenceError });
    }

    session.phase = PHASES.DONE;
    return {
      sessionId: session.id,
      status: 'done',
      phase: PHASES.DONE,
      identity: session.identity,
      startedAt: session.startedAt,
      endedAt: this.clock(),
      token,
      record,
      persistenceError,
      history: session.history,
    };
  }

  private failed(session: ISession, kind: FailureKind, reason: string, diagnosticRef?: string): ISessionOutcome {
    const phase = session.phase;
    session.phase = PHASES.FAILED;
    session.logger.error('Session failed', { phase, kind, reason, diagnosticRef });

    return {
      sessionId: session.id,
      status: 'failed',
      phase: PHASES.FAILED,
      identity: session.identity,
      startedAt: session.startedAt,
      endedAt: this.clock(),
      failure: { kind, phase, reason, diagnosticRef },
      history: session.history,
    };
  }

  private async release(context: IBrowserContextHandle): Promise<void> {
    try {
      await context.close();
    } catch (error) {
      this.logger.warn('Browser context did not close cleanly', { error: toError(error).message });
    }
  }
}

type TimedPhase = keyof IEngineSettings['phaseTimeouts'];

function phaseTimeoutKey(phase: Phase): TimedPhase {
  switch (phase) {
    case PHASES.AWAITING_VERIFICATION:
    case PHASES.LOGGING_IN:
    case PHASES.EXTRACTING_TOKEN:
      return phase;
    default:
      return PHASES.REGISTERING;
  }
}
