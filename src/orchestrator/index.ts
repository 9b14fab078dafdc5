import type { Phase } from '../constants/index.js';
import type { IPageDriver } from '../browser/index.js';
import type { ILogger } from '../infra/logger.js';
import type { IIdentity, IPhaseResult, ISessionOutcome } from '../types/index.js';

export interface ISignupEngine {
  /**
   * Run one session to Done or Failed. Rejects only when the browser cannot
   * be started (BrowserLaunchError) or another session is already active.
   */
  run(): Promise<ISessionOutcome>;

  /**
   * Ask the active session to stop; it unwinds to Failed with kind `cancelled`.
   */
  cancel(reason?: string): void;

  readonly activePhase: Phase | null;
}

/**
 * What a phase handler sees of the running session.
 */
export interface IPhaseContext {
  sessionId: string;
  identity: IIdentity;
  page: IPageDriver;
  /** 1-based attempt within the current phase */
  attempt: number;
  /** Aborts on cancel or when the phase runs out of time */
  signal: AbortSignal;
  /** Set once AwaitingVerification succeeded */
  verificationLink?: string;
  logger: ILogger;
}

export interface IPhaseHandler {
  readonly phase: Phase;
  run(context: IPhaseContext): Promise<IPhaseResult>;
}
