import type { IBatchSummary, ISessionOutcome } from '../types/index.js';

/**
 * Reporter responsible for presenting the outcome of a session.
 */
export interface IReporter {
  report(outcome: ISessionOutcome): Promise<void>;
  /** Totals after every session of a run */
  summarize(summary: IBatchSummary): Promise<void>;
}
