import type { ILogger } from '../infra/logger.js';
import type { IReporter } from '../reporter/index.js';
import type { IBatchSummary, ISessionOutcome } from '../types/index.js';
import type { ISignupEngine } from './index.js';

export interface BatchOptions {
  accounts: number;
  reporter: IReporter;
  logger: ILogger;
  /** Once aborted, no further session starts */
  signal?: AbortSignal;
}

/**
 * A session counts only when its token was extracted and saved.
 */
export function isSuccessful(outcome: ISessionOutcome): boolean {
  return outcome.status === 'done' && !outcome.persistenceError;
}

/**
 * Run `accounts` sessions one after another on the same engine, report each
 * and then the totals. A launch failure rejects and ends the batch.
 */
export async function runBatch(engine: ISignupEngine, options: BatchOptions): Promise<IBatchSummary> {
  const { accounts, reporter, logger, signal } = options;
  const outcomes: ISessionOutcome[] = [];

  for (let index = 1; index <= accounts; index++) {
    if (signal?.aborted) {
      logger.warn('Batch stopped before all sessions ran', { ran: outcomes.length, accounts });
      break;
    }

    logger.info(`Account ${index}/${accounts}`);
    const outcome = await engine.run();
    outcomes.push(outcome);
    await reporter.report(outcome);
  }

  const summary: IBatchSummary = {
    total: accounts,
    succeeded: outcomes.filter(isSuccessful).length,
    outcomes,
  };
  await reporter.summarize(summary);
  return summary;
}
