import { ERROR_MESSAGES, OUTCOMES, type Intent } from '../constants/index.js';
import type { ILogger } from '../infra/logger.js';
import { isInfrastructureError, toError } from '../infra/retry-utils.js';
import type { IInteractionOutcome } from './index.js';

export function cancelledOutcome(attempts: number): IInteractionOutcome {
  return { status: OUTCOMES.FATAL, attempts, reason: ERROR_MESSAGES.CANCELLED };
}

export function notLocatedOutcome(intent: Intent, attempts: number): IInteractionOutcome {
  return { status: OUTCOMES.RETRY, attempts, reason: ERROR_MESSAGES.ELEMENT_NOT_LOCATED(intent) };
}

/**
 * Turn a driver error into a retry reason, or rethrow it when the browser
 * is gone.
 */
export function absorbDriverError(error: unknown, intent: Intent, attempt: number, logger: ILogger): string {
  const err = toError(error);
  if (isInfrastructureError(err)) {
    throw err;
  }
  logger.debug(`Driver error on ${intent}`, { attempt, error: err.message });
  return err.message;
}
