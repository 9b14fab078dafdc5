import { CONFIDENCE_BANDS, type StrategyName } from '../../constants/index.js';
import type { IElementCandidate, IElementSnapshot } from '../../types/index.js';
import type { IIntentProfile } from '../intent-profiles.js';

/**
 * Build a candidate, keeping its confidence inside the strategy's band.
 */
export function toCandidate(
  element: IElementSnapshot,
  profile: IIntentProfile,
  strategy: StrategyName,
  score: number
): IElementCandidate {
  const band = CONFIDENCE_BANDS[strategy];
  const ceiling = band.max === 1 ? 1 : band.max - 0.001;
  const confidence = Math.min(ceiling, Math.max(band.min, score));
  return {
    ref: element.ref,
    intent: profile.intent,
    confidence,
    strategy,
    element,
  };
}
