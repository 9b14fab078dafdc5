import { STRATEGY_NAMES } from '../../constants/index.js';
import type { IDocumentSnapshot, IElementCandidate } from '../../types/index.js';
import type { IElementDiscoveryStrategy, ILocateContext } from '../index.js';
import { isEligible, normalize, type IIntentProfile } from '../intent-profiles.js';
import { toCandidate } from './candidate.js';

/**
 * Rank 2: the element's label, aria-label or placeholder names the intent.
 */
export class LabelAssociationStrategy implements IElementDiscoveryStrategy {
  public readonly name = STRATEGY_NAMES.LABEL;

  discover(snapshot: IDocumentSnapshot, profile: IIntentProfile, context: ILocateContext = {}): IElementCandidate[] {
    const candidates: IElementCandidate[] = [];
    const keywords = profile.labelKeywords;
    if (keywords.length === 0) return candidates;

    for (const el of snapshot.elements) {
      if (!isEligible(el, profile, context)) continue;

      const label = normalize(el.labelText);
      const aria = normalize(el.ariaLabel);
      const placeholder = normalize(el.placeholder);
      let score = 0;

      if (label && keywords.includes(label)) {
        score = 0.78;
      } else if (label && keywords.some(k => label.includes(k))) {
        score = 0.74;
      } else if (aria && keywords.some(k => aria.includes(k))) {
        score = 0.72;
      } else if (placeholder && keywords.some(k => placeholder.includes(k))) {
        score = 0.66;
      }

      if (score > 0) {
        candidates.push(toCandidate(el, profile, this.name, score));
      }
    }

    return candidates;
  }
}
