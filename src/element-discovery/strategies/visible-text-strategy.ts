import { INTENTS, STRATEGY_NAMES } from '../../constants/index.js';
import type { IDocumentSnapshot, IElementCandidate } from '../../types/index.js';
import type { IElementDiscoveryStrategy, ILocateContext } from '../index.js';
import { controlText, displayedText, isEligible, type IIntentProfile } from '../intent-profiles.js';
import { toCandidate } from './candidate.js';

/**
 * Rank 4: the visible text of a link or button, or token-shaped text.
 */
export class VisibleTextStrategy implements IElementDiscoveryStrategy {
  public readonly name = STRATEGY_NAMES.VISIBLE_TEXT;

  discover(snapshot: IDocumentSnapshot, profile: IIntentProfile, context: ILocateContext = {}): IElementCandidate[] {
    const candidates: IElementCandidate[] = [];

    if (profile.intent === INTENTS.TOKEN_DISPLAY) {
      const pattern = context.textPattern;
      if (!pattern) return candidates;
      for (const el of snapshot.elements) {
        if (!isEligible(el, profile, context)) continue;
        const shown = displayedText(el);
        if (shown && pattern.test(shown)) {
          candidates.push(toCandidate(el, profile, this.name, 0.38));
        }
      }
      return candidates;
    }

    if (profile.kind !== 'control' && profile.kind !== 'link') return candidates;

    for (const el of snapshot.elements) {
      if (!isEligible(el, profile)) continue;
      const text = controlText(el);
      if (!text) continue;

      if (profile.textKeywords.includes(text)) {
        candidates.push(toCandidate(el, profile, this.name, 0.38));
      } else if (profile.textKeywords.some(k => text.includes(k))) {
        candidates.push(toCandidate(el, profile, this.name, 0.32));
      }
    }

    return candidates;
  }
}
