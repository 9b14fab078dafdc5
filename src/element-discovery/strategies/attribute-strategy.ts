import { STRATEGY_NAMES } from '../../constants/index.js';
import type { IDocumentSnapshot, IElementCandidate, IElementSnapshot } from '../../types/index.js';
import type { IElementDiscoveryStrategy, ILocateContext } from '../index.js';
import { isEligible, normalize, type IIntentProfile } from '../intent-profiles.js';
import { toCandidate } from './candidate.js';

/**
 * Rank 1: id / name / type / autocomplete carry an intent keyword.
 */
export class AttributeMatchStrategy implements IElementDiscoveryStrategy {
  public readonly name = STRATEGY_NAMES.ATTRIBUTE;

  discover(snapshot: IDocumentSnapshot, profile: IIntentProfile, context: ILocateContext = {}): IElementCandidate[] {
    const candidates: IElementCandidate[] = [];

    for (const el of snapshot.elements) {
      if (!isEligible(el, profile, context)) continue;
      const score = this.score(el, profile);
      if (score > 0) {
        candidates.push(toCandidate(el, profile, this.name, score));
      }
    }

    return candidates;
  }

  private score(el: IElementSnapshot, profile: IIntentProfile): number {
    const id = normalize(el.id);
    const name = normalize(el.name);
    const keywords = profile.attributeKeywords;
    let best = 0;

    if (keywords.some(k => k === id || k === name)) {
      best = Math.max(best, 0.99);
    }
    if (el.type && profile.inputTypes.includes(el.type)) {
      best = Math.max(best, 0.95);
    }
    if (el.autocomplete && profile.autocomplete.includes(normalize(el.autocomplete))) {
      best = Math.max(best, 0.93);
    }
    if (keywords.some(k => (id && id.includes(k)) || (name && name.includes(k)))) {
      best = Math.max(best, 0.9);
    }
    if (profile.kind === 'link' && el.href) {
      const href = el.href.toLowerCase();
      if (keywords.some(k => href.includes(k))) {
        best = Math.max(best, 0.88);
      }
    }
    if (profile.kind === 'display') {
      const classes = el.classes.map(c => c.toLowerCase());
      if (keywords.some(k => classes.some(c => c.includes(k)))) {
        best = Math.max(best, 0.85);
      }
    }

    return best;
  }
}
