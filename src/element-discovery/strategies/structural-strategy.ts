import { INTENTS, STRATEGY_NAMES } from '../../constants/index.js';
import type { IDocumentSnapshot, IElementCandidate, IElementSnapshot } from '../../types/index.js';
import type { IElementDiscoveryStrategy, ILocateContext } from '../index.js';
import { isEligible, type IIntentProfile } from '../intent-profiles.js';
import { toCandidate } from './candidate.js';

const CODE_TAGS = ['code', 'pre', 'kbd', 'samp', 'output'];

/**
 * Rank 3: position and form structure, for markup that names nothing.
 */
export class StructuralStrategy implements IElementDiscoveryStrategy {
  public readonly name = STRATEGY_NAMES.STRUCTURAL;

  discover(snapshot: IDocumentSnapshot, profile: IIntentProfile, context: ILocateContext = {}): IElementCandidate[] {
    const eligible = snapshot.elements.filter(el => isEligible(el, profile, context));
    const inScope = this.scopeToActiveForm(eligible, snapshot.activeFormIndex);

    switch (profile.intent) {
      case INTENTS.EMAIL_FIELD: {
        const first = inScope.find(el => ['text', 'email'].includes(el.type ?? 'text') && el.tag === 'input');
        return first ? [toCandidate(first, profile, this.name, 0.5)] : [];
      }

      case INTENTS.CONFIRM_FIELD: {
        // Second password input of a form is the confirmation
        const byForm = new Map<number | null, IElementSnapshot[]>();
        for (const el of eligible.filter(e => e.type === 'password')) {
          const group = byForm.get(el.formIndex) ?? [];
          group.push(el);
          byForm.set(el.formIndex, group);
        }
        const results: IElementCandidate[] = [];
        for (const group of byForm.values()) {
          if (group.length >= 2) {
            results.push(toCandidate(group[1], profile, this.name, 0.55));
          }
        }
        return results;
      }

      case INTENTS.SUBMIT_BUTTON: {
        // A <button> without a type submits its form
        const submits = inScope.filter(
          el => el.formIndex !== null && el.tag === 'button' && (el.type ?? 'submit') === 'submit'
        );
        return submits.length > 0 ? [toCandidate(submits[0], profile, this.name, 0.55)] : [];
      }

      case INTENTS.TOKEN_DISPLAY: {
        const results: IElementCandidate[] = [];
        for (const el of eligible) {
          if ((el.tag === 'input' || el.tag === 'textarea') && el.readOnly && el.value) {
            results.push(toCandidate(el, profile, this.name, 0.55));
          } else if (CODE_TAGS.includes(el.tag) && el.text) {
            results.push(toCandidate(el, profile, this.name, 0.5));
          }
        }
        return results;
      }

      default:
        return [];
    }
  }

  private scopeToActiveForm(elements: IElementSnapshot[], activeFormIndex: number | null): IElementSnapshot[] {
    if (activeFormIndex === null) return elements;
    const inForm = elements.filter(el => el.formIndex === activeFormIndex);
    return inForm.length > 0 ? inForm : elements;
  }
}
