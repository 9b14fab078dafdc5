import { describe, it, expect } from 'vitest';
import { toCandidate } from '../strategies/candidate.js';
import { AttributeMatchStrategy } from '../strategies/attribute-strategy.js';
import { LabelAssociationStrategy } from '../strategies/label-strategy.js';
import { StructuralStrategy } from '../strategies/structural-strategy.js';
import { INTENT_PROFILES, controlText, isEligible, normalize } from '../intent-profiles.js';
import { CONFIDENCE_BANDS, INTENTS, STRATEGY_NAMES } from '../../constants/index.js';
import { documentOf, element } from '../../__tests__/fixtures/snapshots.js';

describe('toCandidate', () => {
  const el = element({ ref: 4, tag: 'input', type: 'email' });
  const profile = INTENT_PROFILES[INTENTS.EMAIL_FIELD];

  it('should raise a low score to the bottom of the band', () => {
    expect(toCandidate(el, profile, STRATEGY_NAMES.ATTRIBUTE, 0.3).confidence).toBe(0.8);
  });

  it('should keep a high score below the next band', () => {
    expect(toCandidate(el, profile, STRATEGY_NAMES.LABEL, 1.2).confidence).toBeCloseTo(0.799, 6);
  });

  it('should allow a full score in the top band', () => {
    expect(toCandidate(el, profile, STRATEGY_NAMES.ATTRIBUTE, 1).confidence).toBe(1);
  });

  it('should carry the ref, intent and strategy', () => {
    expect(toCandidate(el, profile, STRATEGY_NAMES.STRUCTURAL, 0.5)).toEqual({
      ref: 4,
      intent: INTENTS.EMAIL_FIELD,
      confidence: 0.5,
      strategy: STRATEGY_NAMES.STRUCTURAL,
      element: el,
    });
  });
});

describe('strategies', () => {
  it('should keep every candidate inside its strategy band', () => {
    const snapshot = documentOf([
      element({ ref: 0, tag: 'input', type: 'email', id: 'email', autocomplete: 'email' }),
      element({ ref: 1, tag: 'input', type: 'text', labelText: 'E-mail' }),
      element({ ref: 2, tag: 'input', type: 'text' }),
    ]);
    const profile = INTENT_PROFILES[INTENTS.EMAIL_FIELD];

    for (const strategy of [new AttributeMatchStrategy(), new LabelAssociationStrategy(), new StructuralStrategy()]) {
      const band = CONFIDENCE_BANDS[strategy.name];
      for (const candidate of strategy.discover(snapshot, profile)) {
        expect(candidate.confidence).toBeGreaterThanOrEqual(band.min);
        expect(candidate.confidence).toBeLessThan(band.max === 1 ? 1.0001 : band.max);
      }
    }
  });

  it('should match a verification link by its href', () => {
    const snapshot = documentOf([
      element({ ref: 0, tag: 'a', href: 'https://example.test/account/verify?t=1', text: 'Click here', formIndex: null }),
    ]);

    const [candidate] = new AttributeMatchStrategy().discover(snapshot, INTENT_PROFILES[INTENTS.VERIFICATION_LINK]);

    expect(candidate.confidence).toBe(0.88);
  });

  it('should match a token display by class name', () => {
    const snapshot = documentOf([element({ ref: 0, tag: 'span', classes: ['ApiKey-token'], text: 'tk-1' })]);

    const [candidate] = new AttributeMatchStrategy().discover(snapshot, INTENT_PROFILES[INTENTS.TOKEN_DISPLAY]);

    expect(candidate.confidence).toBe(0.85);
  });
});

describe('intent profiles', () => {
  it('should normalise case, markers and whitespace', () => {
    expect(normalize('  Email *:\n Address ')).toBe('email address');
    expect(normalize(undefined)).toBe('');
  });

  it('should read submit input labels from the value', () => {
    expect(controlText(element({ ref: 0, tag: 'input', type: 'submit', value: 'Next' }))).toBe('next');
    expect(controlText(element({ ref: 0, tag: 'button', text: ' Sign  Up ' }))).toBe('sign up');
  });

  it('should refuse a checkbox as a text field', () => {
    const checkbox = element({ ref: 0, tag: 'input', type: 'checkbox', id: 'email-opt-in' });

    expect(isEligible(checkbox, INTENT_PROFILES[INTENTS.EMAIL_FIELD])).toBe(false);
  });

  it('should refuse a newsletter field as the email field', () => {
    const newsletter = element({ ref: 0, tag: 'input', type: 'email', name: 'newsletter_email' });

    expect(isEligible(newsletter, INTENT_PROFILES[INTENTS.EMAIL_FIELD])).toBe(false);
  });
});
