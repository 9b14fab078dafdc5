import { INTENTS, type Intent } from '../constants/index.js';
import type { IElementSnapshot } from '../types/index.js';
import type { ILocateContext } from './index.js';

export type ElementKind = 'field' | 'control' | 'link' | 'display';

/**
 * What each intent looks like in markup. Keywords are lowercase and matched
 * against normalised attribute / label / text values.
 */
export interface IIntentProfile {
  intent: Intent;
  kind: ElementKind;
  attributeKeywords: string[];
  inputTypes: string[];
  autocomplete: string[];
  labelKeywords: string[];
  textKeywords: string[];
  // Any of these in id/name/label/placeholder disqualifies the element
  excludeKeywords: string[];
  disallowTypes: string[];
  allowDisabled: boolean;
}

const NON_TEXT_INPUT_TYPES = ['hidden', 'submit', 'button', 'checkbox', 'radio', 'image', 'reset', 'file', 'range', 'color'];

const CONFIRM_WORDS = ['confirm', 'repeat', 'retype', 're-enter', 'again', 'password2', 'verification'];

export const INTENT_PROFILES: Record<Intent, IIntentProfile> = {
  [INTENTS.EMAIL_FIELD]: {
    intent: INTENTS.EMAIL_FIELD,
    kind: 'field',
    attributeKeywords: ['email', 'e-mail', 'username', 'login'],
    inputTypes: ['email'],
    autocomplete: ['email', 'username'],
    labelKeywords: ['email address', 'email', 'e-mail', 'username'],
    textKeywords: [],
    excludeKeywords: ['password', 'search', 'code', 'otp', 'newsletter'],
    disallowTypes: ['password'],
    allowDisabled: false,
  },
  [INTENTS.PASSWORD_FIELD]: {
    intent: INTENTS.PASSWORD_FIELD,
    kind: 'field',
    attributeKeywords: ['password', 'passwd', 'pwd'],
    inputTypes: ['password'],
    autocomplete: ['new-password', 'current-password'],
    labelKeywords: ['password'],
    textKeywords: [],
    excludeKeywords: CONFIRM_WORDS,
    disallowTypes: ['email'],
    allowDisabled: false,
  },
  [INTENTS.CONFIRM_FIELD]: {
    intent: INTENTS.CONFIRM_FIELD,
    kind: 'field',
    attributeKeywords: ['confirm', 'repeat', 'retype', 'password2', 'password_confirmation'],
    inputTypes: [],
    autocomplete: [],
    labelKeywords: ['confirm password', 'repeat password', 're-enter password', 'retype password', 'confirm'],
    textKeywords: [],
    excludeKeywords: ['email'],
    disallowTypes: ['email'],
    allowDisabled: false,
  },
  [INTENTS.SUBMIT_BUTTON]: {
    intent: INTENTS.SUBMIT_BUTTON,
    kind: 'control',
    attributeKeywords: ['submit', 'continue', 'signup', 'sign-up', 'register', 'login', 'signin', 'next'],
    inputTypes: ['submit'],
    autocomplete: [],
    labelKeywords: ['continue', 'sign up', 'submit', 'log in', 'sign in', 'next', 'create account'],
    textKeywords: ['continue', 'sign up', 'signup', 'submit', 'register', 'create account', 'next', 'log in', 'login', 'sign in'],
    excludeKeywords: ['google', 'github', 'microsoft', 'apple', 'linkedin', 'social'],
    disallowTypes: [],
    allowDisabled: false,
  },
  [INTENTS.VERIFICATION_LINK]: {
    intent: INTENTS.VERIFICATION_LINK,
    kind: 'link',
    attributeKeywords: ['verify', 'verification', 'confirm', 'activate'],
    inputTypes: [],
    autocomplete: [],
    labelKeywords: ['verify', 'confirm', 'activate'],
    textKeywords: ['verify', 'confirm', 'activate'],
    excludeKeywords: ['unsubscribe'],
    disallowTypes: [],
    allowDisabled: false,
  },
  [INTENTS.TOKEN_DISPLAY]: {
    intent: INTENTS.TOKEN_DISPLAY,
    kind: 'display',
    attributeKeywords: ['api-key', 'apikey', 'api_key', 'token', 'secret'],
    inputTypes: [],
    autocomplete: [],
    labelKeywords: ['api key', 'token', 'secret'],
    textKeywords: [],
    excludeKeywords: ['csrf'],
    disallowTypes: ['hidden'],
    allowDisabled: true,
  },
  [INTENTS.SIGNUP_LINK]: {
    intent: INTENTS.SIGNUP_LINK,
    kind: 'link',
    attributeKeywords: ['signup', 'sign-up', 'register', 'registration'],
    inputTypes: [],
    autocomplete: [],
    labelKeywords: ['sign up', 'create account', 'register'],
    textKeywords: ['sign up', 'signup', 'create account', 'register', 'get started'],
    excludeKeywords: [],
    disallowTypes: [],
    allowDisabled: false,
  },
  [INTENTS.TOKEN_REVEAL]: {
    intent: INTENTS.TOKEN_REVEAL,
    kind: 'control',
    attributeKeywords: ['reveal', 'show-key', 'toggle-visibility', 'show-token'],
    inputTypes: [],
    autocomplete: [],
    labelKeywords: ['show', 'reveal', 'toggle visibility'],
    textKeywords: ['show', 'reveal'],
    excludeKeywords: ['more', 'menu'],
    disallowTypes: [],
    allowDisabled: false,
  },
};

export function normalize(value: string | undefined): string {
  return (value ?? '')
    .toLowerCase()
    .replace(/[*:]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function isTextEntry(el: IElementSnapshot): boolean {
  if (el.tag === 'textarea') return true;
  if (el.tag !== 'input') return false;
  return !NON_TEXT_INPUT_TYPES.includes(el.type ?? 'text');
}

export function isClickable(el: IElementSnapshot): boolean {
  if (el.tag === 'button' || el.tag === 'a') return true;
  if (el.role === 'button' || el.role === 'link') return true;
  return el.tag === 'input' && ['submit', 'button', 'image'].includes(el.type ?? '');
}

// Bullets or asterisks stand in for a token that is not revealed yet
const MASK_PATTERN = /[•●*]/;

/**
 * What a display element shows: an input's value, else its text.
 */
export function displayedText(el: IElementSnapshot): string {
  return (el.value ?? el.text ?? '').trim();
}

/**
 * Whether `el` can satisfy `profile` at all, before any scoring. With a
 * `textPattern`, a display must show a matching or masked value.
 */
export function isEligible(el: IElementSnapshot, profile: IIntentProfile, context: ILocateContext = {}): boolean {
  if (!el.visible || el.ariaHidden || el.outsideModal) return false;
  if (el.disabled && !profile.allowDisabled) return false;
  if (el.type && profile.disallowTypes.includes(el.type)) return false;

  switch (profile.kind) {
    case 'field':
      if (!isTextEntry(el) || el.readOnly) return false;
      break;
    case 'control':
    case 'link':
      if (!isClickable(el)) return false;
      break;
    case 'display': {
      if (isClickable(el)) return false;
      const shown = displayedText(el);
      if (context.textPattern && !context.textPattern.test(shown) && !MASK_PATTERN.test(shown)) return false;
      break;
    }
  }

  if (profile.excludeKeywords.length > 0) {
    const haystack = [el.id, el.name, el.labelText, el.placeholder, el.ariaLabel, profile.kind === 'field' ? undefined : el.text]
      .map(normalize)
      .join(' ');
    if (profile.excludeKeywords.some(word => haystack.includes(word))) return false;
  }

  return true;
}

/**
 * Visible text of a control; submit inputs carry it in `value`.
 */
export function controlText(el: IElementSnapshot): string {
  if (el.tag === 'input') return normalize(el.value);
  return normalize(el.text);
}
