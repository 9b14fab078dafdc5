import { randomInt } from 'crypto';
import type { IIdentity } from '../types/index.js';
import type { IIdentitySettings } from '../types/settings.js';

export type RandomInt = (max: number) => number;

const LOWER = 'abcdefghijklmnopqrstuvwxyz';
const UPPER = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const DIGITS = '0123456789';
// No record delimiters: secrets end up in the results file verbatim
const SYMBOLS = '!@#$%^&*_-+=';

const SUFFIX_LENGTH = 8;
const SECRET_LENGTH = 16;

const cryptoRandom: RandomInt = max => randomInt(max);

function pick(alphabet: string, rand: RandomInt): string {
  return alphabet.charAt(rand(alphabet.length));
}

/**
 * `<prefix>-<8 × [a-z0-9]>@<domain>`
 */
export function generateAddress(settings: IIdentitySettings, rand: RandomInt = cryptoRandom): string {
  let suffix = '';
  for (let i = 0; i < SUFFIX_LENGTH; i++) {
    suffix += pick(LOWER + DIGITS, rand);
  }
  return `${settings.prefix}-${suffix}@${settings.domain}`;
}

/**
 * Random password with at least one upper, lower, digit and symbol.
 */
export function generateSecret(length = SECRET_LENGTH, rand: RandomInt = cryptoRandom): string {
  if (length < 4) {
    throw new Error('Secret length must be at least 4');
  }

  const all = UPPER + LOWER + DIGITS + SYMBOLS;
  const chars = [pick(UPPER, rand), pick(LOWER, rand), pick(DIGITS, rand), pick(SYMBOLS, rand)];
  while (chars.length < length) {
    chars.push(pick(all, rand));
  }

  for (let i = chars.length - 1; i > 0; i--) {
    const j = rand(i + 1);
    [chars[i], chars[j]] = [chars[j], chars[i]];
  }
  return chars.join('');
}

export function generateIdentity(settings: IIdentitySettings, rand: RandomInt = cryptoRandom): IIdentity {
  if (!settings.prefix || !settings.domain) {
    throw new Error('Identity prefix and domain are required');
  }
  return Object.freeze({
    address: generateAddress(settings, rand),
    secret: settings.secret ?? generateSecret(SECRET_LENGTH, rand),
  });
}
