/**
 * Persisted mailbox session (cookie file).
 *
 * Two on-disk shapes are accepted: a bare cookie array, and
 * `{ timestamp, count, cookies }` where `timestamp` is epoch seconds.
 * Only the second form can expire.
 */

import fs from 'fs';
import path from 'path';
import type { CookieSameSite, IBrowserCookie } from '../browser/index.js';
import type { ILogger } from '../infra/logger.js';
import { toError } from '../infra/retry-utils.js';
import type { ISessionState, ISessionStateStore } from './index.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const SAME_SITE_VALUES: readonly CookieSameSite[] = ['Strict', 'Lax', 'None'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSameSite(value: unknown): value is CookieSameSite {
  return SAME_SITE_VALUES.some(option => option === value);
}

/**
 * Every entry must be an object carrying `name` and `value`.
 */
export function isValidCookieList(value: unknown): value is Record<string, unknown>[] {
  return Array.isArray(value) && value.every(cookie => isRecord(cookie) && 'name' in cookie && 'value' in cookie);
}

/**
 * Map raw cookie objects onto browser cookies. Cookies without a domain are
 * bound to `fallbackUrl`, since the browser needs one or the other.
 */
export function toBrowserCookies(raw: Record<string, unknown>[], fallbackUrl: string): IBrowserCookie[] {
  return raw.map(entry => {
    const cookie: IBrowserCookie = { name: String(entry.name), value: String(entry.value) };

    if (typeof entry.domain === 'string' && entry.domain.length > 0) {
      cookie.domain = entry.domain;
      cookie.path = typeof entry.path === 'string' ? entry.path : '/';
    } else {
      cookie.url = fallbackUrl;
    }
    if (typeof entry.expires === 'number') cookie.expires = entry.expires;
    if (typeof entry.httpOnly === 'boolean') cookie.httpOnly = entry.httpOnly;
    if (typeof entry.secure === 'boolean') cookie.secure = entry.secure;
    if (isSameSite(entry.sameSite)) cookie.sameSite = entry.sameSite;

    return cookie;
  });
}

/**
 * Parse the decoded JSON of a cookie file. Null when the shape is wrong.
 */
export function parseSessionState(data: unknown, fallbackUrl: string): ISessionState | null {
  if (isValidCookieList(data)) {
    return { savedAt: null, cookies: toBrowserCookies(data, fallbackUrl) };
  }

  if (isRecord(data) && isValidCookieList(data.cookies)) {
    const savedAt = typeof data.timestamp === 'number' ? Math.round(data.timestamp * 1000) : 0;
    return { savedAt, cookies: toBrowserCookies(data.cookies, fallbackUrl) };
  }

  return null;
}

export function isSessionStateFresh(state: ISessionState, validityDays: number, now = Date.now()): boolean {
  if (state.cookies.length === 0) return false;
  if (state.savedAt === null) return true;
  return now - state.savedAt <= validityDays * DAY_MS;
}

/**
 * Address prefix from the webmail's `aut` cookie: the local part of the
 * JWT payload's `name`, else its `nickname`.
 */
export function prefixFromSessionState(state: ISessionState): string | null {
  for (const cookie of state.cookies) {
    if (cookie.name !== 'aut') continue;

    const payload = cookie.value.split('.')[1];
    if (!payload) continue;

    let claims: unknown;
    try {
      claims = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
    } catch {
      continue;
    }
    if (!isRecord(claims)) continue;

    const { name, nickname } = claims;
    if (typeof name === 'string' && name.includes('@')) {
      return name.split('@')[0];
    }
    if (typeof nickname === 'string' && nickname.length > 0) {
      return nickname;
    }
  }
  return null;
}

export class FileSessionStateStore implements ISessionStateStore {
  constructor(
    private filePath: string,
    private fallbackUrl: string,
    private logger?: ILogger
  ) {}

  async load(): Promise<ISessionState | null> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      this.logger?.warn('No mailbox session file', { file: this.filePath, error: toError(error).message });
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.logger?.warn('Mailbox session file is not valid JSON', { file: this.filePath, error: toError(error).message });
      return null;
    }

    const state = parseSessionState(data, this.fallbackUrl);
    if (!state) {
      this.logger?.warn('Mailbox session file has an unknown shape', { file: this.filePath });
      return null;
    }

    this.logger?.debug('Mailbox session loaded', { cookies: state.cookies.length, savedAt: state.savedAt });
    return state;
  }

  async save(cookies: IBrowserCookie[], now = Date.now()): Promise<void> {
    if (cookies.length === 0) {
      throw new Error('No cookies to save');
    }

    const data = { timestamp: now / 1000, count: cookies.length, cookies };
    await fs.promises.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
    await fs.promises.writeFile(this.filePath, JSON.stringify(data, null, 2), 'utf8');
    this.logger?.info('Mailbox session saved', { file: this.filePath, cookies: cookies.length });
  }
}
