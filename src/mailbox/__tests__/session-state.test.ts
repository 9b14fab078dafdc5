import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  FileSessionStateStore,
  isSessionStateFresh,
  parseSessionState,
  prefixFromSessionState,
} from '../session-state.js';
import type { ISessionState } from '../index.js';

const FALLBACK_URL = 'https://mail.example.test';
const DAY_MS = 24 * 60 * 60 * 1000;

function autCookie(claims: Record<string, unknown>): ISessionState {
  const payload = Buffer.from(JSON.stringify(claims)).toString('base64url');
  return { savedAt: null, cookies: [{ name: 'aut', value: `header.${payload}.signature` }] };
}

describe('parseSessionState', () => {
  it('should read a bare cookie list as a state that never expires', () => {
    const state = parseSessionState([{ name: 'sid', value: 'test-session', domain: '.mail.example.test' }], FALLBACK_URL);

    expect(state).toEqual({
      savedAt: null,
      cookies: [{ name: 'sid', value: 'test-session', domain: '.mail.example.test', path: '/' }],
    });
  });

  it('should bind cookies without a domain to the fallback url', () => {
    const state = parseSessionState([{ name: 'sid', value: 'test-session' }], FALLBACK_URL);

    expect(state?.cookies).toEqual([{ name: 'sid', value: 'test-session', url: FALLBACK_URL }]);
  });

  it('should convert the timestamp from seconds', () => {
    const state = parseSessionState({ timestamp: 1700000000.5, count: 1, cookies: [{ name: 'a', value: 'b' }] }, FALLBACK_URL);

    expect(state?.savedAt).toBe(1700000000500);
  });

  it('should treat a missing timestamp as very old', () => {
    expect(parseSessionState({ cookies: [] }, FALLBACK_URL)?.savedAt).toBe(0);
  });

  it('should keep only known cookie attributes', () => {
    const state = parseSessionState(
      [
        { name: 'a', value: '1', domain: 'mail.example.test', path: '/inbox', secure: true, httpOnly: false, sameSite: 'Lax', expires: 42 },
        { name: 'b', value: '2', domain: 'mail.example.test', sameSite: 'sometimes' },
      ],
      FALLBACK_URL
    );

    expect(state?.cookies).toEqual([
      { name: 'a', value: '1', domain: 'mail.example.test', path: '/inbox', secure: true, httpOnly: false, sameSite: 'Lax', expires: 42 },
      { name: 'b', value: '2', domain: 'mail.example.test', path: '/' },
    ]);
  });

  it('should reject unknown shapes', () => {
    expect(parseSessionState(42, FALLBACK_URL)).toBeNull();
    expect(parseSessionState({ cookies: 'sid=1' }, FALLBACK_URL)).toBeNull();
    expect(parseSessionState([{ name: 'no-value' }], FALLBACK_URL)).toBeNull();
  });
});

describe('isSessionStateFresh', () => {
  const cookies = [{ name: 'sid', value: 'test-session' }];
  const savedAt = 1_700_000_000_000;

  it('should accept a state within the validity window', () => {
    expect(isSessionStateFresh({ savedAt, cookies }, 7, savedAt + 7 * DAY_MS)).toBe(true);
  });

  it('should reject a state past the window', () => {
    expect(isSessionStateFresh({ savedAt, cookies }, 7, savedAt + 7 * DAY_MS + 1)).toBe(false);
  });

  it('should accept an undated state', () => {
    expect(isSessionStateFresh({ savedAt: null, cookies }, 7, savedAt)).toBe(true);
  });

  it('should reject a state without cookies', () => {
    expect(isSessionStateFresh({ savedAt: null, cookies: [] }, 7)).toBe(false);
  });
});

describe('prefixFromSessionState', () => {
  it('should take the local part of the account name', () => {
    expect(prefixFromSessionState(autCookie({ name: 'tester@mail.example.test', nickname: 'nick' }))).toBe('tester');
  });

  it('should fall back to the nickname', () => {
    expect(prefixFromSessionState(autCookie({ name: 'not-an-address', nickname: 'nick' }))).toBe('nick');
  });

  it('should return null without a readable token', () => {
    expect(prefixFromSessionState({ savedAt: null, cookies: [{ name: 'sid', value: 'x' }] })).toBeNull();
    expect(prefixFromSessionState({ savedAt: null, cookies: [{ name: 'aut', value: 'a.%%%.c' }] })).toBeNull();
  });
});

describe('FileSessionStateStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mailbox-'));
    file = path.join(dir, 'state', 'cookies.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should save with a timestamp in seconds and load it back', async () => {
    const store = new FileSessionStateStore(file, FALLBACK_URL);
    const cookies = [{ name: 'sid', value: 'test-session', domain: '.mail.example.test', path: '/' }];

    await store.save(cookies, 1_700_000_000_000);

    expect(JSON.parse(fs.readFileSync(file, 'utf8'))).toEqual({ timestamp: 1700000000, count: 1, cookies });
    expect(await store.load()).toEqual({ savedAt: 1_700_000_000_000, cookies });
  });

  it('should refuse to save an empty session', async () => {
    await expect(new FileSessionStateStore(file, FALLBACK_URL).save([])).rejects.toThrow('No cookies to save');
  });

  it('should load nothing from a missing or broken file', async () => {
    const store = new FileSessionStateStore(file, FALLBACK_URL);
    expect(await store.load()).toBeNull();

    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '{not json');
    expect(await store.load()).toBeNull();

    fs.writeFileSync(file, '{"cookies": 3}');
    expect(await store.load()).toBeNull();
  });
});
