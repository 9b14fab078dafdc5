/**
 * Engine settings.
 * The engine receives one of these at construction and never reads the
 * environment itself; see infra/config.ts for the env → settings mapping.
 */

import { PHASES } from '../constants/index.js';

export type BrowserEngine = 'chromium' | 'firefox' | 'webkit';

export const BROWSER_ENGINES: readonly BrowserEngine[] = ['chromium', 'firefox', 'webkit'];

export interface IBrowserSettings {
  engine: BrowserEngine;
  headless: boolean;
  navigationTimeoutMs: number;
}

export interface IIdentitySettings {
  prefix: string;
  domain: string;
  /** Fixed secret for every identity; a random one is generated when unset */
  secret?: string;
}

export interface ISiteSettings {
  homeUrl: string;
  signupUrl: string;
  dashboardUrl: string;
  postSignupUrlPattern: RegExp;
  postSignupText: RegExp;
  dashboardUrlPattern: RegExp;
  loginUrlPattern: RegExp;
  tokenPattern: RegExp;
}

export interface IWaitSettings {
  minIntervalMs: number;
  maxIntervalMs: number;
  factor: number;
  elementTimeoutMs: number;
  networkIdleTimeoutMs: number;
}

export interface IInteractionSettings {
  fillAttempts: number;
  activateGraceMs: number;
  /** Sleep used by the fixed-wait baseline interactor */
  fixedWaitMs: number;
}

export interface IPhaseSettings {
  maxAttempts: number;
}

export interface IPhaseTimeouts {
  [PHASES.REGISTERING]: number;
  [PHASES.AWAITING_VERIFICATION]: number;
  [PHASES.LOGGING_IN]: number;
  [PHASES.EXTRACTING_TOKEN]: number;
}

export interface IMailboxSettings {
  url: string;
  listUrl: string;
  sessionStateFile: string;
  sessionValidityDays: number;
  pollIntervalMs: number;
  maxWaitMs: number;
  senderPattern: RegExp;
  subjectPattern: RegExp;
  linkPattern: RegExp;
}

export interface IOutputSettings {
  resultsFile: string;
  diagnosticsDir: string;
  screenshots: boolean;
  htmlSnapshots: boolean;
}

export interface IRunSettings {
  /** Sessions run one after another, 1 to 10 */
  accounts: number;
}

export interface IEngineSettings {
  run: IRunSettings;
  browser: IBrowserSettings;
  identity: IIdentitySettings;
  site: ISiteSettings;
  wait: IWaitSettings;
  interaction: IInteractionSettings;
  phases: IPhaseSettings;
  phaseTimeouts: IPhaseTimeouts;
  mailbox: IMailboxSettings;
  output: IOutputSettings;
}

export type SettingsOverrides = {
  [K in keyof IEngineSettings]?: Partial<IEngineSettings[K]>;
};

export const MAX_ACCOUNTS = 10;

export const DEFAULT_SETTINGS: IEngineSettings = {
  run: {
    accounts: 1,
  },
  browser: {
    engine: 'firefox',
    headless: false,
    navigationTimeoutMs: 30000,
  },
  identity: {
    prefix: 'user123',
    domain: '2925.com',
  },
  site: {
    homeUrl: 'https://app.tavily.com/home',
    signupUrl: 'https://app.tavily.com/home',
    dashboardUrl: 'https://app.tavily.com/home',
    postSignupUrlPattern: /email-verification|\/verify|check-?(your-?)?email/i,
    postSignupText: /verify your email|check your (email|inbox)/i,
    dashboardUrlPattern: /app\.tavily\.com\/home/i,
    loginUrlPattern: /auth\.tavily\.com|\/u\/login|\/login/i,
    tokenPattern: /^tvly-[A-Za-z0-9_-]{8,}$/,
  },
  wait: {
    minIntervalMs: 100,
    maxIntervalMs: 2000,
    factor: 2,
    elementTimeoutMs: 10000,
    networkIdleTimeoutMs: 10000,
  },
  interaction: {
    fillAttempts: 3,
    activateGraceMs: 3000,
    fixedWaitMs: 1000,
  },
  phases: {
    maxAttempts: 3,
  },
  phaseTimeouts: {
    [PHASES.REGISTERING]: 120000,
    [PHASES.AWAITING_VERIFICATION]: 330000,
    [PHASES.LOGGING_IN]: 90000,
    [PHASES.EXTRACTING_TOKEN]: 60000,
  },
  mailbox: {
    url: 'https://2925.com',
    listUrl: 'https://www.2925.com/#/mailList',
    sessionStateFile: 'email_cookies.json',
    sessionValidityDays: 7,
    pollIntervalMs: 30000,
    maxWaitMs: 300000,
    senderPattern: /tavily/i,
    subjectPattern: /verif|confirm|activate/i,
    linkPattern: /tavily\.com\/\S*(verify|verification)/i,
  },
  output: {
    resultsFile: 'api_keys.txt',
    diagnosticsDir: 'diagnostics',
    screenshots: true,
    htmlSnapshots: true,
  },
};

/**
 * Merge section-level overrides onto a base settings object.
 */
export function withSettings(
  overrides: SettingsOverrides = {},
  base: IEngineSettings = DEFAULT_SETTINGS
): IEngineSettings {
  return {
    run: { ...base.run, ...overrides.run },
    browser: { ...base.browser, ...overrides.browser },
    identity: { ...base.identity, ...overrides.identity },
    site: { ...base.site, ...overrides.site },
    wait: { ...base.wait, ...overrides.wait },
    interaction: { ...base.interaction, ...overrides.interaction },
    phases: { ...base.phases, ...overrides.phases },
    phaseTimeouts: { ...base.phaseTimeouts, ...overrides.phaseTimeouts },
    mailbox: { ...base.mailbox, ...overrides.mailbox },
    output: { ...base.output, ...overrides.output },
  };
}
