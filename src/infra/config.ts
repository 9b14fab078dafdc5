import { config } from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs';
import type { ILogger } from './logger.js';
import {
  BROWSER_ENGINES,
  DEFAULT_SETTINGS,
  MAX_ACCOUNTS,
  type BrowserEngine,
  type IEngineSettings,
} from '../types/settings.js';
import { PHASES } from '../constants/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Find project root by looking for package.json
let currentDir = __dirname;
let projectRoot = currentDir;
while (currentDir !== path.dirname(currentDir)) {
  if (fs.existsSync(path.join(currentDir, 'package.json'))) {
    projectRoot = currentDir;
    break;
  }
  currentDir = path.dirname(currentDir);
}

export const PROJECT_ROOT = projectRoot;

/**
 * Load `.env` from the project root into process.env. Keys already set in
 * the environment win.
 */
export function loadEnvFile(envPath = path.join(PROJECT_ROOT, '.env')): boolean {
  if (!fs.existsSync(envPath)) {
    return false;
  }
  const result = config({ path: envPath });
  if (result.error) {
    console.error('Dotenv error:', result.error);
    return false;
  }
  return true;
}

export interface IConfig {
  get(key: string): string | undefined;
}

export class EnvConfig implements IConfig {
  constructor(private logger?: ILogger) {}

  get(key: string): string | undefined {
    const val = process.env[key];
    if (!val) {
      this.logger?.debug(`Config key ${key} not set, using default`);
    }
    return val;
  }
}

export class ConfigStub implements IConfig {
  constructor(private values: Record<string, string | undefined> = {}) {}

  get(key: string): string | undefined {
    return this.values[key];
  }
}

export class ConfigError extends Error {
  constructor(key: string, value: string, expected: string) {
    super(`Invalid value for ${key}: "${value}" (expected ${expected})`);
    this.name = 'ConfigError';
  }
}

const TRUE_WORDS = ['true', '1', 'yes', 'on'];
const FALSE_WORDS = ['false', '0', 'no', 'off'];

function readString(cfg: IConfig, key: string): string | undefined {
  const value = cfg.get(key)?.trim();
  return value ? value : undefined;
}

function readInt(cfg: IConfig, key: string, fallback: number): number {
  const value = readString(cfg, key);
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(key, value, 'a non-negative integer');
  }
  return Number(value);
}

function readIntInRange(cfg: IConfig, key: string, fallback: number, min: number, max: number): number {
  const value = readString(cfg, key);
  if (value === undefined) return fallback;
  const parsed = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!(parsed >= min && parsed <= max)) {
    throw new ConfigError(key, value, `an integer from ${min} to ${max}`);
  }
  return parsed;
}

function readBool(cfg: IConfig, key: string, fallback: boolean): boolean {
  const value = readString(cfg, key)?.toLowerCase();
  if (value === undefined) return fallback;
  if (TRUE_WORDS.includes(value)) return true;
  if (FALSE_WORDS.includes(value)) return false;
  throw new ConfigError(key, value, 'true or false');
}

function readPattern(cfg: IConfig, key: string, fallback: RegExp, flags = 'i'): RegExp {
  const value = readString(cfg, key);
  if (value === undefined) return fallback;
  try {
    return new RegExp(value, flags);
  } catch {
    throw new ConfigError(key, value, 'a regular expression');
  }
}

function readEngine(cfg: IConfig, key: string, fallback: BrowserEngine): BrowserEngine {
  const value = readString(cfg, key)?.toLowerCase();
  if (value === undefined) return fallback;
  const engine = BROWSER_ENGINES.find(name => name === value);
  if (!engine) {
    throw new ConfigError(key, value, BROWSER_ENGINES.join(' | '));
  }
  return engine;
}

/**
 * Build engine settings from configuration keys on top of `base`.
 * Unset keys keep the base value; malformed ones throw ConfigError.
 */
export function loadSettings(cfg: IConfig, base: IEngineSettings = DEFAULT_SETTINGS): IEngineSettings {
  return {
    run: {
      accounts: readIntInRange(cfg, 'ACCOUNT_COUNT', base.run.accounts, 1, MAX_ACCOUNTS),
    },
    browser: {
      engine: readEngine(cfg, 'BROWSER_TYPE', base.browser.engine),
      headless: readBool(cfg, 'HEADLESS', base.browser.headless),
      navigationTimeoutMs: readInt(cfg, 'BROWSER_TIMEOUT', base.browser.navigationTimeoutMs),
    },
    identity: {
      prefix: readString(cfg, 'EMAIL_PREFIX') ?? base.identity.prefix,
      domain: readString(cfg, 'EMAIL_DOMAIN') ?? base.identity.domain,
      secret: readString(cfg, 'DEFAULT_PASSWORD') ?? base.identity.secret,
    },
    site: {
      homeUrl: readString(cfg, 'SIGNUP_HOME_URL') ?? readString(cfg, 'TAVILY_HOME_URL') ?? base.site.homeUrl,
      signupUrl: readString(cfg, 'SIGNUP_URL') ?? readString(cfg, 'TAVILY_SIGNUP_URL') ?? base.site.signupUrl,
      dashboardUrl: readString(cfg, 'DASHBOARD_URL') ?? base.site.dashboardUrl,
      postSignupUrlPattern: readPattern(cfg, 'POST_SIGNUP_URL_PATTERN', base.site.postSignupUrlPattern),
      postSignupText: readPattern(cfg, 'POST_SIGNUP_TEXT_PATTERN', base.site.postSignupText),
      dashboardUrlPattern: readPattern(cfg, 'DASHBOARD_URL_PATTERN', base.site.dashboardUrlPattern),
      loginUrlPattern: readPattern(cfg, 'LOGIN_URL_PATTERN', base.site.loginUrlPattern),
      tokenPattern: readPattern(cfg, 'TOKEN_PATTERN', base.site.tokenPattern, ''),
    },
    wait: {
      minIntervalMs: readInt(cfg, 'WAIT_MIN_INTERVAL_MS', base.wait.minIntervalMs),
      maxIntervalMs: readInt(cfg, 'WAIT_MAX_INTERVAL_MS', base.wait.maxIntervalMs),
      factor: base.wait.factor,
      elementTimeoutMs: readInt(cfg, 'ELEMENT_TIMEOUT_MS', base.wait.elementTimeoutMs),
      networkIdleTimeoutMs: readInt(cfg, 'NETWORK_IDLE_TIMEOUT_MS', base.wait.networkIdleTimeoutMs),
    },
    interaction: {
      fillAttempts: readInt(cfg, 'FILL_ATTEMPTS', base.interaction.fillAttempts),
      activateGraceMs: readInt(cfg, 'ACTIVATE_GRACE_MS', base.interaction.activateGraceMs),
      fixedWaitMs: readInt(cfg, 'FIXED_WAIT_MS', base.interaction.fixedWaitMs),
    },
    phases: {
      maxAttempts: readInt(cfg, 'PHASE_MAX_ATTEMPTS', base.phases.maxAttempts),
    },
    phaseTimeouts: {
      [PHASES.REGISTERING]: readInt(cfg, 'REGISTERING_TIMEOUT_MS', base.phaseTimeouts[PHASES.REGISTERING]),
      [PHASES.AWAITING_VERIFICATION]: readInt(
        cfg,
        'VERIFICATION_TIMEOUT_MS',
        base.phaseTimeouts[PHASES.AWAITING_VERIFICATION]
      ),
      [PHASES.LOGGING_IN]: readInt(cfg, 'LOGIN_TIMEOUT_MS', base.phaseTimeouts[PHASES.LOGGING_IN]),
      [PHASES.EXTRACTING_TOKEN]: readInt(cfg, 'TOKEN_TIMEOUT_MS', base.phaseTimeouts[PHASES.EXTRACTING_TOKEN]),
    },
    mailbox: {
      ...base.mailbox,
      url: readString(cfg, 'EMAIL_CHECK_URL') ?? base.mailbox.url,
      listUrl: readString(cfg, 'EMAIL_LIST_URL') ?? base.mailbox.listUrl,
      sessionStateFile: readString(cfg, 'SESSION_STATE_FILE') ?? readString(cfg, 'COOKIES_FILE') ?? base.mailbox.sessionStateFile,
      sessionValidityDays: readInt(cfg, 'SESSION_VALIDITY_DAYS', base.mailbox.sessionValidityDays),
      pollIntervalMs: readInt(cfg, 'EMAIL_CHECK_INTERVAL_MS', base.mailbox.pollIntervalMs),
      maxWaitMs: readInt(cfg, 'MAX_EMAIL_WAIT_MS', base.mailbox.maxWaitMs),
    },
    output: {
      resultsFile: readString(cfg, 'RESULTS_FILE') ?? readString(cfg, 'API_KEYS_FILE') ?? base.output.resultsFile,
      diagnosticsDir: readString(cfg, 'DIAGNOSTICS_DIR') ?? base.output.diagnosticsDir,
      screenshots: readBool(cfg, 'ENABLE_SCREENSHOTS', base.output.screenshots),
      htmlSnapshots: readBool(cfg, 'SAVE_HTML_LOGS', base.output.htmlSnapshots),
    },
  };
}
