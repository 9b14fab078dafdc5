import { PlaywrightLauncher } from './browser/playwright-driver.js';
import { FileDiagnosticsSink } from './diagnostics/file-diagnostics-sink.js';
import { RankedElementLocator } from './element-discovery/ranked-element-locator.js';
import { EnvConfig, loadEnvFile, loadSettings, type IConfig } from './infra/config.js';
import { AdaptiveWaiter } from './infra/adaptive-waiter.js';
import { WinstonLogger, type ILogger } from './infra/logger.js';
import { toError } from './infra/retry-utils.js';
import { AdaptiveFormInteractor } from './interaction/adaptive-form-interactor.js';
import { FixedWaitFormInteractor } from './interaction/fixed-wait-form-interactor.js';
import type { IFormInteractor } from './interaction/index.js';
import { PlaywrightWebmailClient } from './mailbox/playwright-webmail-client.js';
import { FileSessionStateStore, prefixFromSessionState } from './mailbox/session-state.js';
import { WebmailPoller } from './mailbox/webmail-poller.js';
import { runBatch } from './orchestrator/batch-runner.js';
import { SignupOrchestrator } from './orchestrator/signup-orchestrator.js';
import { StdoutReporter } from './reporter/stdout-reporter.js';
import { createResultStore } from './storage/storage-factory.js';
import type { IEngineSettings } from './types/settings.js';
import { withSettings } from './types/settings.js';

const MAILBOX_LOGIN_TIMEOUT_MS = 5 * 60 * 1000;

function createInteractor(mode: string, settings: IEngineSettings, logger: ILogger): IFormInteractor {
  const locator = new RankedElementLocator(undefined, logger);
  if (mode === 'fixed') {
    return new FixedWaitFormInteractor(locator, settings.interaction, logger);
  }
  return new AdaptiveFormInteractor(locator, new AdaptiveWaiter(settings.wait), settings, logger);
}

/**
 * Run the configured number of signup sessions one after another. Returns
 * the process exit code: 0 only when every session saved its token.
 */
async function runSignup(config: IConfig, settings: IEngineSettings, logger: ILogger): Promise<number> {
  const sessionState = new FileSessionStateStore(settings.mailbox.sessionStateFile, settings.mailbox.url, logger);

  if (!config.get('EMAIL_PREFIX')) {
    const state = await sessionState.load();
    const prefix = state ? prefixFromSessionState(state) : null;
    if (prefix) {
      logger.info('Address prefix taken from mailbox session', { prefix });
      settings = withSettings({ identity: { prefix } }, settings);
    }
  }

  const launcher = new PlaywrightLauncher(settings.browser, logger);
  const mailbox = new WebmailPoller(new PlaywrightWebmailClient(launcher, settings.mailbox, logger), settings.mailbox, logger);
  const engine = new SignupOrchestrator({
    settings,
    launcher,
    mailbox,
    sessionState,
    store: createResultStore(config.get('RESULTS_STORE') ?? 'file', settings.output.resultsFile, logger),
    diagnostics: new FileDiagnosticsSink(settings.output.diagnosticsDir, logger),
    interactor: createInteractor(config.get('INTERACTION_MODE') ?? 'adaptive', settings, logger),
    logger,
  });

  const stop = new AbortController();
  const onSigint = () => {
    stop.abort();
    engine.cancel('Interrupted');
  };
  process.once('SIGINT', onSigint);

  try {
    const summary = await runBatch(engine, {
      accounts: settings.run.accounts,
      reporter: new StdoutReporter(),
      logger,
      signal: stop.signal,
    });
    return summary.succeeded === summary.total ? 0 : 1;
  } finally {
    process.off('SIGINT', onSigint);
    await mailbox.close();
    await launcher.shutdown();
  }
}

/**
 * Open the mailbox in a visible browser, wait for a manual login and save
 * the resulting cookies for later sessions.
 */
async function loginMailbox(settings: IEngineSettings, logger: ILogger): Promise<number> {
  const launcher = new PlaywrightLauncher({ ...settings.browser, headless: false }, logger);
  const store = new FileSessionStateStore(settings.mailbox.sessionStateFile, settings.mailbox.url, logger);

  try {
    const context = await launcher.newContext();
    const page = await context.newPage();
    await page.goto(settings.mailbox.url, { waitUntil: 'domcontentloaded' });
    logger.info('Log in to the mailbox in the opened browser window', { url: settings.mailbox.url });

    const listUrl = settings.mailbox.listUrl;
    await page.waitForURL(url => url.href.startsWith(listUrl), { timeout: MAILBOX_LOGIN_TIMEOUT_MS });

    await store.save(await context.cookies());
    await context.close();
    return 0;
  } finally {
    await launcher.shutdown();
  }
}

async function main(): Promise<number> {
  loadEnvFile();
  const logger = new WinstonLogger({ level: process.env.LOG_LEVEL?.toLowerCase() });
  const config = new EnvConfig(logger);

  try {
    const settings = loadSettings(config);
    if (process.argv[2] === 'login-mailbox') {
      return await loginMailbox(settings, logger);
    }
    return await runSignup(config, settings, logger);
  } catch (error) {
    logger.error('Run aborted', toError(error));
    return 1;
  }
}

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Unexpected error:', error);
    process.exitCode = 1;
  }
);
