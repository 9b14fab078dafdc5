export * from './constants/index.js';
export * from './types/index.js';
export * from './types/settings.js';

export type { IBrowserContextHandle, IBrowserCookie, IBrowserLauncher, IContextOptions, IPageDriver } from './browser/index.js';
export { PlaywrightLauncher } from './browser/playwright-driver.js';

export type { IElementDiscoveryStrategy, IElementLocator, ILocateContext, ILocateResult } from './element-discovery/index.js';
export { RankedElementLocator, createDefaultStrategies } from './element-discovery/ranked-element-locator.js';
export { INTENT_PROFILES, type IIntentProfile } from './element-discovery/intent-profiles.js';

export { AdaptiveWaiter, anyOf, elementLocated, networkIdle, textPresent, urlMatches, waitForCondition } from './infra/adaptive-waiter.js';
export { ConfigStub, EnvConfig, loadEnvFile, loadSettings, type IConfig } from './infra/config.js';
export { LoggerStub, ScopedLogger, WinstonLogger, type ILogger } from './infra/logger.js';
export {
  BrowserLaunchError,
  CancelledError,
  FatalError,
  MailboxUnavailableError,
  RetryableError,
  RetryStrategy,
} from './infra/retry-utils.js';

export type { IFormInteractor, IInteractionOptions, IInteractionOutcome } from './interaction/index.js';
export { AdaptiveFormInteractor } from './interaction/adaptive-form-interactor.js';
export { FixedWaitFormInteractor } from './interaction/fixed-wait-form-interactor.js';

export type { IMailboxMessage, IMailboxPoller, ISessionState, ISessionStateStore, IWebmailClient } from './mailbox/index.js';
export { FileSessionStateStore, prefixFromSessionState } from './mailbox/session-state.js';
export { extractVerificationLink } from './mailbox/verification-link.js';
export { WebmailPoller } from './mailbox/webmail-poller.js';
export { PlaywrightWebmailClient } from './mailbox/playwright-webmail-client.js';

export type { IResultStore } from './storage/index.js';
export { FileResultStore } from './storage/file-result-store.js';
export { InMemoryResultStore } from './storage/in-memory-result-store.js';
export { createResultStore } from './storage/storage-factory.js';
export { formatRecordLine, parseRecordLine } from './storage/record-format.js';

export type { IDiagnosticsSink } from './diagnostics/index.js';
export { FileDiagnosticsSink } from './diagnostics/file-diagnostics-sink.js';
export { InMemoryDiagnosticsSink } from './diagnostics/in-memory-diagnostics-sink.js';

export type { IPhaseContext, IPhaseHandler, ISignupEngine } from './orchestrator/index.js';
export { SignupOrchestrator, type SignupOrchestratorDeps } from './orchestrator/signup-orchestrator.js';
export { isSuccessful, runBatch, type BatchOptions } from './orchestrator/batch-runner.js';
export { generateIdentity, generateSecret } from './orchestrator/identity.js';

export type { IReporter } from './reporter/index.js';
export { StdoutReporter } from './reporter/stdout-reporter.js';
