/**
 * Webmail Poller
 * Polls a webmail list at a fixed interval for the verification message.
 * Provider calls go through RetryStrategy; a provider that keeps failing
 * surfaces as MailboxUnavailableError.
 */

import { sleep } from '../infra/abort.js';
import type { ILogger } from '../infra/logger.js';
import { CancelledError, MailboxUnavailableError, RetryStrategy, toError } from '../infra/retry-utils.js';
import type { IMailboxSettings } from '../types/settings.js';
import type { IMailboxPoller, ISessionState, IWebmailClient } from './index.js';
import { isSessionStateFresh } from './session-state.js';
import { extractVerificationLink, rankMatchingMessages } from './verification-link.js';

export interface WebmailPollerOptions {
  /** Messages opened per poll, newest first */
  maxMessagesPerPoll?: number;
  providerRetries?: number;
  providerRetryDelayMs?: number;
}

export class WebmailPoller implements IMailboxPoller {
  private retry: RetryStrategy;
  private maxMessagesPerPoll: number;
  private providerRetries: number;
  private providerRetryDelayMs: number;

  constructor(
    private client: IWebmailClient,
    private settings: IMailboxSettings,
    private logger: ILogger,
    options: WebmailPollerOptions = {}
  ) {
    this.retry = new RetryStrategy(logger);
    this.maxMessagesPerPoll = options.maxMessagesPerPoll ?? 3;
    this.providerRetries = options.providerRetries ?? 2;
    this.providerRetryDelayMs = options.providerRetryDelayMs ?? 1000;
  }

  async authenticate(state: ISessionState | null): Promise<boolean> {
    if (!state) {
      this.logger.warn('No persisted mailbox session');
      return false;
    }
    if (!isSessionStateFresh(state, this.settings.sessionValidityDays)) {
      this.logger.warn('Persisted mailbox session expired', {
        savedAt: state.savedAt,
        validityDays: this.settings.sessionValidityDays,
      });
      return false;
    }

    await this.callProvider('open', () => this.client.open(state.cookies));
    const authenticated = await this.client.isAuthenticated();
    this.logger.info(authenticated ? 'Mailbox session restored' : 'Mailbox rejected the persisted session');
    return authenticated;
  }

  async findVerificationLink(address: string, deadline: number, signal?: AbortSignal): Promise<string | null> {
    const criteria = {
      senderPattern: this.settings.senderPattern,
      subjectPattern: this.settings.subjectPattern,
    };
    const wanted = address.toLowerCase();

    try {
      for (let poll = 1; ; poll++) {
        if (signal?.aborted) return null;

        const messages = await this.callProvider('list', () => this.client.listMessages(), signal);
        const ranked = rankMatchingMessages(messages, address, criteria).slice(0, this.maxMessagesPerPoll);
        this.logger.debug('Mailbox polled', { poll, messages: messages.length, matching: ranked.length });

        for (const message of ranked) {
          const content = await this.callProvider('read', () => this.client.readMessage(message.id), signal);
          if (message.recipient === undefined && !content.toLowerCase().includes(wanted)) {
            continue;
          }

          const link = extractVerificationLink(content, this.settings.linkPattern);
          if (link) {
            this.logger.info('Verification link found', { address, poll, subject: message.subject });
            return link;
          }
        }

        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          this.logger.warn('No verification message before the deadline', { address, polls: poll });
          return null;
        }

        if (!(await sleep(Math.min(this.settings.pollIntervalMs, remaining), signal))) {
          return null;
        }
        await this.callProvider('refresh', () => this.client.refresh(), signal);
      }
    } catch (error) {
      if (error instanceof CancelledError) {
        return null;
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private async callProvider<T>(what: string, operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    try {
      return await this.retry.execute(operation, {
        maxRetries: this.providerRetries,
        backoff: 'exponential',
        initialDelay: this.providerRetryDelayMs,
        maxDelay: this.providerRetryDelayMs * 8,
        retryableErrors: [Error],
        signal,
      });
    } catch (error) {
      const err = toError(error);
      if (err instanceof CancelledError || err instanceof MailboxUnavailableError) {
        throw err;
      }
      throw new MailboxUnavailableError(`Mailbox ${what} failed: ${err.message}`, err);
    }
  }
}
