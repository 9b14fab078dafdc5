/**
 * Mailbox Poller contract.
 * The engine only needs two things from a mailbox: restore a signed-in
 * session, and find the verification link sent to one address.
 */

import type { IBrowserCookie } from '../browser/index.js';

export interface ISessionState {
  /** Epoch ms of the save; null for files written without a timestamp */
  savedAt: number | null;
  cookies: IBrowserCookie[];
}

export interface ISessionStateStore {
  load(): Promise<ISessionState | null>;
  save(cookies: IBrowserCookie[]): Promise<void>;
}

export interface IMailboxMessage {
  id: string;
  sender: string;
  subject: string;
  /** Unknown when the list view does not show it */
  recipient?: string;
  receivedAt: number | null;
}

export interface IMailboxPoller {
  /**
   * Restore a prior session. False when the state is absent, expired, or
   * the provider no longer accepts it.
   */
  authenticate(state: ISessionState | null): Promise<boolean>;

  /**
   * Poll until a verification link for `address` shows up or `deadline`
   * (epoch ms) passes. Resolves null on deadline or cancellation; rejects
   * with MailboxUnavailableError when the provider stays unreachable.
   */
  findVerificationLink(address: string, deadline: number, signal?: AbortSignal): Promise<string | null>;

  close(): Promise<void>;
}

/**
 * Low-level access to one webmail UI, driven by WebmailPoller.
 */
export interface IWebmailClient {
  open(cookies: IBrowserCookie[]): Promise<void>;
  isAuthenticated(): Promise<boolean>;
  refresh(): Promise<void>;
  listMessages(): Promise<IMailboxMessage[]>;
  /** Text and link targets of one message, newline separated */
  readMessage(id: string): Promise<string>;
  close(): Promise<void>;
}
