import type { IBrowserCookie } from '../../browser/index.js';
import type {
  IMailboxMessage,
  IMailboxPoller,
  ISessionState,
  ISessionStateStore,
  IWebmailClient,
} from '../../mailbox/index.js';

/**
 * Mailbox poller with a canned answer. In `hang` mode the lookup only
 * returns (null) once its signal aborts.
 */
export class FakeMailbox implements IMailboxPoller {
  authenticated = true;
  link: string | null = 'https://auth.example.test/verify?ticket=t-1';
  hang = false;
  lookupError?: Error;
  closed = false;
  readonly lookups: { address: string; deadline: number }[] = [];

  async authenticate(state: ISessionState | null): Promise<boolean> {
    return this.authenticated && state !== null;
  }

  async findVerificationLink(address: string, deadline: number, signal?: AbortSignal): Promise<string | null> {
    this.lookups.push({ address, deadline });
    if (this.lookupError) {
      throw this.lookupError;
    }
    if (!this.hang) {
      return this.link;
    }
    return new Promise(resolve => {
      if (signal?.aborted) {
        resolve(null);
        return;
      }
      signal?.addEventListener('abort', () => resolve(null), { once: true });
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeSessionStateStore implements ISessionStateStore {
  saved: IBrowserCookie[][] = [];

  constructor(public state: ISessionState | null = { savedAt: null, cookies: [{ name: 'sid', value: 'test-session' }] }) {}

  async load(): Promise<ISessionState | null> {
    return this.state;
  }

  async save(cookies: IBrowserCookie[]): Promise<void> {
    this.saved.push(cookies);
  }
}

/**
 * Scripted webmail. `inbox` is what each poll lists; the last entry repeats
 * once the script runs out.
 */
export class FakeWebmailClient implements IWebmailClient {
  inbox: IMailboxMessage[][] = [[]];
  readonly bodies = new Map<string, string>();
  authenticated = true;
  openedWith: IBrowserCookie[][] = [];
  refreshes = 0;
  reads: string[] = [];
  closed = false;
  /** Errors thrown by the next calls to listMessages, in order */
  listErrors: Error[] = [];

  private polls = 0;

  async open(cookies: IBrowserCookie[]): Promise<void> {
    this.openedWith.push(cookies);
  }

  async isAuthenticated(): Promise<boolean> {
    return this.authenticated;
  }

  async refresh(): Promise<void> {
    this.refreshes++;
  }

  async listMessages(): Promise<IMailboxMessage[]> {
    const error = this.listErrors.shift();
    if (error) {
      throw error;
    }
    const index = Math.min(this.polls, this.inbox.length - 1);
    this.polls++;
    return this.inbox[index];
  }

  async readMessage(id: string): Promise<string> {
    this.reads.push(id);
    return this.bodies.get(id) ?? '';
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
