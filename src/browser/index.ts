import type { IDocumentSnapshot, IElementSnapshot } from '../types/index.js';

/**
 * Everything the engine needs from a live page.
 * Elements are addressed by the snapshot entry the locator picked; an
 * implementation must refuse to act when the node that entry was taken
 * from is gone (stale reference).
 */
export interface IPageDriver {
  url(): string;
  goto(url: string): Promise<void>;
  snapshot(): Promise<IDocumentSnapshot>;
  fill(target: IElementSnapshot, value: string): Promise<void>;
  /** Current value for form controls, visible text otherwise */
  readValue(target: IElementSnapshot): Promise<string>;
  click(target: IElementSnapshot): Promise<void>;
  isNetworkIdle(timeoutMs: number): Promise<boolean>;
  content(): Promise<string>;
  screenshot(): Promise<Buffer | null>;
}

export type CookieSameSite = 'Strict' | 'Lax' | 'None';

export interface IBrowserCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  url?: string;
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: CookieSameSite;
}

export interface IContextOptions {
  cookies?: IBrowserCookie[];
}

/**
 * A browser context owned by exactly one session.
 */
export interface IBrowserContextHandle {
  readonly closed: boolean;
  newPage(): Promise<IPageDriver>;
  cookies(): Promise<IBrowserCookie[]>;
  close(): Promise<void>;
}

/**
 * Opens isolated browser contexts. Throws BrowserLaunchError when the
 * browser engine cannot start.
 */
export interface IBrowserLauncher {
  openContext(options?: IContextOptions): Promise<IBrowserContextHandle>;
  shutdown(): Promise<void>;
}
