import type {
  IBrowserContextHandle,
  IBrowserCookie,
  IBrowserLauncher,
  IContextOptions,
  IPageDriver,
} from '../../browser/index.js';
import { FakePage } from './fake-page.js';

export class FakeContextHandle implements IBrowserContextHandle {
  closed = false;
  pagesOpened = 0;

  constructor(
    private page: FakePage,
    readonly options: IContextOptions
  ) {}

  async newPage(): Promise<IPageDriver> {
    this.pagesOpened++;
    return this.page;
  }

  async cookies(): Promise<IBrowserCookie[]> {
    return this.options.cookies ?? [];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Hands out contexts over one shared FakePage.
 */
export class FakeLauncher implements IBrowserLauncher {
  readonly contexts: FakeContextHandle[] = [];
  launchError?: Error;
  shutdowns = 0;

  constructor(readonly page: FakePage = new FakePage()) {}

  async openContext(options: IContextOptions = {}): Promise<IBrowserContextHandle> {
    if (this.launchError) {
      throw this.launchError;
    }
    const context = new FakeContextHandle(this.page, options);
    this.contexts.push(context);
    return context;
  }

  async shutdown(): Promise<void> {
    this.shutdowns++;
  }
}
