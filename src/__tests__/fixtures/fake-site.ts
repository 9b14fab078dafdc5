import { withSettings, type IEngineSettings } from '../../types/settings.js';
import { FakePage } from './fake-page.js';
import { element } from './snapshots.js';

export const HOME_URL = 'https://app.example.test/home';
export const SIGNUP_FORM_URL = 'https://auth.example.test/signup';
export const VERIFY_EMAIL_URL = 'https://auth.example.test/verify-email';
export const LOGIN_URL = 'https://auth.example.test/login';
export const VERIFICATION_LINK = 'https://auth.example.test/verify?ticket=t-1';
export const VALID_TOKEN = 'tk-abcd1234efgh';

/**
 * Small timings so a full session runs in a few milliseconds.
 */
export function testSettings(): IEngineSettings {
  return withSettings({
    site: {
      homeUrl: HOME_URL,
      signupUrl: HOME_URL,
      dashboardUrl: HOME_URL,
      postSignupUrlPattern: /verify-email/,
      postSignupText: /check your inbox/i,
      dashboardUrlPattern: /app\.example\.test\/home/,
      loginUrlPattern: /auth\.example\.test/,
      tokenPattern: /^tk-[a-z0-9]{8,}$/,
    },
    wait: { minIntervalMs: 1, maxIntervalMs: 5, factor: 2, elementTimeoutMs: 50, networkIdleTimeoutMs: 20 },
    interaction: { fillAttempts: 2, activateGraceMs: 30, fixedWaitMs: 1 },
    phases: { maxAttempts: 2 },
    output: { screenshots: false, htmlSnapshots: false },
  });
}

export interface IFakeSiteOptions {
  /** Token the dashboard shows once revealed */
  token?: string;
  /** Clicks on the first "Continue" that do nothing */
  ignoredContinueClicks?: number;
}

/**
 * A two-step signup form, a verification link that lands on a login form,
 * and a dashboard that reveals the token on demand.
 */
export class FakeSite {
  signedIn = false;
  verified = false;
  private ignoredContinueClicks: number;

  constructor(
    readonly page: FakePage,
    private options: IFakeSiteOptions = {}
  ) {
    this.ignoredContinueClicks = options.ignoredContinueClicks ?? 0;

    page.routes.set(HOME_URL, p => (this.signedIn ? this.showDashboard(p) : this.showLanding(p)));
    page.routes.set(VERIFICATION_LINK, p => {
      this.verified = true;
      this.showLogin(p);
    });

    page.clickHandlers.set('signup-link', p => this.showEmailStep(p));
    page.clickHandlers.set('continue', p => {
      if (this.ignoredContinueClicks > 0) {
        this.ignoredContinueClicks--;
        return;
      }
      this.showPasswordStep(p);
    });
    page.clickHandlers.set('create-account', p =>
      p.show({ url: VERIFY_EMAIL_URL, bodyText: 'Check your inbox to verify your email', elements: [] })
    );
    page.clickHandlers.set('login', p => {
      this.signedIn = true;
      p.currentUrl = HOME_URL;
      this.showDashboard(p);
    });
    page.clickHandlers.set('reveal-key', p => this.showDashboard(p, this.options.token ?? VALID_TOKEN));
  }

  private showLanding(page: FakePage): void {
    page.show({
      bodyText: 'Welcome',
      activeFormIndex: null,
      elements: [element({ ref: 0, tag: 'a', id: 'signup-link', text: 'Sign up', href: '/signup', formIndex: null })],
    });
  }

  private showEmailStep(page: FakePage): void {
    page.show({
      url: SIGNUP_FORM_URL,
      elements: [
        element({ ref: 0, tag: 'input', type: 'email', id: 'email' }),
        element({ ref: 1, tag: 'button', type: 'submit', id: 'continue', text: 'Continue' }),
      ],
    });
  }

  private showPasswordStep(page: FakePage): void {
    page.show({
      url: SIGNUP_FORM_URL,
      elements: [
        element({ ref: 0, tag: 'input', type: 'password', id: 'password' }),
        element({ ref: 1, tag: 'input', type: 'password', id: 'password-confirm' }),
        element({ ref: 2, tag: 'button', type: 'submit', id: 'create-account', text: 'Sign up' }),
      ],
    });
  }

  private showLogin(page: FakePage): void {
    page.show({
      url: LOGIN_URL,
      elements: [
        element({ ref: 0, tag: 'input', type: 'email', id: 'email' }),
        element({ ref: 1, tag: 'input', type: 'password', id: 'password' }),
        element({ ref: 2, tag: 'button', type: 'submit', id: 'login', text: 'Log in' }),
      ],
    });
  }

  private showDashboard(page: FakePage, token?: string): void {
    page.show({
      bodyText: 'Dashboard',
      activeFormIndex: null,
      elements: [
        element({ ref: 0, tag: 'button', id: 'reveal-key', text: 'Show', formIndex: null }),
        element({ ref: 1, tag: 'code', id: 'api-key', text: token ?? 'tk-••••••••', formIndex: null }),
      ],
    });
  }
}
