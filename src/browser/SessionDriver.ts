import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';
import type { BrowserConfig, TimeoutDefaults } from '../config.js';
import { AuthenticationError, NavigationError, NavigationTimeoutError } from '../errors.js';
import type { ConferenceProfile } from '../profiles/ConferenceProfile.js';
import type { BrowserHost } from './BrowserManager.js';
import type { PageArchive } from './PageArchive.js';
import type { GotoOutcome, PortalPage } from './PortalPage.js';

export interface Credentials {
  login: string;
  password: string;
}

export type AuthState = 'anonymous' | 'authenticating' | 'authenticated' | 'failed';

export interface Session {
  id: string;
  conference: string;
  page: PortalPage;
  authState: AuthState;
  currentUrl: string;
  /** False while a navigation is in flight. */
  ready: boolean;
  closed: boolean;
  createdAt: number;
}

export type WaitResult<T> =
  | { status: 'satisfied'; value: T; elapsedMs: number }
  | { status: 'timeout'; elapsedMs: number };

/** Resolves to a value once the condition holds, to null/undefined while it does not. */
export type WaitPredicate<T> = (page: PortalPage) => Promise<T | null | undefined>;

export interface OpenOptions {
  headless: boolean;
}

export interface SessionDriverOptions {
  browser: BrowserConfig;
  timeouts: TimeoutDefaults;
  logger: Logger;
  archive?: PageArchive;
}

const MAX_POLL_INTERVAL = 2000;
const BACKOFF_FACTOR = 1.5;

async function exists(page: PortalPage, selector: string): Promise<boolean> {
  const found = await page.queryAll(selector);
  return found.length > 0;
}

/**
 * Owns the one browser session of a run: login, navigation and bounded waits.
 * Commands on a session are issued strictly one at a time.
 */
export class SessionDriver {
  readonly timeouts: TimeoutDefaults;
  private readonly browser: BrowserConfig;
  private readonly logger: Logger;
  private readonly archive?: PageArchive;

  constructor(private readonly host: BrowserHost, options: SessionDriverOptions) {
    this.browser = options.browser;
    this.timeouts = options.timeouts;
    this.logger = options.logger;
    this.archive = options.archive;
  }

  /** Launches the browser and signs in. On any failure the browser is released before the error propagates. */
  async open(profile: ConferenceProfile, credentials: Credentials, options: OpenOptions): Promise<Session> {
    let session: Session | undefined;
    try {
      await this.host.launch({ ...this.browser, headless: options.headless });
      const page = await this.host.newPage();
      session = {
        id: `sess_${randomUUID()}`,
        conference: profile.key,
        page,
        authState: 'anonymous',
        currentUrl: page.url(),
        ready: false,
        closed: false,
        createdAt: Date.now(),
      };
      await this.login(session, profile, credentials);
      return session;
    } catch (err) {
      if (session) {
        if (session.authState === 'authenticating') session.authState = 'failed';
        await this.close(session);
      } else {
        await this.releaseHost();
      }
      throw err;
    }
  }

  private async login(session: Session, profile: ConferenceProfile, credentials: Credentials): Promise<void> {
    const { login } = profile;
    const context = { conference: profile.key, step: 'login' };

    this.logger.info({ url: profile.url }, 'Opening portal');
    await this.navigate(session, profile.url, 'open-portal');
    session.authState = 'authenticating';

    this.logger.info('Waiting for login page to load...');
    const form = await this.waitFor(session, async (page) => {
      if (await exists(page, login.successSelector)) return 'signed-in' as const;
      if (await exists(page, login.usernameSelector)) return 'form' as const;
      return null;
    }, this.timeouts.login);

    if (form.status === 'timeout') {
      throw new NavigationTimeoutError(
        session.page.url(),
        `Login form did not appear within ${this.timeouts.login}ms`,
        { ...context, step: 'login-form' },
      );
    }

    if (form.value === 'form') {
      await session.page.type(login.usernameSelector, credentials.login);
      await session.page.type(login.passwordSelector, credentials.password);
      await session.page.click(login.submitSelector);
      this.logger.info('Logging in.');

      const outcome = await this.waitFor(session, async (page) => {
        if (login.failureSelector && await exists(page, login.failureSelector)) return 'rejected' as const;
        if (await exists(page, login.successSelector)) return 'accepted' as const;
        return null;
      }, this.timeouts.auth);

      if (outcome.status === 'timeout') {
        throw new NavigationTimeoutError(
          session.page.url(),
          `Neither the landing page nor a login error appeared within ${this.timeouts.auth}ms`,
          context,
        );
      }
      if (outcome.value === 'rejected') {
        session.authState = 'failed';
        throw new AuthenticationError('Credentials rejected by the portal', context);
      }
    } else {
      this.logger.info('Session already signed in, skipping login form');
    }

    session.authState = 'authenticated';
    session.currentUrl = session.page.url();
    session.ready = true;
    this.logger.info('Logged in.');
    await this.savePage(session, 'landing_page');
  }

  /** Loads `url` and waits until the document reports complete. */
  async navigate(session: Session, url: string, step = 'navigate'): Promise<void> {
    this.assertOpen(session);
    const budget = this.timeouts.navigation;
    const deadline = Date.now() + budget;
    const timedOut = () =>
      new NavigationTimeoutError(url, `Page did not become ready within ${budget}ms: ${url}`, {
        conference: session.conference,
        step,
      });

    session.ready = false;
    let outcome: GotoOutcome;
    try {
      outcome = await session.page.goto(url, budget);
    } catch (err) {
      const cause = err instanceof Error ? err.message : String(err);
      throw new NavigationError(url, `Failed to load ${url}: ${cause}`, {
        conference: session.conference,
        step,
        cause,
      });
    }
    if (outcome === 'timeout') throw timedOut();

    const ready = await this.waitFor(
      session,
      async (page) => ((await page.readyState()) === 'complete' ? true : null),
      Math.max(deadline - Date.now(), 0),
    );
    if (ready.status === 'timeout') throw timedOut();

    session.currentUrl = session.page.url();
    session.ready = true;
  }

  /**
   * Polls `predicate` against the live page with growing intervals until it
   * yields a value or `timeoutMs` has elapsed. The predicate is always tried at
   * least once. A predicate that throws (e.g. the page navigated away mid-query)
   * counts as not yet satisfied.
   */
  async waitFor<T>(session: Session, predicate: WaitPredicate<T>, timeoutMs: number): Promise<WaitResult<T>> {
    this.assertOpen(session);
    const started = Date.now();
    const deadline = started + timeoutMs;
    let interval = this.timeouts.pollInterval;

    for (;;) {
      const value = await this.probe(session, predicate);
      if (value !== null && value !== undefined) {
        return { status: 'satisfied', value, elapsedMs: Date.now() - started };
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return { status: 'timeout', elapsedMs: Date.now() - started };
      }
      await sleep(Math.min(interval, remaining));
      interval = Math.min(interval * BACKOFF_FACTOR, MAX_POLL_INTERVAL);
    }
  }

  private async probe<T>(session: Session, predicate: WaitPredicate<T>): Promise<T | null | undefined> {
    try {
      return await predicate(session.page);
    } catch (err) {
      this.logger.debug({ err }, 'Wait predicate failed, retrying');
      return null;
    }
  }

  /** Writes the current page HTML to the archive when page saving is on. A failed write only logs. */
  async savePage(session: Session, name: string): Promise<void> {
    if (!this.archive || session.closed) return;
    try {
      const html = await session.page.content();
      const file = await this.archive.save(name, html);
      this.logger.debug({ file }, 'Saved page');
    } catch (err) {
      this.logger.warn({ err, name }, 'Failed to save page');
    }
  }

  /** Releases the page and the browser. Safe to call more than once; never throws. */
  async close(session: Session): Promise<void> {
    if (session.closed) return;
    session.closed = true;
    session.ready = false;
    try {
      await session.page.close();
    } catch (err) {
      this.logger.warn({ err, sessionId: session.id }, 'Failed to close page');
    }
    await this.releaseHost();
  }

  private async releaseHost(): Promise<void> {
    try {
      await this.host.close();
    } catch (err) {
      this.logger.warn({ err }, 'Failed to close browser');
    }
  }

  private assertOpen(session: Session): void {
    if (session.closed) {
      throw new Error(`Session ${session.id} is closed`);
    }
  }
}

/** Opens a session, runs `fn` with it and closes it on every exit path. */
export async function withSession<T>(
  driver: SessionDriver,
  profile: ConferenceProfile,
  credentials: Credentials,
  options: OpenOptions,
  fn: (session: Session) => Promise<T>,
): Promise<T> {
  const session = await driver.open(profile, credentials, options);
  try {
    return await fn(session);
  } finally {
    await driver.close(session);
  }
}
