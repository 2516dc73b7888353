import { pino, type Logger } from 'pino';
import type { BrowserHost, BrowserOptions } from '../../src/browser/BrowserManager.js';
import type { GotoOutcome, PortalElement, PortalPage } from '../../src/browser/PortalPage.js';
import type { TimeoutDefaults } from '../../src/config.js';

type Children = Record<string, () => FakeElement[]>;

export class FakeElement implements PortalElement {
  readonly queries: string[] = [];

  constructor(
    private readonly content: string | (() => string),
    private readonly attrs: Record<string, string> = {},
    private readonly children: Children = {},
  ) {}

  async text(): Promise<string> {
    return typeof this.content === 'function' ? this.content() : this.content;
  }

  async attribute(name: string): Promise<string | null> {
    return this.attrs[name] ?? null;
  }

  async queryAll(selector: string): Promise<PortalElement[]> {
    this.queries.push(selector);
    return this.children[selector]?.() ?? [];
  }
}

export interface FakeView {
  body?: string;
  elements: Children;
}

/**
 * In-memory page. Each URL maps to a view; `goto` switches views.
 * Selectors are matched literally against the view's element table.
 */
export class FakePage implements PortalPage {
  current = 'about:blank';
  view: FakeView = { elements: {} };
  readonly visited: string[] = [];
  readonly typed: Array<[string, string]> = [];
  readonly clicks: string[] = [];
  readonly queries: string[] = [];
  closed = false;
  gotoOutcome: GotoOutcome = 'loaded';
  gotoError?: Error;
  state: DocumentReadyState = 'complete';
  onClick?: (selector: string, page: FakePage) => void;

  constructor(readonly views: Map<string, FakeView> = new Map()) {}

  async goto(url: string): Promise<GotoOutcome> {
    this.visited.push(url);
    if (this.gotoError) throw this.gotoError;
    if (this.gotoOutcome === 'timeout') return 'timeout';
    this.current = url;
    this.view = this.views.get(url) ?? { elements: {} };
    return 'loaded';
  }

  url(): string {
    return this.current;
  }

  async readyState(): Promise<DocumentReadyState> {
    return this.state;
  }

  async text(): Promise<string> {
    return this.view.body ?? '';
  }

  async queryAll(selector: string): Promise<PortalElement[]> {
    this.queries.push(selector);
    return this.view.elements[selector]?.() ?? [];
  }

  async type(selector: string, text: string): Promise<void> {
    this.typed.push([selector, text]);
  }

  async click(selector: string): Promise<void> {
    this.clicks.push(selector);
    this.onClick?.(selector, this);
  }

  async content(): Promise<string> {
    return `<html><body>${this.view.body ?? ''}</body></html>`;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeHost implements BrowserHost {
  launched: BrowserOptions[] = [];
  closed = 0;
  launchError?: Error;

  constructor(readonly page: FakePage) {}

  async launch(options: BrowserOptions): Promise<void> {
    if (this.launchError) throw this.launchError;
    this.launched.push(options);
  }

  async newPage(): Promise<PortalPage> {
    return this.page;
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

export const FAST_TIMEOUTS: TimeoutDefaults = {
  navigation: 200,
  login: 200,
  auth: 200,
  list: 100,
  rating: 60,
  pollInterval: 10,
};

export interface CapturedLog {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** A debug-level logger that keeps every line for assertions. */
export function captureLogger(): { logger: Logger; lines: CapturedLog[] } {
  const lines: CapturedLog[] = [];
  const logger = pino({ level: 'debug' }, {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  });
  return { logger, lines };
}

export const WARN = 40;
