import puppeteer from 'puppeteer-core';
import type { Browser } from 'puppeteer-core';
import { existsSync } from 'node:fs';
import { execSync } from 'node:child_process';
import type { Logger } from 'pino';
import { ConfigError } from '../errors.js';
import type { PortalPage } from './PortalPage.js';
import { PuppeteerPortalPage } from './PuppeteerPortalPage.js';

export type BrowserProduct = 'firefox' | 'chrome';

export interface BrowserOptions {
  product: BrowserProduct;
  headless: boolean;
  /** Browser binary; detected from well-known locations when unset. */
  executablePath?: string;
  /** Attach to an already running browser instead of launching one. */
  wsEndpoint?: string;
  windowSize?: { width: number; height: number };
  args: string[];
}

/** What the session driver needs from a browser; BrowserManager is the real one. */
export interface BrowserHost {
  launch(options: BrowserOptions): Promise<void>;
  newPage(): Promise<PortalPage>;
  close(): Promise<void>;
}

export class BrowserManager implements BrowserHost {
  private browser: Browser | null = null;
  private attached = false;

  constructor(private readonly logger: Logger) {}

  async launch(options: BrowserOptions): Promise<void> {
    if (this.browser) return;

    if (options.wsEndpoint) {
      this.logger.debug({ wsEndpoint: options.wsEndpoint }, 'Attaching to running browser');
      this.browser = await puppeteer.connect({
        browserWSEndpoint: options.wsEndpoint,
        protocol: options.product === 'firefox' ? 'webDriverBiDi' : 'cdp',
      });
      this.attached = true;
      return;
    }

    const executablePath = options.executablePath || this.detectBrowserPath(options.product);
    if (!executablePath) {
      throw new ConfigError(
        `${options.product} not found. Set browser.firefox_binary in conf.yaml or the BROWSER_EXECUTABLE_PATH environment variable.\n` +
        '  Example (macOS):   export BROWSER_EXECUTABLE_PATH=/Applications/Firefox.app/Contents/MacOS/firefox\n' +
        '  Example (Linux):   export BROWSER_EXECUTABLE_PATH=/usr/bin/firefox',
        { step: 'launch' },
      );
    }

    const args = ['--no-sandbox', '--disable-dev-shm-usage', ...options.args];
    if (options.windowSize) {
      if (options.product === 'firefox') {
        args.push(`--width=${options.windowSize.width}`, `--height=${options.windowSize.height}`);
      } else {
        args.push(`--window-size=${options.windowSize.width},${options.windowSize.height}`);
      }
    }

    this.logger.debug({ product: options.product, executablePath, headless: options.headless }, 'Launching browser');
    this.browser = await puppeteer.launch({
      browser: options.product,
      executablePath,
      headless: options.headless,
      args,
    });
    this.attached = false;
  }

  private detectBrowserPath(product: BrowserProduct): string | undefined {
    const found = this.getCandidates(product).find((p) => existsSync(p));
    if (found) return found;
    if (process.platform === 'win32') return undefined;
    // Fallback: try system PATH
    const cmd = product === 'firefox'
      ? 'which firefox || which firefox-esr'
      : 'which google-chrome || which chromium-browser || which chromium';
    try {
      const resolved = execSync(cmd, { encoding: 'utf-8', timeout: 3000 }).trim().split('\n')[0];
      return resolved || undefined;
    } catch (err) {
      this.logger.debug({ err, product }, 'Browser not found on PATH');
      return undefined;
    }
  }

  private getCandidates(product: BrowserProduct): string[] {
    const platform = process.platform;
    if (platform === 'darwin') {
      return product === 'firefox'
        ? ['/Applications/Firefox.app/Contents/MacOS/firefox']
        : [
            '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
            '/Applications/Chromium.app/Contents/MacOS/Chromium',
          ];
    }
    if (platform === 'win32') {
      const envDirs = [process.env.PROGRAMFILES, process.env['PROGRAMFILES(X86)'], process.env.LOCALAPPDATA]
        .filter((dir): dir is string => Boolean(dir));
      const suffix = product === 'firefox'
        ? '\\Mozilla Firefox\\firefox.exe'
        : '\\Google\\Chrome\\Application\\chrome.exe';
      return envDirs.map((dir) => dir + suffix);
    }
    // linux
    return product === 'firefox'
      ? ['/usr/bin/firefox', '/usr/bin/firefox-esr', '/snap/bin/firefox']
      : ['/usr/bin/google-chrome', '/usr/bin/chromium-browser', '/usr/bin/chromium'];
  }

  async newPage(): Promise<PortalPage> {
    if (!this.browser) {
      throw new Error('Browser not launched');
    }
    const page = await this.browser.newPage();
    return new PuppeteerPortalPage(page);
  }

  /** Closes a launched browser; an attached one is only disconnected. */
  async close(): Promise<void> {
    const browser = this.browser;
    if (!browser) return;
    this.browser = null;
    if (this.attached) {
      await browser.disconnect();
    } else {
      await browser.close();
    }
  }
}
