import { TimeoutError } from 'puppeteer-core';
import type { ElementHandle, Page } from 'puppeteer-core';
import type { GotoOutcome, PortalElement, PortalPage } from './PortalPage.js';

export class PuppeteerPortalElement implements PortalElement {
  constructor(private readonly handle: ElementHandle<Element>) {}

  text(): Promise<string> {
    return this.handle.evaluate((el) =>
      el instanceof HTMLElement ? el.innerText : (el.textContent ?? ''),
    );
  }

  attribute(name: string): Promise<string | null> {
    return this.handle.evaluate((el, attr) => el.getAttribute(attr), name);
  }

  async queryAll(selector: string): Promise<PortalElement[]> {
    const handles = await this.handle.$$(selector);
    return handles.map((h) => new PuppeteerPortalElement(h));
  }
}

export class PuppeteerPortalPage implements PortalPage {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<GotoOutcome> {
    try {
      await this.page.goto(url, { waitUntil: 'load', timeout: timeoutMs });
      return 'loaded';
    } catch (err) {
      if (err instanceof TimeoutError) return 'timeout';
      throw err;
    }
  }

  url(): string {
    return this.page.url();
  }

  readyState(): Promise<DocumentReadyState> {
    return this.page.evaluate(() => document.readyState);
  }

  text(): Promise<string> {
    return this.page.evaluate(() => document.body?.innerText ?? '');
  }

  async queryAll(selector: string): Promise<PortalElement[]> {
    const handles = await this.page.$$(selector);
    return handles.map((h) => new PuppeteerPortalElement(h));
  }

  async type(selector: string, text: string): Promise<void> {
    await this.page.type(selector, text);
  }

  async click(selector: string): Promise<void> {
    await this.page.click(selector);
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }
}
