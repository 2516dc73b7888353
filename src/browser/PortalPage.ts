/**
 * The slice of a browser page the scraper drives.
 * PuppeteerPortalPage implements it over puppeteer-core; tests use in-memory fakes.
 */

/** Anything that has text and can be searched with a selector: a page or an element. */
export interface Scope {
  text(): Promise<string>;
  queryAll(selector: string): Promise<PortalElement[]>;
}

export interface PortalElement extends Scope {
  attribute(name: string): Promise<string | null>;
}

export type GotoOutcome = 'loaded' | 'timeout';

export interface PortalPage extends Scope {
  goto(url: string, timeoutMs: number): Promise<GotoOutcome>;
  url(): string;
  readyState(): Promise<DocumentReadyState>;
  type(selector: string, text: string): Promise<void>;
  click(selector: string): Promise<void>;
  content(): Promise<string>;
  close(): Promise<void>;
}
