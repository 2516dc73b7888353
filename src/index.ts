import type { Logger } from 'pino';
import { BrowserManager, type BrowserHost } from './browser/BrowserManager.js';
import { PageArchive } from './browser/PageArchive.js';
import { SessionDriver, withSession, type Credentials } from './browser/SessionDriver.js';
import type { BrowserConfig, TimeoutDefaults } from './config.js';
import type { CancelToken } from './extraction/cancel-token.js';
import { ExtractionEngine } from './extraction/ExtractionEngine.js';
import type { ResultSet } from './extraction/types.js';
import { silentLogger } from './logger.js';
import type { ConferenceProfile } from './profiles/ConferenceProfile.js';

export interface ScrapeOptions {
  headless: boolean;
  skipRatings: boolean;
  /** Keep HTML snapshots under this directory. */
  savePagesDir?: string;
  token?: CancelToken;
  onProgress?: (done: number, total: number) => void;
}

export interface ScrapeRequest {
  credentials: Credentials;
  profile: ConferenceProfile;
  browser: BrowserConfig;
  timeouts: TimeoutDefaults;
  options: ScrapeOptions;
  logger?: Logger;
  /** Defaults to a puppeteer-core BrowserManager. */
  host?: BrowserHost;
}

/**
 * Signs in, extracts every submission of the profile's listing page and closes
 * the browser. Resolves to the result set or rejects with a ScraperError.
 */
export async function runReviewScrape(request: ScrapeRequest): Promise<ResultSet> {
  const logger = (request.logger ?? silentLogger()).child({ conference: request.profile.key });
  const { options } = request;

  const driver = new SessionDriver(request.host ?? new BrowserManager(logger), {
    browser: request.browser,
    timeouts: request.timeouts,
    logger,
    archive: options.savePagesDir ? new PageArchive(options.savePagesDir) : undefined,
  });
  const engine = new ExtractionEngine(driver, logger);

  logger.info(`Using configuration for conference: ${request.profile.name}`);
  return withSession(driver, request.profile, request.credentials, { headless: options.headless }, (session) =>
    engine.extractAll(session, request.profile, {
      skipRatings: options.skipRatings,
      token: options.token,
      onProgress: options.onProgress,
    }),
  );
}

export { BrowserManager } from './browser/BrowserManager.js';
export type { BrowserHost, BrowserOptions, BrowserProduct } from './browser/BrowserManager.js';
export type { PortalElement, PortalPage, Scope } from './browser/PortalPage.js';
export { SessionDriver, withSession } from './browser/SessionDriver.js';
export type { AuthState, Credentials, Session, WaitResult } from './browser/SessionDriver.js';
export { loadConfig, parseConfig, getProfile, listConferences, loadCredentials } from './config.js';
export type { AppConfig, BrowserConfig, TimeoutDefaults } from './config.js';
export * from './errors.js';
export { CancelToken } from './extraction/cancel-token.js';
export { ExtractionEngine } from './extraction/ExtractionEngine.js';
export { assemble } from './extraction/RecordAggregator.js';
export type { RawSubmission, ResultSet, Scores, SubmissionRecord } from './extraction/types.js';
export type { ConferenceProfile, FieldRule, RatingRule, RatingRules } from './profiles/ConferenceProfile.js';
export { renderTable } from './output/table.js';
export { saveCsv, toCsv } from './output/csv.js';
export { createLogger } from './logger.js';
