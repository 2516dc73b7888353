import type { Logger } from 'pino';
import type { PortalElement, Scope } from '../browser/PortalPage.js';
import type { Session, SessionDriver } from '../browser/SessionDriver.js';
import { ListNotFoundError } from '../errors.js';
import type { ConferenceProfile, RatingRules } from '../profiles/ConferenceProfile.js';
import {
  extractRatingValues,
  locateRows,
  readDetailLink,
  readField,
  readRatingSlots,
  type RatingValues,
} from '../profiles/locators.js';
import type { CancelToken } from './cancel-token.js';
import { assemble } from './RecordAggregator.js';
import type { RawSubmission, ResultSet } from './types.js';

export interface ExtractOptions {
  skipRatings: boolean;
  token?: CancelToken;
  /** Called after every row, skipped ones included. */
  onProgress?: (done: number, total: number) => void;
}

function noRatings(): RatingValues {
  return { rating: [], confidence: [], finalRating: [] };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Walks the submission list of one conference and turns every row into a raw
 * submission, then hands them to the aggregator. Rows come out in DOM order.
 */
export class ExtractionEngine {
  constructor(
    private readonly driver: SessionDriver,
    private readonly logger: Logger,
  ) {}

  async extractAll(session: Session, profile: ConferenceProfile, options: ExtractOptions): Promise<ResultSet> {
    // Detail-page mode leaves the session on the last submission.
    if (session.currentUrl !== profile.url) {
      await this.driver.navigate(session, profile.url, 'list');
    }
    const rows = await this.waitForRows(session, profile);
    const total = rows.length;
    this.logger.info({ conference: profile.key }, `Found ${total} submissions.`);

    const skipRatings = options.skipRatings || !profile.reviewsExpected || !profile.ratings;
    if (!options.skipRatings && !profile.reviewsExpected) {
      this.logger.info('No reviews expected for this conference, skipping ratings');
    }
    const ratingRules = skipRatings ? undefined : profile.ratings;

    const raw: RawSubmission[] = [];
    let skipped = 0;
    let done = 0;
    const step = (sub: RawSubmission | null) => {
      if (sub) raw.push(sub);
      else skipped++;
      done++;
      options.onProgress?.(done, total);
    };

    if (profile.rows.detailLink) {
      // Row handles go stale once we navigate away, so read every link first.
      const links: Array<{ position: number; url: string | null }> = [];
      for (const [i, row] of rows.entries()) {
        links.push({ position: i + 1, url: await this.tryReadLink(row, profile, i + 1) });
      }
      for (const { position, url } of links) {
        options.token?.throwIfCanceled(profile.key);
        if (!url) {
          this.logger.warn({ position }, 'Skipping row without a submission link');
          step(null);
          continue;
        }
        await this.driver.navigate(session, url, 'submission');
        step(await this.extractSubmission(session, profile, session.page, position, ratingRules, true));
      }
    } else {
      for (const [i, row] of rows.entries()) {
        options.token?.throwIfCanceled(profile.key);
        step(await this.extractSubmission(session, profile, row, i + 1, ratingRules, false));
      }
    }

    if (skipped > 0) {
      this.logger.warn({ skipped }, `Skipped ${skipped} malformed rows`);
    }
    return assemble(profile.key, raw, skipped, this.logger);
  }

  private async waitForRows(session: Session, profile: ConferenceProfile) {
    const found = await this.driver.waitFor(session, async (page) => {
      const rows = await locateRows(page, profile);
      return rows.length > 0 ? rows : null;
    }, this.driver.timeouts.list);

    if (found.status === 'timeout') {
      throw new ListNotFoundError(
        `No submissions matched ${profile.rows.selector} within ${this.driver.timeouts.list}ms`,
        { conference: profile.key, step: 'list', url: session.currentUrl, selector: profile.rows.selector },
      );
    }
    return found.value;
  }

  private async tryReadLink(row: PortalElement, profile: ConferenceProfile, position: number) {
    try {
      return await readDetailLink(row, profile);
    } catch (err) {
      this.logger.warn({ position, reason: describeError(err) }, 'Could not read submission link');
      return null;
    }
  }

  /** Identifier and title are read at once; a row missing either is skipped (null). */
  private async extractSubmission(
    session: Session,
    profile: ConferenceProfile,
    scope: Scope,
    position: number,
    ratingRules: RatingRules | undefined,
    onDetailPage: boolean,
  ): Promise<RawSubmission | null> {
    let id: string | null;
    let title: string | null;
    try {
      id = await readField(scope, profile.identifier);
      title = await readField(scope, profile.title);
    } catch (err) {
      this.logger.warn({ position, reason: describeError(err) }, 'Skipping unreadable row');
      return null;
    }
    if (!id || !title) {
      this.logger.warn({ position, id, title }, 'Skipping malformed row');
      return null;
    }

    this.logger.info(`Loaded submission: ${id} - ${title}`);
    if (onDetailPage) {
      await this.driver.savePage(session, `${id}_${title}`);
    }

    const values = ratingRules ? await this.extractRatings(session, scope, ratingRules, id) : noRatings();
    return {
      id,
      title,
      ratings: values.rating,
      confidences: values.confidence,
      finalRatings: values.finalRating,
    };
  }

  /**
   * Waits for the rating slots to render with text. Slots that never fill in
   * are read as they are once the budget runs out; blanks become null.
   */
  private async extractRatings(session: Session, scope: Scope, rules: RatingRules, id: string): Promise<RatingValues> {
    const populated = await this.driver.waitFor(session, async () => {
      const texts = await readRatingSlots(scope, rules);
      return texts.length > 0 && texts.every((t) => t.trim() !== '') ? texts : null;
    }, this.driver.timeouts.rating);

    if (populated.status === 'satisfied') {
      return extractRatingValues(populated.value, rules);
    }

    this.logger.info({ id, waitedMs: populated.elapsedMs }, 'Ratings not populated in time, recording what is present');
    try {
      return extractRatingValues(await readRatingSlots(scope, rules), rules);
    } catch (err) {
      this.logger.warn({ id, reason: describeError(err) }, 'Rating slots unreadable, recording none');
      return noRatings();
    }
  }
}
