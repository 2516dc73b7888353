import { describe, it, expect } from 'vitest';
import { mkdtemp, readdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { AuthenticationError, runReviewScrape, type ScrapeRequest } from '../src/index.js';
import { FakeElement, FakeHost, FakePage, FAST_TIMEOUTS, captureLogger } from './helpers/fake-portal.js';
import { inlineProfile, LISTING_URL, TEST_BROWSER } from './helpers/profiles.js';

function portal(): { page: FakePage; host: FakeHost } {
  const page = new FakePage(new Map([[LISTING_URL, {
    body: 'Reviewer console',
    elements: {
      '#email': () => [new FakeElement('')],
      '#password': () => [new FakeElement('')],
    },
  }]]));
  page.onClick = (_selector, p) => {
    const ok = p.typed.some(([sel, value]) => sel === '#password' && value === 'test-secret');
    p.view = ok
      ? {
          body: 'Assigned submissions',
          elements: {
            '.submissions': () => [new FakeElement('')],
            '.submissions .row': () => [
              new FakeElement('', {}, {
                '.id': () => [new FakeElement('1234')],
                '.title': () => [new FakeElement('Sparse Attention Revisited')],
                '.score': () => [new FakeElement('6'), new FakeElement('8')],
              }),
            ],
          },
        }
      : { elements: { '.alert-danger': () => [new FakeElement('Wrong password')] } };
  };
  return { page, host: new FakeHost(page) };
}

function request(host: FakeHost, password = 'test-secret'): ScrapeRequest {
  return {
    credentials: { login: 'reviewer@example.org', password },
    profile: inlineProfile(),
    browser: TEST_BROWSER,
    timeouts: FAST_TIMEOUTS,
    options: { headless: true, skipRatings: false },
    host,
  };
}

describe('runReviewScrape', () => {
  it('signs in, extracts and releases the browser', async () => {
    const { page, host } = portal();
    const result = await runReviewScrape(request(host));

    expect(result.records).toEqual([
      { index: 1, id: '1234', title: 'Sparse Attention Revisited', ratings: [6, 8], confidences: [], finalRatings: [] },
    ]);
    expect(page.closed).toBe(true);
    expect(host.closed).toBe(1);
  });

  it('tags log lines with the conference', async () => {
    const { host } = portal();
    const { logger, lines } = captureLogger();
    await runReviewScrape({ ...request(host), logger });

    expect(lines.find((l) => l.msg === 'Found 1 submissions.')).toMatchObject({ conference: 'conf_2025' });
    expect(lines.map((l) => l.msg)).toContain('Using configuration for conference: Conf 2025');
  });

  it('closes the browser when credentials are rejected', async () => {
    const { host } = portal();
    await expect(runReviewScrape(request(host, 'wrong-password'))).rejects.toBeInstanceOf(AuthenticationError);
    expect(host.closed).toBe(1);
  });

  it('saves the landing page when page saving is on', async () => {
    const { host } = portal();
    const dir = await mkdtemp(path.join(tmpdir(), 'review-scraper-run-'));
    const base = request(host);
    await runReviewScrape({ ...base, options: { ...base.options, savePagesDir: dir } });

    const [runDir] = await readdir(dir);
    expect(runDir).toMatch(/^\d{8}_\d{6}$/);
    expect(await readdir(path.join(dir, runDir ?? ''))).toEqual(['landing_page.html']);
  });
});
