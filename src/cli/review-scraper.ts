#!/usr/bin/env node

import { config as loadDotenv } from 'dotenv';
import type { Logger } from 'pino';
import { getProfile, listConferences, loadConfig, loadCredentials } from '../config.js';
import { isScraperError } from '../errors.js';
import { CancelToken } from '../extraction/cancel-token.js';
import type { ResultSet } from '../extraction/types.js';
import { runReviewScrape } from '../index.js';
import { createLogger } from '../logger.js';
import { saveCsv } from '../output/csv.js';
import { renderTable } from '../output/table.js';
import { simulateResultSet } from '../simulate.js';
import { parseCliArgs, USAGE, type CliArgs } from './args.js';

const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

async function scrape(args: CliArgs, logger: Logger): Promise<ResultSet> {
  const config = await loadConfig(args.config);
  for (const warning of config.warnings) logger.warn(warning);

  const key = args.conf ?? listConferences(config)[0];
  const profile = getProfile(config, key);
  const credentials = loadCredentials();

  // First Ctrl-C stops after the current row; the browser is still closed.
  const token = new CancelToken();
  const onSigint = () => token.cancel();
  process.once('SIGINT', onSigint);
  token.onCancel(() => logger.warn('Canceling after the current submission...'));

  try {
    return await runReviewScrape({
      credentials,
      profile,
      browser: config.browser,
      timeouts: config.timeouts,
      logger,
      options: {
        headless: args.headless || process.env.HEADLESS === 'true',
        skipRatings: args.skipReviews,
        savePagesDir: args.savePages ? 'saved_pages' : undefined,
        token,
        onProgress: (done, total) => logger.debug(`Progress: ${done}/${total}`),
      },
    });
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

async function listCommand(args: CliArgs): Promise<void> {
  const config = await loadConfig(args.config);
  console.log('Available conferences:');
  for (const key of listConferences(config)) {
    console.log(`  - ${key}: ${getProfile(config, key).url}`);
  }
}

async function main(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return EXIT_USAGE;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  loadDotenv();
  const logger = createLogger({ debug: args.debug, pretty: args.debug || process.stderr.isTTY });

  try {
    if (args.listConferences) {
      await listCommand(args);
      return 0;
    }

    const result = args.simulate
      ? simulateResultSet(args.conf ?? 'simulation')
      : await scrape(args, logger);

    console.log(renderTable(result));
    if (!args.simulate) {
      await saveCsv(result, args.csv);
      logger.info(`CSV saved to ${args.csv}`);
    }
    return 0;
  } catch (err) {
    if (isScraperError(err)) {
      logger.error({ code: err.code, context: err.context }, err.message);
    } else {
      logger.error({ err }, 'Unexpected failure');
    }
    return EXIT_FAILURE;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = EXIT_FAILURE;
  },
);
