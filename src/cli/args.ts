import { parseArgs } from 'node:util';
import { DEFAULT_CONFIG_FILE } from '../config.js';

export interface CliArgs {
  conf?: string;
  config: string;
  headless: boolean;
  skipReviews: boolean;
  listConferences: boolean;
  simulate: boolean;
  debug: boolean;
  savePages: boolean;
  csv: string;
  help: boolean;
}

export const USAGE = `Usage: review-scraper [options]

  --conf <key>          Conference to scrape (default: first in the config file)
  --config <path>       Configuration file (default: ${DEFAULT_CONFIG_FILE})
  --headless            Run without opening a browser window
  --skip-reviews        Skip reviews and ratings, e.g. before any are posted
  --list-conferences    List the configured conferences and exit
  --simulate            Print random submissions instead of scraping
  --debug               Verbose logging
  --save-pages          Save visited pages under saved_pages/ for debugging selectors
  --csv <path>          Where to write the CSV (default: submissions.csv)
  -h, --help            Show this help`;

/** Throws a TypeError from node:util on unknown flags or missing values. */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      conf: { type: 'string' },
      config: { type: 'string', default: DEFAULT_CONFIG_FILE },
      headless: { type: 'boolean', default: false },
      'skip-reviews': { type: 'boolean', default: false },
      'list-conferences': { type: 'boolean', default: false },
      simulate: { type: 'boolean', default: false },
      debug: { type: 'boolean', default: false },
      'save-pages': { type: 'boolean', default: false },
      csv: { type: 'string', default: 'submissions.csv' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    conf: values.conf,
    config: values.config ?? DEFAULT_CONFIG_FILE,
    headless: values.headless ?? false,
    skipReviews: values['skip-reviews'] ?? false,
    listConferences: values['list-conferences'] ?? false,
    simulate: values.simulate ?? false,
    debug: values.debug ?? false,
    savePages: values['save-pages'] ?? false,
    csv: values.csv ?? 'submissions.csv',
    help: values.help ?? false,
  };
}
