import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { BrowserProduct } from './browser/BrowserManager.js';
import type { Credentials } from './browser/SessionDriver.js';
import type { ConferenceProfile } from './profiles/ConferenceProfile.js';
import { ConfigError } from './errors.js';
import { validateUrl } from './utils/url-validator.js';

export const DEFAULT_CONFIG_FILE = './conf.yaml';

/** Upper bounds, in milliseconds, for each class of wait. */
export interface TimeoutDefaults {
  navigation: number;
  login: number;
  auth: number;
  list: number;
  rating: number;
  pollInterval: number;
}

export interface BrowserConfig {
  product: BrowserProduct;
  executablePath?: string;
  wsEndpoint?: string;
  windowSize?: { width: number; height: number };
  args: string[];
}

export interface AppConfig {
  browser: BrowserConfig;
  timeouts: TimeoutDefaults;
  conferences: ReadonlyMap<string, ConferenceProfile>;
  /** Accepted but non-functional settings, for the caller to log. */
  warnings: string[];
}

const selector = z.string().trim().min(1);

const fieldRuleSchema = z
  .object({
    selector: selector.optional(),
    attribute: z.string().min(1).optional(),
    start_text: z.string().min(1).optional(),
    end_text: z.string().min(1).optional(),
  })
  .strict()
  .transform((r) => ({
    selector: r.selector,
    attribute: r.attribute,
    startText: r.start_text,
    endText: r.end_text,
  }));

const ratingRuleSchema = z
  .object({
    start_text: z.string().min(1).optional(),
    end_text: z.string().min(1).optional(),
    extract_method: z.enum(['decimal', 'first_number']).default('decimal'),
  })
  .strict()
  .transform((r) => ({
    startText: r.start_text,
    endText: r.end_text,
    extractMethod: r.extract_method === 'first_number' ? ('firstNumber' as const) : ('decimal' as const),
  }));

const profileSchema = z
  .object({
    name: z.string().min(1).optional(),
    url: z.string().refine((u) => validateUrl(u).valid, { message: 'must be an http(s) URL' }),
    reviews_expected: z.boolean().default(true),
    login: z
      .object({
        username_selector: selector,
        password_selector: selector,
        submit_selector: selector,
        success_selector: selector,
        failure_selector: selector.optional(),
      })
      .strict(),
    rows: z
      .object({
        selector,
        detail_link: z.object({ attribute: z.string().min(1).default('href') }).strict().optional(),
      })
      .strict(),
    identifier: fieldRuleSchema,
    title: fieldRuleSchema,
    ratings: z
      .object({
        slots: selector,
        rating: ratingRuleSchema.optional(),
        confidence: ratingRuleSchema.optional(),
        final_rating: ratingRuleSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

const browserSchema = z
  .object({
    browser: z.enum(['firefox', 'chrome']).default('firefox'),
    firefox_binary: z.string().min(1).optional(),
    executable_path: z.string().min(1).optional(),
    geckodriver_path: z.string().min(1).optional(),
    browser_ws_endpoint: z.string().min(1).optional(),
    window_size: z.tuple([z.number().int().positive(), z.number().int().positive()]).optional(),
    additional_args: z.array(z.string()).default([]),
  })
  .strict();

const timeoutsSchema = z
  .object({
    navigation: z.number().int().positive().default(30_000),
    login: z.number().int().positive().default(30_000),
    auth: z.number().int().positive().default(120_000),
    list: z.number().int().positive().default(120_000),
    rating: z.number().int().positive().default(20_000),
    poll_interval: z.number().int().positive().default(250),
  })
  .strict();

const configSchema = z.object({
  browser: browserSchema.default({}),
  timeout_defaults: timeoutsSchema.default({}),
  conferences: z
    .record(z.string(), profileSchema)
    .refine((c) => Object.keys(c).length > 0, { message: 'at least one conference is required' }),
});

type ProfileInput = z.infer<typeof profileSchema>;

function toProfile(key: string, p: ProfileInput): ConferenceProfile {
  return Object.freeze({
    key,
    name: p.name ?? key,
    url: p.url,
    reviewsExpected: p.reviews_expected,
    login: {
      usernameSelector: p.login.username_selector,
      passwordSelector: p.login.password_selector,
      submitSelector: p.login.submit_selector,
      successSelector: p.login.success_selector,
      failureSelector: p.login.failure_selector,
    },
    rows: { selector: p.rows.selector, detailLink: p.rows.detail_link },
    identifier: p.identifier,
    title: p.title,
    ratings: p.ratings && {
      slots: p.ratings.slots,
      rating: p.ratings.rating,
      confidence: p.ratings.confidence,
      finalRating: p.ratings.final_rating,
    },
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Validates an already parsed configuration document. Environment variables override the browser section. */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`, { step: 'config' });
  }
  const data = result.data;
  const warnings: string[] = [];

  if (data.browser.geckodriver_path) {
    warnings.push(
      'browser.geckodriver_path is ignored: Firefox is driven over WebDriver BiDi without geckodriver',
    );
  }

  const windowSize = data.browser.window_size;
  const browser: BrowserConfig = {
    product: data.browser.browser,
    executablePath: env.BROWSER_EXECUTABLE_PATH || data.browser.executable_path || data.browser.firefox_binary,
    wsEndpoint: env.BROWSER_WS_ENDPOINT || data.browser.browser_ws_endpoint,
    windowSize: windowSize && { width: windowSize[0], height: windowSize[1] },
    args: data.browser.additional_args,
  };

  const t = data.timeout_defaults;
  const timeouts: TimeoutDefaults = {
    navigation: t.navigation,
    login: t.login,
    auth: t.auth,
    list: t.list,
    rating: t.rating,
    pollInterval: t.poll_interval,
  };

  const conferences = new Map<string, ConferenceProfile>();
  for (const [key, profile] of Object.entries(data.conferences)) {
    conferences.set(key, toProfile(key, profile));
  }

  return { browser, timeouts, conferences, warnings };
}

export async function loadConfig(path: string = DEFAULT_CONFIG_FILE, env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Configuration file ${path} not found!`, { step: 'config', path, cause: String(err) });
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`Configuration file ${path} is not valid YAML: ${String(err)}`, { step: 'config', path });
  }
  return parseConfig(raw, env);
}

export function listConferences(config: AppConfig): string[] {
  return [...config.conferences.keys()];
}

export function getProfile(config: AppConfig, key: string): ConferenceProfile {
  const profile = config.conferences.get(key);
  if (!profile) {
    throw new ConfigError(
      `Conference '${key}' not found in configuration. Available: ${listConferences(config).join(', ')}`,
      { step: 'config', conference: key },
    );
  }
  return profile;
}

/** Reads LOGIN and PASSWORD; a .env file is loaded into the environment by the CLI beforehand. */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  const login = env.LOGIN;
  const password = env.PASSWORD;
  if (!login || !password) {
    throw new ConfigError('LOGIN and PASSWORD must be set (environment or .env file)', { step: 'credentials' });
  }
  return { login, password };
}
