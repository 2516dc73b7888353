export enum ErrorCode {
  AUTHENTICATION_FAILED = 'AUTHENTICATION_FAILED',
  NAVIGATION_TIMEOUT = 'NAVIGATION_TIMEOUT',
  NAVIGATION_FAILED = 'NAVIGATION_FAILED',
  LIST_NOT_FOUND = 'LIST_NOT_FOUND',
  INVALID_CONFIG = 'INVALID_CONFIG',
  RUN_CANCELED = 'RUN_CANCELED',
}

/** Where in the run an error surfaced; logged by the CLI next to the code. */
export interface ErrorContext {
  conference?: string;
  step?: string;
  url?: string;
  [key: string]: unknown;
}

export class ScraperError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public context: ErrorContext = {},
  ) {
    super(message);
    this.name = 'ScraperError';
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        context: this.context,
      },
    };
  }
}

/** Credentials were rejected by the portal. Never retried. */
export class AuthenticationError extends ScraperError {
  constructor(message: string, context: ErrorContext = {}) {
    super(ErrorCode.AUTHENTICATION_FAILED, message, context);
    this.name = 'AuthenticationError';
  }
}

export class NavigationTimeoutError extends ScraperError {
  constructor(
    public url: string,
    message: string,
    context: ErrorContext = {},
  ) {
    super(ErrorCode.NAVIGATION_TIMEOUT, message, { ...context, url });
    this.name = 'NavigationTimeoutError';
  }
}

/** The browser could not load a page at all (network error, detached frame, crash). */
export class NavigationError extends ScraperError {
  constructor(
    public url: string,
    message: string,
    context: ErrorContext = {},
  ) {
    super(ErrorCode.NAVIGATION_FAILED, message, { ...context, url });
    this.name = 'NavigationError';
  }
}

/** The submission list never rendered. Zero rows counts as a broken selector. */
export class ListNotFoundError extends ScraperError {
  constructor(message: string, context: ErrorContext = {}) {
    super(ErrorCode.LIST_NOT_FOUND, message, context);
    this.name = 'ListNotFoundError';
  }
}

export class ConfigError extends ScraperError {
  constructor(message: string, context: ErrorContext = {}) {
    super(ErrorCode.INVALID_CONFIG, message, context);
    this.name = 'ConfigError';
  }
}

export class RunCanceledError extends ScraperError {
  constructor(context: ErrorContext = {}) {
    super(ErrorCode.RUN_CANCELED, 'Run canceled', context);
    this.name = 'RunCanceledError';
  }
}

export function isScraperError(err: unknown): err is ScraperError {
  return err instanceof ScraperError;
}
