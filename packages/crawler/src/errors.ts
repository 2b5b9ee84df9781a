/**
 * Typed error classes for the crawler.
 *
 * Only run-aborting conditions are thrown. Failures of a single URL are
 * logged and turned into `null` by the component that hit them.
 */

/**
 * Base error class for all crawler errors
 */
export class CrawlerError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Original error that caused this error */
  declare readonly cause?: Error;
  /** URL being processed when the error occurred */
  readonly url?: string;

  constructor(message: string, options?: { code?: string; cause?: Error; url?: string }) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'CrawlerError';
    this.code = options?.code ?? 'CRAWLER_ERROR';
    this.url = options?.url;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when robots.txt cannot be fetched. The crawl is fail-closed:
 * without a policy nothing may be fetched.
 */
export class RobotsUnavailableError extends CrawlerError {
  constructor(message: string, options: { url: string; cause?: Error }) {
    super(message, { code: 'ROBOTS_UNAVAILABLE', ...options });
    this.name = 'RobotsUnavailableError';
  }
}

/**
 * Thrown when robots.txt declares no sitemap
 */
export class NoSitemapsError extends CrawlerError {
  constructor(message: string, options: { url: string }) {
    super(message, { code: 'NO_SITEMAPS', ...options });
    this.name = 'NoSitemapsError';
  }
}

/**
 * Thrown when crawler options or run arguments fail validation
 */
export class InvalidConfigError extends CrawlerError {
  /** One entry per failed field, formatted as `path: message` */
  readonly issues: string[];

  constructor(message: string, options: { issues: string[]; cause?: Error }) {
    super(message, { code: 'INVALID_CONFIG', cause: options.cause });
    this.name = 'InvalidConfigError';
    this.issues = options.issues;
  }
}

/**
 * Thrown when an output file cannot be written or read back
 */
export class PersistenceError extends CrawlerError {
  /** File the operation was working on */
  readonly path: string;
  /** 1-based line number for JSONL read failures */
  readonly line?: number;

  constructor(message: string, options: { path: string; line?: number; cause?: Error }) {
    super(message, { code: 'PERSISTENCE_FAILED', cause: options.cause });
    this.name = 'PersistenceError';
    this.path = options.path;
    this.line = options.line;
  }
}

/**
 * Type guard to check if an error is a CrawlerError
 */
export function isCrawlerError(error: unknown): error is CrawlerError {
  return error instanceof CrawlerError;
}

/**
 * Type guard for fetch aborts (request timeouts)
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Message of an unknown thrown value, for log lines
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
