import type { CrawlContext } from '../context';
import { errorMessage, isAbortError } from '../errors';
import type { FetchedPage } from '../types';
import type { Logger } from '../utils/logger';
import { backoffDelayMs, pickRandom } from '../utils/politeness';

export type StatusClass = 'success' | 'permanent' | 'retryable';

const PERMANENT_FAILURES = new Set([403, 404, 410]);
const REDIRECTS = new Set([301, 302]);

/**
 * 200 is success; 301/302 too when redirects are not followed.
 * 403/404/410 are never retried. Everything else is.
 */
export function classifyStatus(status: number, allowRedirects: boolean): StatusClass {
  if (status === 200) return 'success';
  if (!allowRedirects && REDIRECTS.has(status)) return 'success';
  if (PERMANENT_FAILURES.has(status)) return 'permanent';
  return 'retryable';
}

export interface FetchOptions {
  /** Follow redirects (default: true) */
  allowRedirects?: boolean;
  /** Accept header (default: HTML and XML) */
  accept?: string;
}

type AttemptOutcome =
  | { verdict: 'success'; status: number; headers: Headers; body: string }
  | { verdict: Exclude<StatusClass, 'success'>; status: number };

export class HttpFetcher {
  private readonly log: Logger;

  constructor(private readonly context: CrawlContext) {
    this.log = context.logger.child('Fetcher');
  }

  /**
   * GET with bounded retries. Returns null when the URL should be skipped.
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<FetchedPage | null> {
    const { allowRedirects = true, accept = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8' } = options;
    const { maxRetries, backoffBase } = this.context.config;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      let reason: string;

      try {
        const outcome = await this.request(url, allowRedirects, accept);

        if (outcome.verdict === 'success') {
          this.log.debug(`✅ ${outcome.status} ${url}`);
          return { url, status: outcome.status, body: outcome.body, headers: outcome.headers };
        }

        if (outcome.verdict === 'permanent') {
          this.log.warn(`⛔ HTTP ${outcome.status} for ${url}, not retrying`);
          return null;
        }

        reason = `HTTP ${outcome.status}`;
      } catch (error) {
        reason = isAbortError(error)
          ? `timeout after ${this.context.config.requestTimeoutMs}ms`
          : errorMessage(error);
      }

      if (attempt < maxRetries) {
        const delay = backoffDelayMs(attempt, backoffBase, this.context.random);
        this.log.warn(`⚠️ ${reason} for ${url} (attempt ${attempt}/${maxRetries}), retrying in ${delay}ms`);
        await this.context.sleep(delay);
      } else {
        this.log.warn(`⚠️ ${reason} for ${url} (attempt ${attempt}/${maxRetries})`);
      }
    }

    this.log.error(`❌ Giving up on ${url} after ${maxRetries} attempts`);
    return null;
  }

  /**
   * One timed attempt. The timeout covers the body as well as the headers;
   * bodies of unsuccessful responses are cancelled rather than read.
   */
  private async request(url: string, allowRedirects: boolean, accept: string): Promise<AttemptOutcome> {
    const { userAgents, acceptLanguage, requestTimeoutMs } = this.context.config;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), requestTimeoutMs);

    try {
      const response = await this.context.fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': pickRandom(userAgents, this.context.random),
          'Accept-Language': acceptLanguage,
          Accept: accept,
        },
        redirect: allowRedirects ? 'follow' : 'manual',
        signal: controller.signal,
      });

      const verdict = classifyStatus(response.status, allowRedirects);
      if (verdict !== 'success') {
        await response.body?.cancel();
        return { verdict, status: response.status };
      }

      return { verdict, status: response.status, headers: response.headers, body: await response.text() };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
