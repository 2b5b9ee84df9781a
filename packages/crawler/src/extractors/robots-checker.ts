import type { CrawlContext } from '../context';
import { compileArticlePattern } from '../config';
import { CrawlerError, NoSitemapsError, RobotsUnavailableError } from '../errors';
import type { HttpFetcher } from '../fetcher/http-fetcher';
import type { Logger } from '../utils/logger';

export interface RobotsRule {
  /** Lower-cased user agent tokens sharing this group */
  userAgents: string[];
  disallows: string[];
  allows: string[];
}

export interface RobotsPolicy {
  rules: RobotsRule[];
  sitemaps: string[];
}

export interface LoadedPolicy {
  policy: RobotsPolicy;
  sitemaps: string[];
}

const SITEMAP_LINE = /^\s*sitemap\s*:\s*(\S+)/i;

/**
 * Collect `Sitemap:` declarations line by line, independent of group parsing.
 */
export function extractSitemapUrls(text: string): string[] {
  const sitemaps: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const match = SITEMAP_LINE.exec(line);
    if (match?.[1] && !sitemaps.includes(match[1])) {
      sitemaps.push(match[1]);
    }
  }
  return sitemaps;
}

export function parseRobotsTxt(text: string): RobotsPolicy {
  const lines = text
    .split(/\r?\n/)
    .map(line => line.replace(/#.*$/, '').trim())
    .filter(line => line.length > 0);
  const rules: RobotsRule[] = [];

  let currentRule: RobotsRule | null = null;
  // Consecutive User-agent lines open a single group
  let collectingAgents = false;

  for (const line of lines) {
    const separator = line.indexOf(':');
    if (separator === -1) continue;

    const key = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    switch (key) {
      case 'user-agent':
        if (!currentRule || !collectingAgents) {
          currentRule = { userAgents: [], disallows: [], allows: [] };
          rules.push(currentRule);
        }
        currentRule.userAgents.push(value.toLowerCase());
        collectingAgents = true;
        break;

      case 'disallow':
        collectingAgents = false;
        if (currentRule && value) {
          currentRule.disallows.push(value);
        }
        break;

      case 'allow':
        collectingAgents = false;
        if (currentRule && value) {
          currentRule.allows.push(value);
        }
        break;

      case 'sitemap':
        break;

      default:
        collectingAgents = false;
        break;
    }
  }

  return { rules, sitemaps: extractSitemapUrls(text) };
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .replace(/[.+?^${}()|[\]\\]/g, '\\$&') // Escape regex special chars
    .replace(/\*/g, '.*'); // Convert * to .*
  return new RegExp('^' + source + (anchored ? '$' : ''));
}

/**
 * Wildcard-group verdict for a path (query string included).
 * Longest matching pattern wins; Allow wins a tie.
 */
export function isPathAllowedByPolicy(policy: RobotsPolicy, path: string): boolean {
  const rule = policy.rules.find(candidate => candidate.userAgents.includes('*'));
  if (!rule) return true;

  const candidates = [
    ...rule.disallows.map(pattern => ({ pattern, allow: false })),
    ...rule.allows.map(pattern => ({ pattern, allow: true })),
  ];

  let verdict = true;
  let longest = -1;
  for (const { pattern, allow } of candidates) {
    if (!patternToRegExp(pattern).test(path)) continue;
    if (pattern.length > longest || (pattern.length === longest && allow)) {
      longest = pattern.length;
      verdict = allow;
    }
  }

  return verdict;
}

export class RobotsGate {
  private readonly log: Logger;
  private readonly origin: string;
  private readonly articlePattern: RegExp;
  private policy: RobotsPolicy | null = null;

  constructor(
    private readonly context: CrawlContext,
    private readonly fetcher: HttpFetcher
  ) {
    this.log = context.logger.child('Robots');
    this.origin = new URL(context.config.baseUrl).origin;
    this.articlePattern = compileArticlePattern(context.config);
  }

  /**
   * Fetch and parse robots.txt. Throws when it is unreachable or lists no sitemap.
   */
  async loadPolicy(): Promise<LoadedPolicy> {
    const robotsUrl = `${this.origin}/robots.txt`;
    this.log.info(`🤖 Fetching ${robotsUrl}`);

    const page = await this.fetcher.fetch(robotsUrl, { accept: 'text/plain,*/*;q=0.8' });
    if (!page) {
      throw new RobotsUnavailableError(`Could not fetch ${robotsUrl}; refusing to crawl without a policy`, {
        url: robotsUrl,
      });
    }

    const policy = parseRobotsTxt(page.body);
    if (policy.sitemaps.length === 0) {
      throw new NoSitemapsError(`No sitemap declared in ${robotsUrl}`, { url: robotsUrl });
    }

    this.policy = policy;
    this.log.info(`🤖 Parsed ${policy.rules.length} rule groups and ${policy.sitemaps.length} sitemaps`);
    return { policy, sitemaps: policy.sitemaps };
  }

  /**
   * True when the wildcard group permits the URL and its path is an article path.
   */
  isAllowed(url: string): boolean {
    if (!this.policy) {
      throw new CrawlerError('isAllowed called before loadPolicy', { code: 'POLICY_NOT_LOADED', url });
    }

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }

    if (parsed.origin !== this.origin) return false;
    if (!this.articlePattern.test(parsed.pathname)) return false;

    return isPathAllowedByPolicy(this.policy, parsed.pathname + parsed.search);
  }
}
