/**
 * news-sitemap-crawler-sdk
 *
 * Polite single-site news crawler: walks the sitemaps declared in
 * robots.txt, keeps article URLs the policy allows, fetches each page with
 * retry and backoff and extracts a fixed metadata record.
 *
 * @example Simple usage
 * ```typescript
 * import { crawlNews } from 'news-sitemap-crawler-sdk';
 *
 * const result = await crawlNews({ maxArticles: 10 });
 * console.log(`Saved ${result.articles.length} articles`);
 * ```
 *
 * @example Custom components
 * ```typescript
 * import { createCrawlContext, HttpFetcher, ArticleExtractor } from 'news-sitemap-crawler-sdk';
 *
 * const context = createCrawlContext({ config: { maxRetries: 5 } });
 * const page = await new HttpFetcher(context).fetch(url);
 * const article = page ? new ArticleExtractor().extract(page.body, url) : null;
 * ```
 */

// ============================================================================
// HIGH-LEVEL API
// ============================================================================

export { crawlNews, NewsCrawler, type CrawlNewsOptions, type NewsCrawlerComponents } from './orchestrator/news-crawler';

// ============================================================================
// CONFIGURATION & CONTEXT
// ============================================================================

export {
  CrawlerConfigSchema,
  DEFAULT_USER_AGENTS,
  LOG_LEVELS,
  resolveConfig,
  compileArticlePattern,
  type CrawlerConfig,
  type CrawlerOptions,
  type LogLevel
} from './config';

export { createCrawlContext, type CrawlContext, type CrawlContextOverrides, type FetchLike } from './context';

// ============================================================================
// COMPONENTS
// ============================================================================

export { HttpFetcher, classifyStatus, type FetchOptions, type StatusClass } from './fetcher/http-fetcher';

export {
  RobotsGate,
  parseRobotsTxt,
  extractSitemapUrls,
  isPathAllowedByPolicy,
  type RobotsPolicy,
  type RobotsRule,
  type LoadedPolicy
} from './extractors/robots-checker';

export { SitemapWalker, parseSitemapDocument, type SitemapDocument } from './extractors/sitemap-parser';

export {
  ArticleExtractor,
  firstOf,
  decodeLinkedData,
  authorNames,
  parseBylineText,
  type FieldExtractor,
  type LinkedDataBlock
} from './extractors/content-extractor';

export {
  writeJsonl,
  writeCsv,
  writeOutputs,
  readJsonl,
  toJsonLine,
  toCsv,
  type OutputPaths
} from './persistence/writers';

// Utilities
export { createLogger, formatLogLine, type Logger } from './utils/logger';
export { backoffDelayMs, uniformDelayMs, politePause, wait, type Sleep, type RandomSource } from './utils/politeness';

// ============================================================================
// TYPES & ERRORS
// ============================================================================

export { ArticleSchema, ARTICLE_FIELDS, type Article, type ArticleField, type CrawlResult, type CrawlStats, type FetchedPage } from './types';

export {
  CrawlerError,
  RobotsUnavailableError,
  NoSitemapsError,
  InvalidConfigError,
  PersistenceError,
  isCrawlerError,
  isAbortError
} from './errors';

export const VERSION = '0.1.0';
