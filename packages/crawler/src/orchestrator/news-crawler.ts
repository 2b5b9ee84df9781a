import { createCrawlContext, type CrawlContext, type CrawlContextOverrides } from '../context';
import { InvalidConfigError } from '../errors';
import { ArticleExtractor } from '../extractors/content-extractor';
import { RobotsGate } from '../extractors/robots-checker';
import { SitemapWalker } from '../extractors/sitemap-parser';
import { HttpFetcher } from '../fetcher/http-fetcher';
import { writeOutputs } from '../persistence/writers';
import type { Article, CrawlResult, CrawlStats } from '../types';
import type { Logger } from '../utils/logger';
import { politePause } from '../utils/politeness';

export interface NewsCrawlerComponents {
  fetcher: HttpFetcher;
  robots: RobotsGate;
  walker: SitemapWalker;
  extractor: ArticleExtractor;
}

/**
 * robots.txt → sitemaps → allow filter → fetch → extract → write, one
 * request at a time.
 */
export class NewsCrawler {
  private readonly log: Logger;
  private readonly components: NewsCrawlerComponents;

  constructor(
    private readonly context: CrawlContext,
    components: Partial<NewsCrawlerComponents> = {}
  ) {
    this.log = context.logger.child('Crawler');
    const fetcher = components.fetcher ?? new HttpFetcher(context);
    this.components = {
      fetcher,
      robots: components.robots ?? new RobotsGate(context, fetcher),
      walker: components.walker ?? new SitemapWalker(context, fetcher),
      extractor: components.extractor ?? new ArticleExtractor(context.logger),
    };
  }

  async run(maxArticles: number): Promise<CrawlResult> {
    if (!Number.isInteger(maxArticles) || maxArticles < 1) {
      throw new InvalidConfigError(`maxArticles must be a positive integer, got ${maxArticles}`, {
        issues: [`maxArticles: expected a positive integer`],
      });
    }

    const { fetcher, robots, walker, extractor } = this.components;
    const { oversampleFactor, output } = this.context.config;
    const stats: CrawlStats = { candidates: 0, attempted: 0, successful: 0, failed: 0, filtered: 0 };

    // Errors here abort the run before anything is written
    const { sitemaps } = await robots.loadPolicy();
    this.log.info(`🕷️ Starting crawl for ${maxArticles} articles from ${sitemaps.length} sitemaps`);

    const candidates: string[] = [];
    for await (const url of walker.walk(sitemaps, maxArticles * oversampleFactor)) {
      if (!robots.isAllowed(url)) continue;
      candidates.push(url);
      if (candidates.length >= maxArticles) break;
    }
    stats.candidates = candidates.length;
    this.log.info(`🕷️ Collected ${candidates.length} candidate articles`);

    const articles: Article[] = [];
    for (const [index, url] of candidates.entries()) {
      // Permissions are checked again at fetch time
      if (!robots.isAllowed(url)) {
        stats.filtered++;
        this.log.warn(`⛔ Skipping disallowed ${url}`);
        continue;
      }

      await politePause(this.context);
      stats.attempted++;

      const page = await fetcher.fetch(url);
      if (!page) {
        stats.failed++;
        continue;
      }

      const article = extractor.extract(page.body, url);
      articles.push(article);
      stats.successful++;
      this.log.info(`📰 [${index + 1}/${candidates.length}] ${article.title ?? '(untitled)'}`);
    }

    writeOutputs(articles, output);
    this.log.info(
      `✅ Wrote ${articles.length} articles to ${output.jsonlPath} and ${output.csvPath} ` +
        `(attempted ${stats.attempted}, failed ${stats.failed}, filtered ${stats.filtered})`
    );

    return { articles, stats, outputs: { ...output } };
  }
}

export interface CrawlNewsOptions extends CrawlContextOverrides {
  /** Number of articles to collect (default: 20) */
  maxArticles?: number;
}

/**
 * Build a context from options and run one crawl.
 *
 * @example
 * ```typescript
 * const { articles } = await crawlNews({ maxArticles: 10 });
 * console.log(`Saved ${articles.length} articles`);
 * ```
 */
export async function crawlNews(options: CrawlNewsOptions = {}): Promise<CrawlResult> {
  const { maxArticles = 20, ...overrides } = options;
  const context = createCrawlContext(overrides);
  return new NewsCrawler(context).run(maxArticles);
}
