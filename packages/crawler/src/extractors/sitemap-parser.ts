import * as cheerio from 'cheerio';
import type { CrawlContext } from '../context';
import type { HttpFetcher } from '../fetcher/http-fetcher';
import type { Logger } from '../utils/logger';
import { politePause } from '../utils/politeness';

export interface SitemapDocument {
  /** `<sitemap><loc>` children of a sitemap index */
  sitemaps: string[];
  /** `<url><loc>` entries of a leaf sitemap */
  urls: string[];
}

const SITEMAP_ACCEPT = 'application/xml, text/xml, */*';

function collectLocations($: cheerio.CheerioAPI): SitemapDocument {
  const read = (selector: string): string[] => {
    const locations: string[] = [];
    $(selector).each((_, element) => {
      const loc = $(element).find('loc').first().text().trim();
      if (loc) {
        locations.push(loc);
      }
    });
    return locations;
  };

  return { sitemaps: read('sitemap'), urls: read('url') };
}

function tryParse(body: string, xml: boolean): SitemapDocument | null {
  try {
    return collectLocations(cheerio.load(body, { xml }));
  } catch {
    return null;
  }
}

/**
 * Read both sitemap shapes out of one document. The strict XML pass is
 * case-sensitive; when it throws or misses every `<loc>` the lenient HTML
 * parser gets a second try. A body neither pass understands is empty.
 */
export function parseSitemapDocument(body: string): SitemapDocument {
  const strict = tryParse(body, true);
  const found = (doc: SitemapDocument | null) => doc !== null && doc.sitemaps.length + doc.urls.length > 0;

  if (found(strict) || !/<loc[\s>]/i.test(body)) {
    return strict ?? { sitemaps: [], urls: [] };
  }

  return tryParse(body, false) ?? { sitemaps: [], urls: [] };
}

export class SitemapWalker {
  private readonly log: Logger;

  constructor(
    private readonly context: CrawlContext,
    private readonly fetcher: HttpFetcher
  ) {
    this.log = context.logger.child('Sitemap');
  }

  /**
   * Breadth-first walk over sitemap indexes, yielding at most `limit`
   * distinct page URLs. Sitemap documents and page URLs share one visited set.
   */
  async *walk(seedUrls: readonly string[], limit: number): AsyncGenerator<string, void, undefined> {
    if (limit <= 0) return;

    const visited = new Set<string>();
    const queue: string[] = [];
    for (const seed of seedUrls) {
      if (!visited.has(seed)) {
        visited.add(seed);
        queue.push(seed);
      }
    }

    let yielded = 0;
    let sitemapUrl: string | undefined;

    while ((sitemapUrl = queue.shift()) !== undefined) {
      this.log.info(`🗺️ Fetching ${sitemapUrl} (${queue.length} queued)`);
      const page = await this.fetcher.fetch(sitemapUrl, { accept: SITEMAP_ACCEPT });
      await politePause(this.context);

      if (!page) {
        this.log.warn(`⚠️ Skipping sitemap ${sitemapUrl}`);
        continue;
      }

      const document = parseSitemapDocument(page.body);
      if (document.sitemaps.length === 0 && document.urls.length === 0) {
        this.log.warn(`⚠️ No entries found in sitemap ${sitemapUrl}`);
        continue;
      }

      let queued = 0;
      for (const child of document.sitemaps) {
        if (visited.has(child)) continue;
        visited.add(child);
        queue.push(child);
        queued++;
      }
      if (queued > 0) {
        this.log.info(`🗺️ Queued ${queued} child sitemaps from ${sitemapUrl}`);
      }

      for (const url of document.urls) {
        if (visited.has(url)) continue;
        visited.add(url);
        yield url;
        yielded++;

        if (yielded >= limit) {
          this.log.info(`🗺️ Reached limit of ${limit} URLs`);
          return;
        }
      }
    }

    this.log.info(`🗺️ Sitemap queue exhausted after ${yielded} URLs`);
  }
}
