/**
 * Test doubles: an in-process fetch that replays canned responses per URL,
 * a recording sleep and a fixed random source.
 */

import { vi } from 'vitest';
import { createCrawlContext, type CrawlContext } from '../packages/crawler/src/context';
import type { CrawlerOptions } from '../packages/crawler/src/config';

export const BASE_URL = 'https://news.example.com';

export type Reply = { status: number; body?: string } | Error;

/**
 * Each URL gets a list of replies consumed in order; the last one repeats.
 * Unknown URLs answer 404.
 */
export function fakeFetch(routes: Record<string, Reply | Reply[]>) {
  const remaining = new Map<string, Reply[]>(
    Object.entries(routes).map(([url, reply]) => [url, Array.isArray(reply) ? [...reply] : [reply]])
  );

  return vi.fn(async (url: string, _init?: RequestInit): Promise<Response> => {
    const queue = remaining.get(url) ?? [];
    const reply = queue.length > 1 ? queue.shift() : queue[0];

    if (reply === undefined) {
      return new Response('not found', { status: 404 });
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return new Response(reply.body ?? '', { status: reply.status });
  });
}

export function testContext(fetchImpl: CrawlContext['fetch'], config: CrawlerOptions = {}) {
  const sleep = vi.fn(async (_ms: number): Promise<void> => undefined);
  const context = createCrawlContext({
    config: { baseUrl: BASE_URL, logLevel: 'silent', ...config },
    fetch: fetchImpl,
    sleep,
    random: () => 0.5,
  });
  return { ...context, sleep };
}

export function urlset(urls: string[]): string {
  const entries = urls.map(url => `  <url><loc>${url}</loc><lastmod>2024-05-01</lastmod></url>`).join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${entries}
</urlset>`;
}

export function sitemapIndex(sitemaps: string[]): string {
  const entries = sitemaps.map(url => `  <sitemap><loc>${url}</loc></sitemap>`).join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${entries}
</sitemapindex>`;
}

export function articlePath(id: string): string {
  return `${BASE_URL}/news/articles/${id}`;
}
