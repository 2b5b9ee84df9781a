import { z } from 'zod';

// Field order here is the column order of both output files
export const ArticleSchema = z.object({
  url: z.string().url(),
  canonicalUrl: z.string().nullable(),
  title: z.string().nullable(),
  description: z.string().nullable(),
  /** Raw `article:published_time` text, not parsed */
  publishedAt: z.string().nullable(),
  modifiedAt: z.string().nullable(),
  section: z.string().nullable(),
  /** Deduplicated, sorted */
  authors: z.array(z.string().min(1)),
});

export type Article = Readonly<z.infer<typeof ArticleSchema>>;

export type ArticleField = keyof Article;

export const ARTICLE_FIELDS = [
  'url',
  'canonicalUrl',
  'title',
  'description',
  'publishedAt',
  'modifiedAt',
  'section',
  'authors',
] as const satisfies readonly ArticleField[];

export interface FetchedPage {
  /** URL that was requested */
  url: string;
  status: number;
  body: string;
  headers: Headers;
}

export interface CrawlStats {
  /** Robots-allowed URLs collected from the sitemaps */
  candidates: number;
  /** Article fetches issued */
  attempted: number;
  successful: number;
  failed: number;
  /** Candidates rejected by the second permission check */
  filtered: number;
}

export interface CrawlResult {
  articles: Article[];
  stats: CrawlStats;
  outputs: {
    jsonlPath: string;
    csvPath: string;
  };
}
