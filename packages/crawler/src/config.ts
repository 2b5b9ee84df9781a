import { z } from 'zod';
import { InvalidConfigError } from './errors';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_4) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64; rv:125.0) Gecko/20100101 Firefox/125.0',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
] as const;

const DelayRangeSchema = z
  .object({
    min: z.number().int().min(0),
    max: z.number().int().min(0),
  })
  .refine(range => range.min <= range.max, { message: 'min must not exceed max' });

// Zod schema for crawler options; every field has a default
export const CrawlerConfigSchema = z.object({
  baseUrl: z.string().url().default('https://www.bbc.com'),
  /** Regex source matched against the URL path, case-insensitive */
  articlePathPattern: z.string().min(1).default('^/news/articles/[a-z0-9]+'),
  maxRetries: z.number().int().min(1).max(10).default(3),
  backoffBase: z.number().min(1).default(1.5),
  requestTimeoutMs: z.number().int().positive().default(20_000),
  politenessDelayMs: DelayRangeSchema.default({ min: 2_000, max: 5_000 }),
  /** Sitemap walk cap as a multiple of the article target */
  oversampleFactor: z.number().int().min(1).default(5),
  userAgents: z.array(z.string().min(1)).min(1).default([...DEFAULT_USER_AGENTS]),
  acceptLanguage: z.string().min(1).default('en-GB,en;q=0.9'),
  output: z
    .object({
      jsonlPath: z.string().min(1).default('articles.jsonl'),
      csvPath: z.string().min(1).default('articles.csv'),
    })
    .default({}),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type CrawlerConfig = z.infer<typeof CrawlerConfigSchema>;
export type CrawlerOptions = z.input<typeof CrawlerConfigSchema>;

/**
 * Validate partial options and fill in defaults.
 */
export function resolveConfig(options: CrawlerOptions = {}): CrawlerConfig {
  const parsed = CrawlerConfigSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new InvalidConfigError(`Invalid crawler configuration: ${issues.join('; ')}`, { issues });
  }

  try {
    new RegExp(parsed.data.articlePathPattern, 'i');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidConfigError(`Invalid articlePathPattern: ${message}`, {
      issues: [`articlePathPattern: ${message}`],
      cause: error instanceof Error ? error : undefined,
    });
  }

  return parsed.data;
}

export function compileArticlePattern(config: CrawlerConfig): RegExp {
  return new RegExp(config.articlePathPattern, 'i');
}
