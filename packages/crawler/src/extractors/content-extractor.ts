import * as cheerio from 'cheerio';
import { z } from 'zod';
import { errorMessage } from '../errors';
import type { Article } from '../types';
import { createLogger, type Logger } from '../utils/logger';

type Document = cheerio.CheerioAPI;

/** One step of a fallback chain; null means "try the next one" */
export type FieldExtractor = ($: Document) => string | null | undefined;

const ARTICLE_TYPES = new Set([
  'Article',
  'NewsArticle',
  'ReportageNewsArticle',
  'AnalysisNewsArticle',
  'OpinionNewsArticle',
  'BackgroundNewsArticle',
  'ReviewNewsArticle',
  'BlogPosting',
  'LiveBlogPosting',
  'Report',
  'WebPage',
]);

const MIN_BYLINE_NAME = 2;
const MAX_BYLINE_NAME = 80;

// ============================================================================
// Fallback chains
// ============================================================================

const clean = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

/**
 * Run extractors in order and return the first non-empty value.
 */
export function firstOf($: Document, chain: readonly FieldExtractor[]): string | null {
  for (const extractor of chain) {
    try {
      const value = clean(extractor($));
      if (value !== null) return value;
    } catch {
      continue;
    }
  }
  return null;
}

const meta =
  (attribute: 'name' | 'property', key: string): FieldExtractor =>
  $ =>
    $(`meta[${attribute}="${key}"]`).first().attr('content');

const metaEitherForm = (key: string): FieldExtractor[] => [meta('name', key), meta('property', key)];

export const TITLE_CHAIN: readonly FieldExtractor[] = [...metaEitherForm('og:title'), $ => $('title').first().text()];

export const DESCRIPTION_CHAIN: readonly FieldExtractor[] = [
  meta('name', 'description'),
  meta('property', 'og:description'),
  meta('name', 'og:description'),
];

export const PUBLISHED_CHAIN: readonly FieldExtractor[] = metaEitherForm('article:published_time');
export const MODIFIED_CHAIN: readonly FieldExtractor[] = metaEitherForm('article:modified_time');
export const SECTION_CHAIN: readonly FieldExtractor[] = metaEitherForm('article:section');

export const CANONICAL_CHAIN: readonly FieldExtractor[] = [
  $ => {
    const link = $('link[rel]')
      .toArray()
      .find(element => {
        const rel = $(element).attr('rel') ?? '';
        return rel.toLowerCase().split(/\s+/).includes('canonical');
      });
    return link ? $(link).attr('href') : null;
  },
];

// ============================================================================
// Linked data (JSON-LD)
// ============================================================================

const LinkedDataNodeSchema = z
  .object({
    '@type': z.union([z.string(), z.array(z.string())]).optional(),
    '@graph': z.array(z.unknown()).optional(),
    author: z.unknown().optional(),
  })
  .passthrough();

type LinkedDataNode = z.infer<typeof LinkedDataNodeSchema>;

const NamedAuthorSchema = z.object({ name: z.string() }).passthrough();

export type LinkedDataBlock =
  | { kind: 'single'; node: LinkedDataNode }
  | { kind: 'list'; nodes: LinkedDataNode[] }
  | { kind: 'unrecognized' };

const decodeNodes = (values: unknown[]): LinkedDataNode[] =>
  values.flatMap(value => {
    const parsed = LinkedDataNodeSchema.safeParse(value);
    return parsed.success ? [parsed.data] : [];
  });

/**
 * Classify one parsed JSON-LD block. An `@graph` container counts as a list.
 */
export function decodeLinkedData(value: unknown): LinkedDataBlock {
  if (Array.isArray(value)) {
    return { kind: 'list', nodes: decodeNodes(value) };
  }

  const parsed = LinkedDataNodeSchema.safeParse(value);
  if (!parsed.success) {
    return { kind: 'unrecognized' };
  }

  if (parsed.data['@graph']) {
    return { kind: 'list', nodes: decodeNodes(parsed.data['@graph']) };
  }

  return { kind: 'single', node: parsed.data };
}

function isArticleNode(node: LinkedDataNode): boolean {
  const declared = node['@type'];
  const types = Array.isArray(declared) ? declared : declared ? [declared] : [];
  return types.some(type => ARTICLE_TYPES.has(type));
}

/**
 * `{ name }` gives one name, a list of `{ name }` gives one each; anything else none.
 */
export function authorNames(author: unknown): string[] {
  const entries = Array.isArray(author) ? author : [author];
  return entries.flatMap(entry => {
    const parsed = NamedAuthorSchema.safeParse(entry);
    const name = parsed.success ? clean(parsed.data.name) : null;
    return name ? [name] : [];
  });
}

export function authorsFromLinkedData($: Document, log?: Logger): string[] {
  const names: string[] = [];

  $('script[type="application/ld+json"]').each((index, element) => {
    const raw = $(element).html();
    if (!raw) return;

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      log?.debug(`Skipping malformed JSON-LD block #${index + 1}`);
      return;
    }

    const block = decodeLinkedData(value);
    const nodes = block.kind === 'single' ? [block.node] : block.kind === 'list' ? block.nodes : [];
    for (const node of nodes) {
      if (isArticleNode(node)) {
        names.push(...authorNames(node.author));
      }
    }
  });

  return names;
}

// ============================================================================
// Byline fallback
// ============================================================================

/**
 * Split byline text such as "By Jane Doe, John Smith and Ann Lee" into names.
 */
export function parseBylineText(text: string): string[] {
  const marker = text.toLowerCase().indexOf('by ');
  const names = marker === -1 ? text : text.slice(marker + 3);

  return names
    .split(/,| and /)
    .map(fragment => fragment.trim())
    .filter(
      fragment =>
        fragment.length >= MIN_BYLINE_NAME && fragment.length <= MAX_BYLINE_NAME && !fragment.includes('©')
    );
}

export function authorsFromByline($: Document): string[] {
  const byline = $('[data-testid], [class]')
    .filter((_, element) => {
      const $element = $(element);
      return [$element.attr('data-testid'), $element.attr('class')].some(
        value => value !== undefined && value.toLowerCase().includes('byline')
      );
    })
    .first();

  if (byline.length === 0) return [];

  // Text nodes in document order, joined with spaces so nested spans do not run together
  const collectText = (nodes: ReturnType<typeof byline.contents>): string[] =>
    nodes.toArray().flatMap(node => (node.nodeType === 3 ? [$(node).text()] : collectText($(node).contents())));

  const text = collectText(byline.contents()).join(' ').replace(/\s+/g, ' ').trim();

  return parseBylineText(text);
}

// ============================================================================
// Extractor
// ============================================================================

export class ArticleExtractor {
  private readonly log: Logger;

  constructor(logger: Logger = createLogger('Extractor', 'silent')) {
    this.log = logger.child('Extractor');
  }

  /**
   * Build the metadata record for one page. Never throws; fields that
   * cannot be found are null and `authors` is empty.
   */
  extract(html: string, url: string): Article {
    const $ = cheerio.load(html);

    let authors = this.safely(() => authorsFromLinkedData($, this.log), url);
    if (authors.length === 0) {
      authors = this.safely(() => authorsFromByline($), url);
    }

    return {
      url,
      canonicalUrl: firstOf($, CANONICAL_CHAIN),
      title: firstOf($, TITLE_CHAIN),
      description: firstOf($, DESCRIPTION_CHAIN),
      publishedAt: firstOf($, PUBLISHED_CHAIN),
      modifiedAt: firstOf($, MODIFIED_CHAIN),
      section: firstOf($, SECTION_CHAIN),
      authors: [...new Set(authors.map(name => name.trim()).filter(Boolean))].sort(),
    };
  }

  private safely(read: () => string[], url: string): string[] {
    try {
      return read();
    } catch (error) {
      this.log.debug(`Author extraction failed for ${url}: ${errorMessage(error)}`);
      return [];
    }
  }
}
