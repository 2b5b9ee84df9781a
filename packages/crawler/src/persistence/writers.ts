/**
 * Output sinks for a crawl: line-delimited JSON and CSV.
 *
 * Both overwrite their file. The CSV sink writes nothing at all for an
 * empty record set, while the JSONL sink leaves an empty file.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { errorMessage, PersistenceError } from '../errors';
import { ARTICLE_FIELDS, ArticleSchema, type Article } from '../types';

export interface OutputPaths {
  jsonlPath: string;
  csvPath: string;
}

type TabularRow = Record<(typeof ARTICLE_FIELDS)[number], string>;

function writeFile(filePath: string, content: string): void {
  try {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf-8');
  } catch (error) {
    throw new PersistenceError(`Failed to write ${filePath}: ${errorMessage(error)}`, {
      path: filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * One record as a JSON line, keys in declaration order.
 */
export function toJsonLine(article: Article): string {
  const ordered = Object.fromEntries(ARTICLE_FIELDS.map(field => [field, article[field]]));
  return JSON.stringify(ordered);
}

export function writeJsonl(articles: readonly Article[], filePath: string): void {
  writeFile(filePath, articles.map(article => toJsonLine(article) + '\n').join(''));
}

/**
 * Flatten a record for the CSV sink: authors joined with ", ", nulls empty.
 */
export function toTabularRow(article: Article): TabularRow {
  return {
    url: article.url,
    canonicalUrl: article.canonicalUrl ?? '',
    title: article.title ?? '',
    description: article.description ?? '',
    publishedAt: article.publishedAt ?? '',
    modifiedAt: article.modifiedAt ?? '',
    section: article.section ?? '',
    authors: article.authors.join(', '),
  };
}

export function toCsv(articles: readonly Article[]): string {
  const worksheet = XLSX.utils.json_to_sheet(articles.map(toTabularRow), { header: [...ARTICLE_FIELDS] });
  return XLSX.utils.sheet_to_csv(worksheet, { RS: '\n', FS: ',' }) + '\n';
}

/**
 * Returns false when there was nothing to write.
 */
export function writeCsv(articles: readonly Article[], filePath: string): boolean {
  if (articles.length === 0) return false;
  writeFile(filePath, toCsv(articles));
  return true;
}

export function writeOutputs(articles: readonly Article[], paths: OutputPaths): void {
  writeJsonl(articles, paths.jsonlPath);
  writeCsv(articles, paths.csvPath);
}

/**
 * Read a JSONL file back, validating each line. Blank lines are ignored.
 */
export function readJsonl(filePath: string): Article[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new PersistenceError(`Failed to read ${filePath}: ${errorMessage(error)}`, {
      path: filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const articles: Article[] = [];
  content.split('\n').forEach((line, index) => {
    if (!line.trim()) return;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      throw new PersistenceError(`Invalid JSON on line ${index + 1} of ${filePath}`, {
        path: filePath,
        line: index + 1,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const parsed = ArticleSchema.safeParse(value);
    if (!parsed.success) {
      throw new PersistenceError(
        `Invalid record on line ${index + 1} of ${filePath}: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
        { path: filePath, line: index + 1 }
      );
    }
    articles.push(parsed.data);
  });

  return articles;
}
