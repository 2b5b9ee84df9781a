#!/usr/bin/env npx tsx
/**
 * News crawl CLI
 *
 * Crawls the configured site's sitemaps and writes articles.jsonl and
 * articles.csv to the working directory.
 *
 * Usage:
 *   npx tsx cli/crawl.ts [maxArticles]
 *   npx tsx cli/crawl.ts 50
 *
 * Options:
 *   --help, -h       Show this help message
 */

import { crawlNews, isCrawlerError } from '../packages/crawler/src/index';

const DEFAULT_MAX_ARTICLES = 20;

// ============================================================================
// Argument Parsing
// ============================================================================

interface CliArgs {
  maxArticles: number;
  help: boolean;
  error?: string;
}

function parseArgs(argv: string[]): CliArgs {
  const args = argv.slice(2);
  const result: CliArgs = { maxArticles: DEFAULT_MAX_ARTICLES, help: false };

  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      result.help = true;
      continue;
    }

    if (!/^\d+$/.test(arg) || Number(arg) < 1) {
      result.error = `Expected a positive article count, got "${arg}"`;
      continue;
    }

    result.maxArticles = Number(arg);
  }

  return result;
}

function showHelp() {
  console.log(`
News crawl CLI

Usage:
  npx tsx cli/crawl.ts [maxArticles]

Arguments:
  maxArticles   Number of articles to collect (default: ${DEFAULT_MAX_ARTICLES})

Options:
  -h, --help    Show this help message

Output:
  articles.jsonl  One JSON record per line
  articles.csv    Same records, authors joined with ", "
`);
}

// ============================================================================
// Main
// ============================================================================

async function main() {
  const args = parseArgs(process.argv);

  if (args.help || args.error) {
    if (args.error) console.error(`Error: ${args.error}`);
    showHelp();
    process.exit(args.error ? 1 : 0);
  }

  const result = await crawlNews({ maxArticles: args.maxArticles });

  console.error(`\n--- Summary ---`);
  console.error(`Articles saved: ${result.stats.successful}/${result.stats.candidates}`);
  console.error(`Failed: ${result.stats.failed}, filtered: ${result.stats.filtered}`);
}

main().catch(error => {
  const prefix = isCrawlerError(error) ? `Crawl aborted (${error.code})` : 'Fatal error';
  console.error(`${prefix}: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
