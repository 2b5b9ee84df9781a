import { resolveConfig, type CrawlerConfig, type CrawlerOptions } from './config';
import { createLogger, type Logger } from './utils/logger';
import { wait, type RandomSource, type Sleep } from './utils/politeness';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Everything a component needs from the outside world. Passed explicitly
 * to each component; there are no module-level instances.
 */
export interface CrawlContext {
  config: CrawlerConfig;
  fetch: FetchLike;
  sleep: Sleep;
  random: RandomSource;
  logger: Logger;
}

export interface CrawlContextOverrides {
  config?: CrawlerOptions;
  fetch?: FetchLike;
  sleep?: Sleep;
  random?: RandomSource;
  logger?: Logger;
}

export function createCrawlContext(overrides: CrawlContextOverrides = {}): CrawlContext {
  const config = resolveConfig(overrides.config);

  return {
    config,
    fetch: overrides.fetch ?? ((url, init) => fetch(url, init)),
    sleep: overrides.sleep ?? wait,
    random: overrides.random ?? Math.random,
    logger: overrides.logger ?? createLogger('Crawler', config.logLevel),
  };
}
