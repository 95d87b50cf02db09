/**
 * Crawl Configuration
 * Resolves CLI overrides and environment into validated settings, and builds
 * the pipeline configuration shared by every component
 */

import { env } from '../../config/env';
import { createDomainPredicate, DomainMatchMode, extractHostname, normalizeBaseUrl } from '../../lib/crawling';
import { compilePatterns } from '../../lib/extraction';
import { FrequencyMode, LanguageToolkit, loadStopwords, NaturalLanguageToolkit } from '../../lib/processing';
import { ConfigurationError } from '../../lib/scraping';
import { CrawlSettings, CrawlSettingsOverrides, PipelineConfig } from './crawl.types';

export type CrawlEnvironment = Pick<
  typeof env,
  | 'SEED_URL'
  | 'CRAWL_DOMAIN'
  | 'DOMAIN_MATCH'
  | 'BASE_URL'
  | 'REPORT_PATH'
  | 'REPORT_FREQUENCIES'
  | 'FREQUENCY_MODE'
  | 'CRAWL_CONCURRENCY'
  | 'FETCH_TIMEOUT'
  | 'MAX_RETRIES'
  | 'RETRY_BACKOFF_BASE'
  | 'USER_AGENT'
>;

const DOMAIN_MATCH_MODES: readonly DomainMatchMode[] = ['substring', 'host'];
const FREQUENCY_MODES: readonly FrequencyMode[] = ['occurrences', 'distinct'];

export function resolveCrawlSettings(
  overrides: CrawlSettingsOverrides = {},
  source: CrawlEnvironment = env
): CrawlSettings {
  const seedUrl = (overrides.seedUrl ?? source.SEED_URL).trim();
  if (!seedUrl) {
    throw new ConfigurationError('No seed URL provided (use --url=<url> or SEED_URL)');
  }

  let seed: URL;
  try {
    seed = new URL(seedUrl);
  } catch {
    throw new ConfigurationError(`Seed URL is not a valid URL: ${seedUrl}`);
  }
  if (seed.protocol !== 'http:' && seed.protocol !== 'https:') {
    throw new ConfigurationError(`Seed URL must use http or https: ${seedUrl}`);
  }

  const settings: CrawlSettings = {
    seedUrl,
    domain: overrides.domain || source.CRAWL_DOMAIN || extractHostname(seedUrl),
    domainMatch: parseChoice('DOMAIN_MATCH', overrides.domainMatch ?? source.DOMAIN_MATCH, DOMAIN_MATCH_MODES),
    baseUrl: normalizeBaseUrl(overrides.baseUrl || source.BASE_URL || seed.origin),
    reportPath: overrides.reportPath || source.REPORT_PATH,
    reportFrequencies: overrides.reportFrequencies ?? source.REPORT_FREQUENCIES,
    frequencyMode: parseChoice('FREQUENCY_MODE', overrides.frequencyMode ?? source.FREQUENCY_MODE, FREQUENCY_MODES),
    concurrency: requirePositiveInteger('CRAWL_CONCURRENCY', overrides.concurrency ?? source.CRAWL_CONCURRENCY),
    fetchTimeout: requirePositiveInteger('FETCH_TIMEOUT', overrides.fetchTimeout ?? source.FETCH_TIMEOUT),
    maxRetries: requirePositiveInteger('MAX_RETRIES', overrides.maxRetries ?? source.MAX_RETRIES),
    retryBackoffBase: requirePositiveInteger('RETRY_BACKOFF_BASE', overrides.retryBackoffBase ?? source.RETRY_BACKOFF_BASE),
    userAgent: overrides.userAgent || source.USER_AGENT,
  };

  const isInDomain = createDomainPredicate(settings.domain, settings.domainMatch);
  if (!isInDomain(settings.seedUrl)) {
    throw new ConfigurationError(`Seed URL ${settings.seedUrl} is outside the crawl domain "${settings.domain}"`);
  }

  return settings;
}

/**
 * Build the shared pipeline state once per run. The toolkit and stopwords can
 * be swapped for tests.
 */
export function createPipelineConfig(
  settings: CrawlSettings,
  language: { toolkit?: LanguageToolkit; stopwords?: ReadonlySet<string> } = {}
): PipelineConfig {
  return {
    settings: Object.freeze({ ...settings }),
    isInDomain: createDomainPredicate(settings.domain, settings.domainMatch),
    patterns: compilePatterns(),
    stopwords: language.stopwords ?? loadStopwords(),
    toolkit: language.toolkit ?? new NaturalLanguageToolkit(),
  };
}

function parseChoice<T extends string>(name: string, value: string, choices: readonly T[]): T {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigurationError(`${name} must be one of ${choices.join(', ')}, got "${value}"`);
  }
  return match;
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}
