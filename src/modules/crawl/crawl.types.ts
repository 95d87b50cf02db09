/**
 * Crawl Module Types
 * Settings and pipeline configuration for one crawl run
 */

import type { DomainMatchMode, DomainPredicate } from '../../lib/crawling/crawling.types';
import type { PatternSet } from '../../lib/extraction/patterns';
import type { FrequencyMode, LanguageToolkit } from '../../lib/processing/processing.types';

/**
 * Fully resolved, validated settings
 */
export interface CrawlSettings {
  seedUrl: string;
  domain: string;
  domainMatch: DomainMatchMode;
  baseUrl: string;
  reportPath: string;
  reportFrequencies: boolean;
  frequencyMode: FrequencyMode;
  concurrency: number;
  fetchTimeout: number;
  maxRetries: number;
  retryBackoffBase: number;
  userAgent: string;
}

/**
 * Settings as given on the command line; anything missing falls back to the environment
 */
export type CrawlSettingsOverrides = Partial<CrawlSettings>;

/**
 * Shared, read-only state every pipeline component is built from
 */
export interface PipelineConfig {
  settings: Readonly<CrawlSettings>;
  isInDomain: DomainPredicate;
  patterns: PatternSet;
  stopwords: ReadonlySet<string>;
  toolkit: LanguageToolkit;
}
