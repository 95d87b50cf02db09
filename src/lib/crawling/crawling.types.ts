/**
 * Crawling Types
 * Type definitions for single-site crawling
 */

import type { CrawlErrorType } from '../scraping/errors';
import type { PageExtraction } from '../extraction/extraction.types';

/**
 * How the configured domain is matched against a URL
 */
export type DomainMatchMode = 'substring' | 'host';

export type DomainPredicate = (url: string) => boolean;

/**
 * Lifecycle of a URL inside one crawl
 */
export type PageStatus = 'pending' | 'fetching' | 'processed' | 'failed';

/**
 * Crawling engine configuration
 */
export interface CrawlingConfig {
  /**
   * Maximum number of fetches in flight (1 = strictly sequential)
   */
  concurrency: number;
}

/**
 * Crawling statistics interface
 */
export interface CrawlingStatistics {
  /**
   * Number of pages fetched, parsed and extracted
   */
  pagesVisited: number;

  /**
   * Frontier entries discarded because the URL was already handled
   */
  pagesSkipped: number;

  /**
   * Number of pages dropped after a fetch or parse failure
   */
  pagesFailed: number;

  /**
   * Number of in-domain links found across all pages
   */
  linksDiscovered: number;

  /**
   * Total crawling time in milliseconds
   */
  totalTime: number;

  /**
   * Average time per processed page in milliseconds
   */
  averagePageTime: number;

  /**
   * Success rate (0-1)
   */
  successRate: number;
}

/**
 * A URL dropped from the crawl
 */
export interface CrawlFailure {
  url: string;
  type: CrawlErrorType;
  message: string;
  statusCode?: number;
}

/**
 * Receives each processed page exactly once
 */
export type PageHandler = (url: string, extraction: PageExtraction) => void;

/**
 * What the traversal engine hands back when the frontier is exhausted
 */
export interface CrawlOutcome {
  visitedUrls: ReadonlySet<string>;
  failures: CrawlFailure[];
  statistics: CrawlingStatistics;
  cancelled: boolean;
}

/**
 * Consolidated output of a crawl, immutable once built
 */
export interface CrawlResult {
  /** Every processed URL, in visit order */
  readonly uniqueUrls: ReadonlySet<string>;
  readonly imageUrls: ReadonlySet<string>;
  readonly phoneNumbers: ReadonlySet<string>;
  readonly zipCodes: ReadonlySet<string>;
  /** Lower-cased content words */
  readonly vocabulary: ReadonlySet<string>;
  /** Verb lemmas */
  readonly verbs: ReadonlySet<string>;
  /** Noun lemmas */
  readonly nouns: ReadonlySet<string>;
  readonly verbFrequencies: ReadonlyMap<string, number>;
  readonly nounFrequencies: ReadonlyMap<string, number>;
  readonly failures: readonly CrawlFailure[];
  readonly statistics: Readonly<CrawlingStatistics>;
}
