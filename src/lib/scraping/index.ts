/**
 * Scraping System
 * Main export file for fetching, parsing, and crawl errors
 */

export * from './errors';
export * from './page-fetcher';
export * from './html-parser';
