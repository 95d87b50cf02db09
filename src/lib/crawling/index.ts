/**
 * Crawling System
 * Main export file for single-site crawling
 */

export * from './crawling.types';
export * from './url-scope';
export * from './visited-set';
export * from './link-discoverer';
export * from './crawling-frontier';
export * from './crawling-statistics';
export * from './crawl-aggregator';
export * from './crawl-engine';
