/**
 * Extraction System
 * Main export file for pattern matching and per-page extraction
 */

export * from './extraction.types';
export * from './patterns';
export * from './page-extractor';
