/**
 * Lexical Processing System
 * Main export file for lexical filtering and analysis
 */

export * from './processing.types';
export * from './lexical-filter';
export * from './lexical-analyzer';
export * from './language-toolkit';
