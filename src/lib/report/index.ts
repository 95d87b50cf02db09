/**
 * Report System
 * Main export file for report rendering and writing
 */

export * from './report.writer';
